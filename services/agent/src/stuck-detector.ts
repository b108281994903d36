/**
 * Detects an agent repeating itself: counts the length of the current run of
 * identical consecutive states and signals once it reaches the threshold.
 */
export class StuckDetector {
  private last: string | undefined;
  private count = 0;

  constructor(readonly threshold: number) {
    if (!Number.isInteger(threshold) || threshold < 2) {
      throw new Error(`StuckDetector threshold must be an integer >= 2, got ${threshold}`);
    }
  }

  /** Length of the current run of identical states */
  get repeats(): number {
    return this.count;
  }

  observe(state: string): void {
    if (state === this.last) {
      this.count++;
    } else {
      this.last = state;
      this.count = 1;
    }
  }

  shouldAbort(): boolean {
    return this.count >= this.threshold;
  }

  reset(): void {
    this.last = undefined;
    this.count = 0;
  }
}
