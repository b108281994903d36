import { describe, it, expect } from 'vitest';
import { StuckDetector } from '../stuck-detector.js';

function feed(detector: StuckDetector, states: string[]): boolean[] {
  return states.map((state) => {
    detector.observe(state);
    return detector.shouldAbort();
  });
}

describe('StuckDetector', () => {
  it('aborts once the same state repeats threshold times in a row', () => {
    const detector = new StuckDetector(3);
    expect(feed(detector, ['A', 'A', 'A'])).toEqual([false, false, true]);
    expect(detector.repeats).toBe(3);
  });

  it('resets the run when the state changes', () => {
    const detector = new StuckDetector(3);
    expect(feed(detector, ['A', 'A', 'B', 'A', 'A'])).toEqual([false, false, false, false, false]);
    expect(detector.repeats).toBe(2);
  });

  it('aborts at threshold 2 on the first repeat', () => {
    const detector = new StuckDetector(2);
    expect(feed(detector, ['A', 'B', 'B'])).toEqual([false, false, true]);
  });

  it('starts over after reset()', () => {
    const detector = new StuckDetector(2);
    feed(detector, ['A', 'A']);
    detector.reset();
    expect(detector.repeats).toBe(0);
    expect(feed(detector, ['A'])).toEqual([false]);
  });

  it('rejects thresholds below 2', () => {
    expect(() => new StuckDetector(1)).toThrow('StuckDetector threshold must be an integer >= 2, got 1');
  });
});
