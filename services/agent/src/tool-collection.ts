/**
 * Tool Collection — the agent's catalogue of callable tools.
 *
 * Keyed by tool name; insertion order is the order tools are offered to the
 * model. Adding a name that already exists replaces the entry in place, so the
 * most recent registration wins without reordering the catalogue.
 */

import { logger, type ToolDescriptor, type ToolSpec } from '@toolloop/shared';

const log = logger.child({ module: 'tool-collection' });

export class ToolCollection {
  private tools = new Map<string, ToolSpec>();

  constructor(tools: Iterable<ToolSpec> = []) {
    this.addTools(...tools);
  }

  get size(): number {
    return this.tools.size;
  }

  /** Upsert tools by name. A replacement from a different owner is logged. */
  addTools(...specs: ToolSpec[]): void {
    for (const spec of specs) {
      const existing = this.tools.get(spec.name);
      if (existing && existing.owner !== spec.owner) {
        log.warn(
          { tool: spec.name, previousOwner: existing.owner ?? 'local', owner: spec.owner ?? 'local' },
          'tool name collision, replacing existing tool',
        );
      }
      this.tools.set(spec.name, spec);
    }
  }

  /** Remove every tool matching the predicate. Returns the removed names. */
  removeTools(predicate: (spec: ToolSpec) => boolean): string[] {
    const removed: string[] = [];
    for (const [name, spec] of this.tools) {
      if (predicate(spec)) {
        this.tools.delete(name);
        removed.push(name);
      }
    }
    return removed;
  }

  removeByOwner(owner: string): string[] {
    return this.removeTools((spec) => spec.owner === owner);
  }

  lookup(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listSpecs(): ToolSpec[] {
    return [...this.tools.values()];
  }

  /** Model-facing declarations, in catalogue order */
  descriptors(): ToolDescriptor[] {
    return this.listSpecs().map(({ name, description, parameters }) => ({ name, description, parameters }));
  }
}
