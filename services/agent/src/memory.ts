import type { AssistantMessage, Message } from '@toolloop/shared';

/**
 * Append-only conversation history owned by one agent.
 * Messages are frozen on entry and never edited afterwards.
 */
export class Memory {
  private readonly entries: Message[] = [];

  add(message: Message): Readonly<Message> {
    const copy = { ...message };
    if (copy.role === 'assistant') {
      copy.toolCalls = [...copy.toolCalls];
      Object.freeze(copy.toolCalls);
    }
    Object.freeze(copy);
    this.entries.push(copy);
    return copy;
  }

  get messages(): readonly Message[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  /** The last `count` messages, oldest first */
  recent(count: number): readonly Message[] {
    if (count <= 0) return [];
    return this.entries.slice(-count);
  }

  lastAssistant(): AssistantMessage | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry.role === 'assistant') return entry;
    }
    return undefined;
  }
}
