import type { Message } from './types.js';

/**
 * Estimate token count from text.
 * Uses the ~4 chars/token heuristic; good enough for a budget guard.
 */
function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Estimate the size of a conversation, tool call arguments included. */
export function estimateMessageTokens(messages: readonly Message[]): number {
  let total = 0;
  for (const message of messages) {
    total += estimateTokens(message.content);
    if (message.role === 'assistant') {
      for (const call of message.toolCalls) {
        total += estimateTokens(call.name) + estimateTokens(JSON.stringify(call.arguments));
      }
    }
  }
  return total;
}
