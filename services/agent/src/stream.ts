/**
 * Stream channel — turns an agent run into client-facing StreamEvents.
 *
 * Tool results stream as they are observed. An error ends the stream with a
 * single error event; otherwise the final assistant message is flushed and a
 * done event carries the finish reason. A run that throws (for instance an
 * agent that has already run) also ends in one error event. Agent cleanup runs
 * exactly once however the stream ends.
 */

import { logger, toAgentError, type StreamEvent } from '@toolloop/shared';
import type { Agent } from './agent.js';

const log = logger.child({ module: 'stream' });

export async function* streamAgent(
  agent: Agent,
  prompt: string,
  signal?: AbortSignal,
): AsyncGenerator<StreamEvent, void, undefined> {
  try {
    for await (const outcome of agent.run(prompt, signal)) {
      if (outcome.type === 'error') {
        yield { type: 'error', error: outcome.error.message };
        return;
      }
      if (outcome.type === 'tools') {
        for (const message of outcome.results) {
          if (message.content) {
            yield { type: 'content', content: message.content };
          }
        }
      }
    }

    const final = agent.memory.lastAssistant()?.content;
    if (final) {
      yield { type: 'content', content: final };
    }
    yield { type: 'done', reason: agent.finishReason ?? 'completed' };
  } catch (err) {
    const error = toAgentError(err);
    log.error({ err: error, agentId: agent.id }, 'agent run threw');
    yield { type: 'error', error: error.message };
  } finally {
    log.debug({ agentId: agent.id, state: agent.state }, 'stream closed, cleaning up agent');
    await agent.cleanup();
  }
}
