/**
 * Anthropic-backed ModelClient.
 *
 * Converts agent memory into Messages API turns: assistant tool calls become
 * tool_use blocks, consecutive tool results are grouped into one user turn,
 * and the per-call next-step prompt is appended to the final user turn.
 */

import Anthropic from '@anthropic-ai/sdk';
import { logger } from './logger.js';
import { ContextBudgetExceededError, ModelError, errorMessage } from './errors.js';
import type { Message, ToolInvocation } from './types.js';
import type { AssistantReply, ModelClient, ModelConfig, ModelRequest } from './model-types.js';

const log = logger.child({ module: 'model-client' });

type MessageParam = Anthropic.Messages.MessageParam;
type ContentBlockParam = Anthropic.Messages.ContentBlockParam;

const CONTEXT_OVERFLOW_PATTERN = /prompt is too long|context window|too many tokens/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Append blocks to the conversation, merging into the previous turn when roles match */
function pushTurn(turns: MessageParam[], role: MessageParam['role'], blocks: ContentBlockParam[]): void {
  if (blocks.length === 0) return;
  const previous = turns[turns.length - 1];
  if (previous && previous.role === role && Array.isArray(previous.content)) {
    previous.content.push(...blocks);
    return;
  }
  turns.push({ role, content: blocks });
}

export function toAnthropicMessages(messages: readonly Message[], nextStepPrompt?: string): MessageParam[] {
  const turns: MessageParam[] = [];

  for (const message of messages) {
    switch (message.role) {
      case 'user':
        pushTurn(turns, 'user', [{ type: 'text', text: message.content }]);
        break;
      case 'assistant': {
        const blocks: ContentBlockParam[] = [];
        if (message.content) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
        }
        pushTurn(turns, 'assistant', blocks);
        break;
      }
      case 'tool':
        pushTurn(turns, 'user', [
          { type: 'tool_result', tool_use_id: message.toolCallId, content: message.content },
        ]);
        break;
    }
  }

  if (nextStepPrompt) {
    pushTurn(turns, 'user', [{ type: 'text', text: nextStepPrompt }]);
  }

  return turns;
}

function isContextOverflow(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const status = 'status' in err ? err.status : undefined;
  return status === 400 && CONTEXT_OVERFLOW_PATTERN.test(err.message);
}

export class AnthropicModelClient implements ModelClient {
  private readonly client: Anthropic;

  constructor(private readonly config: ModelConfig) {
    const apiKey = config.apiKey ?? process.env.ANTHROPIC_API_KEY;
    if (!apiKey) {
      throw new ModelError('anthropic model client: no API key configured');
    }
    this.client = new Anthropic({ apiKey, baseURL: config.baseURL });
    log.info({ model: config.modelName, baseURL: config.baseURL }, 'anthropic model client initialized');
  }

  async next(request: ModelRequest): Promise<AssistantReply> {
    let response: Anthropic.Messages.Message;
    try {
      response = await this.client.messages.create({
        model: this.config.modelName,
        max_tokens: this.config.maxTokens,
        system: request.system,
        tools: request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          input_schema: tool.parameters,
        })),
        messages: toAnthropicMessages(request.messages, request.nextStepPrompt),
      }, { signal: request.signal });
    } catch (err) {
      if (isContextOverflow(err)) {
        throw new ContextBudgetExceededError(errorMessage(err), err);
      }
      log.error({ err, model: this.config.modelName }, 'model request failed');
      throw new ModelError(`model request failed: ${errorMessage(err)}`, err);
    }

    const texts: string[] = [];
    const toolCalls: ToolInvocation[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        texts.push(block.text);
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: isRecord(block.input) ? block.input : {},
        });
      }
    }

    log.debug(
      { model: response.model, stopReason: response.stop_reason, toolCalls: toolCalls.length },
      'model reply received',
    );

    return { content: texts.join('\n'), toolCalls };
  }
}

export function createModelClient(config: ModelConfig): ModelClient {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicModelClient(config);
  }
}
