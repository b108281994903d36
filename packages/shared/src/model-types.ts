/**
 * Model client types — the agent loop's view of language-model inference.
 *
 * The loop only needs "given this conversation, produce the next assistant
 * message"; providers implement ModelClient behind that contract.
 */

import type { Message, ToolDescriptor, ToolInvocation } from './types.js';

export type ModelProvider = 'anthropic';

export interface ModelConfig {
  provider: ModelProvider;
  /** Model string sent to the provider API */
  modelName: string;
  /** Max tokens for each response */
  maxTokens: number;
  apiKey?: string;
  /** Override the provider base URL (e.g. an Anthropic-compatible gateway) */
  baseURL?: string;
}

export interface ModelRequest {
  system: string;
  messages: readonly Message[];
  /** Instruction appended after the conversation for this call only */
  nextStepPrompt?: string;
  tools: ToolDescriptor[];
  /** Cancels the request when the run is aborted */
  signal?: AbortSignal;
}

export interface AssistantReply {
  content: string;
  toolCalls: ToolInvocation[];
}

export interface ModelClient {
  next(request: ModelRequest): Promise<AssistantReply>;
}
