export * from './types.js';
export * from './errors.js';
export * from './model-types.js';
export { logger } from './logger.js';
export { withSpan } from './tracing.js';
export { estimateMessageTokens } from './token-count.js';
export { stableStringify } from './stable-json.js';
export {
  parseAgentConfig,
  loadAgentConfig,
  type AgentConfig,
  type AgentLimits,
} from './config.js';
export { AnthropicModelClient, createModelClient, toAnthropicMessages } from './model-client.js';
