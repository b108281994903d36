import { describe, it, expect } from 'vitest';
import * as shared from '../index.js';

describe('@toolloop/shared exports', () => {
  it('exposes the runtime API and nothing module-internal', () => {
    expect(Object.keys(shared).sort()).toEqual([
      'AgentError',
      'AnthropicModelClient',
      'ContextBudgetExceededError',
      'DispatchError',
      'ModelError',
      'RemoteConnectionError',
      'ToolExecutionError',
      'createModelClient',
      'errorMessage',
      'estimateMessageTokens',
      'fail',
      'loadAgentConfig',
      'logger',
      'ok',
      'parseAgentConfig',
      'stableStringify',
      'toAgentError',
      'toAnthropicMessages',
      'withSpan',
    ]);
  });
});
