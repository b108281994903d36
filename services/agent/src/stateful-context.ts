import type { Message, StatefulTool, ToolSpec } from '@toolloop/shared';

/** How many trailing memory entries count as "recent" use of the stateful tool */
export const STATEFUL_LOOKBACK = 3;

export function isStatefulTool(spec: ToolSpec): spec is StatefulTool {
  return (
    'currentContext' in spec &&
    typeof spec.currentContext === 'function' &&
    'cleanup' in spec &&
    typeof spec.cleanup === 'function'
  );
}

/** True when any assistant message among `messages` invoked `toolName` */
export function invokedRecently(messages: readonly Message[], toolName: string): boolean {
  return messages.some(
    (message) => message.role === 'assistant' && message.toolCalls.some((call) => call.name === toolName),
  );
}
