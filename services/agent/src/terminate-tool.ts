import type { TerminationStatus } from '@toolloop/shared';
import { defineTool, type LocalTool } from './local-tool.js';

export const TERMINATE_TOOL_NAME = 'terminate';

/** Tool content that ends the run even without a structured terminal flag */
export const TERMINATION_SENTINEL = JSON.stringify({ status: 'success' });

const STATUSES = ['success', 'failure'] as const;

function isStatus(value: unknown): value is (typeof STATUSES)[number] {
  return STATUSES.some((status) => status === value);
}

export function createTerminateTool(): LocalTool {
  return defineTool({
    name: TERMINATE_TOOL_NAME,
    description:
      'Finish the interaction. Call this when the request is met or when you cannot make further progress.',
    parameters: {
      type: 'object',
      properties: {
        status: {
          type: 'string',
          enum: [...STATUSES],
          description: 'Whether the task was completed',
        },
      },
      required: ['status'],
    },
    async execute(args) {
      const status: TerminationStatus = isStatus(args.status) ? args.status : 'success';
      return { content: JSON.stringify({ status }), terminal: status };
    },
  });
}

/** True when a tool result ends the run */
export function isTerminal(result: { content: string; terminal?: TerminationStatus }): boolean {
  return result.terminal !== undefined || result.content.trim() === TERMINATION_SENTINEL;
}
