import { ToolExecutionError, errorMessage, type ToolParameters, type ToolResult, type ToolSpec } from '@toolloop/shared';
import type { McpClientManager, McpToolInfo, McpToolResult } from './mcp-client.js';

/** Model-facing tool names must match ^[a-zA-Z0-9_-]{1,128}$ */
export function sanitizeToolName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 128);
}

/**
 * Proxy for a tool that lives on a remote MCP server. Owned by that server's
 * id; calls go through the shared McpClientManager under the advertised name.
 */
export class RemoteTool implements ToolSpec {
  readonly name: string;
  readonly description: string;
  readonly parameters: ToolParameters;
  readonly owner: string;
  /** Name as the server advertised it */
  readonly remoteName: string;

  constructor(
    serverId: string,
    info: McpToolInfo,
    private readonly clients: McpClientManager,
  ) {
    this.owner = serverId;
    this.remoteName = info.name;
    this.name = sanitizeToolName(info.name);
    this.description = info.description;
    this.parameters = info.inputSchema;
  }

  async execute(args: Record<string, unknown>): Promise<ToolResult> {
    let result: McpToolResult;
    try {
      result = await this.clients.callTool(this.owner, this.remoteName, args);
    } catch (err) {
      throw new ToolExecutionError(this.name, errorMessage(err), err);
    }
    if (result.isError) {
      throw new ToolExecutionError(this.name, result.text || 'remote tool reported an error');
    }
    return { content: result.text };
  }
}
