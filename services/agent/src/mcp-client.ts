/**
 * MCP Client Manager — manages connections to MCP servers via stdio or HTTP transports.
 *
 * Each connected server gets its own MCP Client instance, keyed by server id.
 * The manager handles connecting, listing tools, calling tools, and shutdown.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { logger, type RemoteServerDescriptor, type ToolParameters } from '@toolloop/shared';

const log = logger.child({ module: 'mcp-client' });

/** Tool info returned from MCP list_tools */
export interface McpToolInfo {
  name: string;
  description: string;
  inputSchema: ToolParameters;
}

/** Result from calling an MCP tool, text content joined */
export interface McpToolResult {
  text: string;
  isError: boolean;
}

export type TransportFactory = (descriptor: RemoteServerDescriptor) => Transport | Promise<Transport>;

/** Build the SDK transport a descriptor asks for */
export function createTransport(descriptor: RemoteServerDescriptor): Transport {
  if (descriptor.transport === 'process') {
    return new StdioClientTransport({
      command: descriptor.endpointOrCommand,
      args: [...descriptor.args],
      env: descriptor.env ? { ...getDefaultEnvironment(), ...descriptor.env } : undefined,
    });
  }

  const url = new URL(descriptor.endpointOrCommand);
  const requestInit: RequestInit | undefined = descriptor.headers ? { headers: { ...descriptor.headers } } : undefined;

  if (descriptor.protocol === 'sse') {
    // Legacy SSE transport
    return new SSEClientTransport(url, { requestInit });
  }
  return new StreamableHTTPClientTransport(url, { requestInit });
}

function toParameters(schema: { properties?: Record<string, unknown>; [key: string]: unknown }): ToolParameters {
  const required = Array.isArray(schema.required)
    ? schema.required.filter((entry): entry is string => typeof entry === 'string')
    : undefined;
  return {
    type: 'object',
    properties: schema.properties ?? {},
    ...(required ? { required } : {}),
  };
}

export class McpClientManager {
  private clients = new Map<string, Client>();

  constructor(private readonly transportFactory: TransportFactory = createTransport) {}

  /**
   * Open a session with the server the descriptor names.
   * An existing session under the same id is closed first.
   */
  async connect(descriptor: RemoteServerDescriptor): Promise<void> {
    const serverId = descriptor.id;
    if (this.clients.has(serverId)) {
      log.warn({ serverId }, 'server already connected, closing existing connection');
      await this.close(serverId);
    }

    log.info(
      { serverId, transport: descriptor.transport, target: descriptor.endpointOrCommand },
      'connecting MCP client',
    );

    const client = new Client({ name: `toolloop-${serverId}`, version: '1.0.0' }, { capabilities: {} });

    // Handle transport errors to prevent unhandled exceptions crashing the process
    client.onerror = (err) => {
      log.error({ err, serverId }, 'MCP client error, cleaning up connection');
      if (this.clients.get(serverId) === client) {
        this.clients.delete(serverId);
      }
    };

    try {
      const transport = await this.transportFactory(descriptor);
      await client.connect(transport);
      // A concurrent connect for the same id may have finished first
      const superseded = this.clients.get(serverId);
      this.clients.set(serverId, client);
      if (superseded) {
        log.warn({ serverId }, 'closing session superseded by a concurrent connect');
        await superseded.close().catch((closeErr: unknown) => {
          log.debug({ err: closeErr, serverId }, 'error closing superseded MCP client');
        });
      }
      log.info({ serverId }, 'MCP client connected');
    } catch (err) {
      log.error({ err, serverId }, 'failed to connect MCP client');
      await client.close().catch((closeErr: unknown) => {
        log.debug({ err: closeErr, serverId }, 'error closing half-open MCP client');
      });
      throw err;
    }
  }

  private requireClient(serverId: string): Client {
    const client = this.clients.get(serverId);
    if (!client) {
      throw new Error(`MCP client not connected for server: ${serverId}`);
    }
    return client;
  }

  /** List all tools available from a connected MCP server */
  async listTools(serverId: string): Promise<McpToolInfo[]> {
    const result = await this.requireClient(serverId).listTools();
    return result.tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? '',
      inputSchema: toParameters(tool.inputSchema),
    }));
  }

  /** Call a tool on a connected MCP server */
  async callTool(serverId: string, toolName: string, input: Record<string, unknown>): Promise<McpToolResult> {
    const client = this.requireClient(serverId);

    log.info({ serverId, toolName }, 'calling MCP tool');

    try {
      const raw = await client.callTool({ name: toolName, arguments: input });
      const parsed = CallToolResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`unexpected tool result shape from '${serverId}'`);
      }

      const text = parsed.data.content
        .map((item) => (item.type === 'text' ? item.text : `[${item.type} content]`))
        .join('\n');

      return { text, isError: parsed.data.isError === true };
    } catch (err) {
      log.error({ err, serverId, toolName }, 'MCP tool call failed');
      throw err;
    }
  }

  /** Check if a server is currently connected */
  isConnected(serverId: string): boolean {
    return this.clients.has(serverId);
  }

  /** Close a specific server's MCP client connection */
  async close(serverId: string): Promise<void> {
    const client = this.clients.get(serverId);
    if (!client) return;

    try {
      await client.close();
      log.info({ serverId }, 'MCP client closed');
    } catch (err) {
      log.error({ err, serverId }, 'error closing MCP client');
    } finally {
      this.clients.delete(serverId);
    }
  }

  /** Close all MCP client connections */
  async closeAll(): Promise<void> {
    const serverIds = [...this.clients.keys()];
    for (const serverId of serverIds) {
      await this.close(serverId);
    }
    log.info({ count: serverIds.length }, 'all MCP clients closed');
  }
}
