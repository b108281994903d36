import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type {
  AssistantReply,
  ModelClient,
  ModelRequest,
  ToolInvocation,
} from '@toolloop/shared';

// ---------------------------------------------------------------------------
// Scripted model
// ---------------------------------------------------------------------------

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown> = {}): ToolInvocation {
  callCounter++;
  return { id: `call_${callCounter}`, name, arguments: args };
}

export function reply(content: string, ...toolCalls: ToolInvocation[]): AssistantReply {
  return { content, toolCalls };
}

/**
 * Returns queued replies in order and records every request. Once the queue
 * is empty, the last reply repeats (with fresh call ids).
 */
export class ScriptedModel implements ModelClient {
  readonly requests: ModelRequest[] = [];
  private replies: AssistantReply[];
  private lastReply: AssistantReply | undefined;

  constructor(...replies: AssistantReply[]) {
    this.replies = replies;
  }

  async next(request: ModelRequest): Promise<AssistantReply> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const next = this.replies.shift() ?? this.lastReply;
    if (!next) {
      throw new Error('scripted model has no replies');
    }
    this.lastReply = next;
    return {
      content: next.content,
      toolCalls: next.toolCalls.map((call) => toolCall(call.name, call.arguments)),
    };
  }
}

// ---------------------------------------------------------------------------
// In-memory MCP server
// ---------------------------------------------------------------------------

export interface FakeRemoteTool {
  name: string;
  description?: string;
  /** Returns the text content; a thrown error becomes an isError result */
  handler: (args: Record<string, unknown>) => string;
}

export interface FakeRemoteServer {
  server: Server;
  /** Client side of the linked pair, handed to the McpClientManager */
  clientTransport: Transport;
  calls: Array<{ name: string; args: Record<string, unknown> }>;
  /** Set once the session's transport closes */
  closed: boolean;
}

export async function startFakeRemoteServer(name: string, tools: FakeRemoteTool[]): Promise<FakeRemoteServer> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  const calls: FakeRemoteServer['calls'] = [];

  const server = new Server({ name, version: '1.0.0' }, { capabilities: { tools: {} } });
  const fake: FakeRemoteServer = { server, clientTransport, calls, closed: false };
  server.onclose = () => {
    fake.closed = true;
  };

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((tool) => ({
      name: tool.name,
      description: tool.description ?? `${tool.name} tool`,
      inputSchema: { type: 'object' as const, properties: { value: { type: 'string' } } },
    })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const args = request.params.arguments ?? {};
    calls.push({ name: request.params.name, args });
    const tool = tools.find((candidate) => candidate.name === request.params.name);
    if (!tool) {
      return { content: [{ type: 'text' as const, text: `no such tool: ${request.params.name}` }], isError: true };
    }
    try {
      return { content: [{ type: 'text' as const, text: tool.handler(args) }] };
    } catch (err) {
      return { content: [{ type: 'text' as const, text: err instanceof Error ? err.message : String(err) }], isError: true };
    }
  });

  await server.connect(serverTransport);
  return fake;
}
