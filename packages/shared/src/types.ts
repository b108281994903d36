// --- Conversation ---

/** A single tool call requested by the model */
export interface ToolInvocation {
  /** Provider-assigned call id, echoed back on the matching tool message */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  toolCalls: ToolInvocation[];
}

export interface ToolMessage {
  role: 'tool';
  content: string;
  toolCallId: string;
  name: string;
}

export type Message = UserMessage | AssistantMessage | ToolMessage;

// --- Tools ---

/** JSON-schema-shaped parameter declaration (matches the MCP inputSchema shape) */
export type ToolParameters = {
  type: 'object';
  properties?: Record<string, unknown>;
  required?: string[];
};

export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/** How a terminal tool result ended the run */
export type TerminationStatus = 'success' | 'failure' | 'partial';

export interface ToolResult {
  /** Human-readable output, recorded in memory and streamed to the caller */
  content: string;
  /** Set by tools whose result ends the run */
  terminal?: TerminationStatus;
}

/**
 * A callable capability. Local tools leave `owner` unset; tools proxied from a
 * remote server carry that server's id.
 */
export interface ToolSpec extends ToolDescriptor {
  readonly owner?: string;
  execute(args: Record<string, unknown>): Promise<ToolResult>;
}

/** A tool that holds a live session whose state is worth showing the model */
export interface StatefulTool extends ToolSpec {
  /** Summary of the session's current state, or undefined when nothing is open */
  currentContext(): Promise<string | undefined>;
  /** Release the session. Must be safe to call when nothing is open. */
  cleanup(): Promise<void>;
}

// --- Remote tool servers ---

/** `stream` is a long-lived HTTP stream; `process` is a spawned child over stdio */
export type RemoteTransportKind = 'stream' | 'process';

/** Wire protocol for `stream` servers */
export type StreamProtocol = 'sse' | 'streamable-http';

export interface RemoteServerDescriptor {
  readonly id: string;
  readonly transport: RemoteTransportKind;
  /** URL for `stream`, executable for `process` */
  readonly endpointOrCommand: string;
  readonly args: readonly string[];
  readonly protocol?: StreamProtocol;
  /** Extra environment for `process` servers */
  readonly env?: Readonly<Record<string, string>>;
  /** Extra request headers for `stream` servers */
  readonly headers?: Readonly<Record<string, string>>;
}

// --- Agent lifecycle ---

export type AgentState = 'IDLE' | 'RUNNING' | 'FINISHED' | 'ERROR';

export type FinishReason =
  | 'terminated'
  | 'completed'
  | 'max_steps'
  | 'stuck'
  | 'cancelled'
  | 'error';

// --- Streaming ---

export type StreamEvent =
  | { type: 'content'; content: string }
  | { type: 'error'; error: string }
  | { type: 'done'; reason: FinishReason };
