export type AgentErrorKind =
  | 'dispatch'
  | 'tool_execution'
  | 'remote_connection'
  | 'context_budget'
  | 'model'
  | 'internal';

export class AgentError extends Error {
  public readonly kind: AgentErrorKind;
  public override readonly cause?: unknown;

  constructor(message: string, kind: AgentErrorKind, cause?: unknown) {
    super(message);
    this.kind = kind;
    this.cause = cause;
    this.name = 'AgentError';
  }
}

/** The model asked for a tool that is not registered */
export class DispatchError extends AgentError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`, 'dispatch');
    this.toolName = toolName;
    this.name = 'DispatchError';
  }
}

/** A tool failed while executing, whether local or remote */
export class ToolExecutionError extends AgentError {
  public readonly toolName: string;

  constructor(toolName: string, message: string, cause?: unknown) {
    super(`Tool '${toolName}' failed: ${message}`, 'tool_execution', cause);
    this.toolName = toolName;
    this.name = 'ToolExecutionError';
  }
}

/** A remote tool server could not be reached or listed */
export class RemoteConnectionError extends AgentError {
  public readonly serverId: string;

  constructor(serverId: string, message: string, cause?: unknown) {
    super(`Failed to connect to remote server '${serverId}': ${message}`, 'remote_connection', cause);
    this.serverId = serverId;
    this.name = 'RemoteConnectionError';
  }
}

/** The conversation no longer fits the model's context window */
export class ContextBudgetExceededError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'context_budget', cause);
    this.name = 'ContextBudgetExceededError';
  }
}

/** The inference call failed for a reason other than context size */
export class ModelError extends AgentError {
  constructor(message: string, cause?: unknown) {
    super(message, 'model', cause);
    this.name = 'ModelError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Normalise anything thrown into an AgentError, keeping known subclasses as they are */
export function toAgentError(err: unknown): AgentError {
  if (err instanceof AgentError) return err;
  return new AgentError(errorMessage(err), 'internal', err);
}

// --- Step results ---

export type StepResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: AgentError };

export function ok<T>(value: T): StepResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: AgentError): StepResult<T> {
  return { ok: false, error };
}
