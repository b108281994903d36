/**
 * Agent loop — think, act, observe until the run ends.
 *
 * One Agent serves one session: `run()` drives the IDLE → RUNNING →
 * FINISHED | ERROR lifecycle and yields one StepOutcome per step. The run ends
 * when a tool result is terminal, the model stops asking for tools, the step
 * budget runs out, the stuck detector trips, a step fails, the caller's
 * abort signal fires, or the consumer stops iterating.
 */

import { randomUUID } from 'node:crypto';
import {
  AgentError,
  ContextBudgetExceededError,
  DispatchError,
  ToolExecutionError,
  errorMessage,
  estimateMessageTokens,
  fail,
  logger,
  ok,
  stableStringify,
  toAgentError,
  withSpan,
  type AgentLimits,
  type AgentState,
  type AssistantReply,
  type FinishReason,
  type Message,
  type ModelClient,
  type RemoteServerDescriptor,
  type StepResult,
  type ToolInvocation,
  type ToolMessage,
  type ToolResult,
  type ToolSpec,
} from '@toolloop/shared';
import { AgentStateMachine } from './agent-state.js';
import { McpClientManager } from './mcp-client.js';
import { Memory } from './memory.js';
import { DEFAULT_PROMPTS, renderTemplate, type AgentPrompts } from './prompts.js';
import { RemoteToolServerManager, type InitializeReport } from './remote-servers.js';
import { STATEFUL_LOOKBACK, invokedRecently, isStatefulTool } from './stateful-context.js';
import { StuckDetector } from './stuck-detector.js';
import { createTerminateTool, isTerminal } from './terminate-tool.js';
import { ToolCollection } from './tool-collection.js';

const log = logger.child({ module: 'agent' });

export interface AgentOptions {
  id?: string;
  config: AgentLimits & { servers?: readonly RemoteServerDescriptor[] };
  model: ModelClient;
  /** Local tools; defaults to the terminate tool alone */
  tools?: ToolSpec[];
  /** Session manager for remote servers; tests inject one over in-memory transports */
  clients?: McpClientManager;
  prompts?: Partial<AgentPrompts>;
}

/** One executed tool call, before truncation */
export interface ToolOutcome {
  call: ToolInvocation;
  result: ToolResult;
}

export type StepOutcome =
  | { type: 'tools'; step: number; results: ToolMessage[] }
  | { type: 'reply'; step: number; content: string }
  | { type: 'error'; step: number; error: AgentError };

/** Fingerprint of a reply for repeat detection; call ids are ignored */
function replyFingerprint(reply: AssistantReply): string {
  return stableStringify({
    content: reply.content,
    toolCalls: reply.toolCalls.map((call) => ({ name: call.name, arguments: call.arguments })),
  });
}

/** Cut to at most `limit` UTF-16 units without splitting a surrogate pair */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) return text;
  let end = limit;
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end--;
  return text.slice(0, end);
}

export class Agent {
  readonly id: string;
  readonly memory = new Memory();
  readonly tools: ToolCollection;
  readonly remoteServers: RemoteToolServerManager;

  private readonly config: AgentOptions['config'];
  private readonly model: ModelClient;
  private readonly prompts: AgentPrompts;
  private readonly lifecycle = new AgentStateMachine();
  private readonly stuck: StuckDetector;

  private stepCount = 0;
  private staged: ToolOutcome[] | undefined;
  private remoteInit: Promise<InitializeReport> | undefined;
  private signal: AbortSignal | undefined;
  private cleanupPromise: Promise<void> | undefined;

  constructor(options: AgentOptions) {
    this.id = options.id ?? randomUUID();
    this.config = options.config;
    this.model = options.model;
    this.prompts = { ...DEFAULT_PROMPTS, ...options.prompts };
    this.tools = new ToolCollection(options.tools ?? [createTerminateTool()]);
    this.remoteServers = new RemoteToolServerManager(options.clients ?? new McpClientManager(), this.tools);
    this.stuck = new StuckDetector(options.config.maxStuckCount);

    this.lifecycle.on('finished', (reason: FinishReason) => {
      log.info({ agentId: this.id, steps: this.stepCount, reason }, 'agent run finished');
    });
    this.lifecycle.on('ERROR', () => {
      log.warn({ agentId: this.id, steps: this.stepCount }, 'agent run failed');
    });
  }

  /** Build an agent and connect its configured remote servers */
  static async create(options: AgentOptions): Promise<Agent> {
    const agent = new Agent(options);
    await agent.connectRemoteServers();
    return agent;
  }

  get state(): AgentState {
    return this.lifecycle.state;
  }

  get finishReason(): FinishReason | undefined {
    return this.lifecycle.finishReason;
  }

  get steps(): number {
    return this.stepCount;
  }

  /** Connect configured servers once; later calls share the first attempt */
  connectRemoteServers(): Promise<InitializeReport> {
    if (!this.remoteInit) {
      this.remoteInit = this.remoteServers.initializeFromConfig(this.config.servers ?? []);
    }
    return this.remoteInit;
  }

  /**
   * Run the loop for one user prompt. Throws on the first iteration if the
   * agent has already run.
   *
   * Aborting `signal` finishes the run as `cancelled` at the next step
   * boundary, or before the pending tool calls run; an in-flight model call
   * receives the same signal.
   */
  async *run(prompt: string, signal?: AbortSignal): AsyncGenerator<StepOutcome, void, undefined> {
    this.lifecycle.start();
    this.signal = signal;
    this.memory.add({ role: 'user', content: prompt });
    log.info({ agentId: this.id, maxSteps: this.config.maxSteps }, 'agent run started');

    try {
      while (this.lifecycle.isRunning()) {
        if (this.cancelIfAborted()) break;
        if (this.stepCount >= this.config.maxSteps) {
          log.warn({ agentId: this.id, steps: this.stepCount }, 'step budget exhausted');
          this.lifecycle.finish('max_steps');
          break;
        }
        this.stepCount++;
        const outcome = await this.step(this.stepCount);
        if (!outcome) break;
        yield outcome;
      }
    } finally {
      if (this.lifecycle.isRunning()) {
        log.info({ agentId: this.id, steps: this.stepCount }, 'agent run cancelled by consumer');
        this.lifecycle.finish('cancelled');
      }
    }
  }

  /** Finish as cancelled if the run's signal has fired */
  private cancelIfAborted(): boolean {
    if (!this.signal?.aborted || !this.lifecycle.isRunning()) return false;
    log.info({ agentId: this.id, steps: this.stepCount }, 'agent run aborted');
    this.lifecycle.finish('cancelled');
    return true;
  }

  /** Undefined when the run was aborted mid-step */
  private async step(step: number): Promise<StepOutcome | undefined> {
    log.debug({ agentId: this.id, step }, 'executing step');
    try {
      const hasActions = await this.think();
      if (!hasActions) {
        this.lifecycle.finish('completed');
        return { type: 'reply', step, content: this.memory.lastAssistant()?.content ?? '' };
      }
      if (this.cancelIfAborted()) return undefined;

      const acted = await this.act();
      if (!acted.ok) return this.failStep(step, acted.error);

      const observed = this.observe();
      if (!observed.ok) return this.failStep(step, observed.error);

      if (this.lifecycle.isRunning() && this.stuck.shouldAbort()) {
        log.warn({ agentId: this.id, step, repeats: this.stuck.repeats }, 'agent is repeating itself, stopping');
        this.lifecycle.finish('stuck');
      }
      return { type: 'tools', step, results: observed.value };
    } catch (err) {
      if (this.cancelIfAborted()) return undefined;
      return this.failStep(step, toAgentError(err));
    }
  }

  private failStep(step: number, error: AgentError): StepOutcome {
    log.error({ err: error, agentId: this.id, step, kind: error.kind }, 'step failed');
    this.staged = undefined;
    if (this.lifecycle.isRunning()) {
      this.lifecycle.fail();
    }
    return { type: 'error', step, error };
  }

  /**
   * Ask the model for the next message and record it.
   * Returns false when the reply requests no tool calls.
   */
  async think(): Promise<boolean> {
    await this.connectRemoteServers();
    this.checkContextBudget();

    const nextStepPrompt = await this.selectNextStepPrompt();
    const reply = await withSpan('agent.think', { 'agent.id': this.id, 'agent.step': this.stepCount }, () =>
      this.model.next({
        system: this.prompts.system,
        messages: this.memory.messages,
        nextStepPrompt,
        tools: this.tools.descriptors(),
        signal: this.signal,
      }),
    );

    this.memory.add({ role: 'assistant', content: reply.content, toolCalls: reply.toolCalls });
    this.stuck.observe(replyFingerprint(reply));

    log.debug(
      { agentId: this.id, step: this.stepCount, tools: reply.toolCalls.map((call) => call.name) },
      'model selected tools',
    );
    return reply.toolCalls.length > 0;
  }

  /**
   * Execute the tool calls of the latest assistant message in order and stage
   * the results for observe(). A terminal result finishes the run.
   */
  async act(): Promise<StepResult<ToolOutcome[]>> {
    const calls = this.memory.lastAssistant()?.toolCalls ?? [];
    const outcomes: ToolOutcome[] = [];

    for (const call of calls) {
      const spec = this.tools.lookup(call.name);
      if (!spec) {
        return fail<ToolOutcome[]>(new DispatchError(call.name));
      }

      try {
        const result = await withSpan('agent.tool', { 'tool.name': call.name, 'tool.owner': spec.owner ?? 'local' }, () =>
          spec.execute(call.arguments),
        );
        outcomes.push({ call, result });
      } catch (err) {
        const error = err instanceof ToolExecutionError ? err : new ToolExecutionError(call.name, errorMessage(err), err);
        return fail<ToolOutcome[]>(error);
      }
    }

    this.staged = outcomes;
    if (this.lifecycle.isRunning() && outcomes.some((outcome) => isTerminal(outcome.result))) {
      log.info({ agentId: this.id, step: this.stepCount }, 'terminal tool result received');
      this.lifecycle.finish('terminated');
    }
    return ok(outcomes);
  }

  /** Truncate staged results and commit them to memory as tool messages */
  observe(): StepResult<ToolMessage[]> {
    const staged = this.staged;
    if (!staged) {
      return fail<ToolMessage[]>(new AgentError('observe called with no staged tool results', 'internal'));
    }
    this.staged = undefined;

    const committed: ToolMessage[] = [];
    for (const { call, result } of staged) {
      const message: ToolMessage = {
        role: 'tool',
        content: truncate(result.content, this.config.maxObserve),
        toolCallId: call.id,
        name: call.name,
      };
      this.memory.add(message);
      committed.push(message);
    }
    return ok(committed);
  }

  /** Release stateful tool sessions and disconnect remote servers. Idempotent. */
  cleanup(): Promise<void> {
    if (!this.cleanupPromise) {
      this.cleanupPromise = this.releaseResources();
    }
    return this.cleanupPromise;
  }

  private async releaseResources(): Promise<void> {
    if (this.remoteInit) {
      await this.remoteInit;
    }
    const stateful = this.tools.listSpecs().filter(isStatefulTool);
    const settled = await Promise.allSettled([
      ...stateful.map((tool) => tool.cleanup()),
      this.remoteServers.disconnect(),
    ]);
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        log.error({ err: outcome.reason, agentId: this.id }, 'cleanup step failed');
      }
    }
    log.info({ agentId: this.id, statefulTools: stateful.length }, 'agent resources released');
  }

  private checkContextBudget(): void {
    const limit = this.config.maxContextTokens;
    if (limit === undefined) return;
    const estimate = estimateMessageTokens(this.memory.messages);
    if (estimate > limit) {
      throw new ContextBudgetExceededError(
        `conversation needs about ${estimate} tokens, budget is ${limit}`,
      );
    }
  }

  /** Stateful prompt while the stateful tool was used recently and has live context */
  private async selectNextStepPrompt(): Promise<string> {
    const toolName = this.config.statefulTool;
    if (!toolName) return this.prompts.nextStep;

    const recent: readonly Message[] = this.memory.recent(STATEFUL_LOOKBACK);
    if (!invokedRecently(recent, toolName)) return this.prompts.nextStep;

    const spec = this.tools.lookup(toolName);
    if (!spec || !isStatefulTool(spec)) return this.prompts.nextStep;

    const context = await spec.currentContext();
    if (context === undefined) return this.prompts.nextStep;
    return renderTemplate(this.prompts.statefulNextStep, { context });
  }
}
