import { EventEmitter } from 'node:events';
import type { AgentState, FinishReason } from '@toolloop/shared';

/**
 * Valid lifecycle transitions. States only move forward; a finished agent is
 * discarded and a new one built for the next session.
 */
const VALID_TRANSITIONS: Record<AgentState, Set<AgentState>> = {
  IDLE: new Set(['RUNNING']),
  RUNNING: new Set(['FINISHED', 'ERROR']),
  FINISHED: new Set(),
  ERROR: new Set(),
};

export class AgentStateMachine extends EventEmitter {
  private _state: AgentState = 'IDLE';
  private _finishReason: FinishReason | undefined;

  get state(): AgentState {
    return this._state;
  }

  /** Why the run ended; undefined while IDLE or RUNNING */
  get finishReason(): FinishReason | undefined {
    return this._finishReason;
  }

  isRunning(): boolean {
    return this._state === 'RUNNING';
  }

  start(): void {
    this.transition('RUNNING');
  }

  finish(reason: Exclude<FinishReason, 'error'>): void {
    this.transition('FINISHED');
    this._finishReason = reason;
    this.emit('finished', reason);
  }

  fail(): void {
    this.transition('ERROR');
    this._finishReason = 'error';
  }

  private transition(to: AgentState): void {
    const allowed = VALID_TRANSITIONS[this._state];
    if (!allowed.has(to)) {
      throw new Error(`Invalid state transition: ${this._state} -> ${to}`);
    }
    this._state = to;
    this.emit(to);
  }
}
