import type { Logger } from 'pino';
import { Blackboard } from './blackboard.js';

export type RunInput = {
  className: string;
  methodName: string;
};

export type LoopExitStatus = {
  status: 'approved' | 'ignored';
  message: string;
};

/**
 * Everything one pipeline run owns: its blackboard, the escalate flag the
 * refinement loop watches and the logger the stages write to. A fresh
 * context is built for every run and dropped when it ends.
 */
export class RunContext {
  readonly blackboard: Blackboard;
  private escalated = false;
  private loopDepth = 0;

  constructor(
    readonly input: RunInput,
    readonly log: Logger,
    blackboard: Blackboard = new Blackboard(),
  ) {
    this.blackboard = blackboard;
  }

  /** The request every stage sees as its user turn. */
  get userMessage(): string {
    return `Review and refactor the method '${this.input.methodName}' in class '${this.input.className}'.`;
  }

  get inLoop(): boolean {
    return this.loopDepth > 0;
  }

  get escalateRequested(): boolean {
    return this.escalated;
  }

  /** Sets the escalate flag; outside a loop the request is ignored. */
  requestLoopExit(): LoopExitStatus {
    if (!this.inLoop) {
      return { status: 'ignored', message: 'No refinement loop is running; nothing to exit.' };
    }
    this.escalated = true;
    return { status: 'approved', message: 'Code validated. Exiting validation loop.' };
  }

  enterLoop(): void {
    this.loopDepth++;
    this.escalated = false;
  }

  leaveLoop(): void {
    this.loopDepth = Math.max(0, this.loopDepth - 1);
    this.escalated = false;
  }
}
