import type { RunContext, LoopExitStatus } from '../core/run_context.js';
import { StateKeys } from '../core/blackboard.js';

/**
 * The two operations the remote runtime offers. Implementations own the
 * physical connection; callers must not issue concurrent calls.
 */
export interface RemoteRuntime {
  fetchSource(className: string, methodName: string, signal?: AbortSignal): Promise<string>;
  evaluate(expression: string, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
}

/**
 * Operations visible to stages: the remote runtime's two calls plus the
 * local `recordIdentity` and `signalLoopExit` controls that act on the
 * current run. Built once and reused across runs.
 */
export class ToolGateway {
  constructor(private readonly runtime: RemoteRuntime) {}

  fetchSource(className: string, methodName: string, signal?: AbortSignal): Promise<string> {
    return this.runtime.fetchSource(className, methodName, signal);
  }

  /**
   * Returns the runtime's text answer as-is; whether it reports success is
   * for the calling stage to judge.
   */
  evaluate(expression: string, signal?: AbortSignal): Promise<string> {
    return this.runtime.evaluate(expression, signal);
  }

  recordIdentity(ctx: RunContext, className: string, methodName: string): string {
    ctx.blackboard.set(StateKeys.className, className);
    ctx.blackboard.set(StateKeys.methodName, methodName);
    return `Context saved. Class: ${className}, Method: ${methodName}`;
  }

  signalLoopExit(ctx: RunContext): LoopExitStatus {
    return ctx.requestLoopExit();
  }

  close(): Promise<void> {
    return this.runtime.close();
  }
}
