import type { Logger } from 'pino';
import { incRunStarted, observeRun } from '../util/metrics.js';
import type { BlackboardSnapshot } from './blackboard.js';
import { describeError, toStdError } from './errors.js';
import type { Pipeline } from './pipeline.js';
import { RunContext } from './run_context.js';
import { SingleFlightLock, type Release } from './single_flight.js';
import type { PipelineServices } from './stage.js';

export type RefinementSummary = {
  outcome: 'EXITED' | 'CAPPED';
  iterations: number;
};

export type RunRecord = {
  success: boolean;
  className: string;
  methodName: string;
  result?: BlackboardSnapshot;
  error?: string;
  durationMs: number;
  refinement?: RefinementSummary;
};

/**
 * Owns the shared tool gateway and admits one pipeline run at a time. The
 * lock is held across every oracle and tool call of a run and released on
 * every path before a result is returned. Run failures come back as
 * `{ success: false }` records, never as exceptions.
 */
export class SingleFlightExecutor {
  private readonly lock = new SingleFlightLock();

  constructor(
    private readonly pipeline: Pipeline,
    private readonly services: PipelineServices,
    private readonly log: Logger,
  ) {}

  isBusy(): boolean {
    return this.lock.isLocked();
  }

  /** Waits for the lock if another run holds it. */
  async run(className: string, methodName: string): Promise<RunRecord> {
    const release = await this.lock.acquire();
    return this.execute(release, className, methodName);
  }

  /**
   * Takes the lock only if it is free; returns `null` when busy. Checking and
   * acquiring happen in one step, so two callers can never both get in.
   */
  tryRun(className: string, methodName: string): Promise<RunRecord> | null {
    const release = this.lock.tryAcquire();
    if (!release) return null;
    return this.execute(release, className, methodName);
  }

  async close(): Promise<void> {
    await this.services.gateway.close();
  }

  private async execute(release: Release, className: string, methodName: string): Promise<RunRecord> {
    const started = Date.now();
    const log = this.log.child({ target: `${className}>>${methodName}` });
    try {
      incRunStarted();
      const ctx = new RunContext({ className, methodName }, log);
      const report = await this.pipeline.run(ctx, this.services);
      const loop = report.steps.find((s) => s.kind === 'loop');
      const durationMs = Date.now() - started;
      observeRun(true, durationMs);
      return {
        success: true,
        className,
        methodName,
        result: ctx.blackboard.snapshot(),
        durationMs,
        ...(loop && loop.kind === 'loop' ? { refinement: { outcome: loop.outcome, iterations: loop.iterations } } : {}),
      };
    } catch (err) {
      const durationMs = Date.now() - started;
      observeRun(false, durationMs);
      log.error({ error: toStdError(err, 'pipeline'), durationMs }, 'run:failed');
      return {
        success: false,
        className,
        methodName,
        error: describeError(err),
        durationMs,
      };
    } finally {
      release();
    }
  }
}
