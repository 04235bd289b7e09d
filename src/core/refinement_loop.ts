import { observeLoop } from '../util/metrics.js';
import type { RunContext } from './run_context.js';
import type { PipelineServices, PipelineStep, Stage, StepReport } from './stage.js';

export type LoopState = 'ITERATING' | 'EXITED' | 'CAPPED';

export type LoopDescriptor = {
  name: string;
  critique: Stage;
  refine: Stage;
  maxIterations: number;
};

/**
 * Runs critique then refine until a stage raises the exit signal or the
 * iteration cap is reached. The flag is checked after each full iteration.
 * Hitting the cap is a normal outcome: later steps get whatever code was
 * written last.
 */
export class BoundedRefinementLoop implements PipelineStep {
  private readonly descriptor: Readonly<LoopDescriptor>;

  constructor(descriptor: LoopDescriptor) {
    if (!Number.isInteger(descriptor.maxIterations) || descriptor.maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${descriptor.maxIterations}`);
    }
    this.descriptor = Object.freeze({ ...descriptor });
  }

  get name(): string {
    return this.descriptor.name;
  }

  get maxIterations(): number {
    return this.descriptor.maxIterations;
  }

  requires(): string[] {
    const { critique, refine } = this.descriptor;
    const fromCritique = new Set(critique.produces());
    return [...new Set([...critique.requires(), ...refine.requires().filter((k) => !fromCritique.has(k))])];
  }

  produces(): string[] {
    return [...this.descriptor.critique.produces(), ...this.descriptor.refine.produces()];
  }

  async run(ctx: RunContext, services: PipelineServices): Promise<StepReport> {
    const { name, critique, refine, maxIterations } = this.descriptor;
    const log = ctx.log.child({ loop: name });
    const started = Date.now();
    let state: LoopState = 'ITERATING';
    let iterations = 0;

    ctx.enterLoop();
    try {
      while (state === 'ITERATING') {
        await critique.run(ctx, services);
        await refine.run(ctx, services);
        iterations++;
        log.debug({ iteration: iterations, escalate: ctx.escalateRequested }, 'loop:iteration');

        if (ctx.escalateRequested) state = 'EXITED';
        else if (iterations >= maxIterations) state = 'CAPPED';
      }
    } finally {
      ctx.leaveLoop();
    }

    const outcome = state === 'EXITED' ? 'EXITED' : 'CAPPED';
    observeLoop(outcome, iterations);
    if (outcome === 'CAPPED') {
      log.warn({ iterations }, 'loop:capped without approval, continuing with last written code');
    } else {
      log.info({ iterations }, 'loop:exited');
    }
    return { kind: 'loop', name, outcome, iterations, ms: Date.now() - started };
  }
}
