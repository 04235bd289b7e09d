import { MissingContextError } from './errors.js';
import type { RunContext } from './run_context.js';
import type { PipelineServices, PipelineStep, StepReport } from './stage.js';

export type PipelineReport = {
  name: string;
  steps: StepReport[];
  ms: number;
};

/**
 * Fixed ordered composition of steps run against one run context. The key
 * flow is checked when the pipeline is built: every key a step requires must
 * be produced by an earlier step or be one of the seed keys.
 */
export class Pipeline {
  readonly steps: readonly PipelineStep[];

  constructor(
    readonly name: string,
    steps: PipelineStep[],
    seedKeys: readonly string[] = [],
  ) {
    this.steps = Object.freeze([...steps]);
    const available = new Set(seedKeys);
    for (const step of this.steps) {
      for (const key of step.requires()) {
        if (!available.has(key)) throw new MissingContextError(key, `pipeline ${name}, step ${step.name}`);
      }
      for (const key of step.produces()) available.add(key);
    }
  }

  /** Runs every step in order; the first failure aborts the run. */
  async run(ctx: RunContext, services: PipelineServices): Promise<PipelineReport> {
    const started = Date.now();
    const steps: StepReport[] = [];
    ctx.log.info({ pipeline: this.name, steps: this.steps.map((s) => s.name) }, 'pipeline:start');
    for (const step of this.steps) {
      steps.push(await step.run(ctx, services));
    }
    const ms = Date.now() - started;
    ctx.log.info({ pipeline: this.name, ms }, 'pipeline:done');
    return { name: this.name, steps, ms };
  }
}
