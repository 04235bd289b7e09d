import { TaskCancelledError, timeout, TimeoutStrategy } from 'cockatiel';
import type { Oracle, OracleReply } from '../agent/oracle.js';
import { buildToolset, TOOL_WRITES, type ToolName } from '../agent/tools/index.js';
import type { ToolGateway } from '../gateway/tool_gateway.js';
import { observeStage } from '../util/metrics.js';
import { StageExecutionError } from './errors.js';
import type { RunContext } from './run_context.js';
import { renderTemplate, templateReferences } from './template.js';

export type StageOutputFormat = 'text' | 'code';

export type StageDescriptor = {
  role: string;
  /** Instruction text; `{key}` placeholders are filled from the blackboard. */
  template: string;
  tools: readonly ToolName[];
  outputKey: string;
  /** `code` output has surrounding markdown fences removed. */
  output: StageOutputFormat;
  /** Tool the stage is told to call before anything else. */
  firstTool?: ToolName;
};

export type PipelineServices = {
  gateway: ToolGateway;
  oracle: Oracle;
};

export type StepReport =
  | { kind: 'stage'; role: string; wrote: boolean; ms: number }
  | { kind: 'loop'; name: string; outcome: 'EXITED' | 'CAPPED'; iterations: number; ms: number };

/** A unit the pipeline runs in order: a stage or a refinement loop. */
export interface PipelineStep {
  readonly name: string;
  /** Keys the step needs on the blackboard before it starts. */
  requires(): string[];
  /** Keys the step may leave on the blackboard. */
  produces(): string[];
  run(ctx: RunContext, services: PipelineServices): Promise<StepReport>;
}

const FENCED = /^\s*```[\w+-]*[^\S\n]*\n([\s\S]*?)\n?```\s*$/;

/** Removes one surrounding markdown code fence, if present. */
export function stripCodeFences(text: string): string {
  const m = text.match(FENCED);
  return m && m[1] !== undefined ? m[1] : text;
}

/**
 * One role-bound turn of the oracle. Renders its template, lets the oracle
 * use the stage's tools and writes the reply under `outputKey`. A stage
 * that raised the loop exit signal during its turn leaves the key as it was.
 */
export class Stage implements PipelineStep {
  readonly descriptor: Readonly<StageDescriptor>;

  constructor(descriptor: StageDescriptor, private readonly opts: { timeoutMs?: number } = {}) {
    this.descriptor = Object.freeze({ ...descriptor, tools: Object.freeze([...descriptor.tools]) });
  }

  get name(): string {
    return this.descriptor.role;
  }

  requires(): string[] {
    return templateReferences(this.descriptor.template).filter((r) => !r.optional).map((r) => r.key);
  }

  produces(): string[] {
    return [...this.descriptor.tools.flatMap((t) => TOOL_WRITES[t]), this.descriptor.outputKey];
  }

  async run(ctx: RunContext, services: PipelineServices): Promise<StepReport> {
    const { role, outputKey } = this.descriptor;
    const log = ctx.log.child({ stage: role });
    const started = Date.now();
    const escalatedBefore = ctx.escalateRequested;
    log.info('stage:start');

    let output: string;
    try {
      const instruction = renderTemplate(this.descriptor.template, ctx.blackboard, role);
      const tools = buildToolset(this.descriptor.tools, services.gateway, ctx);
      const turn = (signal?: AbortSignal) => services.oracle.converse({
        role,
        instruction,
        userMessage: ctx.userMessage,
        tools,
        signal,
      });
      const reply = this.opts.timeoutMs ? await this.converseWithin(this.opts.timeoutMs, turn) : await turn();

      const first = this.descriptor.firstTool;
      if (first && reply.toolInvocations[0]?.name !== first) {
        log.warn({ expected: first, actual: reply.toolInvocations[0]?.name ?? null }, 'stage:first tool not called first');
      }
      output = this.descriptor.output === 'code' ? stripCodeFences(reply.output) : reply.output;
    } catch (err) {
      const ms = Date.now() - started;
      observeStage(role, ms, false);
      log.error({ err, ms }, 'stage:failed');
      throw new StageExecutionError(role, err);
    }

    const exitedHere = !escalatedBefore && ctx.escalateRequested;
    if (!exitedHere) ctx.blackboard.set(outputKey, output);

    const ms = Date.now() - started;
    observeStage(role, ms, true);
    log.info({ ms, outputKey, wrote: !exitedHere }, 'stage:done');
    return { kind: 'stage', role, wrote: !exitedHere, ms };
  }

  /**
   * Signals the turn to stop once `ms` has passed, then waits for it to
   * settle. The run keeps the single-flight lock until no tool call of this
   * turn is still outstanding.
   */
  private async converseWithin(ms: number, turn: (signal: AbortSignal) => Promise<OracleReply>): Promise<OracleReply> {
    let expired = false;
    const reply = await timeout(ms, TimeoutStrategy.Cooperative).execute(async ({ signal }) => {
      try {
        return await turn(signal);
      } finally {
        expired = signal.aborted;
      }
    }).catch((err: unknown) => {
      if (expired) throw new TaskCancelledError(`${this.descriptor.role} turn timed out after ${ms}ms`);
      throw err;
    });
    if (expired) throw new TaskCancelledError(`${this.descriptor.role} turn timed out after ${ms}ms`);
    return reply;
  }
}
