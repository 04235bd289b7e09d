import type { Logger } from 'pino';
import type { AppConfig } from '../config/app.js';
import { StateKeys } from '../core/blackboard.js';
import { SingleFlightExecutor } from '../core/executor.js';
import { createChatClient } from '../core/llm.js';
import { Pipeline } from '../core/pipeline.js';
import { getPrompt } from '../core/prompts.js';
import { BoundedRefinementLoop } from '../core/refinement_loop.js';
import { Stage, type PipelineServices } from '../core/stage.js';
import { McpRemoteRuntime } from '../gateway/mcp_runtime.js';
import { ToolGateway } from '../gateway/tool_gateway.js';
import { ChatOracle } from './oracle.js';

export const PIPELINE_NAME = 'PharoRefactoringPipeline';

export type PipelineOptions = {
  maxValidationIterations: number;
  stageTimeoutMs?: number;
};

/**
 * Reviewer → InitialWriter → ValidationLoop(Validator, Refiner) → Release.
 */
export async function buildRefactoringPipeline(opts: PipelineOptions): Promise<Pipeline> {
  const stageOpts = { timeoutMs: opts.stageTimeoutMs };
  const [reviewer, writer, validator, refiner, release] = await Promise.all([
    getPrompt('reviewer'),
    getPrompt('initial_writer'),
    getPrompt('validator'),
    getPrompt('refiner'),
    getPrompt('release'),
  ]);

  const reviewerStage = new Stage({
    role: 'ReviewerAgent',
    template: reviewer,
    tools: ['record_identity', 'fetch_source'],
    firstTool: 'record_identity',
    outputKey: StateKeys.codeReview,
    output: 'text',
  }, stageOpts);

  const writerStage = new Stage({
    role: 'InitialWriterAgent',
    template: writer,
    tools: [],
    outputKey: StateKeys.refactoredCode,
    output: 'code',
  }, stageOpts);

  const validationLoop = new BoundedRefinementLoop({
    name: 'ValidationLoop',
    maxIterations: opts.maxValidationIterations,
    critique: new Stage({
      role: 'ValidatorAgent',
      template: validator,
      tools: ['fetch_source', 'evaluate'],
      outputKey: StateKeys.validationResult,
      output: 'text',
    }, stageOpts),
    refine: new Stage({
      role: 'RefinerAgent',
      template: refiner,
      tools: ['signal_loop_exit'],
      outputKey: StateKeys.refactoredCode,
      output: 'code',
    }, stageOpts),
  });

  const releaseStage = new Stage({
    role: 'ReleaseAgent',
    template: release,
    tools: ['encode_compile_script', 'evaluate'],
    outputKey: StateKeys.releaseStatus,
    output: 'text',
  }, stageOpts);

  return new Pipeline(PIPELINE_NAME, [reviewerStage, writerStage, validationLoop, releaseStage]);
}

/** Production wiring: MCP runtime, chat-model oracle and the executor. */
export async function createExecutor(config: AppConfig, log: Logger): Promise<SingleFlightExecutor> {
  const runtime = new McpRemoteRuntime(config.runtime, log.child({ component: 'mcp' }));
  const chat = createChatClient(config.llm, config.resilience, { log: log.child({ component: 'llm' }) });
  const services: PipelineServices = {
    gateway: new ToolGateway(runtime),
    oracle: new ChatOracle(chat, { maxSteps: config.llm.maxToolSteps, log: log.child({ component: 'oracle' }) }),
  };
  const pipeline = await buildRefactoringPipeline({
    maxValidationIterations: config.pipeline.maxValidationIterations,
    stageTimeoutMs: config.pipeline.stageTimeoutMs,
  });
  return new SingleFlightExecutor(pipeline, services, log.child({ component: 'executor' }));
}
