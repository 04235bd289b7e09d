import { describe, it, expect, beforeEach } from '@jest/globals';
import { Blackboard } from '../../../src/core/blackboard.js';
import { StageExecutionError } from '../../../src/core/errors.js';
import { BoundedRefinementLoop } from '../../../src/core/refinement_loop.js';
import { RunContext } from '../../../src/core/run_context.js';
import { Stage, type PipelineServices } from '../../../src/core/stage.js';
import { ToolGateway } from '../../../src/gateway/tool_gateway.js';
import { silentLogger } from '../../../src/util/logging.js';
import { FakeRuntime, ScriptedOracle, type RoleScript } from '../../helpers/fakes.js';

const validator = new Stage({
  role: 'ValidatorAgent',
  template: 'Review:\n{refactored_code}',
  tools: [],
  outputKey: 'validation_result',
  output: 'text',
});

const refiner = new Stage({
  role: 'RefinerAgent',
  template: 'Code:\n{refactored_code}\nFeedback:\n{validation_result}',
  tools: ['signal_loop_exit'],
  outputKey: 'refactored_code',
  output: 'code',
});

function loop(maxIterations: number, critique: Stage = validator): BoundedRefinementLoop {
  return new BoundedRefinementLoop({ name: 'ValidationLoop', critique, refine: refiner, maxIterations });
}

/** Validator answers `verdicts` in order; refiner exits on approval, else writes v1, v2, ... */
function scripts(verdicts: string[]): Record<string, RoleScript> {
  let validations = 0;
  let revisions = 0;
  return {
    ValidatorAgent: () => verdicts[Math.min(validations++, verdicts.length - 1)] ?? 'APPROVED',
    RefinerAgent: async ({ turn, call }) => {
      if (turn.instruction.includes('Feedback:\nAPPROVED')) {
        await call('signal_loop_exit');
        return '';
      }
      revisions++;
      return `v${revisions}`;
    },
  };
}

let ctx: RunContext;

beforeEach(() => {
  ctx = new RunContext(
    { className: 'Calculator', methodName: 'sum:with:' },
    silentLogger(),
    new Blackboard({ refactored_code: 'v0' }),
  );
});

function services(oracle: ScriptedOracle): PipelineServices {
  return { gateway: new ToolGateway(new FakeRuntime()), oracle };
}

describe('BoundedRefinementLoop', () => {
  it('stops at the cap when the code is never approved', async () => {
    const oracle = new ScriptedOracle(scripts(['NEEDS IMPROVEMENT: rename a and b']));

    const report = await loop(3).run(ctx, services(oracle));

    expect(report).toMatchObject({ kind: 'loop', name: 'ValidationLoop', outcome: 'CAPPED', iterations: 3 });
    expect(oracle.countFor('ValidatorAgent')).toBe(3);
    expect(oracle.countFor('RefinerAgent')).toBe(3);
    expect(ctx.blackboard.get('refactored_code')).toBe('v3');
    expect(ctx.inLoop).toBe(false);
  });

  it('exits on approval and keeps the approved code', async () => {
    const oracle = new ScriptedOracle(scripts(['NEEDS IMPROVEMENT: add a comment', 'APPROVED']));

    const report = await loop(3).run(ctx, services(oracle));

    expect(report).toMatchObject({ outcome: 'EXITED', iterations: 2 });
    expect(oracle.rolesCalled()).toEqual(['ValidatorAgent', 'RefinerAgent', 'ValidatorAgent', 'RefinerAgent']);
    expect(ctx.blackboard.get('refactored_code')).toBe('v1');
    expect(ctx.blackboard.get('validation_result')).toBe('APPROVED');
    expect(ctx.escalateRequested).toBe(false);
  });

  it('exits after one iteration on immediate approval', async () => {
    const oracle = new ScriptedOracle(scripts(['APPROVED']));

    const report = await loop(3).run(ctx, services(oracle));

    expect(report).toMatchObject({ outcome: 'EXITED', iterations: 1 });
    expect(ctx.blackboard.get('refactored_code')).toBe('v0');
  });

  it('finishes the iteration before honouring an exit raised by the critique', async () => {
    const eagerCritique = new Stage({
      role: 'EagerValidator',
      template: 'Review:\n{refactored_code}',
      tools: ['signal_loop_exit'],
      outputKey: 'validation_result',
      output: 'text',
    });
    ctx.blackboard.set('validation_result', 'pending');
    const oracle = new ScriptedOracle({
      ...scripts([]),
      EagerValidator: async ({ call }) => {
        await call('signal_loop_exit');
        return 'APPROVED';
      },
    });

    const report = await loop(3, eagerCritique).run(ctx, services(oracle));

    expect(report).toMatchObject({ outcome: 'EXITED', iterations: 1 });
    expect(oracle.rolesCalled()).toEqual(['EagerValidator', 'RefinerAgent']);
    expect(ctx.blackboard.get('validation_result')).toBe('pending');
    expect(ctx.blackboard.get('refactored_code')).toBe('v1');
  });

  it('leaves the loop when a stage fails', async () => {
    const oracle = new ScriptedOracle({
      ValidatorAgent: () => {
        throw new Error('model unavailable');
      },
    });

    await expect(loop(3).run(ctx, services(oracle))).rejects.toBeInstanceOf(StageExecutionError);
    expect(ctx.inLoop).toBe(false);
  });

  it('rejects a cap below one', () => {
    expect(() => loop(0)).toThrow(RangeError);
    expect(() => loop(1.5)).toThrow('maxIterations must be a positive integer, got 1.5');
  });

  it('requires what the critique needs plus what only the refine step needs', () => {
    expect(loop(2).requires()).toEqual(['refactored_code']);
    expect(loop(2).produces()).toEqual(['validation_result', 'refactored_code']);
  });
});
