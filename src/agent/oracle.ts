import type { Logger } from 'pino';
import type { ChatFn, ChatMessage } from '../core/llm.js';
import { invokeTool, type ToolInvocation, type ToolSpec } from './tools/index.js';

export type OracleTurn = {
  role: string;
  /** Rendered stage instruction. */
  instruction: string;
  userMessage: string;
  tools: readonly ToolSpec[];
  signal?: AbortSignal;
};

export type OracleReply = {
  output: string;
  toolInvocations: ToolInvocation[];
};

/**
 * The text/tool-calling model behind every stage. A turn may run any of the
 * offered tools before producing its final text.
 */
export interface Oracle {
  converse(turn: OracleTurn): Promise<OracleReply>;
}

export class ToolLoopExceededError extends Error {
  constructor(role: string, steps: number) {
    super(`${role} did not finish within ${steps} tool steps`);
    this.name = 'ToolLoopExceededError';
  }
}

/**
 * Oracle backed by an OpenAI-compatible chat model: the instruction is the
 * system message, tool calls are executed and fed back until the model
 * answers in plain text.
 */
export class ChatOracle implements Oracle {
  constructor(
    private readonly chat: ChatFn,
    private readonly opts: { maxSteps: number; log?: Logger },
  ) {}

  async converse(turn: OracleTurn): Promise<OracleReply> {
    const log = this.opts.log?.child({ stage: turn.role });
    const msgs: ChatMessage[] = [
      { role: 'system', content: turn.instruction },
      { role: 'user', content: turn.userMessage },
    ];
    const toolSpecs = turn.tools.map((t) => t.spec);
    const toolInvocations: ToolInvocation[] = [];

    for (let step = 0; step < this.opts.maxSteps; step++) {
      turn.signal?.throwIfAborted();
      const res = await this.chat({ messages: msgs, tools: toolSpecs, signal: turn.signal });
      const message = res.choices[0]?.message;
      if (!message) throw new Error('Model returned no choices');

      const calls = message.tool_calls ?? [];
      if (calls.length === 0) {
        const output = (message.content ?? '').trim();
        log?.debug({ step, outputLength: output.length, toolCalls: toolInvocations.length }, 'oracle:done');
        return { output, toolInvocations };
      }

      msgs.push({ role: 'assistant', content: message.content ?? null, tool_calls: calls });
      for (const call of calls) {
        log?.debug({ step, tool: call.function.name }, 'oracle:tool_call');
        const invocation = await invokeTool(turn.tools, call.function.name, call.function.arguments, turn.signal);
        toolInvocations.push(invocation);
        msgs.push({
          role: 'tool',
          tool_call_id: call.id,
          content: typeof invocation.result === 'string' ? invocation.result : JSON.stringify(invocation.result),
        });
      }
    }
    throw new ToolLoopExceededError(turn.role, this.opts.maxSteps);
  }
}
