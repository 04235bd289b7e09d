import { describe, it, expect, beforeEach } from '@jest/globals';
import { ChatOracle, ToolLoopExceededError } from '../../../src/agent/oracle.js';
import { buildToolset, UnknownToolError } from '../../../src/agent/tools/index.js';
import { ChatCompletionSchema, type ChatCompletion, type ChatFn, type ChatMessage, type ChatRequest } from '../../../src/core/llm.js';
import { RunContext } from '../../../src/core/run_context.js';
import { ToolGateway } from '../../../src/gateway/tool_gateway.js';
import { silentLogger } from '../../../src/util/logging.js';
import { FakeRuntime } from '../../helpers/fakes.js';

const answer = (content: string): ChatCompletion =>
  ChatCompletionSchema.parse({ choices: [{ message: { role: 'assistant', content } }] });

const toolCall = (id: string, name: string, args: string): ChatCompletion =>
  ChatCompletionSchema.parse({
    choices: [{ message: { role: 'assistant', content: null, tool_calls: [{ id, type: 'function', function: { name, arguments: args } }] } }],
  });

/** Chat function that replays `replies` and keeps a copy of every request. */
function scriptedChat(replies: ChatCompletion[]): { chat: ChatFn; requests: ChatMessage[][]; toolNames: string[][] } {
  const requests: ChatMessage[][] = [];
  const toolNames: string[][] = [];
  let i = 0;
  const chat: ChatFn = async (req: ChatRequest) => {
    requests.push([...req.messages]);
    toolNames.push(req.tools.map((t) => t.function.name));
    const reply = replies[Math.min(i++, replies.length - 1)];
    if (!reply) throw new Error('no scripted reply');
    return reply;
  };
  return { chat, requests, toolNames };
}

let ctx: RunContext;
let gateway: ToolGateway;

beforeEach(() => {
  ctx = new RunContext({ className: 'Calculator', methodName: 'sum:with:' }, silentLogger());
  gateway = new ToolGateway(new FakeRuntime());
});

describe('ChatOracle', () => {
  it('returns the trimmed text of a plain answer', async () => {
    const { chat, requests } = scriptedChat([answer('\n  APPROVED \n')]);
    const oracle = new ChatOracle(chat, { maxSteps: 4 });

    const reply = await oracle.converse({ role: 'ValidatorAgent', instruction: 'Judge it', userMessage: ctx.userMessage, tools: [] });

    expect(reply).toEqual({ output: 'APPROVED', toolInvocations: [] });
    expect(requests[0]).toEqual([
      { role: 'system', content: 'Judge it' },
      { role: 'user', content: "Review and refactor the method 'sum:with:' in class 'Calculator'." },
    ]);
  });

  it('executes tool calls and feeds the results back', async () => {
    const { chat, requests, toolNames } = scriptedChat([
      toolCall('call-1', 'encode_compile_script', '{"class_name":"Foo","code":"bar"}'),
      answer('RELEASED: bar'),
    ]);
    const tools = buildToolset(['encode_compile_script'], gateway, ctx);
    const oracle = new ChatOracle(chat, { maxSteps: 4 });

    const reply = await oracle.converse({ role: 'ReleaseAgent', instruction: 'Install', userMessage: 'go', tools });

    expect(reply.output).toBe('RELEASED: bar');
    expect(reply.toolInvocations).toEqual([
      { name: 'encode_compile_script', args: { class_name: 'Foo', code: 'bar' }, result: "Foo compile: ('bar')" },
    ]);
    expect(toolNames[0]).toEqual(['encode_compile_script']);
    expect(requests[1]?.[3]).toEqual({ role: 'tool', tool_call_id: 'call-1', content: "Foo compile: ('bar')" });
  });

  it('serialises structured tool results as JSON', async () => {
    const { chat, requests } = scriptedChat([toolCall('c', 'signal_loop_exit', '{}'), answer('')]);
    const oracle = new ChatOracle(chat, { maxSteps: 4 });

    await oracle.converse({ role: 'RefinerAgent', instruction: 'Refine', userMessage: 'go', tools: buildToolset(['signal_loop_exit'], gateway, ctx) });

    expect(requests[1]?.[3]).toEqual({
      role: 'tool',
      tool_call_id: 'c',
      content: '{"status":"ignored","message":"No refinement loop is running; nothing to exit."}',
    });
  });

  it('gives up after maxSteps rounds of tool calls', async () => {
    const { chat } = scriptedChat([toolCall('c', 'signal_loop_exit', '{}')]);
    const oracle = new ChatOracle(chat, { maxSteps: 2 });

    await expect(oracle.converse({ role: 'RefinerAgent', instruction: 'x', userMessage: 'y', tools: buildToolset(['signal_loop_exit'], gateway, ctx) }))
      .rejects.toThrow(new ToolLoopExceededError('RefinerAgent', 2));
  });

  it('fails when the model calls a tool the stage does not have', async () => {
    const { chat } = scriptedChat([toolCall('c', 'evaluate', '{"expression":"Smalltalk image"}')]);
    const oracle = new ChatOracle(chat, { maxSteps: 4 });

    await expect(oracle.converse({ role: 'InitialWriterAgent', instruction: 'x', userMessage: 'y', tools: [] }))
      .rejects.toBeInstanceOf(UnknownToolError);
  });
});
