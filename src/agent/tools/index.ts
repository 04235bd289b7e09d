import { z } from 'zod';
import type { FunctionToolSpec } from '../../core/llm.js';
import type { RunContext } from '../../core/run_context.js';
import { StateKeys } from '../../core/blackboard.js';
import { encodeCompileScript } from '../../core/script_encoder.js';
import type { ToolGateway } from '../../gateway/tool_gateway.js';

export const TOOL_NAMES = [
  'record_identity',
  'fetch_source',
  'evaluate',
  'signal_loop_exit',
  'encode_compile_script',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export type ToolSpec = {
  name: ToolName;
  description: string;
  // Zod schema used for runtime validation
  schema: z.ZodTypeAny;
  // OpenAI-style tool spec derived from the schema
  spec: FunctionToolSpec;
  call: (args: unknown, signal?: AbortSignal) => Promise<unknown>;
};

export type ToolInvocation = {
  name: string;
  args: unknown;
  result: unknown;
};

/** Blackboard keys a tool writes as a side effect. */
export const TOOL_WRITES: Record<ToolName, readonly string[]> = {
  record_identity: [StateKeys.className, StateKeys.methodName],
  fetch_source: [],
  evaluate: [],
  signal_loop_exit: [],
  encode_compile_script: [],
};

export class UnknownToolError extends Error {
  constructor(name: string) {
    super(`Tool ${name} is not available to this stage`);
    this.name = 'UnknownToolError';
  }
}

export class ToolArgumentError extends Error {
  constructor(name: string, detail: string) {
    super(`Invalid arguments for ${name}: ${detail}`);
    this.name = 'ToolArgumentError';
  }
}

// Minimal JSON Schema builders for our inputs
const str = (desc?: string) => ({ type: 'string', description: desc });
const obj = (properties: Record<string, unknown>, required: string[] = []) => ({ type: 'object', properties, required, additionalProperties: false });

function defineTool<S extends z.ZodTypeAny>(def: {
  name: ToolName;
  description: string;
  schema: S;
  parameters: unknown;
  run: (input: z.infer<S>, signal?: AbortSignal) => Promise<unknown> | unknown;
}): ToolSpec {
  return {
    name: def.name,
    description: def.description,
    schema: def.schema,
    spec: { type: 'function', function: { name: def.name, description: def.description, parameters: def.parameters } },
    async call(args: unknown, signal?: AbortSignal) {
      const parsed = def.schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw new ToolArgumentError(def.name, parsed.error.issues.map((i) => `${i.path.join('.') || 'args'}: ${i.message}`).join('; '));
      }
      return def.run(parsed.data, signal);
    },
  };
}

const Identity = z.object({ class_name: z.string().min(1), method_name: z.string().min(1) });

function createTool(name: ToolName, gateway: ToolGateway, ctx: RunContext): ToolSpec {
  switch (name) {
    case 'record_identity':
      return defineTool({
        name,
        description: 'Save the target class and method name to the shared run state. Call this first.',
        schema: Identity,
        parameters: obj({ class_name: str('Pharo class name'), method_name: str('Method selector') }, ['class_name', 'method_name']),
        run: (input) => gateway.recordIdentity(ctx, input.class_name, input.method_name),
      });
    case 'fetch_source':
      return defineTool({
        name,
        description: 'Fetch the source code of a method from the Pharo image.',
        schema: Identity,
        parameters: obj({ class_name: str('Pharo class name'), method_name: str('Method selector, e.g. sum:with:') }, ['class_name', 'method_name']),
        run: (input, signal) => gateway.fetchSource(input.class_name, input.method_name, signal),
      });
    case 'evaluate':
      return defineTool({
        name,
        description: 'Evaluate one Pharo expression in the image and return its printed result or error text.',
        schema: z.object({ expression: z.string().min(1) }),
        parameters: obj({ expression: str('Pharo expression to evaluate') }, ['expression']),
        run: (input, signal) => gateway.evaluate(input.expression, signal),
      });
    case 'signal_loop_exit':
      return defineTool({
        name,
        description: 'Signal that the code is approved and the validation loop should stop.',
        schema: z.object({}).passthrough(),
        parameters: obj({}),
        run: () => gateway.signalLoopExit(ctx),
      });
    case 'encode_compile_script':
      return defineTool({
        name,
        description: 'Build a safe single-line Pharo expression that compiles the given method source into a class.',
        schema: z.object({ class_name: z.string().min(1), code: z.string() }),
        parameters: obj({ class_name: str('Target Pharo class'), code: str('Raw method source') }, ['class_name', 'code']),
        run: (input) => encodeCompileScript(input.class_name, input.code),
      });
  }
}

/** Tools a stage may call during its turn, bound to the current run. */
export function buildToolset(names: readonly ToolName[], gateway: ToolGateway, ctx: RunContext): ToolSpec[] {
  return names.map((name) => createTool(name, gateway, ctx));
}

/**
 * Runs one tool call requested by the oracle. `rawArgs` may be the JSON text
 * the model produced or an already decoded object. An aborted `signal`
 * stops the call before it reaches the runtime.
 */
export async function invokeTool(
  tools: readonly ToolSpec[],
  name: string,
  rawArgs: unknown,
  signal?: AbortSignal,
): Promise<ToolInvocation> {
  signal?.throwIfAborted();
  const tool = tools.find((t) => t.name === name);
  if (!tool) throw new UnknownToolError(name);
  let args = rawArgs;
  if (typeof rawArgs === 'string') {
    try {
      args = rawArgs.trim() ? JSON.parse(rawArgs) : {};
    } catch {
      throw new ToolArgumentError(name, 'arguments are not valid JSON');
    }
  }
  const result = await tool.call(args, signal);
  return { name, args, result };
}
