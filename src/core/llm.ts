import { z } from 'zod';
import { fetch as undiciFetch, type Dispatcher } from 'undici';
import type { Logger } from 'pino';
import type { AppConfig } from '../config/app.js';
import { createLlmPolicy, type ResilienceConfig } from '../config/resilience.js';

export type FunctionToolSpec = {
  type: 'function';
  function: { name: string; description?: string; parameters: unknown };
};

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string().default('{}'),
  }),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;

export type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      role: z.string().optional(),
      content: z.string().nullable().optional(),
      tool_calls: z.array(ToolCallSchema).optional(),
    }),
    finish_reason: z.string().nullable().optional(),
  })).default([]),
  usage: z.object({
    prompt_tokens: z.number().optional(),
    completion_tokens: z.number().optional(),
  }).optional(),
});

export type ChatCompletion = z.infer<typeof ChatCompletionSchema>;

export type ChatRequest = {
  messages: ChatMessage[];
  tools: FunctionToolSpec[];
  signal?: AbortSignal;
};

export type ChatFn = (req: ChatRequest) => Promise<ChatCompletion>;

export class LlmRequestError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'LlmRequestError';
  }
}

/**
 * OpenAI-compatible `/chat/completions` client with function tools. Calls go
 * through a circuit breaker and a per-request timeout; non-2xx responses and
 * malformed bodies throw {@link LlmRequestError}.
 */
export function createChatClient(
  llm: AppConfig['llm'],
  resilience: ResilienceConfig,
  opts: { log?: Logger; dispatcher?: Dispatcher } = {},
): ChatFn {
  const url = `${llm.baseUrl.replace(/\/$/, '')}/chat/completions`;
  const policy = createLlmPolicy(resilience);
  const log = opts.log;

  return async ({ messages, tools, signal }) => {
    const body = {
      model: llm.model,
      messages,
      temperature: llm.temperature,
      ...(tools.length > 0 ? { tools, tool_choice: 'auto' } : {}),
      ...(llm.maxTokens !== undefined ? { max_tokens: llm.maxTokens } : {}),
    };
    log?.debug({ model: llm.model, messages: messages.length, tools: tools.length }, 'llm:request');

    const started = Date.now();
    const data = await policy.execute(async ({ signal: policySignal }) => {
      const res = await undiciFetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${llm.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: policySignal,
        ...(opts.dispatcher ? { dispatcher: opts.dispatcher } : {}),
      });
      if (!res.ok) {
        const errorText = await res.text();
        throw new LlmRequestError(`HTTP ${res.status}: ${errorText.substring(0, 200)}`, res.status);
      }
      return res.json();
    }, signal);

    const parsed = ChatCompletionSchema.safeParse(data);
    if (!parsed.success) {
      throw new LlmRequestError(`Malformed completion: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }
    log?.debug({
      ms: Date.now() - started,
      toolCalls: parsed.data.choices[0]?.message.tool_calls?.length ?? 0,
      usage: parsed.data.usage,
    }, 'llm:response');
    return parsed.data;
  };
}
