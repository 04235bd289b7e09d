import { z } from 'zod';
import { loadResilienceConfig, ResilienceConfigSchema } from './resilience.js';

const csv = z.preprocess(
  (v) => (typeof v === 'string' ? v.split(',').map((s) => s.trim()).filter(Boolean) : v),
  z.array(z.string()),
);

const flag = z.preprocess(
  (v) => (typeof v === 'string' ? ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase()) : v),
  z.boolean(),
);

export const AppConfigSchema = z.object({
  appName: z.string().min(1).default('Pharo Refactoring Agent API'),
  appVersion: z.string().min(1).default('1.0.0'),
  debug: flag.default(false),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  logFile: z.string().min(1).optional(),
  llm: z.object({
    baseUrl: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai'),
    apiKey: z.string().default(''),
    model: z.string().min(1).default('gemini-2.5-pro'),
    temperature: z.coerce.number().min(0).max(2).default(0.2),
    maxTokens: z.coerce.number().int().positive().optional(),
    maxToolSteps: z.coerce.number().int().min(1).max(32).default(8),
  }),
  runtime: z.object({
    serverUrl: z.string().url().default('http://localhost:8086'),
    command: z.string().min(1).default('uv'),
    args: csv.default(['run', 'pharo-smalltalk-interop-mcp-server']),
    cwd: z.string().optional(),
    timeoutSec: z.coerce.number().positive().default(30),
    sourceTool: z.string().min(1).default('get_method_source'),
    evalTool: z.string().min(1).default('eval'),
  }),
  pipeline: z.object({
    maxValidationIterations: z.coerce.number().int().min(1).default(3),
    stageTimeoutMs: z.coerce.number().int().min(1000).default(300000),
  }),
  cors: z.object({
    origins: csv.default(['*']),
    allowCredentials: flag.default(true),
    methods: csv.default(['*']),
    headers: csv.default(['*']),
  }),
  resilience: ResilienceConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const blank = (v: string | undefined): string | undefined => (v === undefined || v.trim() === '' ? undefined : v);

/**
 * Reads the process configuration from environment variables. Called once at
 * start-up; the result is passed down explicitly.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return AppConfigSchema.parse({
    appName: blank(env.APP_NAME),
    appVersion: blank(env.APP_VERSION),
    debug: blank(env.DEBUG),
    host: blank(env.HOST),
    port: blank(env.PORT),
    logLevel: blank(env.LOG_LEVEL),
    logFile: blank(env.LOG_FILE),
    llm: {
      baseUrl: blank(env.LLM_PROVIDER_BASEURL),
      apiKey: blank(env.LLM_API_KEY) ?? blank(env.GOOGLE_API_KEY),
      model: blank(env.LLM_MODEL),
      temperature: blank(env.LLM_TEMPERATURE),
      maxTokens: blank(env.LLM_MAX_TOKENS),
      maxToolSteps: blank(env.LLM_MAX_TOOL_STEPS),
    },
    runtime: {
      serverUrl: blank(env.PHARO_SERVER_URL),
      command: blank(env.PHARO_MCP_SERVER_COMMAND),
      args: blank(env.PHARO_MCP_SERVER_ARGS),
      cwd: blank(env.PHARO_MCP_SERVER_CWD),
      timeoutSec: blank(env.PHARO_MCP_TIMEOUT),
      sourceTool: blank(env.PHARO_MCP_SOURCE_TOOL),
      evalTool: blank(env.PHARO_MCP_EVAL_TOOL),
    },
    pipeline: {
      maxValidationIterations: blank(env.MAX_VALIDATION_ITERATIONS),
      stageTimeoutMs: blank(env.STAGE_TIMEOUT_MS),
    },
    cors: {
      origins: blank(env.CORS_ORIGINS),
      allowCredentials: blank(env.CORS_ALLOW_CREDENTIALS),
      methods: blank(env.CORS_ALLOW_METHODS),
      headers: blank(env.CORS_ALLOW_HEADERS),
    },
    resilience: loadResilienceConfig(env),
  });
}

/** Log level derived from configuration: explicit level wins, then DEBUG. */
export function effectiveLogLevel(config: AppConfig): string {
  return config.logLevel ?? (config.debug ? 'debug' : 'info');
}
