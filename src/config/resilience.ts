import {
  circuitBreaker,
  ConsecutiveBreaker,
  handleAll,
  timeout,
  TimeoutStrategy,
  wrap,
} from 'cockatiel';
import { z } from 'zod';

export const ResilienceConfigSchema = z.object({
  failureThreshold: z.coerce.number().int().min(1).default(5),
  resetTimeoutMs: z.coerce.number().int().min(1000).default(30000),
  requestTimeoutMs: z.coerce.number().int().min(1000).default(120000),
});

export type ResilienceConfig = z.infer<typeof ResilienceConfigSchema>;

export function loadResilienceConfig(env: NodeJS.ProcessEnv = process.env): ResilienceConfig {
  return ResilienceConfigSchema.parse({
    failureThreshold: env.CIRCUIT_BREAKER_FAILURE_THRESHOLD || undefined,
    resetTimeoutMs: env.CIRCUIT_BREAKER_RESET_TIMEOUT || undefined,
    requestTimeoutMs: env.LLM_REQUEST_TIMEOUT_MS || undefined,
  });
}

/**
 * Circuit breaker around a per-request timeout for LLM calls. After
 * `failureThreshold` consecutive failures the breaker rejects calls with
 * BrokenCircuitError until `resetTimeoutMs` has passed.
 */
export function createLlmPolicy(config: ResilienceConfig) {
  const breaker = circuitBreaker(handleAll, {
    halfOpenAfter: config.resetTimeoutMs,
    breaker: new ConsecutiveBreaker(config.failureThreshold),
  });
  return wrap(breaker, timeout(config.requestTimeoutMs, TimeoutStrategy.Aggressive));
}

export type LlmPolicy = ReturnType<typeof createLlmPolicy>;
