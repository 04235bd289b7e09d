import 'dotenv/config';
import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import chalk from 'chalk';
import { ExponentialBackoff, handleWhen, noJitterGenerator, retry } from 'cockatiel';
import { fetch as undiciFetch } from 'undici';
import { z } from 'zod';

const FRAME_BAR = '─'.repeat(44);

const HealthBody = z.object({ app_name: z.string(), version: z.string(), busy: z.boolean().optional() });
const RefactorBody = z.object({
  success: z.boolean(),
  class_name: z.string(),
  method_name: z.string(),
  result: z.record(z.unknown()).optional(),
  refinement: z.object({ outcome: z.string(), iterations: z.number() }).optional(),
});
const ErrorBody = z.object({ detail: z.string() });

export class AgentBusyError extends Error {
  constructor() {
    super('Agent is busy');
    this.name = 'AgentBusyError';
  }
}

export type RefactorResult = z.infer<typeof RefactorBody>;

export async function checkHealth(baseUrl: string): Promise<z.infer<typeof HealthBody> | null> {
  try {
    const res = await undiciFetch(`${baseUrl}/health`, { signal: AbortSignal.timeout(5000) });
    if (!res.ok) return null;
    const parsed = HealthBody.safeParse(await res.json());
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Posts one refactoring request, retrying 503 (busy) answers with
 * exponential backoff: 1s, 2s, 4s, ... `maxAttempts` counts every request,
 * the first one included.
 */
export async function refactorWithRetry(
  baseUrl: string,
  className: string,
  methodName: string,
  opts: { maxAttempts?: number; initialDelayMs?: number; onBusy?: (attempt: number) => void } = {},
): Promise<RefactorResult> {
  const policy = retry(handleWhen((err) => err instanceof AgentBusyError), {
    maxAttempts: Math.max(0, (opts.maxAttempts ?? 5) - 1),
    backoff: new ExponentialBackoff({
      initialDelay: opts.initialDelayMs ?? 1000,
      exponent: 2,
      maxDelay: 16000,
      generator: noJitterGenerator,
    }),
  });
  let attempt = 0;
  policy.onRetry(() => opts.onBusy?.(++attempt));

  return policy.execute(async () => {
    const res = await undiciFetch(`${baseUrl}/api/v1/refactor`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ class_name: className, method_name: methodName }),
      signal: AbortSignal.timeout(300000),
    });
    if (res.status === 503) throw new AgentBusyError();
    const body: unknown = await res.json();
    if (!res.ok) {
      const err = ErrorBody.safeParse(body);
      throw new Error(err.success ? err.data.detail : `HTTP ${res.status}`);
    }
    return RefactorBody.parse(body);
  });
}

function section(title: string, text: unknown): string {
  const value = typeof text === 'string' ? text : JSON.stringify(text, null, 2);
  return `${chalk.gray(`┌─ ${title} ${FRAME_BAR}`)}\n${value ?? chalk.dim('(none)')}\n${chalk.gray(`└${FRAME_BAR}`)}`;
}

async function main(): Promise<void> {
  const baseUrl = (process.env.REFACTOR_API_URL ?? 'http://localhost:8000').replace(/\/$/, '');
  console.log(chalk.bold('Pharo refactoring client\n'));

  const health = await checkHealth(baseUrl);
  if (!health) {
    console.log(chalk.red(`API at ${baseUrl} is not available. Start it with: npm start`));
    process.exitCode = 1;
    return;
  }
  console.log(chalk.green(`API is healthy - ${health.app_name} v${health.version}`));

  let [className, methodName] = process.argv.slice(2);
  if (!className || !methodName) {
    const rl = readline.createInterface({ input, output });
    try {
      className = (await rl.question("Class name (e.g. 'Calculator'): ")).trim();
      methodName = (await rl.question("Method selector (e.g. 'sum:with:'): ")).trim();
    } finally {
      rl.close();
    }
  }
  if (!className || !methodName) {
    console.log(chalk.red('Class name and method selector are required.'));
    process.exitCode = 1;
    return;
  }

  console.log(chalk.cyan(`\nRefactoring ${className}>>${methodName} ...`));
  const out = await refactorWithRetry(baseUrl, className, methodName, {
    onBusy: (attempt) => console.log(chalk.yellow(`Agent busy, retrying (attempt ${attempt})...`)),
  });
  const result = out.result ?? {};
  console.log(section('REVIEW', result.code_review));
  console.log(section('REFACTORED CODE', result.refactored_code));
  console.log(section('VALIDATION', result.validation_result));
  if (out.refinement) {
    console.log(chalk.dim(`Refinement ${out.refinement.outcome} after ${out.refinement.iterations} iteration(s)`));
  }
  const status = typeof result.release_status === 'string' ? result.release_status : '';
  console.log(status.startsWith('RELEASED') ? chalk.green(status) : chalk.red(status || 'No release status'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  });
}
