import pino from 'pino';

export type LoggerOptions = {
  level?: string;
  /** Also append JSON lines to this file. */
  file?: string;
};

// Secrets that may travel through config or request objects
const REDACT_PATHS = [
  'apiKey',
  '*.apiKey',
  'llm.apiKey',
  'config.llm.apiKey',
  'headers.authorization',
  '*.headers.authorization',
];

/**
 * Creates the service logger. Level comes from the caller, then LOG_LEVEL,
 * then `info`.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const base: pino.LoggerOptions = {
    level,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
  };
  if (!options.file) return pino(base);

  return pino(
    base,
    pino.multistream([
      { level: 'trace', stream: process.stdout },
      { level: 'trace', stream: pino.destination({ dest: options.file, mkdir: true, sync: false }) },
    ]),
  );
}

/** Logger that drops everything; handy for tests and scripts. */
export function silentLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
