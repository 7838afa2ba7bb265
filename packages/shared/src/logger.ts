import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

// Test runs stay quiet unless LOG_LEVEL asks otherwise.
function getLogLevel(): LogLevel {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel !== undefined && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env['VITEST'] ? 'silent' : 'info';
}

export const logger = pino({
  name: 'tenet',
  level: getLogLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    process.env['NODE_ENV'] === 'development'
      ? { target: 'pino/file', options: { destination: 1 } }
      : undefined,
});

/** Child logger tagged `<area>:<component>`, e.g. `evaluation:coherence-checker`. */
export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}
