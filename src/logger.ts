import pino from 'pino';

type LogFn = (obj: Record<string, unknown>, msg: string) => void;

export interface MetricsLogger {
  debug?: LogFn;
  info?: LogFn;
  warn?: LogFn;
  error?: LogFn;
}

export function logLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL || 'info';
}

export const logger = pino({ name: 'metric-schema', level: logLevel() });
