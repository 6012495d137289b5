/**
 * Structured logging with pino.
 *
 * Logs go to stderr so stdout stays free for the CLI's summary output.
 */
import { createRequire } from 'node:module';
import pino from 'pino';
import type { LoggerOptions } from 'pino';

const require = createRequire(import.meta.url);

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Level from LOG_LEVEL (case-insensitive), `info` when unset or unknown. */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = env.LOG_LEVEL?.toLowerCase();
  return level && isLogLevel(level) ? level : 'info';
}

function prettyTransportAvailable(env: NodeJS.ProcessEnv): boolean {
  if (env.NODE_ENV !== 'development') return false;
  try {
    require.resolve('pino-pretty');
    return true;
  } catch (e) {
    console.debug('pino-pretty not available, using JSON logs:', e);
    return false;
  }
}

const env = process.env;

const options: LoggerOptions = {
  level: resolveLogLevel(env),
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  base: {
    service: 'driftnet',
    pid: process.pid,
  },
};

export const logger = prettyTransportAvailable(env)
  ? pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: 2,
        },
      },
    })
  : pino(options, pino.destination(2));

export type Logger = typeof logger;
