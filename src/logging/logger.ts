/**
 * pino loggers. One root logger per process; modules take named children.
 * Level comes from LOG_LEVEL (default `info`).
 */

import { pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export function isLogLevel(value: string): value is LevelWithSilent {
  return LEVELS.some((level) => level === value);
}

function envLevel(): LevelWithSilent {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

const root: Logger = pino({
  level: envLevel(),
  base: { service: 'otlp-metrics-envelope' },
  serializers: { err: pino.stdSerializers.err },
});

export interface LoggerOptions {
  /** Overrides the root level for this child only. */
  level?: LevelWithSilent;
}

/** Named child of the root logger. */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const child = root.child({ module: name });
  if (options.level !== undefined) child.level = options.level;
  return child;
}

/** Discards everything. Tests inject it where a component takes a logger. */
export const silentLogger: Logger = pino({ level: 'silent' });
