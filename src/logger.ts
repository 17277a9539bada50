/**
 * @tessera/core — logging
 *
 * One pino root logger per container; each component logs through a child
 * bound to `{ component }`.
 */

import pino, { type Logger, type LoggerOptions } from 'pino';
import { errWithCause } from 'pino-std-serializers';
import type { LogLevel } from './config';

export type { Logger } from 'pino';

export interface CreateLoggerOptions {
  level?:    LogLevel;
  bindings?: Record<string, unknown>;
}

export function createLogger(opts: CreateLoggerOptions = {}): Logger {
  const pinoOpts: LoggerOptions = {
    name:        'tessera',
    level:       opts.level ?? 'info',
    serializers: { err: errWithCause },
  };
  return pino(pinoOpts).child(opts.bindings ?? {});
}

export function componentLogger(root: Logger, component: string): Logger {
  return root.child({ component });
}
