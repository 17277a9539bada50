/**
 * @tessera/core — container options
 *
 * Options are validated with zod. resolveOptions() takes caller input;
 * loadOptionsFromEnv() reads TESSERA_* variables, falling back to the schema
 * defaults for anything unset.
 */

import { z } from 'zod';

export const SYNC_MODES = ['no-sync', 'sync', 'sync-block', 'sync-on-flush', 'sync-on-flush-block'] as const;
export type SyncMode = (typeof SYNC_MODES)[number];

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const ContainerOptionsSchema = z.object({
  /**
   * no-sync              never force data to stable storage
   * sync                 background sync on flush() and close()
   * sync-block           inline sync on flush() and close()
   * sync-on-flush        background sync on flush() only
   * sync-on-flush-block  inline sync on flush() only
   */
  syncMode:            z.enum(SYNC_MODES).default('no-sync'),
  /**
   * Reuse a committed type even when its layout differs from the requested
   * shape. Records written under a drifted type are laid out by the new
   * shape, so this is only safe when the caller knows the layouts agree.
   */
  preferExistingTypes: z.boolean().default(false),
  typeConflictPolicy:  z.enum(['replace', 'error']).default('replace'),
  logLevel:            z.enum(LOG_LEVELS).default('info'),
  /** Chunk length for compound arrays created without an explicit one. */
  defaultChunkSize:    z.number().int().positive().optional(),
});

export type ContainerOptionsInput = z.input<typeof ContainerOptionsSchema>;
export type ContainerOptions      = z.output<typeof ContainerOptionsSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** @throws ConfigError */
export function resolveOptions(input: ContainerOptionsInput = {}): ContainerOptions {
  const result = ContainerOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid container options:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}

const EnvSchema = z.object({
  TESSERA_SYNC_MODE:             z.enum(SYNC_MODES).optional(),
  TESSERA_PREFER_EXISTING_TYPES: booleanFromEnv.optional(),
  TESSERA_TYPE_CONFLICT_POLICY:  z.enum(['replace', 'error']).optional(),
  TESSERA_LOG_LEVEL:             z.enum(LOG_LEVELS).optional(),
  TESSERA_DEFAULT_CHUNK_SIZE:    z.coerce.number().int().positive().optional(),
});

/**
 * Options from TESSERA_* environment variables. Empty values count as unset.
 * @throws ConfigError
 */
export function loadOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ContainerOptions {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') present[key] = value;
  }

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment configuration:\n${z.prettifyError(parsed.error)}`);
  }
  const e = parsed.data;

  const input: Record<string, unknown> = {};
  if (e.TESSERA_SYNC_MODE             !== undefined) input['syncMode']            = e.TESSERA_SYNC_MODE;
  if (e.TESSERA_PREFER_EXISTING_TYPES !== undefined) input['preferExistingTypes'] = e.TESSERA_PREFER_EXISTING_TYPES;
  if (e.TESSERA_TYPE_CONFLICT_POLICY  !== undefined) input['typeConflictPolicy']  = e.TESSERA_TYPE_CONFLICT_POLICY;
  if (e.TESSERA_LOG_LEVEL             !== undefined) input['logLevel']            = e.TESSERA_LOG_LEVEL;
  if (e.TESSERA_DEFAULT_CHUNK_SIZE    !== undefined) input['defaultChunkSize']    = e.TESSERA_DEFAULT_CHUNK_SIZE;

  const result = ContainerOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(`Invalid environment configuration:\n${z.prettifyError(result.error)}`);
  }
  return result.data;
}
