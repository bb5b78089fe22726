/**
 * Engine Configuration
 * ====================
 *
 * Resolves the options passed into the resolver, executor and store.
 * Nothing in the core reads process state; tools resolve a config here
 * and hand it down explicitly.
 *
 * Precedence: CLI overrides > environment > defaults.
 *
 * Environment:
 * - DOCPATCH_ADD_MODE        'strict' | 'upsert'
 * - DOCPATCH_CREATE_PARENTS  '1' | 'true' | '0' | 'false'
 * - DOCPATCH_BACKUP          '1' | 'true' | '0' | 'false'
 */

import type { AddMode, EditOptions } from '../types/document.js';

/**
 * Resolved engine configuration.
 */
export interface EngineConfig {
  add_mode: AddMode;
  create_parents: boolean;
  make_backup: boolean;
}

/**
 * Values set explicitly on the command line.
 */
export type EngineConfigOverrides = Partial<EngineConfig>;

/**
 * Environment variables consulted, subset of process.env.
 */
export type ConfigEnv = Readonly<Record<string, string | undefined>>;

/**
 * Defaults - strict insert, no implicit parents, backups on.
 */
const DEFAULT_CONFIG: EngineConfig = {
  add_mode: 'strict',
  create_parents: false,
  make_backup: true,
};

/**
 * Raised for an unusable configuration value.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// =============================================================================
// Parsing
// =============================================================================

export function parseAddMode(value: string, source: string): AddMode {
  if (value === 'strict' || value === 'upsert') return value;
  throw new ConfigError(`${source} must be 'strict' or 'upsert', got '${value}'`);
}

function parseFlag(value: string, source: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      throw new ConfigError(`${source} must be one of 1, true, 0, false; got '${value}'`);
  }
}

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve configuration from environment and overrides.
 *
 * @throws ConfigError for invalid environment values
 */
export function resolveEngineConfig(env: ConfigEnv = {}, overrides: EngineConfigOverrides = {}): EngineConfig {
  const config: EngineConfig = { ...DEFAULT_CONFIG };

  const addMode = env['DOCPATCH_ADD_MODE'];
  if (addMode !== undefined && addMode !== '') {
    config.add_mode = parseAddMode(addMode, 'DOCPATCH_ADD_MODE');
  }

  const createParents = env['DOCPATCH_CREATE_PARENTS'];
  if (createParents !== undefined && createParents !== '') {
    config.create_parents = parseFlag(createParents, 'DOCPATCH_CREATE_PARENTS');
  }

  const backup = env['DOCPATCH_BACKUP'];
  if (backup !== undefined && backup !== '') {
    config.make_backup = parseFlag(backup, 'DOCPATCH_BACKUP');
  }

  if (overrides.add_mode !== undefined) config.add_mode = overrides.add_mode;
  if (overrides.create_parents !== undefined) config.create_parents = overrides.create_parents;
  if (overrides.make_backup !== undefined) config.make_backup = overrides.make_backup;

  return config;
}

/**
 * Edit options for the resolver and executor.
 */
export function toEditOptions(config: EngineConfig): EditOptions {
  return { addMode: config.add_mode, createParents: config.create_parents };
}
