import { existsSync, readFileSync } from 'node:fs';
import { ConfigError, errorMessage } from './lib/errors';
import { log } from './lib/logger';

/**
 * How a secret file's content becomes a config value.
 * - text: surrounding whitespace stripped
 * - raw: verbatim (PEM keys keep their trailing newline)
 * - integer: stripped and parsed as a base-10 integer
 */
export type SecretFormat = 'text' | 'raw' | 'integer';

/**
 * Maps a secret file (path taken from an environment variable) onto
 * `config[section][key]`.
 */
export interface SecretBinding {
  envVar: string;
  section: string;
  key: string;
  format: SecretFormat;
  /** Optional secrets are skipped when missing or malformed; required ones abort */
  optional: boolean;
}

/**
 * Read a secret file. Returns null when the file does not exist.
 */
export function readSecretFile(filePath: string): string | null {
  if (!existsSync(filePath)) {
    return null;
  }
  try {
    return readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read secret file ${filePath}: ${errorMessage(err)}`, 'READ_FAILED', {
      path: filePath,
    });
  }
}

function formatSecret(binding: SecretBinding, raw: string): string | number | null {
  switch (binding.format) {
    case 'raw':
      return raw;
    case 'text':
      return raw.trim();
    case 'integer': {
      const text = raw.trim();
      return /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : null;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Apply secret bindings to a loaded config, in binding order.
 *
 * A binding only applies when its section already exists in the config and its
 * environment variable is set. Returns the `section.key` paths that were set.
 */
export function applySecretBindings(
  config: Record<string, unknown>,
  bindings: readonly SecretBinding[],
  env: NodeJS.ProcessEnv
): string[] {
  const applied: string[] = [];

  for (const binding of bindings) {
    const section = config[binding.section];
    const filePath = env[binding.envVar]?.trim();
    if (!isRecord(section) || !filePath) {
      continue;
    }

    const target = `${binding.section}.${binding.key}`;
    const raw = readSecretFile(filePath);
    if (raw === null) {
      if (binding.optional) {
        log.warn('secret.file_missing', { target, envVar: binding.envVar, path: filePath });
        continue;
      }
      throw new ConfigError(`Secret file for ${target} not found: ${filePath}`, 'MISSING_SECRET', {
        envVar: binding.envVar,
        path: filePath,
      });
    }

    const value = formatSecret(binding, raw);
    if (value === null) {
      if (binding.optional) {
        log.warn('secret.invalid_integer', { target, envVar: binding.envVar });
        continue;
      }
      throw new ConfigError(`Secret for ${target} is not an integer`, 'INVALID_SECRET', {
        envVar: binding.envVar,
      });
    }

    section[binding.key] = value;
    applied.push(target);
  }

  return applied;
}
