/**
 * Environment parsing with Zod schemas.
 *
 * The systemd units that run the injector pass everything through the
 * environment; this module turns it into one typed object.
 */

import { z } from 'zod';
import { DEFAULT_CACHE_PORT, parseDomainList, parseSslBumpMode } from '@runner-fleet/shared';
import type { SslBumpMode } from '@runner-fleet/shared';
import { ConfigError } from './lib/errors';
import { isLogLevel, log } from './lib/logger';
import type { LogLevel } from './lib/logger';

// ============================================================================
// Zod Schemas
// ============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value.trim()));

const flag = z
  .string()
  .optional()
  .transform((value) => value === 'true');

const CachePortSchema = z.coerce.number().int().min(1).max(65535);

export const InjectorEnvSchema = z.object({
  REGISTRY_CACHE_GATEWAY: optionalString,
  ZOT_ENABLED: flag,
  REGISTRY_CACHE_ENABLED: flag,
  ZOT_PORT: optionalString,
  ZOT_MIRRORS: optionalString,
  SQUID_SSL_BUMP_MODE: optionalString,
  SQUID_SSL_BUMP_DOMAINS: optionalString,
  SQUID_CA_FILE: optionalString,
  DEBUG_SSH_KEY_FILE: optionalString,
  DEBUG_SSH_KEY: optionalString,
  FIREGLAB_GATEWAY: optionalString,
  CONFIG_INPUT: optionalString,
  CONFIG_OUTPUT: optionalString,
  LOG_LEVEL: optionalString,
});

// ============================================================================
// Typed Environment
// ============================================================================

export interface InjectorEnvironment {
  /** Address of the registry cache; empty when unset */
  registryCacheGateway: string;
  /** ZOT_ENABLED or REGISTRY_CACHE_ENABLED is "true" */
  registryCacheEnabled: boolean;
  cachePort: number;
  /** Raw mirror JSON, parsed later so bad input only disables mirrors */
  mirrorsJson?: string;
  sslBumpMode: SslBumpMode;
  sslBumpDomains: string[];
  caFile?: string;
  debugSshKeyFile?: string;
  debugSshKey?: string;
  /** Product subnet gateway used for DNS by products on their own bridge */
  productGateway: string;
  configInput?: string;
  configOutput?: string;
  logLevel: LogLevel;
}

/**
 * Parse the cache port. The cache is optional, so a bad value falls back to
 * the default instead of aborting products that never use it.
 */
export function resolveCachePort(value: string | undefined): number {
  if (value === undefined) {
    return DEFAULT_CACHE_PORT;
  }
  const parsed = CachePortSchema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }
  log.warn('registry_cache.port_invalid', { value, fallback: DEFAULT_CACHE_PORT });
  return DEFAULT_CACHE_PORT;
}

/**
 * Parse process environment into an InjectorEnvironment.
 * Throws ConfigError(INVALID_INPUT) when a present value cannot be used.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): InjectorEnvironment {
  const result = InjectorEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Invalid environment: ${errors.join('; ')}`, 'INVALID_INPUT', {
      errors,
    });
  }

  const data = result.data;
  const logLevel = data.LOG_LEVEL?.toLowerCase() ?? 'info';

  return {
    registryCacheGateway: data.REGISTRY_CACHE_GATEWAY ?? '',
    registryCacheEnabled: data.ZOT_ENABLED || data.REGISTRY_CACHE_ENABLED,
    cachePort: resolveCachePort(data.ZOT_PORT),
    mirrorsJson: data.ZOT_MIRRORS,
    sslBumpMode: parseSslBumpMode(data.SQUID_SSL_BUMP_MODE),
    sslBumpDomains: parseDomainList(data.SQUID_SSL_BUMP_DOMAINS),
    caFile: data.SQUID_CA_FILE,
    debugSshKeyFile: data.DEBUG_SSH_KEY_FILE,
    debugSshKey: data.DEBUG_SSH_KEY,
    productGateway: data.FIREGLAB_GATEWAY ?? '',
    configInput: data.CONFIG_INPUT,
    configOutput: data.CONFIG_OUTPUT,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  };
}
