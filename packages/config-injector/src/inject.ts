import { readFileSync } from 'node:fs';
import { generateUserData, shouldInjectCaCertificate, validateUserDataSize } from '@runner-fleet/cloud-init';
import type { CaInjection } from '@runner-fleet/cloud-init';
import {
  isValidGatewayAddress,
  parseRegistryMirrors,
  validateMirrorEndpoint,
} from '@runner-fleet/shared';
import type { MirrorEndpoint, RegistryMirror } from '@runner-fleet/shared';
import type { InjectorEnvironment } from './env';
import { ConfigError, errorMessage } from './lib/errors';
import { log } from './lib/logger';
import { assignInstanceIds, injectUserData, isPoolList } from './pools';
import type { ProductProfile } from './products';
import { applySecretBindings, readSecretFile } from './secrets';
import { parseConfig, serializeConfig } from './serialize';
import { writeFileAtomic } from './write';

/**
 * Resolve the cache endpoint. Mirrors need both the enable flag and a gateway.
 */
export function resolveMirrorEndpoint(env: InjectorEnvironment): MirrorEndpoint {
  const endpoint: MirrorEndpoint = {
    gateway: env.registryCacheEnabled ? env.registryCacheGateway : '',
    port: env.cachePort,
  };

  const validation = validateMirrorEndpoint(endpoint);
  if (!validation.valid) {
    const messages = validation.errors.map((err) => `${err.field}: ${err.message}`);
    throw new ConfigError(`Invalid registry cache endpoint: ${messages.join('; ')}`, 'INVALID_INPUT', {
      errors: messages,
    });
  }

  return endpoint;
}

/**
 * Parse the mirror map. Unusable input disables mirrors with a warning, and
 * entries that cannot be written safely are dropped one by one.
 */
export function loadRegistryMirrors(env: InjectorEnvironment): RegistryMirror[] {
  const { mirrors, skipped, warning } = parseRegistryMirrors(env.mirrorsJson);
  if (warning) {
    log.warn('registry_cache.mirrors_invalid', { reason: warning, input: env.mirrorsJson });
  }
  for (const entry of skipped) {
    log.warn('registry_cache.mirror_skipped', { registry: entry.name, reason: entry.reason });
  }
  return mirrors;
}

/**
 * Load the interception CA when the SSL-bump settings require it.
 * A required CA whose file is missing aborts the run.
 */
export function loadCaInjection(env: InjectorEnvironment): CaInjection | undefined {
  if (!env.caFile) {
    return undefined;
  }
  if (!shouldInjectCaCertificate(env.sslBumpMode, env.sslBumpDomains)) {
    log.debug('ca_certificate.skipped', { mode: env.sslBumpMode });
    return undefined;
  }

  const certificate = readSecretFile(env.caFile);
  if (certificate === null) {
    throw new ConfigError(`CA certificate not found: ${env.caFile}`, 'MISSING_SECRET', {
      path: env.caFile,
    });
  }

  if (certificate.trim() === '') {
    log.warn('ca_certificate.empty', { path: env.caFile });
    return undefined;
  }

  log.info('ca_certificate.injected', { mode: env.sslBumpMode });
  return { certificate, mode: env.sslBumpMode, domains: env.sslBumpDomains };
}

/**
 * Load the debug SSH key. The key file wins over DEBUG_SSH_KEY.
 */
export function loadDebugSshKey(env: InjectorEnvironment): string | undefined {
  if (env.debugSshKeyFile) {
    const key = readSecretFile(env.debugSshKeyFile);
    if (key !== null && key.trim() !== '') {
      log.info('debug_ssh_key.loaded', { path: env.debugSshKeyFile });
      return key.trim();
    }
    log.warn('debug_ssh_key.file_missing', { path: env.debugSshKeyFile });
  }
  return env.debugSshKey;
}

function resolveDnsGateway(profile: ProductProfile, env: InjectorEnvironment): string | undefined {
  const gateway = profile.dnsGateway === 'cache' ? env.registryCacheGateway : env.productGateway;
  if (!gateway) {
    return undefined;
  }
  if (!isValidGatewayAddress(gateway)) {
    throw new ConfigError(`Invalid DNS gateway: ${gateway}`, 'INVALID_INPUT', { gateway });
  }
  return gateway;
}

/**
 * Build the user-data a product's pools receive, or null when the product's
 * policy says none is needed.
 */
export function buildPoolUserData(profile: ProductProfile, env: InjectorEnvironment): string | null {
  if (profile.userData === 'never') {
    return null;
  }
  if (
    profile.userData === 'registry-cache' &&
    !env.registryCacheEnabled &&
    env.registryCacheGateway === ''
  ) {
    log.debug('registry_cache.disabled', { product: profile.product });
    return null;
  }

  const endpoint = resolveMirrorEndpoint(env);
  const mirrors = endpoint.gateway ? loadRegistryMirrors(env) : [];
  if (mirrors.length > 0) {
    log.info('registry_cache.mirrors_planned', {
      registries: mirrors.map((mirror) => mirror.name),
      gateway: endpoint.gateway,
      port: endpoint.port,
    });
  }

  const userData = generateUserData({
    headerComment: profile.headerComment,
    endpoint,
    mirrors,
    ca: loadCaInjection(env),
    sshAuthorizedKey: loadDebugSshKey(env),
    dnsGateway: resolveDnsGateway(profile, env),
    hostname: profile.hostname,
  });

  if (!validateUserDataSize(userData)) {
    log.warn('user_data.size_exceeded', {
      product: profile.product,
      bytes: new TextEncoder().encode(userData).length,
    });
  }

  return userData;
}

/**
 * Apply secrets and pool metadata to a loaded config. Mutates and returns it.
 */
export function injectConfig(
  config: Record<string, unknown>,
  profile: ProductProfile,
  env: InjectorEnvironment,
  processEnv: NodeJS.ProcessEnv
): Record<string, unknown> {
  for (const target of applySecretBindings(config, profile.secrets, processEnv)) {
    log.info('secret.injected', { target });
  }

  if (config.pools === undefined) {
    return config;
  }

  const pools = config.pools;
  if (!isPoolList(pools)) {
    throw new ConfigError('pools must be a list of pool descriptors', 'INVALID_INPUT');
  }

  if (profile.assignInstanceIds) {
    assignInstanceIds(pools, profile.product);
  }

  const userData = buildPoolUserData(profile, env);
  if (userData !== null) {
    for (const pool of injectUserData(pools, userData)) {
      log.info('pool.user_data_injected', { product: profile.product, pool });
    }
  }

  return config;
}

/**
 * Read the product's base config, inject everything, and atomically write the result.
 * Returns the output path.
 */
export function runInjection(
  profile: ProductProfile,
  env: InjectorEnvironment,
  processEnv: NodeJS.ProcessEnv
): string {
  const inputPath = env.configInput ?? profile.configPath;
  const outputPath = env.configOutput ?? profile.outputPath;

  let text: string;
  try {
    text = readFileSync(inputPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Failed to read ${inputPath}: ${errorMessage(err)}`, 'READ_FAILED', {
      path: inputPath,
    });
  }

  const config = injectConfig(parseConfig(text, inputPath), profile, env, processEnv);
  writeFileAtomic(outputPath, serializeConfig(config));
  log.info('config.written', { product: profile.product, path: outputPath });

  return outputPath;
}
