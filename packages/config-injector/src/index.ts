export { run, parseArgs, isEntryPoint, CLOUD_CONFIG_COMMAND } from './cli';
export type { CliArgs } from './cli';

export { loadEnvironment, InjectorEnvSchema } from './env';
export type { InjectorEnvironment } from './env';

export {
  injectConfig,
  runInjection,
  buildPoolUserData,
  resolveMirrorEndpoint,
  loadRegistryMirrors,
  loadCaInjection,
  loadDebugSshKey,
} from './inject';

export {
  generateCloudConfig,
  runCloudConfigGeneration,
  transformPool,
  PoolInputSchema,
} from './cloud-image';
export type { CloudConfig, OrchestratorPool, PoolInput } from './cloud-image';

export { PRODUCT_PROFILES, isProductName } from './products';
export type { ProductProfile, UserDataPolicy, DnsGatewaySource } from './products';

export { applySecretBindings, readSecretFile } from './secrets';
export type { SecretBinding, SecretFormat } from './secrets';

export { assignInstanceIds, ensurePoolMetadata, injectUserData, isPoolList } from './pools';
export { parseConfig, serializeConfig, DEFAULT_SERIALIZE_OPTIONS } from './serialize';
export type { SerializeOptions, MultilineStyle } from './serialize';
export { writeFileAtomic } from './write';

export { ConfigError } from './lib/errors';
export type { ConfigErrorCode } from './lib/errors';
export { log, setLogLevel } from './lib/logger';
export type { LogLevel } from './lib/logger';
