export { generateUserData, validateUserDataSize } from './generate';
export type { CaInjection, UserDataOptions } from './generate';

export { assembleCloudInit, buildRunCommands } from './assemble';
export type { CloudInitDocumentOptions } from './assemble';

export {
  planRegistryMirrors,
  buildHostsToml,
  buildBuildkitConfig,
  buildDockerDaemonConfig,
} from './registry-mirrors';
export type { RegistryMirrorPlan, RegistryMirrorPlanOptions } from './registry-mirrors';

export { shouldInjectCaCertificate } from './ca-policy';
