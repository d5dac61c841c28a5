import { MAX_USER_DATA_BYTES } from '@runner-fleet/shared';
import type {
  HostnameSource,
  MirrorEndpoint,
  RegistryMirror,
  SslBumpMode,
} from '@runner-fleet/shared';
import { assembleCloudInit } from './assemble';
import { shouldInjectCaCertificate } from './ca-policy';
import { planRegistryMirrors } from './registry-mirrors';

/**
 * CA certificate offered for injection, with the proxy settings that decide
 * whether it is actually needed.
 */
export interface CaInjection {
  certificate: string;
  mode: SslBumpMode;
  domains: readonly string[];
}

/**
 * Variables for user-data generation.
 */
export interface UserDataOptions {
  headerComment: string;
  /** Cache endpoint; an empty gateway disables mirror configuration */
  endpoint: MirrorEndpoint;
  mirrors: readonly RegistryMirror[];
  /** Buildx builder name (default: registry-cache) */
  builderName?: string;
  ca?: CaInjection;
  sshAuthorizedKey?: string;
  /** Nameserver for the VM (may differ from the cache gateway) */
  dnsGateway?: string;
  hostname: HostnameSource;
}

/**
 * Generate cloud-init user-data with registry cache, CA, SSH and runcmd sections.
 */
export function generateUserData(options: UserDataOptions): string {
  const plan = planRegistryMirrors({
    endpoint: options.endpoint,
    mirrors: options.mirrors,
    builderName: options.builderName,
  });

  const ca = options.ca;
  const caCertificate =
    ca && ca.certificate && shouldInjectCaCertificate(ca.mode, ca.domains)
      ? ca.certificate
      : undefined;

  return assembleCloudInit({
    headerComment: options.headerComment,
    files: plan.files,
    caCertificate,
    sshAuthorizedKey: options.sshAuthorizedKey,
    bootCommands: plan.bootCommands,
    dnsGateway: options.dnsGateway,
    hostname: options.hostname,
  });
}

/**
 * Validate user-data doesn't exceed the 16KB EC2 datasource limit.
 */
export function validateUserDataSize(userData: string): boolean {
  const sizeBytes = new TextEncoder().encode(userData).length;
  return sizeBytes <= MAX_USER_DATA_BYTES;
}
