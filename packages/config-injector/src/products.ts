import { HOSTNAME_SOURCES } from '@runner-fleet/shared';
import type { HostnameSource, ProductName } from '@runner-fleet/shared';
import type { SecretBinding } from './secrets';

/**
 * When a product's pools receive generated user-data.
 * - registry-cache: only when the cache is enabled or a gateway is configured
 * - always: whenever the config has pools
 * - never: secrets only
 */
export type UserDataPolicy = 'registry-cache' | 'always' | 'never';

/**
 * Which gateway the VMs use as their nameserver.
 * - cache: the registry cache gateway (VMs share its bridge)
 * - product: the product's own subnet gateway (FIREGLAB_GATEWAY)
 */
export type DnsGatewaySource = 'cache' | 'product';

/**
 * Everything that differs between runner managers.
 */
export interface ProductProfile {
  product: ProductName;
  /** Base config written by the NixOS module */
  configPath: string;
  /** Final config read by the runner manager */
  outputPath: string;
  headerComment: string;
  hostname: HostnameSource;
  dnsGateway: DnsGatewaySource;
  userData: UserDataPolicy;
  /** Whether pools get an EC2-compatible instance-id */
  assignInstanceIds: boolean;
  secrets: SecretBinding[];
}

export const PRODUCT_PROFILES: Record<ProductName, ProductProfile> = {
  fireactions: {
    product: 'fireactions',
    configPath: '/etc/fireactions/config.yaml',
    outputPath: '/run/fireactions/config.yaml',
    headerComment: 'Registry cache configuration - auto-injected by fireactions',
    hostname: HOSTNAME_SOURCES.fireactions,
    dnsGateway: 'cache',
    userData: 'registry-cache',
    assignInstanceIds: true,
    secrets: [
      { envVar: 'APP_ID_FILE', section: 'github', key: 'app_id', format: 'integer', optional: false },
      { envVar: 'PRIVATE_KEY_FILE', section: 'github', key: 'app_private_key', format: 'raw', optional: false },
    ],
  },
  fireglab: {
    product: 'fireglab',
    configPath: '/etc/fireglab/config.yaml',
    outputPath: '/run/fireglab/config.yaml',
    headerComment: 'Fireglab VM configuration - auto-injected by runner-fleet-config',
    hostname: HOSTNAME_SOURCES.fireglab,
    dnsGateway: 'product',
    userData: 'always',
    assignInstanceIds: true,
    secrets: [
      { envVar: 'ACCESS_TOKEN_FILE', section: 'gitlab', key: 'accessToken', format: 'text', optional: true },
      { envVar: 'INSTANCE_URL_FILE', section: 'gitlab', key: 'instanceURL', format: 'text', optional: true },
      { envVar: 'GROUP_ID_FILE', section: 'gitlab', key: 'groupId', format: 'integer', optional: true },
      { envVar: 'PROJECT_ID_FILE', section: 'gitlab', key: 'projectId', format: 'integer', optional: true },
    ],
  },
  fireteact: {
    product: 'fireteact',
    configPath: '/etc/fireteact/config.yaml',
    outputPath: '/run/fireteact/config.yaml',
    headerComment: 'Fireteact VM configuration - auto-injected by runner-fleet-config',
    hostname: HOSTNAME_SOURCES.fireteact,
    dnsGateway: 'product',
    userData: 'never',
    assignInstanceIds: false,
    secrets: [
      { envVar: 'API_TOKEN_FILE', section: 'gitea', key: 'apiToken', format: 'text', optional: false },
    ],
  },
};

export function isProductName(value: string): value is ProductName {
  return Object.prototype.hasOwnProperty.call(PRODUCT_PROFILES, value);
}
