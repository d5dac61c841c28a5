import type { HostnameSource, ProductName } from './types';

// =============================================================================
// Registry Cache Defaults
// =============================================================================

/** Port the pull-through cache listens on when none is configured. */
export const DEFAULT_CACHE_PORT = 5000;

/** Upstreams for registries that do not serve from their own host name. */
export const DEFAULT_UPSTREAMS: Readonly<Record<string, string>> = {
  'docker.io': 'https://registry-1.docker.io',
  'ghcr.io': 'https://ghcr.io',
  'quay.io': 'https://quay.io',
  'gcr.io': 'https://gcr.io',
};

/**
 * Docker Hub images live at the cache root; every other registry is
 * namespaced under /v2/<name>.
 */
export const ROOT_NAMESPACE_REGISTRY = 'docker.io';

/** Name of the Buildx builder pre-created with the generated BuildKit config. */
export const DEFAULT_BUILDX_BUILDER = 'registry-cache';

// =============================================================================
// Guest Paths
// =============================================================================

export const CONTAINERD_CERTS_DIR = '/etc/containerd/certs.d';
export const BUILDKIT_CONFIG_DIR = '/etc/buildkit';
export const BUILDKIT_CONFIG_PATH = `${BUILDKIT_CONFIG_DIR}/buildkitd.toml`;
export const DOCKER_DAEMON_CONFIG_PATH = '/etc/docker/daemon.json';
export const CA_BUNDLE_PATH = '/etc/ssl/certs/ca-certificates.crt';
export const CLOUD_INIT_CA_GLOB = '/usr/local/share/ca-certificates/cloud-init-ca-cert-*.crt';

// =============================================================================
// Metadata Service
// =============================================================================

/** Link-local MMDS address served to every microVM. */
export const MMDS_ADDRESS = '169.254.169.254';
export const MMDS_METADATA_BASE_URL = `http://${MMDS_ADDRESS}/latest/meta-data`;

export const HOSTNAME_SOURCES: Record<ProductName, HostnameSource> = {
  fireactions: { metadataPath: 'fireactions/runner_id', variable: 'RUNNER_ID' },
  fireglab: { metadataPath: 'fireglab/runner_name', variable: 'RUNNER_NAME' },
  fireteact: { metadataPath: 'fireteact/runner_name', variable: 'RUNNER_NAME' },
};

/** Pool name used for the instance-id when a pool has none. */
export const DEFAULT_POOL_NAME = 'default';

// =============================================================================
// Limits
// =============================================================================

/** EC2-compatible datasources reject user-data above 16 KiB. */
export const MAX_USER_DATA_BYTES = 16 * 1024;
