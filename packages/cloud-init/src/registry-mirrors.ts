import {
  BUILDKIT_CONFIG_DIR,
  BUILDKIT_CONFIG_PATH,
  CONTAINERD_CERTS_DIR,
  DEFAULT_BUILDX_BUILDER,
  DOCKER_DAEMON_CONFIG_PATH,
  ROOT_NAMESPACE_REGISTRY,
} from '@runner-fleet/shared';
import type {
  BootCommand,
  FileWriteDirective,
  MirrorEndpoint,
  RegistryMirror,
} from '@runner-fleet/shared';
import { buildxCreateScript } from './template';

/**
 * Input for registry mirror planning.
 */
export interface RegistryMirrorPlanOptions {
  endpoint: MirrorEndpoint;
  /** Mirrors in the order they should appear in every generated file */
  mirrors: readonly RegistryMirror[];
  /** Buildx builder name (default: registry-cache) */
  builderName?: string;
}

/**
 * Files and boot commands that route a VM's image pulls through the cache.
 */
export interface RegistryMirrorPlan {
  files: FileWriteDirective[];
  bootCommands: BootCommand[];
}

function cacheAddress(endpoint: MirrorEndpoint): string {
  return `${endpoint.gateway}:${endpoint.port}`;
}

/**
 * Containerd hosts.toml for one registry.
 *
 * The cache stores Docker Hub images at its root and every other registry
 * under /v2/<name>, so only non-Docker-Hub registries get the override_path host.
 */
export function buildHostsToml(mirror: RegistryMirror, endpoint: MirrorEndpoint): string {
  const cacheUrl = `http://${cacheAddress(endpoint)}`;
  const lines = [
    `server = "${mirror.upstream}"`,
    '',
    `[host."${cacheUrl}"]`,
    '  capabilities = ["pull", "resolve"]',
    '  skip_verify = true',
  ];

  if (mirror.name !== ROOT_NAMESPACE_REGISTRY) {
    lines.push(
      '',
      `[host."${cacheUrl}/v2/${mirror.name}"]`,
      '  capabilities = ["pull", "resolve"]',
      '  override_path = true'
    );
  }

  return lines.join('\n');
}

/**
 * BuildKit daemon config with one registry stanza per mirror.
 */
export function buildBuildkitConfig(
  mirrors: readonly RegistryMirror[],
  endpoint: MirrorEndpoint
): string {
  const header = [
    '# BuildKit registry mirrors for docker/setup-buildx-action',
    `# Use with: docker buildx create --config ${BUILDKIT_CONFIG_PATH}`,
  ].join('\n');

  const stanzas = mirrors.map((mirror) =>
    [
      `[registry."${mirror.name}"]`,
      `  mirrors = ["${cacheAddress(endpoint)}"]`,
      '  http = true',
      '  insecure = true',
    ].join('\n')
  );

  return `${header}\n${stanzas.join('\n\n')}`;
}

/**
 * Docker daemon.json pointing `docker pull` at the cache.
 * One entry regardless of mirror count: dockerd only mirrors Docker Hub.
 */
export function buildDockerDaemonConfig(endpoint: MirrorEndpoint): string {
  const address = cacheAddress(endpoint);
  return JSON.stringify(
    {
      'registry-mirrors': [`http://${address}`],
      'insecure-registries': [address],
    },
    null,
    2
  );
}

/**
 * Plan the write_files entries and runcmd steps for the registry cache.
 *
 * Returns an empty plan when the gateway is empty or no mirrors are configured.
 */
export function planRegistryMirrors(options: RegistryMirrorPlanOptions): RegistryMirrorPlan {
  const { endpoint, mirrors } = options;
  if (!endpoint.gateway || mirrors.length === 0) {
    return { files: [], bootCommands: [] };
  }

  const files: FileWriteDirective[] = mirrors.map((mirror) => ({
    path: `${CONTAINERD_CERTS_DIR}/${mirror.name}/hosts.toml`,
    content: buildHostsToml(mirror, endpoint),
  }));

  files.push(
    { path: BUILDKIT_CONFIG_PATH, content: buildBuildkitConfig(mirrors, endpoint) },
    { path: DOCKER_DAEMON_CONFIG_PATH, content: buildDockerDaemonConfig(endpoint) }
  );

  const bootCommands: BootCommand[] = [
    {
      comment: 'Ensure containerd picks up the new registry mirrors',
      command: `mkdir -p ${CONTAINERD_CERTS_DIR}`,
    },
    { command: `mkdir -p ${BUILDKIT_CONFIG_DIR}` },
    { command: 'systemctl restart containerd || true' },
    {
      comment: 'Restart Docker daemon to pick up registry mirror config',
      command: 'systemctl restart docker || true',
    },
    {
      comment: 'Create a pre-configured Buildx builder that uses the registry mirrors',
      command: buildxCreateScript(options.builderName ?? DEFAULT_BUILDX_BUILDER),
    },
  ];

  return { files, bootCommands };
}
