/**
 * Config generator for cloud images (Azure and other non-NixOS hosts).
 *
 * Builds the complete fireactions config from environment variables set by the
 * image's own cloud-init, instead of patching a base config file.
 */

import { z } from 'zod';
import { generateUserData } from '@runner-fleet/cloud-init';
import type { PoolMetadata } from '@runner-fleet/shared';
import type { InjectorEnvironment } from './env';
import { loadRegistryMirrors, resolveMirrorEndpoint } from './inject';
import { ConfigError, errorMessage } from './lib/errors';
import { log } from './lib/logger';
import { assignInstanceIds, injectUserData } from './pools';
import { PRODUCT_PROFILES } from './products';
import { serializeConfig } from './serialize';
import { writeFileAtomic } from './write';

export const DEFAULT_RUNNER_IMAGE = 'ghcr.io/thpham/fireactions-images/ubuntu-24.04:latest';
export const DEFAULT_KERNEL_ARGS = 'console=ttyS0 reboot=k panic=1 pci=off';

// ============================================================================
// Zod Schemas
// ============================================================================

export const PoolInputSchema = z.object({
  name: z.string().min(1).default('default'),
  maxRunners: z.number().int().positive().default(10),
  minRunners: z.number().int().nonnegative().default(1),
  runner: z
    .object({
      name: z.string().default('runner'),
      image: z.string().default(DEFAULT_RUNNER_IMAGE),
      imagePullPolicy: z.string().default('IfNotPresent'),
      organization: z.string().optional(),
      labels: z.array(z.string()).default(['self-hosted', 'fireactions']),
      groupId: z.union([z.number().int(), z.string()]).optional(),
    })
    .default({}),
  firecracker: z
    .object({
      kernelArgs: z.string().default(DEFAULT_KERNEL_ARGS),
      memSizeMib: z.number().int().positive().default(2048),
      vcpuCount: z.number().int().positive().default(2),
    })
    .default({}),
});

export type PoolInput = z.infer<typeof PoolInputSchema>;

const CloudConfigEnvSchema = z.object({
  GITHUB_APP_ID: z
    .string({ required_error: 'GITHUB_APP_ID not set' })
    .min(1, 'GITHUB_APP_ID not set')
    .regex(/^\d+$/, 'GITHUB_APP_ID must be numeric'),
  GITHUB_PRIVATE_KEY: z
    .string({ required_error: 'GITHUB_PRIVATE_KEY not set' })
    .min(1, 'GITHUB_PRIVATE_KEY not set'),
  POOLS: z.string({ required_error: 'POOLS not set' }).min(1, 'POOLS not set'),
  BIND_ADDRESS: z.string().default('0.0.0.0:8080'),
  LOG_LEVEL: z.string().default('info'),
});

// ============================================================================
// Orchestrator Types
// ============================================================================

export type OrchestratorPool = {
  name: string;
  max_runners: number;
  min_runners: number;
  runner: {
    name: string;
    image: string;
    image_pull_policy: string;
    organization: string | null;
    labels: string[];
    group_id?: number | string;
  };
  firecracker: {
    binary_path: string;
    kernel_image_path: string;
    kernel_args: string;
    cni_conf_dir: string;
    cni_bin_dirs: string[];
    machine_config: {
      mem_size_mib: number;
      vcpu_count: number;
    };
    metadata?: PoolMetadata;
  };
};

export type CloudConfig = {
  bind_address: string;
  log_level: string;
  debug: boolean;
  metrics: { enabled: boolean; address: string };
  github: { app_id: number; app_private_key: string };
  pools: OrchestratorPool[];
};

/**
 * Transform a user-facing pool definition into the orchestrator's format.
 */
export function transformPool(pool: PoolInput): OrchestratorPool {
  const runner: OrchestratorPool['runner'] = {
    name: pool.runner.name,
    image: pool.runner.image,
    image_pull_policy: pool.runner.imagePullPolicy,
    organization: pool.runner.organization ?? null,
    labels: pool.runner.labels,
  };

  if (pool.runner.groupId) {
    runner.group_id = pool.runner.groupId;
  }

  return {
    name: pool.name,
    max_runners: pool.maxRunners,
    min_runners: pool.minRunners,
    runner,
    firecracker: {
      binary_path: 'firecracker',
      kernel_image_path: '/var/lib/fireactions/kernels/vmlinux',
      kernel_args: pool.firecracker.kernelArgs,
      cni_conf_dir: '/etc/cni/conf.d',
      cni_bin_dirs: ['/opt/cni/bin'],
      machine_config: {
        mem_size_mib: pool.firecracker.memSizeMib,
        vcpu_count: pool.firecracker.vcpuCount,
      },
    },
  };
}

function parsePools(json: string): PoolInput[] {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ConfigError(`Invalid POOLS JSON: ${errorMessage(err)}`, 'INVALID_INPUT');
  }

  const result = z.array(PoolInputSchema).safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`);
    throw new ConfigError(`Invalid POOLS: ${errors.join('; ')}`, 'INVALID_INPUT', { errors });
  }
  return result.data;
}

/**
 * Build the complete fireactions config for a cloud image.
 */
export function generateCloudConfig(
  processEnv: NodeJS.ProcessEnv,
  env: InjectorEnvironment
): CloudConfig {
  const result = CloudConfigEnvSchema.safeParse(processEnv);
  if (!result.success) {
    const errors = result.error.errors.map((err) => err.message);
    const missing = result.error.errors.some(
      (err) => err.code === 'invalid_type' || err.code === 'too_small'
    );
    throw new ConfigError(errors.join('; '), missing ? 'MISSING_ENV' : 'INVALID_INPUT', { errors });
  }
  const vars = result.data;

  const pools = parsePools(vars.POOLS).map(transformPool);

  const endpoint = resolveMirrorEndpoint(env);
  const mirrors = endpoint.gateway ? loadRegistryMirrors(env) : [];
  if (mirrors.length > 0) {
    const profile = PRODUCT_PROFILES.fireactions;
    const userData = generateUserData({
      headerComment: profile.headerComment,
      endpoint,
      mirrors,
      dnsGateway: endpoint.gateway,
      hostname: profile.hostname,
    });

    assignInstanceIds(pools, profile.product);
    injectUserData(pools, userData);
    log.info('registry_cache.metadata_injected', {
      registries: mirrors.map((mirror) => mirror.name),
      pools: pools.map((pool) => pool.name),
    });
  }

  return {
    bind_address: vars.BIND_ADDRESS,
    log_level: vars.LOG_LEVEL,
    debug: false,
    metrics: { enabled: true, address: '0.0.0.0:8081' },
    github: { app_id: Number.parseInt(vars.GITHUB_APP_ID, 10), app_private_key: vars.GITHUB_PRIVATE_KEY },
    pools,
  };
}

/**
 * Generate the cloud image config and atomically write it. Returns the output path.
 */
export function runCloudConfigGeneration(
  processEnv: NodeJS.ProcessEnv,
  env: InjectorEnvironment
): string {
  const outputPath = env.configOutput ?? PRODUCT_PROFILES.fireactions.outputPath;
  const config = generateCloudConfig(processEnv, env);
  writeFileAtomic(outputPath, serializeConfig(config));
  log.info('config.written', { product: 'fireactions', path: outputPath, pools: config.pools.length });
  return outputPath;
}
