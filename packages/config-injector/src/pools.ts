import { z } from 'zod';
import { buildInstanceId } from '@runner-fleet/shared';
import type { PoolDescriptor, PoolMetadata, ProductName } from '@runner-fleet/shared';

// Validates shape only; callers keep the original objects so key order survives.
const PoolDescriptorSchema = z
  .object({
    name: z.string().optional(),
    firecracker: z
      .object({
        metadata: z.record(z.string(), z.unknown()).optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const PoolListSchema = z.array(PoolDescriptorSchema);

export function isPoolList(value: unknown): value is PoolDescriptor[] {
  return PoolListSchema.safeParse(value).success;
}

/**
 * Ensure `firecracker.metadata` exists on the pool and return it.
 */
export function ensurePoolMetadata(pool: PoolDescriptor): PoolMetadata {
  const firecracker = pool.firecracker ?? {};
  pool.firecracker = firecracker;
  const metadata = firecracker.metadata ?? {};
  firecracker.metadata = metadata;
  return metadata;
}

/**
 * Give every pool an instance-id unless it already has one.
 * Returns the ids that were assigned.
 */
export function assignInstanceIds(pools: PoolDescriptor[], product: ProductName): string[] {
  const assigned: string[] = [];
  for (const pool of pools) {
    const metadata = ensurePoolMetadata(pool);
    if (!('instance-id' in metadata)) {
      const instanceId = buildInstanceId(product, pool.name);
      metadata['instance-id'] = instanceId;
      assigned.push(instanceId);
    }
  }
  return assigned;
}

/**
 * Attach user-data to every pool that does not already carry its own.
 * Existing user-data always wins. Returns the names of updated pools.
 */
export function injectUserData(pools: PoolDescriptor[], userData: string): string[] {
  const injected: string[] = [];
  for (const pool of pools) {
    const metadata = ensurePoolMetadata(pool);
    if (!('user-data' in metadata)) {
      metadata['user-data'] = userData;
      injected.push(pool.name ?? 'unknown');
    }
  }
  return injected;
}
