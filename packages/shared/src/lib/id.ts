import { DEFAULT_POOL_NAME } from '../constants';
import type { ProductName } from '../types';

/**
 * Build the EC2-compatible instance-id for a pool.
 * Format: i-{product}-{pool}
 * Example: i-fireactions-small
 *
 * cloud-init's EC2 datasource refuses metadata without an instance-id.
 */
export function buildInstanceId(product: ProductName, poolName?: string): string {
  return `i-${product}-${poolName || DEFAULT_POOL_NAME}`;
}
