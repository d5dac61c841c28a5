import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import type { PoolDescriptor } from '@runner-fleet/shared';
import { assignInstanceIds, ensurePoolMetadata, injectUserData, isPoolList } from '../../src/pools';

describe('pools', () => {
  describe('isPoolList', () => {
    it('accepts descriptors with extra fields', () => {
      expect(isPoolList([{ name: 'small', max_runners: 5, firecracker: { vcpu_count: 2 } }])).toBe(true);
      expect(isPoolList([])).toBe(true);
    });

    it('rejects values that are not pool lists', () => {
      expect(isPoolList('small')).toBe(false);
      expect(isPoolList({ name: 'small' })).toBe(false);
      expect(isPoolList([{ name: 3 }])).toBe(false);
      expect(isPoolList([{ firecracker: { metadata: 'x' } }])).toBe(false);
    });
  });

  describe('ensurePoolMetadata', () => {
    it('creates missing levels and keeps existing entries', () => {
      const bare: PoolDescriptor = { name: 'a' };
      ensurePoolMetadata(bare);
      expect(bare).toEqual({ name: 'a', firecracker: { metadata: {} } });

      const existing: PoolDescriptor = { firecracker: { kernel_args: 'x', metadata: { custom: 1 } } };
      expect(ensurePoolMetadata(existing)).toEqual({ custom: 1 });
      expect(existing).toEqual({ firecracker: { kernel_args: 'x', metadata: { custom: 1 } } });
    });
  });

  describe('assignInstanceIds', () => {
    it('assigns ids to pools without one', () => {
      const pools: PoolDescriptor[] = [
        { name: 'small' },
        { name: 'large', firecracker: { metadata: { 'instance-id': 'i-custom' } } },
        {},
      ];

      expect(assignInstanceIds(pools, 'fireactions')).toEqual([
        'i-fireactions-small',
        'i-fireactions-default',
      ]);
      expect(pools[0]?.firecracker?.metadata).toEqual({ 'instance-id': 'i-fireactions-small' });
      expect(pools[1]?.firecracker?.metadata).toEqual({ 'instance-id': 'i-custom' });
      expect(pools[2]?.firecracker?.metadata).toEqual({ 'instance-id': 'i-fireactions-default' });
    });
  });

  describe('injectUserData', () => {
    it('leaves pools with their own user-data untouched', () => {
      const pools: PoolDescriptor[] = [
        { name: 'small' },
        { name: 'custom', firecracker: { metadata: { 'user-data': '#cloud-config\n' } } },
        { firecracker: {} },
      ];

      expect(injectUserData(pools, 'generated')).toEqual(['small', 'unknown']);
      expect(pools[0]?.firecracker?.metadata?.['user-data']).toBe('generated');
      expect(pools[1]?.firecracker?.metadata?.['user-data']).toBe('#cloud-config\n');
      expect(pools[2]?.firecracker?.metadata?.['user-data']).toBe('generated');
    });

    it('never overwrites existing user-data', () => {
      fc.assert(
        fc.property(
          fc.array(fc.option(fc.string(), { nil: undefined }), { maxLength: 8 }),
          (existing) => {
            const pools: PoolDescriptor[] = existing.map((userData) =>
              userData === undefined ? {} : { firecracker: { metadata: { 'user-data': userData } } }
            );
            injectUserData(pools, 'generated');
            pools.forEach((pool, index) => {
              expect(pool.firecracker?.metadata?.['user-data']).toBe(existing[index] ?? 'generated');
            });
          }
        )
      );
    });
  });
});
