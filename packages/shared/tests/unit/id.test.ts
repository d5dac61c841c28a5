import { describe, it, expect } from 'vitest';
import { buildInstanceId } from '../../src/lib/id';

describe('buildInstanceId', () => {
  it('prefixes the pool name with the product', () => {
    expect(buildInstanceId('fireactions', 'small')).toBe('i-fireactions-small');
    expect(buildInstanceId('fireglab', 'large')).toBe('i-fireglab-large');
  });

  it('falls back to the default pool name', () => {
    expect(buildInstanceId('fireactions')).toBe('i-fireactions-default');
    expect(buildInstanceId('fireglab', '')).toBe('i-fireglab-default');
  });
});
