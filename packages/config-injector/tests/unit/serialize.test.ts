import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { ConfigError } from '../../src/lib/errors';
import { parseConfig, serializeConfig } from '../../src/serialize';

describe('serialize', () => {
  describe('parseConfig', () => {
    it('parses a mapping', () => {
      expect(parseConfig('github:\n  app_id: 1\npools: []\n')).toEqual({
        github: { app_id: 1 },
        pools: [],
      });
    });

    it('returns an empty config for an empty document', () => {
      expect(parseConfig('')).toEqual({});
      expect(parseConfig('# only a comment\n')).toEqual({});
    });

    it.each([
      ['a list', '- a\n- b\n'],
      ['a scalar', 'hello\n'],
      ['broken YAML', 'pools: [1, 2\n'],
    ])('rejects %s', (_label, text) => {
      try {
        parseConfig(text, '/etc/fireactions/config.yaml');
        expect.unreachable('should have thrown');
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        if (err instanceof ConfigError) {
          expect(err.code).toBe('INVALID_INPUT');
          expect(err.message).toContain('/etc/fireactions/config.yaml');
        }
      }
    });
  });

  describe('serializeConfig', () => {
    it('keeps key order', () => {
      expect(serializeConfig({ pools: [], bind_address: '0.0.0.0:8080', debug: false })).toBe(
        'pools: []\nbind_address: 0.0.0.0:8080\ndebug: false\n'
      );
    });

    it('writes multi-line strings as literal blocks', () => {
      const userData = '#cloud-config\nruncmd:\n  - echo hi\n';
      const output = serializeConfig({ metadata: { 'user-data': userData } });
      expect(output).toContain('user-data: |\n');
      expect(parse(output)).toEqual({ metadata: { 'user-data': userData } });
    });

    it('keeps long lines unwrapped', () => {
      const long = `ssh-ed25519 ${'A'.repeat(200)} test@example`;
      expect(serializeConfig({ key: long })).toBe(`key: ${long}\n`);
    });

    it('round-trips through parseConfig', () => {
      const config = {
        github: { app_id: 12345, app_private_key: 'line one\nline two\n' },
        pools: [{ name: 'small', firecracker: { metadata: { 'instance-id': 'i-fireactions-small' } } }],
      };
      expect(parseConfig(serializeConfig(config))).toEqual(config);
    });
  });
});
