import { describe, it, expect } from 'vitest';
import { parse } from 'yaml';
import { assembleCloudInit, buildRunCommands } from '../src/assemble';
import type { CloudInitDocumentOptions } from '../src/assemble';

const HOSTNAME_SCRIPT = [
  'RUNNER_ID=$(curl -sf http://169.254.169.254/latest/meta-data/fireactions/runner_id)',
  'if [ -n "$RUNNER_ID" ]; then',
  '  hostnamectl set-hostname "$RUNNER_ID"',
  'fi',
].join('\n');

const TEST_CA = [
  '-----BEGIN CERTIFICATE-----',
  'dGVzdC1jZXJ0aWZpY2F0ZQ==',
  '-----END CERTIFICATE-----',
  '',
].join('\n');

function baseOptions(overrides?: Partial<CloudInitDocumentOptions>): CloudInitDocumentOptions {
  return {
    headerComment: 'Test configuration',
    files: [],
    bootCommands: [],
    hostname: { metadataPath: 'fireactions/runner_id', variable: 'RUNNER_ID' },
    ...overrides,
  };
}

describe('assembleCloudInit', () => {
  it('emits only the header and hostname script when nothing is enabled', () => {
    expect(assembleCloudInit(baseOptions())).toBe(
      [
        '#cloud-config',
        '# Test configuration',
        '',
        'runcmd:',
        '  # Set hostname from MMDS metadata',
        '  - |',
        '    RUNNER_ID=$(curl -sf http://169.254.169.254/latest/meta-data/fireactions/runner_id)',
        '    if [ -n "$RUNNER_ID" ]; then',
        '      hostnamectl set-hostname "$RUNNER_ID"',
        '    fi',
        '',
      ].join('\n')
    );
  });

  it('omits write_files when there are no files', () => {
    expect(assembleCloudInit(baseOptions())).not.toContain('write_files:');
  });

  it('indents file content 6 columns under the block scalar', () => {
    const document = assembleCloudInit(
      baseOptions({ files: [{ path: '/etc/example.conf', content: 'first = 1\n\nsecond = 2' }] })
    );

    expect(document).toContain(
      [
        'write_files:',
        '  - path: /etc/example.conf',
        '    content: |',
        '      first = 1',
        '      ',
        '      second = 2',
        '',
        'runcmd:',
      ].join('\n')
    );
  });

  it('emits owner and permissions before content', () => {
    const document = assembleCloudInit(
      baseOptions({
        files: [
          { path: '/etc/example.conf', content: 'x', owner: 'root:root', permissions: '0600' },
        ],
      })
    );

    expect(document).toContain(
      [
        '  - path: /etc/example.conf',
        '    owner: root:root',
        "    permissions: '0600'",
        '    content: |',
        '      x',
      ].join('\n')
    );
  });

  it('reproduces file content exactly when parsed as YAML', () => {
    const content = '{\n  "key": "value: with colon # and hash"\n}';
    const document = assembleCloudInit(
      baseOptions({ files: [{ path: '/etc/app.json', content, permissions: '0644' }] })
    );

    const parsed = parse(document);
    expect(parsed.write_files).toEqual([
      { path: '/etc/app.json', permissions: '0644', content: `${content}\n` },
    ]);
  });

  it('embeds the CA certificate with its trailing newline stripped', () => {
    const document = assembleCloudInit(baseOptions({ caCertificate: TEST_CA }));

    expect(document).toContain(
      [
        'ca_certs:',
        '  trusted:',
        '    - |',
        '      -----BEGIN CERTIFICATE-----',
        '      dGVzdC1jZXJ0aWZpY2F0ZQ==',
        '      -----END CERTIFICATE-----',
        '',
        'runcmd:',
      ].join('\n')
    );
    expect(parse(document).ca_certs.trusted).toEqual([TEST_CA]);
  });

  it('grants root the SSH key verbatim', () => {
    const document = assembleCloudInit(
      baseOptions({ sshAuthorizedKey: 'ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKey debug@host' })
    );

    expect(document).toContain(
      [
        'users:',
        '  - name: root',
        '    ssh_authorized_keys:',
        '      - ssh-ed25519 AAAAC3NzaC1lZDI1NTE5AAAAITestKey debug@host',
      ].join('\n')
    );
  });

  it('quotes an SSH key whose comment would parse as a mapping', () => {
    const key = "ssh-ed25519 AAAA bob's laptop: work";
    const document = assembleCloudInit(baseOptions({ sshAuthorizedKey: key }));

    expect(document).toContain("      - 'ssh-ed25519 AAAA bob''s laptop: work'\n");
    expect(parse(document).users).toEqual([{ name: 'root', ssh_authorized_keys: [key] }]);
  });

  it('passes a malformed SSH key through unchanged', () => {
    const document = assembleCloudInit(baseOptions({ sshAuthorizedKey: 'not-a-key' }));
    expect(document).toContain('      - not-a-key\n');
  });

  it('emits sections in write_files, ca_certs, users, runcmd order', () => {
    const document = assembleCloudInit(
      baseOptions({
        files: [{ path: '/etc/a', content: 'a' }],
        caCertificate: TEST_CA,
        sshAuthorizedKey: 'ssh-ed25519 AAAA test',
      })
    );

    const positions = ['write_files:', 'ca_certs:', 'users:', 'runcmd:'].map((key) =>
      document.indexOf(`\n${key}\n`)
    );
    expect(positions.every((position) => position > 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it('renders single-line commands as plain list items', () => {
    const document = assembleCloudInit(
      baseOptions({ bootCommands: [{ command: 'systemctl restart containerd || true' }] })
    );
    expect(document).toContain('runcmd:\n  - systemctl restart containerd || true\n');
  });

  it('renders single-line commands that are unsafe as plain scalars as blocks', () => {
    const document = assembleCloudInit(
      baseOptions({ bootCommands: [{ command: 'echo key: value' }] })
    );
    expect(document).toContain('runcmd:\n  - |\n    echo key: value\n');
    expect(parse(document).runcmd[0]).toBe('echo key: value\n');
  });

  it('ends with exactly one newline', () => {
    const document = assembleCloudInit(baseOptions({ caCertificate: TEST_CA }));
    expect(document.endsWith('fi\n')).toBe(true);
  });
});

describe('buildRunCommands', () => {
  it('orders CA fix, caller commands, DNS override, hostname', () => {
    const commands = buildRunCommands(
      baseOptions({
        caCertificate: TEST_CA,
        bootCommands: [{ command: 'systemctl restart docker || true' }],
        dnsGateway: '10.200.0.1',
      })
    );

    expect(commands.map((entry) => entry.command)).toEqual([
      [
        'CA_CERT=$(ls -t /usr/local/share/ca-certificates/cloud-init-ca-cert-*.crt 2>/dev/null | head -1)',
        'if [ -n "$CA_CERT" ]; then',
        '  update-ca-certificates',
        '  cat "$CA_CERT" >> /etc/ssl/certs/ca-certificates.crt',
        '  echo "CA cert added to bundle: $CA_CERT"',
        'fi',
      ].join('\n'),
      'systemctl restart docker || true',
      "echo 'nameserver 10.200.0.1' > /etc/resolv.conf",
      HOSTNAME_SCRIPT,
    ]);
  });

  it('skips the CA fix without a CA and DNS without a gateway', () => {
    const commands = buildRunCommands(baseOptions());
    expect(commands.map((entry) => entry.command)).toEqual([HOSTNAME_SCRIPT]);
  });

  it('uses the product metadata path and variable for the hostname', () => {
    const commands = buildRunCommands(
      baseOptions({ hostname: { metadataPath: 'fireglab/runner_name', variable: 'RUNNER_NAME' } })
    );
    expect(commands[commands.length - 1]?.command).toBe(
      [
        'RUNNER_NAME=$(curl -sf http://169.254.169.254/latest/meta-data/fireglab/runner_name)',
        'if [ -n "$RUNNER_NAME" ]; then',
        '  hostnamectl set-hostname "$RUNNER_NAME"',
        'fi',
      ].join('\n')
    );
  });
});
