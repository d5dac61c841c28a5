import type { BootCommand, FileWriteDirective, HostnameSource } from '@runner-fleet/shared';
import { CA_BUNDLE_FIX_SCRIPT, dnsOverrideCommand, hostnameScript } from './template';

/**
 * Everything that goes into one cloud-init user-data document.
 */
export interface CloudInitDocumentOptions {
  /** Second header line, emitted as a YAML comment */
  headerComment: string;
  files: readonly FileWriteDirective[];
  /** PEM text; emitted under ca_certs when non-empty */
  caCertificate?: string;
  /** Authorized key for root; passed through unvalidated */
  sshAuthorizedKey?: string;
  /** Commands that run after the CA fix and before the DNS override */
  bootCommands: readonly BootCommand[];
  /** Nameserver written to /etc/resolv.conf when set */
  dnsGateway?: string;
  hostname: HostnameSource;
}

// write_files content and ca_certs entries sit 6 columns in, 4 past the list dash.
const FILE_CONTENT_INDENT = ' '.repeat(6);
// runcmd scripts sit 4 columns in, 2 past the list dash.
const SCRIPT_INDENT = ' '.repeat(4);

// Plain YAML scalars cannot start with an indicator or contain ": " / " #".
const UNSAFE_PLAIN_SCALAR = /^[-?:,[\]{}#&*!|>'"%@`\s]|: | #|\s$/;

function indentBlock(text: string, indent: string): string[] {
  return text.replace(/\n+$/, '').split('\n').map((line) => `${indent}${line}`);
}

function renderScalar(value: string): string {
  return UNSAFE_PLAIN_SCALAR.test(value) ? `'${value.replace(/'/g, "''")}'` : value;
}

function renderFile(file: FileWriteDirective): string[] {
  const lines = [`  - path: ${file.path}`];
  if (file.owner) {
    lines.push(`    owner: ${file.owner}`);
  }
  if (file.permissions) {
    lines.push(`    permissions: '${file.permissions}'`);
  }
  lines.push('    content: |', ...indentBlock(file.content, FILE_CONTENT_INDENT));
  return lines;
}

function renderBootCommand(entry: BootCommand): string[] {
  const lines: string[] = [];
  if (entry.comment) {
    lines.push(`  # ${entry.comment}`);
  }
  if (entry.command.includes('\n') || UNSAFE_PLAIN_SCALAR.test(entry.command)) {
    lines.push('  - |', ...indentBlock(entry.command, SCRIPT_INDENT));
  } else {
    lines.push(`  - ${entry.command}`);
  }
  return lines;
}

/**
 * Ordered runcmd entries: CA bundle fix, caller commands, DNS, hostname.
 */
export function buildRunCommands(options: CloudInitDocumentOptions): BootCommand[] {
  const commands: BootCommand[] = [];

  if (options.caCertificate) {
    commands.push({
      comment: 'Append the injected CA to the bundle file read by curl and docker',
      command: CA_BUNDLE_FIX_SCRIPT,
    });
  }

  commands.push(...options.bootCommands);

  if (options.dnsGateway) {
    commands.push({
      comment: 'Set DNS to use the host gateway',
      command: dnsOverrideCommand(options.dnsGateway),
    });
  }

  commands.push({
    comment: 'Set hostname from MMDS metadata',
    command: hostnameScript(options.hostname),
  });

  return commands;
}

/**
 * Render a cloud-init user-data document.
 *
 * Sections are emitted in a fixed order and separated by one blank line.
 * Output depends only on the options, so identical input gives identical bytes.
 */
export function assembleCloudInit(options: CloudInitDocumentOptions): string {
  const sections: string[][] = [['#cloud-config', `# ${options.headerComment}`]];

  if (options.files.length > 0) {
    sections.push(['write_files:', ...options.files.flatMap(renderFile)]);
  }

  if (options.caCertificate) {
    sections.push([
      'ca_certs:',
      '  trusted:',
      '    - |',
      ...indentBlock(options.caCertificate, FILE_CONTENT_INDENT),
    ]);
  }

  if (options.sshAuthorizedKey) {
    sections.push([
      'users:',
      '  - name: root',
      '    ssh_authorized_keys:',
      `      - ${renderScalar(options.sshAuthorizedKey)}`,
    ]);
  }

  sections.push(['runcmd:', ...buildRunCommands(options).flatMap(renderBootCommand)]);

  return `${sections.map((lines) => lines.join('\n')).join('\n\n')}\n`;
}
