#!/usr/bin/env tsx
/**
 * runner-fleet-config: inject secrets and cloud-init user-data into a runner
 * manager's config.
 *
 * Usage:
 *   runner-fleet-config <fireactions|fireglab|fireteact> [--input path] [--output path]
 *   runner-fleet-config generate-cloud-config [--output path]
 */

import { existsSync, realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { runCloudConfigGeneration } from './cloud-image';
import { loadEnvironment } from './env';
import type { InjectorEnvironment } from './env';
import { runInjection } from './inject';
import { ConfigError, errorMessage } from './lib/errors';
import { log, setLogLevel } from './lib/logger';
import { PRODUCT_PROFILES, isProductName } from './products';

export const CLOUD_CONFIG_COMMAND = 'generate-cloud-config';

export interface CliArgs {
  command: string;
  input?: string;
  output?: string;
}

/**
 * Parse `<command> [--input path] [--output path]`.
 */
export function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let input: string | undefined;
  let output: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--input' || arg === '--output') {
      const value = argv[i + 1];
      if (!value || value.startsWith('--')) {
        throw new ConfigError(`${arg} requires a path`, 'INVALID_INPUT');
      }
      if (arg === '--input') input = value;
      else output = value;
      i++;
    } else if (arg !== undefined) {
      positional.push(arg);
    }
  }

  const command = positional[0];
  if (!command || positional.length > 1) {
    throw new ConfigError(
      `Usage: runner-fleet-config <${Object.keys(PRODUCT_PROFILES).join('|')}|${CLOUD_CONFIG_COMMAND}> [--input path] [--output path]`,
      'INVALID_INPUT'
    );
  }

  return { command, input, output };
}

/**
 * Run one CLI invocation. Returns the path of the written config.
 */
export function run(argv: string[], processEnv: NodeJS.ProcessEnv = process.env): string {
  const args = parseArgs(argv);
  const loaded = loadEnvironment(processEnv);
  setLogLevel(loaded.logLevel);

  const env: InjectorEnvironment = {
    ...loaded,
    configInput: args.input ?? loaded.configInput,
    configOutput: args.output ?? loaded.configOutput,
  };

  if (args.command === CLOUD_CONFIG_COMMAND) {
    return runCloudConfigGeneration(processEnv, env);
  }
  if (isProductName(args.command)) {
    return runInjection(PRODUCT_PROFILES[args.command], env, processEnv);
  }
  throw new ConfigError(`Unknown command: ${args.command}`, 'INVALID_INPUT');
}

function main(): void {
  try {
    run(process.argv.slice(2));
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error('config.failed', { code: err.code, message: err.message, ...err.details });
    } else {
      log.error('config.failed', { message: errorMessage(err) });
    }
    process.exit(1);
  }
}

/**
 * Whether `entry` (argv[1]) is the module at `moduleUrl`. The bin is a
 * symlink into node_modules, so both sides are resolved first.
 */
export function isEntryPoint(entry: string | undefined, moduleUrl: string): boolean {
  if (!entry || !existsSync(entry)) {
    return false;
  }
  return realpathSync(entry) === realpathSync(fileURLToPath(moduleUrl));
}

if (isEntryPoint(process.argv[1], import.meta.url)) {
  main();
}
