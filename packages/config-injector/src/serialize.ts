import { parse, stringify } from 'yaml';
import { ConfigError, errorMessage } from './lib/errors';

/**
 * How multi-line strings are written.
 * - literal: `|` block scalars, newlines preserved verbatim (user-data, PEM keys)
 * - default: whatever the yaml library picks
 */
export type MultilineStyle = 'literal' | 'default';

export interface SerializeOptions {
  multilineStyle: MultilineStyle;
}

export const DEFAULT_SERIALIZE_OPTIONS: SerializeOptions = {
  multilineStyle: 'literal',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a service config document. An empty document yields an empty config.
 */
export function parseConfig(text: string, source = 'config'): Record<string, unknown> {
  let doc: unknown;
  try {
    doc = parse(text);
  } catch (err) {
    throw new ConfigError(`Failed to parse ${source}: ${errorMessage(err)}`, 'INVALID_INPUT', {
      source,
    });
  }

  if (doc === null || doc === undefined) {
    return {};
  }
  if (!isRecord(doc)) {
    throw new ConfigError(`${source} must be a YAML mapping`, 'INVALID_INPUT', { source });
  }
  return doc;
}

/**
 * Serialize a service config, keeping key order and block style.
 */
export function serializeConfig(
  config: Record<string, unknown>,
  options: SerializeOptions = DEFAULT_SERIALIZE_OPTIONS
): string {
  return stringify(config, {
    blockQuote: options.multilineStyle === 'literal' ? 'literal' : true,
    lineWidth: 0,
    sortMapEntries: false,
  });
}
