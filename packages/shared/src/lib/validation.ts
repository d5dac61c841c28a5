import { z } from 'zod';
import { DEFAULT_UPSTREAMS } from '../constants';
import type { MirrorEndpoint, RegistryMirror, SslBumpMode } from '../types';

/**
 * Validation error with field-specific messages
 */
export interface ValidationError {
  field: string;
  message: string;
}

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

// =============================================================================
// Registry Mirrors
// =============================================================================

// A mirror map is a JSON object; arrays, null and scalars are rejected.
const MirrorMapSchema = z.record(z.string(), z.unknown());

const MirrorEntrySchema = z.object({
  url: z.string().min(1),
});

// Upstreams are written into TOML strings, so quoting characters are refused.
const UpstreamUrlSchema = z
  .string()
  .url()
  .regex(/^https?:\/\/[^\s"'\\]+$/);

// A registry name becomes a directory, a TOML string and a plain YAML scalar.
const REGISTRY_NAME_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9.-]*[A-Za-z0-9])?(?::\d{1,5})?$/;

// Object key order puts integer-like keys first, which would reorder the mirrors.
const INTEGER_LIKE_PATTERN = /^\d+$/;

export const SslBumpModeSchema = z.enum(['off', 'all', 'selective']);

/**
 * Resolve the upstream URL for a registry.
 *
 * Explicit `url` wins, then the well-known default, then `https://<name>`.
 * A non-object entry (bare string, number, true) is treated as "use default"
 * and its value is discarded.
 */
export function resolveUpstream(name: string, entry: unknown): string {
  const parsed = MirrorEntrySchema.safeParse(entry);
  if (parsed.success) {
    return parsed.data.url;
  }
  return DEFAULT_UPSTREAMS[name] ?? `https://${name}`;
}

/**
 * Check that a registry name is a host name (optionally with a port) that
 * needs no quoting anywhere it is written.
 */
export function isValidRegistryName(name: string): boolean {
  return REGISTRY_NAME_PATTERN.test(name) && !INTEGER_LIKE_PATTERN.test(name);
}

/**
 * Check that an upstream is an http(s) URL that can sit inside a TOML string.
 */
export function isValidUpstreamUrl(url: string): boolean {
  return UpstreamUrlSchema.safeParse(url).success;
}

/** A mirror entry dropped from the set, with the reason. */
export interface SkippedMirror {
  name: string;
  reason: string;
}

export interface ParsedMirrors {
  mirrors: RegistryMirror[];
  /** Entries dropped because their name or upstream cannot be written safely */
  skipped: SkippedMirror[];
  /** Set when the input was present but unusable */
  warning?: string;
}

/**
 * Parse the mirror map (JSON text) into an ordered list of mirrors.
 * Order follows the input object's key order.
 */
export function parseRegistryMirrors(json: string | undefined): ParsedMirrors {
  if (!json || json.trim() === '') {
    return { mirrors: [], skipped: [] };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { mirrors: [], skipped: [], warning: `Failed to parse mirror JSON: ${reason}` };
  }

  const map = MirrorMapSchema.safeParse(raw);
  if (!map.success) {
    return { mirrors: [], skipped: [], warning: 'Mirror configuration must be a JSON object' };
  }

  const mirrors: RegistryMirror[] = [];
  const skipped: SkippedMirror[] = [];
  for (const [name, entry] of Object.entries(map.data)) {
    if (!isValidRegistryName(name)) {
      skipped.push({ name, reason: 'Registry name must be a host name' });
      continue;
    }
    const upstream = resolveUpstream(name, entry);
    if (!isValidUpstreamUrl(upstream)) {
      skipped.push({ name, reason: 'Upstream must be an http(s) URL without quotes or whitespace' });
      continue;
    }
    mirrors.push({ name, upstream });
  }

  return { mirrors, skipped };
}

// =============================================================================
// SSL Bump
// =============================================================================

/**
 * Parse the SSL-bump mode. Unknown values disable interception.
 */
export function parseSslBumpMode(value: string | undefined): SslBumpMode {
  const parsed = SslBumpModeSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : 'off';
}

/**
 * Split a comma- or whitespace-separated domain list.
 */
export function parseDomainList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(/[\s,]+/).filter((domain) => domain.length > 0);
}

// =============================================================================
// Mirror Endpoint
// =============================================================================

// Gateway ends up inside TOML strings, JSON strings and a single-quoted shell echo.
const GATEWAY_PATTERN = /^[A-Za-z0-9.:[\]-]+$/;

/**
 * Check that an address is an IP or host name that needs no quoting.
 */
export function isValidGatewayAddress(value: string): boolean {
  return GATEWAY_PATTERN.test(value);
}

/**
 * Validate that a gateway and port can be formatted into every generated file.
 * An empty gateway is valid: it means the registry cache is disabled.
 */
export function validateMirrorEndpoint(endpoint: MirrorEndpoint): ValidationResult {
  const errors: ValidationError[] = [];

  if (endpoint.gateway !== '' && !isValidGatewayAddress(endpoint.gateway)) {
    errors.push({
      field: 'gateway',
      message: 'Gateway must be an IP address or host name',
    });
  }

  if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65535) {
    errors.push({
      field: 'port',
      message: 'Port must be an integer between 1 and 65535',
    });
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
