export type ConfigErrorCode =
  | 'MISSING_ENV'
  | 'MISSING_SECRET'
  | 'INVALID_SECRET'
  | 'INVALID_INPUT'
  | 'READ_FAILED'
  | 'WRITE_FAILED';

/**
 * Typed error for conditions that must abort config generation.
 * Optional features never raise this; they are skipped instead.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
