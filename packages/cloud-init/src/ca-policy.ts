import type { SslBumpMode } from '@runner-fleet/shared';

/**
 * Decide whether the interception CA must be trusted inside the VM.
 *
 * A CA file on disk is not enough: the proxy has to actually intercept
 * something, either all traffic or a non-empty list of selected domains.
 */
export function shouldInjectCaCertificate(
  mode: SslBumpMode,
  domains: readonly string[]
): boolean {
  switch (mode) {
    case 'all':
      return true;
    case 'selective':
      return domains.length > 0;
    case 'off':
    default:
      return false;
  }
}
