import {
  BUILDKIT_CONFIG_PATH,
  CA_BUNDLE_PATH,
  CLOUD_INIT_CA_GLOB,
  MMDS_METADATA_BASE_URL,
} from '@runner-fleet/shared';
import type { HostnameSource } from '@runner-fleet/shared';

/**
 * Shell snippets emitted under runcmd.
 *
 * Every snippet is safe to re-run: cloud-init may replay runcmd when the
 * instance-id changes.
 */

/**
 * Append the injected CA to the system bundle.
 *
 * The ca_certs module writes the certificate and hash symlinks, but curl and
 * dockerd read the bundle file, which some images do not regenerate.
 */
export const CA_BUNDLE_FIX_SCRIPT = `CA_CERT=$(ls -t ${CLOUD_INIT_CA_GLOB} 2>/dev/null | head -1)
if [ -n "$CA_CERT" ]; then
  update-ca-certificates
  cat "$CA_CERT" >> ${CA_BUNDLE_PATH}
  echo "CA cert added to bundle: $CA_CERT"
fi`;

/**
 * Create a docker-container Buildx builder that reads the generated BuildKit
 * config. setup-buildx-action style builders do not inherit containerd's
 * hosts.toml, so they need their own mirror list.
 */
export function buildxCreateScript(builderName: string): string {
  return `if command -v docker &> /dev/null && [ -f ${BUILDKIT_CONFIG_PATH} ]; then
  docker buildx create --name ${builderName} --driver docker-container \\
    --config ${BUILDKIT_CONFIG_PATH} --use 2>/dev/null || true
fi`;
}

/**
 * Point the resolver at the gateway's dnsmasq.
 */
export function dnsOverrideCommand(gateway: string): string {
  return `echo 'nameserver ${gateway}' > /etc/resolv.conf`;
}

/**
 * Set the hostname from the runner identifier published in MMDS.
 */
export function hostnameScript(source: HostnameSource): string {
  const variable = source.variable;
  return `${variable}=$(curl -sf ${MMDS_METADATA_BASE_URL}/${source.metadataPath})
if [ -n "$${variable}" ]; then
  hostnamectl set-hostname "$${variable}"
fi`;
}
