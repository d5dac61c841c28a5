// =============================================================================
// Products
// =============================================================================

/** Runner managers that consume generated pool configuration. */
export type ProductName = 'fireactions' | 'fireglab' | 'fireteact';

// =============================================================================
// Registry Cache
// =============================================================================

/**
 * An upstream registry served through the pull-through cache.
 * Built once per run from the mirror input and never mutated.
 */
export interface RegistryMirror {
  /** Registry host name, e.g. "docker.io" */
  readonly name: string;
  /** Resolved upstream URL */
  readonly upstream: string;
}

/** Address of the cache itself, shared by every mirror in a run. */
export interface MirrorEndpoint {
  gateway: string;
  port: number;
}

/** SSL interception mode of the egress proxy. */
export type SslBumpMode = 'off' | 'all' | 'selective';

// =============================================================================
// cloud-init Directives
// =============================================================================

/** One file materialized by cloud-init's write_files module. */
export interface FileWriteDirective {
  path: string;
  content: string;
  owner?: string;
  /** Octal mode string, e.g. "0644" */
  permissions?: string;
}

/** One runcmd entry. Multi-line commands are emitted as literal block scalars. */
export interface BootCommand {
  command: string;
  comment?: string;
}

/**
 * Where the hostname script finds the runner identifier in MMDS.
 * The script queries `http://169.254.169.254/latest/meta-data/<metadataPath>`.
 */
export interface HostnameSource {
  metadataPath: string;
  /** Shell variable holding the fetched value, without the leading `$` */
  variable: string;
}

// =============================================================================
// Pool Configuration
// =============================================================================

/**
 * Metadata map served to a VM over MMDS.
 * Generated entries are strings; hand-written ones pass through untouched.
 */
export type PoolMetadata = Record<string, unknown>;

/**
 * A pool descriptor as found in the orchestrator's config file.
 * Only the fields this project touches are typed; everything else passes through.
 */
export interface PoolDescriptor {
  name?: string;
  firecracker?: {
    metadata?: PoolMetadata;
    [key: string]: unknown;
  };
  [key: string]: unknown;
}
