/**
 * Application configuration types
 *
 * Server profiles come from the profile file, runtime settings from the
 * environment. Both are validated in validation.ts and passed to commands.
 */

/**
 * Log level type
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Basic-auth credentials attached to every request of a target.
 */
export interface Credentials {
  readonly username: string;
  readonly password: string;
}

/**
 * A server profile as declared in the profile file (validated, not yet resolved).
 */
export interface ServerProfile {
  /** Unique profile name used with --target */
  name: string;
  /** Host with optional port (e.g., 'localhost:9200') */
  host: string;
  /** 'http' or 'https' */
  protocol: 'http' | 'https';
  /** Optional basic-auth credentials */
  credentials?: Credentials;
  /** Whether to verify TLS certificates (default: true) */
  verifySsl: boolean;
  /** Path prefix of the cluster API behind a proxy */
  clusterPath?: string;
  /** Path prefix of the dashboards application */
  basePath?: string;
}

/**
 * Fully-resolved connection target. Immutable once produced by the resolver.
 */
export interface ServerTarget {
  readonly name: string;
  /** Cluster API root without trailing slash (e.g., 'https://proxy/es') */
  readonly clusterBaseUrl: string;
  /** Dashboards application root without trailing slash */
  readonly dashboardsBaseUrl: string;
  readonly credentials?: Credentials;
  readonly verifySsl: boolean;
  /** True for the first declared profile */
  readonly isDefault: boolean;
}

/**
 * Runtime settings read from the environment.
 */
export interface RuntimeConfig {
  /** Path of the server profile file */
  configFile: string;
  /** Log level for application logging */
  logLevel: LogLevel;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs: number;
  /** Retry count for idempotent requests */
  maxRetries: number;
  /** Worker pool size for per-id fan-out */
  concurrency: number;
  /** Internal index used by the legacy backend */
  legacyIndex: string;
}

/**
 * Combined application configuration.
 */
export interface AppConfig {
  runtime: RuntimeConfig;
  /** Declared profiles in declaration order; the first is the default */
  servers: ServerProfile[];
}
