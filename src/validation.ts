import { existsSync, readFileSync } from 'fs';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import { findEnvFile, getServersFile } from './config';
import { ConfigError, ValidationError } from './types/errors';
import type { Credentials, LogLevel, RuntimeConfig, ServerProfile } from './types/config';
import { isRecord } from './utils';

export type { LogLevel, RuntimeConfig, ServerProfile } from './types/config';

/**
 * Configuration validation utilities
 * Provides helpful error messages for invalid/missing settings
 */

/**
 * Gets the location hint for where to set environment variables.
 *
 * @returns Hint message about where to set environment variables
 */
function getEnvFileHint(): string {
  const envFile = findEnvFile();
  if (envFile) {
    return `Set it in ${envFile}`;
  }
  return 'Set it in ~/.dashsync/.env or create a local .env file';
}

/**
 * Validates required environment variable is set.
 *
 * @param name - Environment variable name
 * @param value - Environment variable value
 * @returns Result containing the validated value or a ValidationError
 */
export function validateRequired(
  name: string,
  value: string | undefined,
): Result<string, ValidationError> {
  if (!value || value.trim() === '') {
    return err(
      new ValidationError(`${name} is required. ${getEnvFileHint()}`, name, 'MISSING_REQUIRED'),
    );
  }
  return ok(value);
}

/**
 * Parses and validates boolean environment variable.
 *
 * Accepts: 'true', '1', 'yes' for true; 'false', '0', 'no' for false (case-insensitive)
 *
 * @param name - Environment variable name
 * @param value - Value to parse
 * @param defaultValue - Default value if not set (default: false)
 * @returns Result containing the boolean value or a ValidationError
 */
export function validateBoolean(
  name: string,
  value: string | undefined,
  defaultValue = false,
): Result<boolean, ValidationError> {
  if (!value || value.trim() === '') {
    return ok(defaultValue);
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) {
    return ok(true);
  }
  if (['false', '0', 'no'].includes(normalized)) {
    return ok(false);
  }

  return err(
    new ValidationError(
      `${name} must be true or false (got: ${value}). ${getEnvFileHint()}`,
      name,
      'INVALID_BOOLEAN',
    ),
  );
}

/**
 * Parses and validates an integer environment variable.
 *
 * @param name - Environment variable name
 * @param value - Value to parse
 * @param defaultValue - Default value if not set
 * @param min - Smallest accepted value (default: 0)
 * @returns Result containing the integer or a ValidationError
 *
 * @example
 * ```typescript
 * const result = validateInteger("DASHSYNC_CONCURRENCY", process.env.DASHSYNC_CONCURRENCY, 4, 1);
 * const concurrency = result.unwrapOr(4);
 * ```
 */
export function validateInteger(
  name: string,
  value: string | undefined,
  defaultValue: number,
  min = 0,
): Result<number, ValidationError> {
  if (!value || value.trim() === '') {
    return ok(defaultValue);
  }

  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return err(
      new ValidationError(
        `${name} must be an integer (got: ${value}). ${getEnvFileHint()}`,
        name,
        'INVALID_INTEGER',
      ),
    );
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < min) {
    return err(
      new ValidationError(
        `${name} must be at least ${String(min)} (got: ${value}). ${getEnvFileHint()}`,
        name,
        'OUT_OF_RANGE',
      ),
    );
  }
  return ok(parsed);
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Validates log level.
 *
 * @param name - Environment variable name
 * @param value - Log level value
 * @param defaultValue - Default log level (default: "info")
 * @returns Result containing the validated log level or a ValidationError
 */
export function validateLogLevel(
  name: string,
  value: string | undefined,
  defaultValue: LogLevel = 'info',
): Result<LogLevel, ValidationError> {
  if (!value || value.trim() === '') {
    return ok(defaultValue);
  }

  const trimmed = value.trim().toLowerCase();
  if (!isLogLevel(trimmed)) {
    return err(
      new ValidationError(
        `${name} must be one of: ${LOG_LEVELS.join(', ')} (got: ${value}). ${getEnvFileHint()}`,
        name,
        'INVALID_LOG_LEVEL',
      ),
    );
  }

  return ok(trimmed);
}

/**
 * Validates runtime settings from the environment.
 *
 * @param env - Environment to read (defaults to process.env)
 * @returns Result containing RuntimeConfig or a ValidationError
 *
 * @example
 * ```typescript
 * const result = validateRuntimeConfig();
 * if (result.isErr()) {
 *   console.error(result.error.message);
 *   process.exit(1);
 * }
 * const runtime = result.value;
 * ```
 */
export function validateRuntimeConfig(
  env: NodeJS.ProcessEnv = process.env,
): Result<RuntimeConfig, ValidationError> {
  const logLevelResult = validateLogLevel('LOG_LEVEL', env.LOG_LEVEL, 'info');
  const timeoutResult = validateInteger(
    'DASHSYNC_REQUEST_TIMEOUT_MS',
    env.DASHSYNC_REQUEST_TIMEOUT_MS,
    30000,
    1,
  );
  const retriesResult = validateInteger('DASHSYNC_MAX_RETRIES', env.DASHSYNC_MAX_RETRIES, 2, 0);
  const concurrencyResult = validateInteger(
    'DASHSYNC_CONCURRENCY',
    env.DASHSYNC_CONCURRENCY,
    4,
    1,
  );

  // Combine all results - fail on first error
  const step1 = logLevelResult.andThen((logLevel) =>
    timeoutResult.map((requestTimeoutMs) => ({ logLevel, requestTimeoutMs })),
  );

  return step1.andThen(({ logLevel, requestTimeoutMs }) =>
    retriesResult.andThen((maxRetries) =>
      concurrencyResult.map((concurrency) => ({
        configFile: env.DASHSYNC_CONFIG?.trim() || getServersFile(),
        logLevel,
        requestTimeoutMs,
        maxRetries,
        concurrency,
        legacyIndex: env.DASHSYNC_LEGACY_INDEX?.trim() || '.kibana',
      })),
    ),
  );
}

function optionalString(
  raw: Record<string, unknown>,
  key: string,
  position: string,
): Result<string | undefined, ValidationError> {
  const value = raw[key];
  if (value === undefined || value === null) {
    return ok(undefined);
  }
  if (typeof value !== 'string') {
    return err(
      new ValidationError(
        `${position}.${key} must be a string (got: ${typeof value})`,
        `${position}.${key}`,
        'INVALID_TYPE',
      ),
    );
  }
  return ok(value.trim() === '' ? undefined : value.trim());
}

function validateProtocol(
  value: unknown,
  position: string,
): Result<'http' | 'https', ValidationError> {
  if (value === 'http' || value === 'https') {
    return ok(value);
  }
  return err(
    new ValidationError(
      `${position}.protocol must be http or https (got: ${String(value)})`,
      `${position}.protocol`,
      'INVALID_PROTOCOL',
    ),
  );
}

function validateHost(value: unknown, position: string): Result<string, ValidationError> {
  if (typeof value !== 'string' || value.trim() === '') {
    return err(
      new ValidationError(`${position}.host is required`, `${position}.host`, 'MISSING_REQUIRED'),
    );
  }
  const host = value.trim();
  if (host.includes('://') || host.includes('/')) {
    return err(
      new ValidationError(
        `${position}.host must be a host name with optional port, without scheme or path (got: ${host})`,
        `${position}.host`,
        'INVALID_HOST',
      ),
    );
  }
  return ok(host);
}

function validateVerifySsl(value: unknown, position: string): Result<boolean, ValidationError> {
  if (value === undefined || value === null) {
    return ok(true);
  }
  if (typeof value === 'boolean') {
    return ok(value);
  }
  if (typeof value === 'string') {
    return validateBoolean(`${position}.verify_ssl`, value, true);
  }
  return err(
    new ValidationError(
      `${position}.verify_ssl must be true or false (got: ${String(value)})`,
      `${position}.verify_ssl`,
      'INVALID_BOOLEAN',
    ),
  );
}

function validateCredentials(
  raw: Record<string, unknown>,
  position: string,
): Result<Credentials | undefined, ValidationError> {
  return optionalString(raw, 'username', position).andThen((username) =>
    optionalString(raw, 'password', position).andThen((password) => {
      if (username === undefined && password === undefined) {
        return ok(undefined);
      }
      if (username === undefined || password === undefined) {
        return err(
          new ValidationError(
            `${position} must set both username and password, or neither`,
            `${position}.${username === undefined ? 'username' : 'password'}`,
            'INCOMPLETE_CREDENTIALS',
          ),
        );
      }
      return ok({ username, password });
    }),
  );
}

/**
 * Validates one server profile.
 *
 * @param name - Profile name
 * @param raw - Raw profile object from the file
 * @param position - Location used in error messages (e.g., 'servers[0]')
 * @returns Result containing the ServerProfile or a ValidationError
 */
export function validateServerProfile(
  name: unknown,
  raw: unknown,
  position: string,
): Result<ServerProfile, ValidationError> {
  if (!isRecord(raw)) {
    return err(
      new ValidationError(`${position} must be an object`, position, 'INVALID_TYPE'),
    );
  }
  if (typeof name !== 'string' || name.trim() === '') {
    return err(
      new ValidationError(`${position}.name is required`, `${position}.name`, 'MISSING_REQUIRED'),
    );
  }

  const step1 = validateHost(raw.host, position).andThen((host) =>
    validateProtocol(raw.protocol, position).map((protocol) => ({ host, protocol })),
  );

  const step2 = step1.andThen((partial) =>
    validateVerifySsl(raw.verify_ssl, position).andThen((verifySsl) =>
      validateCredentials(raw, position).map((credentials) => ({
        ...partial,
        verifySsl,
        credentials,
      })),
    ),
  );

  return step2.andThen((partial) =>
    optionalString(raw, 'cluster_path', position).andThen((clusterPath) =>
      optionalString(raw, 'base_path', position).map((basePath) => ({
        name: name.trim(),
        ...partial,
        clusterPath,
        basePath,
      })),
    ),
  );
}

/**
 * Validates the parsed server profile file.
 *
 * Accepts either `{"servers": [{"name": ..., ...}]}` or
 * `{"servers": {"<name>": {...}}}`. Declaration order is kept; the first
 * profile is the default target.
 *
 * @param raw - Parsed JSON content
 * @returns Result containing the profiles or a ValidationError
 */
export function validateServersConfig(raw: unknown): Result<ServerProfile[], ValidationError> {
  if (!isRecord(raw)) {
    return err(new ValidationError('Configuration must be a JSON object', 'servers', 'INVALID_TYPE'));
  }

  const servers = raw.servers;
  let entries: [unknown, unknown, string][];
  if (Array.isArray(servers)) {
    entries = servers.map((entry: unknown, index) => [
      isRecord(entry) ? entry.name : undefined,
      entry,
      `servers[${String(index)}]`,
    ]);
  } else if (isRecord(servers)) {
    entries = Object.entries(servers).map(([name, entry]) => [name, entry, `servers.${name}`]);
  } else {
    return err(
      new ValidationError(
        'Configuration must declare "servers" as a list or a mapping',
        'servers',
        'MISSING_REQUIRED',
      ),
    );
  }

  if (entries.length === 0) {
    return err(new ValidationError('No servers configured', 'servers', 'MISSING_REQUIRED'));
  }

  const profiles: ServerProfile[] = [];
  const seen = new Set<string>();
  for (const [name, entry, position] of entries) {
    const result = validateServerProfile(name, entry, position);
    if (result.isErr()) {
      return err(result.error);
    }
    if (seen.has(result.value.name)) {
      return err(
        new ValidationError(
          `Server name '${result.value.name}' is declared twice`,
          `${position}.name`,
          'DUPLICATE_NAME',
        ),
      );
    }
    seen.add(result.value.name);
    profiles.push(result.value);
  }
  return ok(profiles);
}

/**
 * Reads and validates the server profile file.
 *
 * @param filePath - Path to the JSON profile file
 * @returns Result containing the profiles, or a ConfigError/ValidationError
 */
export function loadServersConfig(
  filePath: string,
): Result<ServerProfile[], ConfigError | ValidationError> {
  if (!existsSync(filePath)) {
    return err(
      new ConfigError(
        `Server configuration not found: ${filePath}. Create it or point DASHSYNC_CONFIG at one`,
        filePath,
        'CONFIG_NOT_FOUND',
      ),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (parseErr) {
    return err(
      new ConfigError(
        `Server configuration is not valid JSON: ${filePath}`,
        filePath,
        'MALFORMED_CONFIG',
        parseErr instanceof Error ? parseErr : undefined,
      ),
    );
  }

  return validateServersConfig(parsed);
}
