import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import * as dotenv from 'dotenv';

/**
 * Get user configuration directory path.
 *
 * Server profiles, logs and the optional .env file live under this directory
 * to keep user data separate from the application installation.
 *
 * @returns Path to user config directory
 *
 * @example
 * ```typescript
 * import { getUserConfigDir } from './config';
 * console.log(getUserConfigDir()); // "/Users/username/.dashsync"
 * ```
 */
export function getUserConfigDir(): string {
  return path.join(os.homedir(), '.dashsync');
}

/**
 * Get logs directory path.
 *
 * Contains one JSON log file per day (e.g., `dashsync-2025-12-14.log`).
 *
 * @returns Path to logs directory
 */
export function getLogsDir(): string {
  return path.join(getUserConfigDir(), 'logs');
}

/**
 * Get default server profile file path.
 *
 * Overridable with DASHSYNC_CONFIG.
 *
 * @returns Path to config.json
 *
 * @example
 * ```typescript
 * import { getServersFile } from './config';
 * console.log(getServersFile()); // "/Users/username/.dashsync/config.json"
 * ```
 */
export function getServersFile(): string {
  return path.join(getUserConfigDir(), 'config.json');
}

/**
 * Get user environment configuration file path.
 *
 * @returns Path to user .env file
 */
export function getEnvFile(): string {
  return path.join(getUserConfigDir(), '.env');
}

/**
 * Get local development environment configuration file path.
 *
 * Takes precedence over the user's ~/.dashsync/.env file when it exists.
 *
 * @returns Path to local .env file
 */
export function getLocalEnvFile(): string {
  return path.join(process.cwd(), '.env');
}

/**
 * Ensure the configuration directories exist.
 *
 * Idempotent and safe to call multiple times.
 *
 * @throws {Error} If directory creation fails due to permissions or filesystem errors
 */
export function ensureConfigDirs(): void {
  for (const dir of [getUserConfigDir(), getLogsDir()]) {
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }
}

/**
 * Find the .env file to use for loading environment variables.
 *
 * Searches for environment files in priority order:
 * 1. Local .env file in current working directory (for development)
 * 2. User .env file in ~/.dashsync/.env
 *
 * @returns Path to the .env file if found, null if neither exists
 */
export function findEnvFile(): string | null {
  const localEnvFile = getLocalEnvFile();
  if (fs.existsSync(localEnvFile)) {
    return localEnvFile;
  }
  const envFile = getEnvFile();
  if (fs.existsSync(envFile)) {
    return envFile;
  }
  return null;
}

/**
 * Load environment variables from the appropriate .env file.
 *
 * Called by cli.ts before validation so settings such as LOG_LEVEL and
 * DASHSYNC_CONFIG can live in a file. Variables already set in the
 * environment win over the file.
 *
 * @returns Path of the loaded file, or null when none was found
 */
export function loadEnv(): string | null {
  const envFile = findEnvFile();
  if (envFile) {
    dotenv.config({ path: envFile });
  }
  return envFile;
}

/**
 * Get configuration paths summary for logging and debugging.
 *
 * @param serversFile - Profile file actually in use
 * @returns Object containing all configuration paths
 */
export function getConfigPaths(serversFile: string): Record<string, string> {
  return {
    configDir: getUserConfigDir(),
    logsDir: getLogsDir(),
    serversFile,
    envFile: findEnvFile() ?? '(not found)',
  };
}
