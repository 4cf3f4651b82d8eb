/**
 * Pure utility functions shared across modules.
 *
 * Contains stateless helpers with no side effects.
 */

/**
 * Narrows an unknown value to a plain JSON object.
 *
 * @param value - Value to check
 * @returns True for non-null, non-array objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalizes a path prefix to exactly one leading slash and no trailing slash.
 *
 * @param prefix - Raw prefix from configuration (e.g., 'es/', '/dashboards//')
 * @returns Normalized prefix, or '' when the prefix is empty or only slashes
 *
 * @example
 * ```typescript
 * normalizePathPrefix('es/');        // "/es"
 * normalizePathPrefix('//kibana//'); // "/kibana"
 * normalizePathPrefix('/');          // ""
 * ```
 */
export function normalizePathPrefix(prefix: string | undefined): string {
  if (!prefix) return '';
  const trimmed = prefix.trim().replace(/^\/+/, '').replace(/\/+$/, '');
  return trimmed === '' ? '' : `/${trimmed}`;
}

/**
 * Joins a base URL and a path with exactly one separating slash.
 *
 * @param base - Base URL (trailing slashes ignored)
 * @param path - Path (leading slashes ignored)
 * @returns Joined URL
 */
export function joinUrl(base: string, path: string): string {
  const trimmedPath = path.replace(/^\/+/, '');
  const trimmedBase = base.replace(/\/+$/, '');
  return trimmedPath === '' ? trimmedBase : `${trimmedBase}/${trimmedPath}`;
}

/**
 * Formats a byte count as a short human readable string.
 *
 * @param bytes - Size in bytes
 * @returns Size with one decimal and unit (e.g., "1.5KB")
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  for (const unit of units) {
    if (value < 1024) {
      return `${value.toFixed(1)}${unit}`;
    }
    value /= 1024;
  }
  return `${value.toFixed(1)}PB`;
}
