/**
 * Input Validation Utilities
 * Shared validation helpers for all services
 */

/**
 * Validates and clamps pagination parameters
 */
export function validatePagination(
  limit?: number | string,
  offset?: number | string,
  maxLimit = 1000
): { limit: number; offset: number } {
  let parsedLimit = typeof limit === 'string' ? parseInt(limit, 10) : (limit ?? 100);
  let parsedOffset = typeof offset === 'string' ? parseInt(offset, 10) : (offset ?? 0);

  if (isNaN(parsedLimit)) {
    parsedLimit = 100;
  }
  if (isNaN(parsedOffset)) {
    parsedOffset = 0;
  }

  return {
    limit: Math.min(Math.max(parsedLimit, 1), maxLimit),
    offset: Math.max(parsedOffset, 0),
  };
}

/**
 * Validates a port number
 */
export function validatePort(value: string | number | undefined, defaultPort: number): number {
  const port = typeof value === 'string' ? parseInt(value, 10) : (value ?? defaultPort);
  if (isNaN(port) || port < 0 || port > 65535) {
    return defaultPort;
  }
  return port;
}

/**
 * Narrows a string to one of the allowed literals
 */
export function isOneOf<T extends string>(value: string | undefined, allowed: readonly T[]): value is T {
  return value !== undefined && (allowed as readonly string[]).includes(value);
}

/**
 * Parses an environment flag ("true"/"1"/"yes", case-insensitive)
 */
export function parseBoolean(value: string | undefined, defaultValue = false): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Strict positive integer for command-line options: throws instead of
 * falling back, so a typo never turns into a default
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();
  const num = /^\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(num) || num < 1) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return num;
}
