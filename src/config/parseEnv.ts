/**
 * Environment variable parsing utilities with boolean/int/string handling
 * Avoids truthy coercion pitfalls where the string "false" evaluates to true
 */

export const TRUE_VALUES = ['true', '1', 'yes'] as const;
export const FALSE_VALUES = ['false', '0', 'no'] as const;

/**
 * Whether a raw value is something parseBoolEnv understands (blank counts)
 */
export function isBoolEnv(value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') {
    return true;
  }
  const normalized = value.toLowerCase().trim();
  return (
    TRUE_VALUES.some(v => v === normalized) ||
    FALSE_VALUES.some(v => v === normalized)
  );
}

/**
 * Parse boolean environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty
 * @returns Parsed boolean
 */
export function parseBoolEnv(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const normalized = value.toLowerCase().trim();

  if (TRUE_VALUES.some(v => v === normalized)) {
    return true;
  }

  if (FALSE_VALUES.some(v => v === normalized)) {
    return false;
  }

  // Invalid value - return default
  return defaultValue;
}

/**
 * Parse integer environment variable
 * @param value - Environment variable value
 * @param defaultValue - Default value if undefined/empty/invalid
 * @param min - Optional minimum value
 */
export function parseIntEnv(
  value: string | undefined,
  defaultValue: number,
  min?: number
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    return defaultValue;
  }

  if (min !== undefined && parsed < min) {
    return min;
  }

  return parsed;
}

/**
 * Get string environment variable, trimmed, or the default when blank
 */
export function getEnvString(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  return value.trim();
}
