/**
 * Environment Variable Parsing Utilities
 *
 * - parseEnvInt throws on invalid/out-of-range values (strict, for startup)
 * - parseEnvBool falls back to the default on anything unrecognised
 * - parseEnvList splits comma-separated values and drops blanks
 */

/**
 * Parse and validate an integer environment variable.
 * Returns defaultValue if the variable is unset or empty.
 *
 * @example
 * ```typescript
 * const port = parseEnvInt('CONTROLLER_PORT', 3100, 1, 65535);
 * ```
 */
export function parseEnvInt(
  name: string,
  defaultValue: number,
  min?: number,
  max?: number,
  env: NodeJS.ProcessEnv = process.env
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return defaultValue;

  const trimmed = raw.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${name}: "${raw}" is not a valid integer`);
  }
  const parsed = parseInt(trimmed, 10);
  if (min !== undefined && max !== undefined) {
    if (parsed < min || parsed > max) {
      throw new Error(`Invalid ${name}: ${parsed} is out of range [${min}, ${max}]`);
    }
  } else if (min !== undefined && parsed < min) {
    throw new Error(`Invalid ${name}: ${parsed} is below minimum ${min}`);
  } else if (max !== undefined && parsed > max) {
    throw new Error(`Invalid ${name}: ${parsed} is above maximum ${max}`);
  }
  return parsed;
}

export function parseEnvBool(
  name: string,
  defaultValue: boolean,
  env: NodeJS.ProcessEnv = process.env
): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') return defaultValue;

  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;

  return defaultValue;
}

export function parseEnvList(
  name: string,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const raw = env[name];
  if (!raw) return [];
  return raw
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}
