import { logWarn } from '../utils/logger';

export type Env = Record<string, string | undefined>;

/**
 * Non-negative integer from the environment. Missing values use the
 * default silently, invalid or negative ones with a warning.
 */
export function envInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    logWarn('config', `Invalid ${name}, using default`, {
      value: raw,
      default: fallback
    });
    return fallback;
  }
  return value;
}

export function envIntClamped(
  env: Env,
  name: string,
  fallback: number,
  min: number,
  max: number
): number {
  return Math.max(min, Math.min(envInt(env, name, fallback), max));
}

export function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['true', '1', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

export function envList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}
