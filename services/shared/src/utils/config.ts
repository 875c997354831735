import { ConfigurationError } from './errors';

/**
 * Resolve a positive integer setting: an explicit value wins, then the
 * environment variable, then the fallback. Anything else throws so the
 * service fails at startup instead of on its first request.
 */
export function positiveIntSetting(
     name: string,
     override: number | undefined,
     fallback: number
): number {
     const raw = process.env[name];
     const value =
          override ?? (raw === undefined || raw.trim() === '' ? fallback : Number(raw));

     if (!Number.isInteger(value) || value <= 0) {
          throw new ConfigurationError(name, override ?? raw);
     }

     return value;
}
