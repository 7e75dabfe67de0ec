/**
 * Severity scale shared by both sinks.
 *
 * winston orders levels by number, lowest = most severe, so the scale below is
 * registered as custom levels on every logger this package creates.
 */

import { ConfigError } from './errors';

export const SEVERITY_LEVELS = {
  critical: 0,
  error: 1,
  warning: 2,
  info: 3,
  debug: 4,
} as const;

export type Severity = keyof typeof SEVERITY_LEVELS;

export const SEVERITY_COLORS: Record<Severity, string> = {
  critical: 'bold red',
  error: 'red',
  warning: 'yellow',
  info: 'green',
  debug: 'gray',
};

const ALIASES: Record<string, Severity> = {
  warn: 'warning',
  fatal: 'critical',
};

// Numeric levels as other logging stacks spell them (10 = debug ... 50 = critical)
const NUMERIC: Record<number, Severity> = {
  10: 'debug',
  20: 'info',
  30: 'warning',
  40: 'error',
  50: 'critical',
};

export function isSeverity(value: string): value is Severity {
  return Object.prototype.hasOwnProperty.call(SEVERITY_LEVELS, value);
}

/**
 * Accepts a severity name (any case), `warn`/`fatal`, or 10/20/30/40/50
 * (also as digit strings). Throws ConfigError naming `option` otherwise.
 */
export function parseSeverity(value: unknown, option: string): Severity {
  if (typeof value === 'number' && NUMERIC[value]) {
    return NUMERIC[value];
  }
  if (typeof value === 'string') {
    const key = value.trim().toLowerCase();
    if (isSeverity(key)) return key;
    if (ALIASES[key]) return ALIASES[key];
    if (/^\d+$/.test(key) && NUMERIC[Number(key)]) return NUMERIC[Number(key)];
  }
  throw new ConfigError(`'${option}' must be one of ${Object.keys(SEVERITY_LEVELS).join(', ')} (received ${String(value)}).`, option);
}

/** Whichever of the two thresholds lets more messages through. */
export function moreVerbose(a: Severity, b: Severity): Severity {
  return SEVERITY_LEVELS[a] >= SEVERITY_LEVELS[b] ? a : b;
}
