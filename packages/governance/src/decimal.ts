/**
 * Fixed-point decimals
 *
 * Fractions, quorums and thresholds travel as canonical decimal strings and are
 * compared as integers of 10^-18 units, so `0.1 + 0.2 + 0.7` is exactly 1.
 */

import { ValidationError } from './errors.js';

/** Canonical decimal string, e.g. "0.5" or "1000" */
export type Decimal = string;

export const DECIMAL_PLACES = 18;

const SCALE = 10n ** BigInt(DECIMAL_PLACES);

export const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,18}))?$/;

export const ZERO_UNITS = 0n;
export const ONE_UNITS = SCALE;

/**
 * Convert a decimal string to integer units
 *
 * @example
 * ```typescript
 * toUnits('0.25'); // 250000000000000000n
 * ```
 */
export function toUnits(value: Decimal): bigint {
  const match = DECIMAL_PATTERN.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid decimal: ${value}`);
  }
  const whole = match[1];
  const fraction = match[2] ?? '';
  return BigInt(whole) * SCALE + BigInt(fraction.padEnd(DECIMAL_PLACES, '0'));
}

/**
 * Convert integer units back to a canonical decimal string
 *
 * @example
 * ```typescript
 * fromUnits(1_500_000_000_000_000_000n); // '1.5'
 * ```
 */
export function fromUnits(units: bigint): Decimal {
  const whole = units / SCALE;
  const fraction = (units % SCALE).toString().padStart(DECIMAL_PLACES, '0').replace(/0+$/, '');
  return fraction ? `${whole}.${fraction}` : whole.toString();
}

/** Strip redundant zeros: "0.50" → "0.5", "007" → "7" */
export function normalizeDecimal(value: Decimal): Decimal {
  return fromUnits(toUnits(value));
}
