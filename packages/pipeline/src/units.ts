/**
 * Exact conversion between human-readable token amounts ("0.05") and atomic
 * units (50000n for a 6-decimal token). Integer arithmetic only.
 */

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d*))?$/;
const ATOMIC_PATTERN = /^\d+$/;

/**
 * Convert a decimal string to atomic units.
 * Throws when the string has more fractional digits than the token supports,
 * since truncating would silently change the amount.
 */
export function toAtomic(amount: string, decimals: number): bigint {
  const match = DECIMAL_PATTERN.exec(amount.trim());
  if (!match) {
    throw new Error(`Invalid decimal amount: "${amount}"`);
  }

  const wholePart = match[1] ?? '0';
  const fracPart = match[2] ?? '';
  if (fracPart.length > decimals) {
    throw new Error(`Amount "${amount}" has more than ${decimals} decimal places`);
  }

  const multiplier = 10n ** BigInt(decimals);
  return BigInt(wholePart) * multiplier + BigInt(fracPart.padEnd(decimals, '0') || '0');
}

/**
 * Format atomic units as a decimal string, keeping at least two decimal places.
 */
export function fromAtomic(atomic: bigint | string, decimals: number): string {
  const value = typeof atomic === 'bigint' ? atomic : parseAtomic(atomic);
  const multiplier = 10n ** BigInt(decimals);
  const whole = value / multiplier;
  const remainder = value % multiplier;

  if (decimals === 0) {
    return whole.toString();
  }

  const trimmed = remainder.toString().padStart(decimals, '0').replace(/0+$/, '');
  const frac = trimmed.length < 2 ? trimmed.padEnd(Math.min(2, decimals), '0') : trimmed;

  return `${whole}.${frac}`;
}

/**
 * Parse an atomic-unit string as sent on the wire ("50000").
 */
export function parseAtomic(value: string): bigint {
  if (!ATOMIC_PATTERN.test(value)) {
    throw new Error(`Invalid atomic amount: "${value}"`);
  }
  return BigInt(value);
}

export function isAtomic(value: string): boolean {
  return ATOMIC_PATTERN.test(value);
}
