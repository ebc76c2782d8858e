const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Convert a decimal amount in major units ("49.99") to the gateway's integer
 * minor-unit string ("4999"). Rounds half away from zero on the digit after
 * `exponent`, operating on the decimal digits rather than a float.
 */
export function toMinorUnits(amount: string | number, exponent = 2): string {
  const text = typeof amount === 'number' ? amount.toString() : amount.trim();
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new Error(`Invalid decimal amount: ${String(amount)}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const padded = fraction.padEnd(exponent + 1, '0');
  const kept = padded.slice(0, exponent);
  const roundDigit = Number(padded[exponent]);

  let units = BigInt(`${whole}${kept}`);
  if (roundDigit >= 5) {
    units += 1n;
  }

  if (units === 0n) return '0';
  return `${sign ?? ''}${units.toString()}`;
}
