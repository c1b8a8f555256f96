import { Decimal } from 'decimal.js';

// Monetary amounts carry at most a few decimal places; 28 significant digits
// keep sums over millions of rows exact.
Decimal.set({
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7,
  toExpPos: 21,
});

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: string | number | Decimal | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

// Plain decimal notation only; decimal.js would also take 0x, 0b and 0o literals
const DECIMAL_TEXT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parse a currency amount as written in source files ("$12.50", "12.50").
 * Returns undefined when the text is not a finite decimal number.
 */
export function parseCurrencyAmount(text: string): Decimal | undefined {
  const trimmed = text.trim();
  const unsigned = trimmed.startsWith('$') ? trimmed.slice(1) : trimmed;
  if (!DECIMAL_TEXT_PATTERN.test(unsigned)) return undefined;

  const out = { value: new Decimal(0) };
  if (!tryParseDecimal(unsigned, out) || !out.value.isFinite()) {
    return undefined;
  }
  return out.value;
}

export function sumDecimals(values: Iterable<Decimal>): Decimal {
  let total = new Decimal(0);
  for (const value of values) {
    total = total.plus(value);
  }
  return total;
}

/**
 * total / count, or zero when count is zero
 */
export function averageOf(total: Decimal, count: number): Decimal {
  return count > 0 ? total.dividedBy(count) : new Decimal(0);
}

/**
 * Convert Decimal to string with appropriate precision for display
 */
export function formatDecimal(decimal: Decimal, maxDecimalPlaces = 2): string {
  return decimal.toFixed(maxDecimalPlaces).replace(/\.0+$/, '');
}
