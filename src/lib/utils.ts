import { type ClassValue, clsx } from 'clsx';
import { twMerge } from 'tailwind-merge';

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs));
}

const formatterCache = new Map<string, Intl.NumberFormat>();

function getFixedFormatter(decimals: number, grouping: boolean): Intl.NumberFormat {
  const key = `${decimals}:${grouping}`;
  const cached = formatterCache.get(key);
  if (cached) return cached;

  const formatter = new Intl.NumberFormat('en-US', {
    minimumFractionDigits: decimals,
    maximumFractionDigits: decimals,
    useGrouping: grouping,
    roundingMode: 'halfEven',
    signDisplay: 'negative', // anything that rounds to zero prints unsigned
  });
  formatterCache.set(key, formatter);
  return formatter;
}

const EXPANDED_DECIMAL = /^-?\d+(\.\d+)?(e[+-]\d+)?$/;

function isStringNumericLiteral(text: string): text is Intl.StringNumericLiteral {
  return EXPANDED_DECIMAL.test(text);
}

// Full binary value of the double, so 2.675 (really 2.67499…) is not a tie.
function exactDecimal(value: number): Intl.StringNumericLiteral | number {
  const expanded = value.toFixed(100);
  return isStringNumericLiteral(expanded) ? expanded : value;
}

/**
 * Fixed-point number, round-half-to-even on the exact binary value.
 * formatFixed(2.125, 2) → "2.12", formatFixed(2.675, 2) → "2.67",
 * formatFixed(1234.5, 2, true) → "1,234.50"
 */
export function formatFixed(value: number, decimals: number, grouping = false): string {
  return getFixedFormatter(decimals, grouping).format(exactDecimal(value));
}

/**
 * Dollar amount, precision picked from the magnitude:
 *   |v| ≥ 1       → "$1,234.50"
 *   |v| ≥ 0.01    → "$0.0500"
 *   |v| ≥ 0.0001  → "$0.005600"
 *   otherwise     → "$0.00001234"
 * Sign goes after the symbol: "$-1,234.50". Values that round to zero,
 * -0 included, print as "$0.00000000".
 */
export function formatCurrency(value: number): string {
  const magnitude = Math.abs(value);
  if (magnitude >= 1) return `$${formatFixed(value, 2, true)}`;
  if (magnitude >= 0.01) return `$${formatFixed(value, 4)}`;
  if (magnitude >= 0.0001) return `$${formatFixed(value, 6)}`;
  return `$${formatFixed(value, 8)}`;
}

export function formatPercent(value: number, decimals = 2): string {
  return `${formatFixed(value, decimals)}%`;
}
