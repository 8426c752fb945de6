import type { CellValue } from './types.js';

const TRUTHY_TEXT = new Set(['yes', 'y', 'true', 't', '1']);

// Plain decimal literals only: no hex, no "Infinity", no thousands separators.
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Parses a cell as a number when it is one. Booleans count as numeric,
 * strings must be a decimal literal once trimmed. Returns undefined when the
 * value is not a finite number.
 */
function parseNumeric(value: CellValue): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string') {
    const text = value.trim();
    if (!NUMERIC_TEXT.test(text)) return undefined;
    const parsed = Number(text);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Maps a raw cell to its amount. Total: every input yields a finite number.
 *
 * 1. Numeric values are used as-is.
 * 2. Truthy text (`yes`, `y`, `true`, `t`, `1`, any case, surrounding
 *    whitespace ignored) is `1`.
 * 3. Anything else, missing values included, is `0`.
 */
export function normalizeValue(value: CellValue): number {
  const numeric = parseNumeric(value);
  if (numeric !== undefined) {
    return numeric;
  }

  const text = String(value ?? '')
    .trim()
    .toLowerCase();
  return TRUTHY_TEXT.has(text) ? 1 : 0;
}

export function normalize(values: readonly CellValue[]): number[] {
  return values.map(normalizeValue);
}

/**
 * A row is CAPEX when its amount is strictly above the threshold.
 */
export function isCapex(amount: number, threshold: number): boolean {
  return amount > threshold;
}
