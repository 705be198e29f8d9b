/**
 * Value Coercion Utilities
 *
 * The API serializes some numeric statistics as text and CSV files carry
 * everything as text. These helpers turn such values into numbers.
 */

/**
 * Decimal places kept on summed or differenced statistics
 */
const STAT_PRECISION = 2;

/**
 * Parse a number from a number or numeric text
 *
 * @returns The finite number, or null for empty, non-numeric or absent input
 */
export function parseNumeric(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Coerce a cumulative statistic; anything unparseable counts as 0
 */
export function toNumberOrZero(value: unknown): number {
  return parseNumeric(value) ?? 0;
}

/**
 * Coerce a point-in-time statistic; unparseable stays null
 */
export function toNumberOrNull(value: unknown): number | null {
  return parseNumeric(value);
}

/**
 * Non-empty text, otherwise null
 */
export function toTextOrNull(value: unknown): string | null {
  if (typeof value === 'string') {
    return value === '' ? null : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Round away binary floating-point noise (e.g., 0.1 + 0.2)
 */
export function roundStat(value: number): number {
  const factor = 10 ** STAT_PRECISION;
  const rounded = Math.round(value * factor) / factor;
  // Avoid writing -0
  return rounded === 0 ? 0 : rounded;
}
