/**
 * Numeric text normalization
 *
 * Numbers, bigints and numeric strings are all reduced to text before the
 * number check inspects them. Deciding numeric-ness and sign on that one
 * form keeps bigints beyond Number.MAX_SAFE_INTEGER and digit strings on the
 * same path as ordinary numbers.
 *
 * Internal to the number check; not exported from the package root.
 */

/**
 * Decimal or exponent notation, or an infinity spelling, with an optional sign.
 */
const NUMERIC_TEXT = /^[+-]?(?:(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?|inf(?:inity)?)$/i;

/**
 * Any spelling of zero: `0`, `-0`, `0.00`, `.0`, `0e10`.
 */
const ZERO_TEXT = /^[+-]?(?:0+(?:\.0*)?|\.0+)(?:e[+-]?\d+)?$/i;

/**
 * Round-trip a candidate through its text form.
 *
 * @returns The trimmed text, or undefined when the value has no numeric
 *          text form (objects, booleans, NaN, ...)
 */
export function toNumericText(value: unknown): string | undefined {
  switch (typeof value) {
    case 'number':
      return Number.isNaN(value) ? undefined : String(value);
    case 'bigint':
      return value.toString();
    case 'string':
      return value.trim();
    default:
      return undefined;
  }
}

/**
 * Check if normalized text reads as a number.
 */
export function isNumericText(text: string): boolean {
  return NUMERIC_TEXT.test(text);
}

/**
 * Sign of normalized numeric text.
 *
 * Computed on the text itself, so `-0` is zero and the sign of a number too
 * large for a double is still exact.
 */
export function numericSign(text: string): -1 | 0 | 1 {
  if (ZERO_TEXT.test(text)) return 0;
  return text.startsWith('-') ? -1 : 1;
}
