/**
 * Normalizers for values read from XML text nodes, PDF text and model output.
 *
 * Brazilian documents write amounts as `1.234,56` or `R$ 1.234,56`; XML uses
 * `1234.56`. Both forms are accepted.
 */

const NBSP = /\u00a0/g;

/**
 * Parse a monetary or quantity value.
 *
 * When a comma is present it is the decimal separator and dots are thousands
 * separators. Without a comma the dot is the decimal separator.
 *
 * @returns The number, or null when the value is absent or unparseable
 *
 * @example
 * ```typescript
 * parseBrazilianNumber('R$ 1.234,56') // => 1234.56
 * parseBrazilianNumber('1234.56')     // => 1234.56
 * parseBrazilianNumber('abc')         // => null
 * ```
 */
export function parseBrazilianNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') {
    return null;
  }

  let text = value.replace(NBSP, '').replace(/R\$/gi, '').replace(/\s+/g, '');
  if (text.length === 0) {
    return null;
  }
  if (text.includes(',')) {
    text = text.replace(/\./g, '').replace(',', '.');
  }
  if (!/^[+-]?(\d+\.?\d*|\.\d+)$/.test(text)) {
    return null;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Keep digits only. Non-string, non-number input yields ''.
 */
export function digitsOnly(value: unknown): string {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value).replace(/\D/g, '');
  }
  if (typeof value !== 'string') {
    return '';
  }
  return value.replace(/\D/g, '');
}

/**
 * Trimmed text, or null when absent or blank.
 */
export function cleanText(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  if (typeof value !== 'string') {
    return null;
  }
  const trimmed = value.replace(NBSP, ' ').trim();
  return trimmed.length > 0 ? trimmed : null;
}

/**
 * Integer cents for a monetary amount, for tolerance-free comparisons.
 */
export function toCents(value: number): number {
  return Math.round(value * 100);
}

/**
 * Round half away from zero to the given number of decimal places.
 */
export function roundTo(value: number, places = 2): number {
  const factor = 10 ** places;
  return Math.sign(value) * Math.round(Math.abs(value) * factor) / factor;
}
