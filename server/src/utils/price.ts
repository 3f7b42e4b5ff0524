import { fieldValidationError } from '../errors/AppError.js';

/** Up to three integer digits and two fractional digits: 0.00 to 999.99 */
const PRICE_PATTERN = /^(\d{1,3})(?:\.(\d{1,2}))?$/;

/**
 * Parse a price given as a number (5.5) or decimal string ("5.50") into integer cents.
 * @throws ValidationError for negative, non-finite, over-precise or too large values
 */
export function parsePrice(value: number | string): number {
  const text = typeof value === 'number' ? String(value) : value.trim();
  const match = PRICE_PATTERN.exec(text);
  if (!match) {
    throw fieldValidationError(
      '/price',
      'Price must be a non-negative decimal between 0 and 999.99 with at most 2 decimal places',
    );
  }
  const [, whole, fraction = ''] = match;
  return Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
}

/**
 * Render integer cents as a two-decimal string: 525 becomes "5.25".
 */
export function formatPrice(cents: number): string {
  const whole = Math.floor(cents / 100);
  const fraction = String(cents % 100).padStart(2, '0');
  return `${whole}.${fraction}`;
}
