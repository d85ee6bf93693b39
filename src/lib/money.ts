/**
 * Money Utilities
 *
 * Amounts are held as integer cents. On the wire they are decimal strings
 * ("12.50") or JSON numbers with at most two fractional digits, up to ten
 * integer digits.
 */

export type Cents = number;

const MONEY_REGEX = /^(\d{1,10})(?:\.(\d{1,2}))?$/;

/**
 * Parse a decimal amount into cents
 *
 * @returns cents, or null when the value is negative, malformed or carries
 * more than two fractional digits
 *
 * @example
 * parseMoney("12.5") // 1250
 * parseMoney(0.07)   // 7
 * parseMoney("1.999") // null
 */
export function parseMoney(value: string | number): Cents | null {
  let text: string;

  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      return null;
    }
    // Numbers such as 0.07 print exactly; anything needing more digits is rejected
    text = String(value);
  } else {
    text = value.trim();
  }

  const match = MONEY_REGEX.exec(text);
  if (!match) {
    return null;
  }

  const whole = Number(match[1]);
  const fraction = Number((match[2] ?? '').padEnd(2, '0'));

  return whole * 100 + fraction;
}

/**
 * Format cents as a decimal string with two fractional digits
 *
 * @example
 * formatCents(1250) // "12.50"
 * formatCents(-5)   // "-0.05"
 */
export function formatCents(cents: Cents): string {
  const sign = cents < 0 ? '-' : '';
  const abs = Math.abs(cents);
  const whole = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, '0');

  return `${sign}${whole}.${fraction}`;
}
