/** Amount token source with exactly two decimals, usable inside larger line patterns. */
export const AMOUNT_TOKEN =
  '[-+]?\\(?-?\\$?\\s?(?:\\d{1,3}(?:,\\d{3})+|\\d+)\\.\\d{2}\\)?(?:-|\\s?CR\\b|\\s?DR\\b)?';

const amountPattern =
  /^([-+])?\s?(\()?\s?([-+])?\s?\$?\s?((?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d+)?)\s?(\))?\s?(-|CR|DR)?$/i;

/**
 * Parses a printed amount. Parentheses, a leading or trailing minus and a DR suffix
 * mean negative; a CR suffix means positive.
 */
export const parseAmount = (raw: string | number): number | null => {
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? raw : null;
  }

  const match = raw.trim().match(amountPattern);
  if (!match) return null;

  const [, leadingSign, openParen, innerSign, digits, closeParen, suffix] = match;
  if (Boolean(openParen) !== Boolean(closeParen)) return null;

  const value = Number(digits.replace(/,/g, ''));
  if (!Number.isFinite(value)) return null;

  const marker = suffix?.toUpperCase();
  if (marker === 'CR') return Math.abs(value);

  const negative = leadingSign === '-' || innerSign === '-' || Boolean(openParen) || marker === '-' || marker === 'DR';
  return negative ? -value : value;
};
