// Bank export prefixes that carry no information about the merchant
const NOISY_PREFIXES = [
  'POS PURCHASE ',
  'POS ',
  'DEBIT ',
  'CREDIT ',
  'PURCHASE ',
  'ACH ',
  'EFT ',
  'INTERAC ',
  'VISA ',
  'MASTERCARD ',
];

const UPPERCASE_RATIO_FOR_TITLE_CASE = 0.75;

function titleCase(value: string): string {
  return value.toLowerCase().replace(/(^|\s)(\p{L})/gu, (_match, space: string, letter: string) => {
    return space + letter.toUpperCase();
  });
}

/**
 * Normalizes a payee for display while keeping it readable.
 *
 * Collapses whitespace, strips at most one noisy bank prefix and title-cases
 * text that is mostly uppercase.
 *
 * @example
 * ```typescript
 * normalizePayeeDisplay('POS  CORNER   MARKET'); // 'Corner Market'
 * ```
 */
export function normalizePayeeDisplay(payee: string): string {
  let value = payee.trim();
  if (value === '') {
    return value;
  }

  value = value
    .replace(/[\t\n\r]+/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim();

  const upper = value.toUpperCase();
  const prefix = NOISY_PREFIXES.find((p) => upper.startsWith(p));
  if (prefix) {
    value = value.slice(prefix.length).trim();
  }

  const letters = value.match(/\p{L}/gu) ?? [];
  if (letters.length > 0) {
    const upperLetters = letters.filter((letter) => /\p{Lu}/u.test(letter)).length;
    if (upperLetters / letters.length > UPPERCASE_RATIO_FOR_TITLE_CASE) {
      value = titleCase(value);
    }
  }

  return value;
}

/**
 * Aggressive normalization used to group payees and match rules
 *
 * @example
 * ```typescript
 * normalizePayeeForComparison('VISA Joe\'s Café #12'); // 'joe s caf 12'
 * ```
 */
export function normalizePayeeForComparison(payee: string): string {
  return normalizePayeeDisplay(payee)
    .toLowerCase()
    .replace(/[^a-z0-9 ]/g, ' ')
    .replace(/\s{2,}/g, ' ')
    .trim();
}
