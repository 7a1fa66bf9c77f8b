import type { AmountFormatId } from '@template-extract/shared/schemas/templateDocument.zod';

export interface AmountFormat {
  id: AmountFormatId;
  name: string;
  decimalSeparator: ',' | '.';
  thousandsSeparator: '.' | ',' | ' ' | '';
}

/**
 * Pre-configured amount format presets
 */
export const AMOUNT_FORMATS: Record<AmountFormatId, AmountFormat> = {
  pl: { id: 'pl', name: 'Polish (1 234,56)', decimalSeparator: ',', thousandsSeparator: ' ' },
  de: { id: 'de', name: 'German (1.234,56)', decimalSeparator: ',', thousandsSeparator: '.' },
  'de-space': { id: 'de-space', name: 'German with spaces (1 234,56)', decimalSeparator: ',', thousandsSeparator: ' ' },
  us: { id: 'us', name: 'US/UK (1,234.56)', decimalSeparator: '.', thousandsSeparator: ',' },
  'us-space': { id: 'us-space', name: 'International (1 234.56)', decimalSeparator: '.', thousandsSeparator: ' ' },
  simple: { id: 'simple', name: 'Plain (1234.56)', decimalSeparator: '.', thousandsSeparator: '' },
  'simple-comma': { id: 'simple-comma', name: 'Plain with comma (1234,56)', decimalSeparator: ',', thousandsSeparator: '' },
};

const MINOR_UNITS_PER_MAJOR = 100n;
const FRACTION_DIGITS = 2;
const THOUSANDS_GROUP = 3;

const CURRENCY_MARKERS = /(?:[$€£¥]|zł|pln|eur|usd|gbp|chf|ron|lei)/gi;
const WHITESPACE = /\s/g;
const WHITESPACE_RUNS = /\s+/g;
const SPACE_GROUPED = /\d\s+\d/;
const PLAIN_DIGITS = /^\d+$/;
const FRACTION = /^\d*$/;
const FIXED_POINT = /^(-?)(\d+)\.(\d{2})$/;

function escapeForRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function stripSign(value: string): { body: string; negative: boolean } {
  let body = value;
  let negative = false;

  if (body.startsWith('(') && body.endsWith(')')) {
    negative = true;
    body = body.slice(1, -1).trim();
  }
  if (body.startsWith('-')) {
    negative = !negative;
    body = body.slice(1);
  } else if (body.endsWith('-')) {
    negative = !negative;
    body = body.slice(0, -1);
  }
  if (body.startsWith('+')) {
    body = body.slice(1);
  }

  return { body: body.trim(), negative };
}

function isGroupedInteger(value: string, separator: AmountFormat['thousandsSeparator']): boolean {
  if (PLAIN_DIGITS.test(value)) {
    return true;
  }
  if (separator === '') {
    return false;
  }
  const grouped = new RegExp(`^\\d{1,${THOUSANDS_GROUP}}(?:${escapeForRegExp(separator)}\\d{${THOUSANDS_GROUP}})*$`);
  return grouped.test(value);
}

/**
 * Parses an amount in the given format into integer minor units (cents).
 * Returns null for anything that is not a well-formed amount: more than two
 * fraction digits, thousands separators outside three-digit groups, or a
 * separator the format does not use.
 */
export function parseAmount(value: string, format: AmountFormat): bigint | null {
  const { body, negative } = stripSign(value.replace(CURRENCY_MARKERS, '').trim());
  // A run of whitespace counts as one group separator
  const cleaned = format.thousandsSeparator === ' ' ? body.replace(WHITESPACE_RUNS, ' ') : body;

  const parts = cleaned.split(format.decimalSeparator);
  if (parts.length > 2) {
    return null;
  }

  const [integerPart, fractionPart = ''] = parts;
  if (!isGroupedInteger(integerPart, format.thousandsSeparator)) {
    return null;
  }
  if (!FRACTION.test(fractionPart) || fractionPart.length > FRACTION_DIGITS) {
    return null;
  }

  const digits = format.thousandsSeparator === '' ? integerPart : integerPart.split(format.thousandsSeparator).join('');
  const minor = BigInt(digits) * MINOR_UNITS_PER_MAJOR + BigInt(fractionPart.padEnd(FRACTION_DIGITS, '0'));
  return negative ? -minor : minor;
}

/**
 * Picks a format for a value whose convention is unknown: with both
 * separators the last one is decimal, a single separator followed by one or
 * two digits is decimal, otherwise it groups thousands. Digits split by
 * whitespace select a space-grouped format.
 */
export function detectAmountFormat(value: string): AmountFormat {
  const withoutCurrency = value.replace(CURRENCY_MARKERS, '').trim();
  const spaceGrouped = SPACE_GROUPED.test(withoutCurrency);
  const cleaned = withoutCurrency.replace(WHITESPACE, '');
  const lastComma = cleaned.lastIndexOf(',');
  const lastPeriod = cleaned.lastIndexOf('.');

  if (lastComma >= 0 && lastPeriod >= 0) {
    return lastComma > lastPeriod ? AMOUNT_FORMATS.de : AMOUNT_FORMATS.us;
  }

  if (lastComma >= 0) {
    const commaCount = cleaned.split(',').length - 1;
    const digitsAfter = cleaned.slice(lastComma + 1).replace(/\D/g, '').length;
    if (commaCount === 1 && digitsAfter <= FRACTION_DIGITS) {
      return spaceGrouped ? AMOUNT_FORMATS['de-space'] : AMOUNT_FORMATS['simple-comma'];
    }
    return AMOUNT_FORMATS.us;
  }

  if (lastPeriod >= 0) {
    const periodCount = cleaned.split('.').length - 1;
    const digitsAfter = cleaned.slice(lastPeriod + 1).replace(/\D/g, '').length;
    if (periodCount === 1 && digitsAfter !== THOUSANDS_GROUP) {
      return spaceGrouped ? AMOUNT_FORMATS['us-space'] : AMOUNT_FORMATS.simple;
    }
    return AMOUNT_FORMATS.de;
  }

  return spaceGrouped ? AMOUNT_FORMATS['us-space'] : AMOUNT_FORMATS.simple;
}

export function toFixedPoint(minor: bigint): string {
  const negative = minor < 0n;
  const absolute = negative ? -minor : minor;
  const major = absolute / MINOR_UNITS_PER_MAJOR;
  const fraction = (absolute % MINOR_UNITS_PER_MAJOR).toString().padStart(FRACTION_DIGITS, '0');
  return `${negative ? '-' : ''}${major.toString()}.${fraction}`;
}

export function fromFixedPoint(value: string): bigint | null {
  const match = FIXED_POINT.exec(value);
  if (!match) {
    return null;
  }
  const [, sign, major, fraction] = match;
  const minor = BigInt(major) * MINOR_UNITS_PER_MAJOR + BigInt(fraction);
  return sign === '-' ? -minor : minor;
}

/**
 * Renders minor units in the given format, e.g. 123456n as "1 234,56" for pl.
 */
export function formatAmount(minor: bigint, format: AmountFormat): string {
  const fixed = toFixedPoint(minor);
  const negative = fixed.startsWith('-');
  const [major, fraction] = (negative ? fixed.slice(1) : fixed).split('.');

  const groups: string[] = [];
  for (let end = major.length; end > 0; end -= THOUSANDS_GROUP) {
    groups.unshift(major.slice(Math.max(0, end - THOUSANDS_GROUP), end));
  }

  return `${negative ? '-' : ''}${groups.join(format.thousandsSeparator)}${format.decimalSeparator}${fraction}`;
}
