import { format as formatDate, isValid, parse } from 'date-fns';
import { AmountFormatIdEnum } from '@template-extract/shared/schemas/templateDocument.zod';
import type { FieldValue } from '@template-extract/shared/schemas/extractionResult.zod';
import type { FieldRule } from '../../models/Template';
import { AMOUNT_FORMATS, detectAmountFormat, parseAmount, toFixedPoint } from './amounts';
import type { AmountFormat } from './amounts';
import { FALLBACK_DATE_FORMATS, getLocaleProfile } from './localeProfiles';

const ISO_DATE_FORMAT = 'yyyy-MM-dd';
// Fixed reference so that formats without a year or century resolve the same way on every run
const DATE_REFERENCE = new Date(2000, 0, 1);
const INTEGER_PATTERN = /^[-+]?\d+$/;
const DIGIT_GROUP_SEPARATORS = /[\s']/g;
const INNER_WHITESPACE = /\s+/g;
const FULL_YEAR_TOKEN = /yyyy/;
const MIN_FULL_YEAR = 1000;

export type CoercionResult = { ok: true; value: FieldValue } | { ok: false; reason: string };

type CoercibleRule = Pick<FieldRule, 'valueType' | 'formatHints'>;

// date-fns reads one to four digits for yyyy, so "01.04.24" would come out as the year 24
function fitsYearToken(parsed: Date, dateFormat: string): boolean {
  return !FULL_YEAR_TOKEN.test(dateFormat) || parsed.getFullYear() >= MIN_FULL_YEAR;
}

export class TypeCoercionService {
  coerce(raw: string, rule: CoercibleRule, locale: string | null): CoercionResult {
    const trimmed = raw.trim();

    if (trimmed === '') {
      return { ok: false, reason: 'captured value is empty' };
    }

    switch (rule.valueType) {
      case 'amount':
        return this.coerceToAmount(trimmed, rule.formatHints, locale);
      case 'date':
        return this.coerceToDate(trimmed, rule.formatHints, locale);
      case 'integer':
        return this.coerceToInteger(trimmed);
      case 'text':
        return { ok: true, value: { type: 'text', value: trimmed.replace(INNER_WHITESPACE, ' ') } };
    }
  }

  resolveAmountFormats(formatHints: readonly string[], locale: string | null, value: string): AmountFormat[] {
    const hinted: AmountFormat[] = [];
    for (const hint of formatHints) {
      const parsed = AmountFormatIdEnum.safeParse(hint);
      if (parsed.success) {
        hinted.push(AMOUNT_FORMATS[parsed.data]);
      }
    }
    if (hinted.length > 0) {
      return hinted;
    }

    const profile = getLocaleProfile(locale);
    if (profile) {
      return [AMOUNT_FORMATS[profile.amountFormat]];
    }

    return [detectAmountFormat(value)];
  }

  resolveDateFormats(formatHints: readonly string[], locale: string | null): readonly string[] {
    if (formatHints.length > 0) {
      return formatHints;
    }
    return getLocaleProfile(locale)?.dateFormats ?? FALLBACK_DATE_FORMATS;
  }

  private coerceToAmount(value: string, formatHints: readonly string[], locale: string | null): CoercionResult {
    const formats = this.resolveAmountFormats(formatHints, locale, value);

    for (const amountFormat of formats) {
      const minor = parseAmount(value, amountFormat);
      if (minor !== null) {
        return { ok: true, value: { type: 'amount', value: toFixedPoint(minor) } };
      }
    }

    return {
      ok: false,
      reason: `"${value}" is not an amount in format ${formats.map((f) => f.id).join(', ')}`,
    };
  }

  private coerceToDate(value: string, formatHints: readonly string[], locale: string | null): CoercionResult {
    const formats = this.resolveDateFormats(formatHints, locale);

    for (const dateFormat of formats) {
      const parsed = parse(value, dateFormat, DATE_REFERENCE);
      if (isValid(parsed) && fitsYearToken(parsed, dateFormat)) {
        return { ok: true, value: { type: 'date', value: formatDate(parsed, ISO_DATE_FORMAT) } };
      }
    }

    return {
      ok: false,
      reason: `"${value}" is not a valid date in format ${formats.join(', ')}`,
    };
  }

  private coerceToInteger(value: string): CoercionResult {
    const cleaned = value.replace(DIGIT_GROUP_SEPARATORS, '');

    if (!INTEGER_PATTERN.test(cleaned)) {
      return { ok: false, reason: `"${value}" is not an integer` };
    }

    const parsed = Number(cleaned);
    if (!Number.isSafeInteger(parsed)) {
      return { ok: false, reason: `"${value}" is outside the safe integer range` };
    }

    return { ok: true, value: { type: 'integer', value: parsed } };
  }
}

let typeCoercionService: TypeCoercionService | null = null;

export function getTypeCoercionService(): TypeCoercionService {
  if (!typeCoercionService) {
    typeCoercionService = new TypeCoercionService();
  }
  return typeCoercionService;
}
