import type { AmountFormatId } from '@template-extract/shared/schemas/templateDocument.zod';

export interface LocaleProfile {
  amountFormat: AmountFormatId;
  dateFormats: readonly string[];
}

export const FALLBACK_DATE_FORMATS: readonly string[] = ['yyyy-MM-dd', 'dd.MM.yyyy'];

/**
 * Number and date conventions used when a field rule gives no format hint.
 */
export const LOCALE_PROFILES: Readonly<Record<string, LocaleProfile>> = {
  pl: { amountFormat: 'pl', dateFormats: ['dd.MM.yyyy', 'yyyy-MM-dd', 'dd-MM-yyyy', 'dd/MM/yyyy'] },
  de: { amountFormat: 'de', dateFormats: ['dd.MM.yyyy', 'yyyy-MM-dd', 'dd.MM.yy'] },
  ro: { amountFormat: 'de', dateFormats: ['dd.MM.yyyy', 'yyyy-MM-dd', 'dd/MM/yyyy'] },
  en: { amountFormat: 'us', dateFormats: ['dd/MM/yyyy', 'yyyy-MM-dd', 'MMMM d, yyyy', 'd MMMM yyyy'] },
};

export function getLocaleProfile(locale: string | null): LocaleProfile | null {
  if (!locale) {
    return null;
  }
  return LOCALE_PROFILES[locale.toLowerCase()] ?? null;
}
