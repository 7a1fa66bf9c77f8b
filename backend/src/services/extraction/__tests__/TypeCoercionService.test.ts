import { describe, it, expect, beforeEach } from 'vitest';
import { TypeCoercionService } from '../TypeCoercionService';
import { FALLBACK_DATE_FORMATS } from '../localeProfiles';

describe('TypeCoercionService', () => {
  let service: TypeCoercionService;

  beforeEach(() => {
    service = new TypeCoercionService();
  });

  describe('text', () => {
    it('should trim and collapse inner whitespace', () => {
      expect(service.coerce('  Orange \n  Polska  ', { valueType: 'text', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'text', value: 'Orange Polska' },
      });
    });

    it('should refuse an empty capture', () => {
      expect(service.coerce('   ', { valueType: 'text', formatHints: [] }, null)).toEqual({
        ok: false,
        reason: 'captured value is empty',
      });
    });
  });

  describe('amount', () => {
    it('should use the hinted format', () => {
      expect(service.coerce('1 230,00', { valueType: 'amount', formatHints: ['pl'] }, 'en')).toEqual({
        ok: true,
        value: { type: 'amount', value: '1230.00' },
      });
    });

    it('should try hinted formats in order', () => {
      expect(service.coerce('1.234,56', { valueType: 'amount', formatHints: ['us', 'de'] }, null)).toEqual({
        ok: true,
        value: { type: 'amount', value: '1234.56' },
      });
    });

    it('should fall back to the locale convention', () => {
      expect(service.coerce('1.234,56', { valueType: 'amount', formatHints: [] }, 'de')).toEqual({
        ok: true,
        value: { type: 'amount', value: '1234.56' },
      });
    });

    it('should detect the convention without hint or locale', () => {
      expect(service.coerce('1,234.56', { valueType: 'amount', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'amount', value: '1234.56' },
      });
      expect(service.coerce('12,5', { valueType: 'amount', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'amount', value: '12.50' },
      });
    });

    it('should name the formats it tried when parsing fails', () => {
      expect(service.coerce('12.345,6', { valueType: 'amount', formatHints: ['pl'] }, null)).toEqual({
        ok: false,
        reason: '"12.345,6" is not an amount in format pl',
      });
    });

    it('should refuse separators that do not form three-digit groups', () => {
      expect(service.coerce('1,5', { valueType: 'amount', formatHints: ['us'] }, null)).toEqual({
        ok: false,
        reason: '"1,5" is not an amount in format us',
      });
      expect(service.coerce('12.5', { valueType: 'amount', formatHints: ['de'] }, null)).toEqual({
        ok: false,
        reason: '"12.5" is not an amount in format de',
      });
      expect(service.coerce('1.2.3,45', { valueType: 'amount', formatHints: ['de'] }, null)).toEqual({
        ok: false,
        reason: '"1.2.3,45" is not an amount in format de',
      });
    });

    it('should detect space-grouped amounts without hint or locale', () => {
      expect(service.coerce('1 234,56 zł', { valueType: 'amount', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'amount', value: '1234.56' },
      });
    });

    it('should reject three fraction digits for the locale convention', () => {
      expect(service.coerce('1 234,567', { valueType: 'amount', formatHints: [] }, 'pl')).toEqual({
        ok: false,
        reason: '"1 234,567" is not an amount in format pl',
      });
    });
  });

  describe('date', () => {
    it('should normalize a hinted date to ISO', () => {
      expect(service.coerce('15.03.2024', { valueType: 'date', formatHints: ['dd.MM.yyyy'] }, null)).toEqual({
        ok: true,
        value: { type: 'date', value: '2024-03-15' },
      });
    });

    it('should reject impossible calendar dates', () => {
      expect(service.coerce('31.02.2024', { valueType: 'date', formatHints: ['dd.MM.yyyy'] }, null)).toEqual({
        ok: false,
        reason: '"31.02.2024" is not a valid date in format dd.MM.yyyy',
      });
    });

    it('should use the locale date formats without a hint', () => {
      expect(service.coerce('March 5, 2024', { valueType: 'date', formatHints: [] }, 'en')).toEqual({
        ok: true,
        value: { type: 'date', value: '2024-03-05' },
      });
      expect(service.coerce('02/04/2024', { valueType: 'date', formatHints: [] }, 'pl')).toEqual({
        ok: true,
        value: { type: 'date', value: '2024-04-02' },
      });
    });

    it('should read a two-digit year with the short format instead of the year 24', () => {
      expect(service.coerce('01.04.24', { valueType: 'date', formatHints: [] }, 'de')).toEqual({
        ok: true,
        value: { type: 'date', value: '2024-04-01' },
      });
    });

    it('should not take a two-digit year for a four-digit year format', () => {
      expect(service.coerce('01.04.24', { valueType: 'date', formatHints: ['dd.MM.yyyy'] }, null)).toEqual({
        ok: false,
        reason: '"01.04.24" is not a valid date in format dd.MM.yyyy',
      });
    });

    it('should fall back to ISO and dotted dates for unknown locales', () => {
      expect(service.resolveDateFormats([], 'xx')).toBe(FALLBACK_DATE_FORMATS);
      expect(service.coerce('2024-04-02', { valueType: 'date', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'date', value: '2024-04-02' },
      });
    });
  });

  describe('integer', () => {
    it('should drop digit grouping', () => {
      expect(service.coerce('4 455 667', { valueType: 'integer', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'integer', value: 4455667 },
      });
      expect(service.coerce("1'000", { valueType: 'integer', formatHints: [] }, null)).toEqual({
        ok: true,
        value: { type: 'integer', value: 1000 },
      });
    });

    it('should reject fractions and unsafe magnitudes', () => {
      expect(service.coerce('12.5', { valueType: 'integer', formatHints: [] }, null)).toEqual({
        ok: false,
        reason: '"12.5" is not an integer',
      });
      expect(service.coerce('99999999999999999999', { valueType: 'integer', formatHints: [] }, null)).toEqual({
        ok: false,
        reason: '"99999999999999999999" is outside the safe integer range',
      });
    });
  });
});
