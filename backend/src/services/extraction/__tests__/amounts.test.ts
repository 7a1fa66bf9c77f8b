import { describe, it, expect } from 'vitest';
import { AMOUNT_FORMATS, detectAmountFormat, formatAmount, fromFixedPoint, parseAmount, toFixedPoint } from '../amounts';

describe('amounts', () => {
  describe('parseAmount', () => {
    it('should parse each preset into minor units', () => {
      expect(parseAmount('1 234,56', AMOUNT_FORMATS.pl)).toBe(123456n);
      expect(parseAmount('1.234,56', AMOUNT_FORMATS.de)).toBe(123456n);
      expect(parseAmount('1 234,56', AMOUNT_FORMATS['de-space'])).toBe(123456n);
      expect(parseAmount('1,234.56', AMOUNT_FORMATS.us)).toBe(123456n);
      expect(parseAmount('1 234.56', AMOUNT_FORMATS['us-space'])).toBe(123456n);
      expect(parseAmount('1234.56', AMOUNT_FORMATS.simple)).toBe(123456n);
      expect(parseAmount('1234,56', AMOUNT_FORMATS['simple-comma'])).toBe(123456n);
    });

    it('should pad a single fraction digit and accept whole amounts', () => {
      expect(parseAmount('12,5', AMOUNT_FORMATS.pl)).toBe(1250n);
      expect(parseAmount('100', AMOUNT_FORMATS.us)).toBe(10000n);
    });

    it('should strip currency markers', () => {
      expect(parseAmount('1 230,00 zł', AMOUNT_FORMATS.pl)).toBe(123000n);
      expect(parseAmount('€1.234,56', AMOUNT_FORMATS.de)).toBe(123456n);
      expect(parseAmount('$1,234.56', AMOUNT_FORMATS.us)).toBe(123456n);
      expect(parseAmount('99.90 EUR', AMOUNT_FORMATS.simple)).toBe(9990n);
    });

    it('should read negative amounts in every notation', () => {
      expect(parseAmount('-1234.56', AMOUNT_FORMATS.simple)).toBe(-123456n);
      expect(parseAmount('($1,234.56)', AMOUNT_FORMATS.us)).toBe(-123456n);
      expect(parseAmount('12,50-', AMOUNT_FORMATS.pl)).toBe(-1250n);
    });

    it('should reject more than two fraction digits', () => {
      expect(parseAmount('12,345', AMOUNT_FORMATS.pl)).toBeNull();
      expect(parseAmount('1.5000', AMOUNT_FORMATS.simple)).toBeNull();
    });

    it('should reject the separator of the other convention', () => {
      expect(parseAmount('1.234,56', AMOUNT_FORMATS.pl)).toBeNull();
      expect(parseAmount('1,234.56', AMOUNT_FORMATS.simple)).toBeNull();
    });

    it('should reject thousands separators outside three-digit groups', () => {
      expect(parseAmount('1,5', AMOUNT_FORMATS.us)).toBeNull();
      expect(parseAmount('12.5', AMOUNT_FORMATS.de)).toBeNull();
      expect(parseAmount('1.2.3,45', AMOUNT_FORMATS.de)).toBeNull();
      expect(parseAmount('12 34,56', AMOUNT_FORMATS.pl)).toBeNull();
      expect(parseAmount('1,2345.00', AMOUNT_FORMATS.us)).toBeNull();
    });

    it('should reject whitespace inside formats that do not group with spaces', () => {
      expect(parseAmount('1 234.56', AMOUNT_FORMATS.us)).toBeNull();
      expect(parseAmount('1 234', AMOUNT_FORMATS.simple)).toBeNull();
    });

    it('should accept wide gaps between space-separated groups', () => {
      expect(parseAmount('1  234,56', AMOUNT_FORMATS.pl)).toBe(123456n);
      expect(parseAmount('- 12,50', AMOUNT_FORMATS.pl)).toBe(-1250n);
    });

    it('should reject values that are not amounts', () => {
      expect(parseAmount('abc', AMOUNT_FORMATS.simple)).toBeNull();
      expect(parseAmount('', AMOUNT_FORMATS.simple)).toBeNull();
      expect(parseAmount('1.2.3', AMOUNT_FORMATS.simple)).toBeNull();
    });
  });

  describe('detectAmountFormat', () => {
    it('should treat the last of two separators as decimal', () => {
      expect(detectAmountFormat('1.234,56').id).toBe('de');
      expect(detectAmountFormat('1,234.56').id).toBe('us');
    });

    it('should treat a lone separator before one or two digits as decimal', () => {
      expect(detectAmountFormat('12,50').id).toBe('simple-comma');
      expect(detectAmountFormat('12.5').id).toBe('simple');
    });

    it('should treat a lone separator before three digits as grouping', () => {
      expect(detectAmountFormat('1,234').id).toBe('us');
      expect(detectAmountFormat('1.234').id).toBe('de');
    });

    it('should pick a space-grouped format when digits are split by spaces', () => {
      expect(detectAmountFormat('1 234,56').id).toBe('de-space');
      expect(detectAmountFormat('1 234.56').id).toBe('us-space');
      expect(detectAmountFormat('1 234').id).toBe('us-space');
    });

    it('should default to plain amounts', () => {
      expect(detectAmountFormat('1234').id).toBe('simple');
    });
  });

  describe('fixed point', () => {
    it('should render minor units with two fraction digits', () => {
      expect(toFixedPoint(123456n)).toBe('1234.56');
      expect(toFixedPoint(-5n)).toBe('-0.05');
      expect(toFixedPoint(0n)).toBe('0.00');
    });

    it('should read fixed-point strings back', () => {
      expect(fromFixedPoint('1234.56')).toBe(123456n);
      expect(fromFixedPoint('-0.05')).toBe(-5n);
      expect(fromFixedPoint('12.5')).toBeNull();
    });

    it('should keep precision beyond the float range', () => {
      expect(toFixedPoint(parseAmount('90 071 992 547 409 931,99', AMOUNT_FORMATS.pl) ?? 0n)).toBe('90071992547409931.99');
    });
  });

  describe('formatAmount', () => {
    it('should group thousands with the preset separators', () => {
      expect(formatAmount(123456789n, AMOUNT_FORMATS.pl)).toBe('1 234 567,89');
      expect(formatAmount(123456789n, AMOUNT_FORMATS.us)).toBe('1,234,567.89');
      expect(formatAmount(100000n, AMOUNT_FORMATS.de)).toBe('1.000,00');
      expect(formatAmount(123456789n, AMOUNT_FORMATS.simple)).toBe('1234567.89');
    });

    it('should parse its own output back to the same value', () => {
      for (const format of Object.values(AMOUNT_FORMATS)) {
        for (const minor of [0n, 5n, 99999n, 123456789n, -100000n]) {
          expect(parseAmount(formatAmount(minor, format), format)).toBe(minor);
        }
      }
    });

    it('should keep the sign in front', () => {
      expect(formatAmount(-5n, AMOUNT_FORMATS.de)).toBe('-0,05');
      expect(formatAmount(-123456n, AMOUNT_FORMATS.us)).toBe('-1,234.56');
    });
  });
});
