import { describe, it, expect } from 'vitest';
import type { ExtractionResult, FieldValue } from '@template-extract/shared/schemas/extractionResult.zod';
import { Fingerprinter, normalizeDocumentNumber, normalizeFiscalIdComponent } from '../Fingerprinter';

const ORANGE_KEY = '4c0b6cda04fb3c3389128c40a6d9218414f145e255bc304d84a60b884bcced6e';

function result(fields: Record<string, FieldValue | null>, templateId = 'pl/orange_polska'): ExtractionResult {
  return { template_id: templateId, fields, tables: {}, completeness: true, issues: [] };
}

const orangeFields: Record<string, FieldValue | null> = {
  invoice_number: { type: 'text', value: 'F/0012345/24' },
  issue_date: { type: 'date', value: '2024-03-15' },
  seller_tax_id: { type: 'text', value: '1234563218' },
  total_gross: { type: 'amount', value: '1230.00' },
};

describe('Fingerprinter', () => {
  const fingerprinter = new Fingerprinter();

  describe('normalization', () => {
    it('should strip separators and a country prefix from fiscal ids', () => {
      expect(normalizeFiscalIdComponent('PL 123-456-32-18')).toBe('1234563218');
      expect(normalizeFiscalIdComponent('ro12345674')).toBe('12345674');
      expect(normalizeFiscalIdComponent('DE 123/456')).toBe('123456');
    });

    it('should upper-case document numbers and collapse whitespace', () => {
      expect(normalizeDocumentNumber('  fv/7   2024 ')).toBe('FV/7 2024');
    });
  });

  describe('fingerprint', () => {
    it('should hash the canonical components', () => {
      expect(fingerprinter.fingerprint(result(orangeFields))).toEqual({
        status: 'complete',
        key: ORANGE_KEY,
        canonical: '1234563218|F/0012345/24|2024-03-15|1230.00',
        components: {
          fiscal_id: '1234563218',
          document_number: 'F/0012345/24',
          document_date: '2024-03-15',
          gross_amount: '1230.00',
        },
      });
    });

    it('should give the same key whichever template and notation produced the values', () => {
      const restyled = result(
        {
          ...orangeFields,
          invoice_number: { type: 'text', value: 'f/0012345/24' },
          seller_tax_id: { type: 'text', value: 'PL123-456-32-18' },
          customer_number: { type: 'integer', value: 4455667 },
        },
        'generic/invoice_pl'
      );

      const outcome = fingerprinter.fingerprint(restyled);

      expect(outcome.status === 'complete' && outcome.key).toBe(ORANGE_KEY);
    });

    it('should change the key when any component changes', () => {
      const outcome = fingerprinter.fingerprint(
        result({ ...orangeFields, total_gross: { type: 'amount', value: '1230.01' } })
      );

      expect(outcome.status === 'complete' && outcome.key).not.toBe(ORANGE_KEY);
    });

    it('should list every missing component', () => {
      expect(
        fingerprinter.fingerprint(result({ ...orangeFields, issue_date: null, total_gross: null }))
      ).toEqual({ status: 'incomplete', missing: ['document_date', 'gross_amount'] });
      expect(fingerprinter.fingerprint(result({}))).toEqual({
        status: 'incomplete',
        missing: ['fiscal_id', 'document_number', 'document_date', 'gross_amount'],
      });
    });

    it('should treat a value of the wrong type as missing', () => {
      const outcome = fingerprinter.fingerprint(
        result({ ...orangeFields, issue_date: { type: 'text', value: '15.03.2024' } })
      );

      expect(outcome).toEqual({ status: 'incomplete', missing: ['document_date'] });
    });

    it('should accept an integer document number', () => {
      const outcome = fingerprinter.fingerprint(
        result({ ...orangeFields, invoice_number: { type: 'integer', value: 445566 } })
      );

      expect(outcome.status === 'complete' && outcome.components.document_number).toBe('445566');
    });

    it('should read the configured field names', () => {
      const custom = new Fingerprinter({
        fiscalId: 'vendor_id',
        documentNumber: 'number',
        documentDate: 'date',
        grossAmount: 'amount',
      });

      const outcome = custom.fingerprint(
        result({
          vendor_id: { type: 'text', value: '1234563218' },
          number: { type: 'text', value: 'F/0012345/24' },
          date: { type: 'date', value: '2024-03-15' },
          amount: { type: 'amount', value: '1230.00' },
        })
      );

      expect(outcome.status === 'complete' && outcome.key).toBe(ORANGE_KEY);
    });
  });
});
