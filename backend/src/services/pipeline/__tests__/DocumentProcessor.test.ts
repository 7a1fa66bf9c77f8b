import { describe, it, expect, beforeAll } from 'vitest';
import { createEngineServices } from '../../EngineServices';
import type { EngineServices } from '../../EngineServices';
import { loadConfig } from '../../../utils/config';
import { EmptyDocumentError, StoreEmptyError, TemplateNotFoundError } from '../../../utils/errors';
import { ORANGE_INVOICE_TEXT, UNKNOWN_ISSUER_INVOICE_TEXT } from '../../templates/__tests__/templateFactory';

const NOW = new Date(2024, 5, 1);
const ORANGE_KEY = '4c0b6cda04fb3c3389128c40a6d9218414f145e255bc304d84a60b884bcced6e';
const PAPER_KEY = '7f0ccd522e4106d49ad61063325cc16c898e8ef5fe2c700e1befde5b09008e93';

describe('DocumentProcessor', () => {
  let services: EngineServices;

  beforeAll(async () => {
    services = createEngineServices(loadConfig({}));
    await services.registry.reload();
  });

  it('should match, extract and fingerprint an issuer invoice', () => {
    const processed = services.processor.process({ text: ORANGE_INVOICE_TEXT, locale: 'pl' }, { now: NOW });

    expect(processed.store_version).toBe(1);
    expect(processed.match).toMatchObject({ status: 'matched', template_id: 'pl/orange_polska', score: 1024 });
    expect(processed.result?.completeness).toBe(true);
    expect(processed.fingerprint).toMatchObject({ status: 'complete', key: ORANGE_KEY });
  });

  it('should process an unknown issuer with the generic template', () => {
    const processed = services.processor.process({ text: UNKNOWN_ISSUER_INVOICE_TEXT, locale: 'pl' }, { now: NOW });

    expect(processed.match).toMatchObject({ template_id: 'generic/invoice_pl', score: 0.5 });
    expect(processed.result?.tables.line_items).toHaveLength(1);
    expect(processed.fingerprint).toMatchObject({ status: 'complete', key: PAPER_KEY });
  });

  it('should use an explicitly requested template without matching', () => {
    const processed = services.processor.process(
      { text: ORANGE_INVOICE_TEXT, templateId: 'generic/invoice_pl' },
      { now: NOW }
    );

    expect(processed.match).toEqual({
      status: 'matched',
      template_id: 'generic/invoice_pl',
      score: 0,
      matched_keywords: [],
      matched_fiscal_id: false,
    });
    expect(processed.result?.template_id).toBe('generic/invoice_pl');
  });

  it('should give the same fingerprint whichever template extracted the invoice', () => {
    const viaIssuer = services.processor.process({ text: ORANGE_INVOICE_TEXT, locale: 'pl' }, { now: NOW });
    const viaGeneric = services.processor.process(
      { text: ORANGE_INVOICE_TEXT, templateId: 'generic/invoice_pl' },
      { now: NOW }
    );

    expect(viaGeneric.fingerprint).toEqual(viaIssuer.fingerprint);
  });

  it('should return no result when no template matches', () => {
    const processed = services.processor.process({ text: 'Factura nr 1', locale: 'ro' }, { now: NOW });

    expect(processed).toEqual({
      store_version: 1,
      match: { status: 'no_match', candidates_considered: 1 },
      result: null,
      fingerprint: null,
    });
  });

  it('should reject an unknown template id', () => {
    expect(() => services.processor.process({ text: ORANGE_INVOICE_TEXT, templateId: 'pl/unknown' })).toThrow(
      TemplateNotFoundError
    );
  });

  it('should reject blank documents', () => {
    expect(() => services.processor.process({ text: '   ' })).toThrow(EmptyDocumentError);
  });

  it('should refuse to process before templates are loaded', () => {
    const unloaded = createEngineServices(loadConfig({}));

    expect(() => unloaded.processor.process({ text: ORANGE_INVOICE_TEXT })).toThrow(StoreEmptyError);
  });
});
