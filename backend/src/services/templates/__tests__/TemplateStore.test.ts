import { describe, it, expect } from 'vitest';
import { TemplateStore } from '../TemplateStore';
import { buildTemplate } from './templateFactory';

const FIELDS = { invoice_number: { patterns: ['Invoice\\s+(\\S+)'] } };

const genericPl = buildTemplate({ template: { id: 'generic/pl', name: 'Generic PL', locale: 'pl', priority: 10 }, fields: FIELDS });
const issuerPl = buildTemplate({
  template: { id: 'pl/issuer', name: 'Issuer PL', locale: 'pl', priority: 80 },
  issuer: { keywords: ['Issuer'], fiscal_id: '123-456-32-18' },
  fields: FIELDS,
});
const genericDe = buildTemplate({ template: { id: 'generic/de', name: 'Generic DE', locale: 'de', priority: 10 }, fields: FIELDS });
const anywhere = buildTemplate({
  template: { id: 'any/issuer', name: 'Unrestricted issuer', priority: 80 },
  issuer: { keywords: ['Anywhere'] },
  fields: FIELDS,
});

describe('TemplateStore', () => {
  const store = new TemplateStore([genericPl, genericDe, issuerPl, anywhere], 3);

  it('should order templates by priority, then id', () => {
    expect(store.getAll().map((t) => t.id)).toEqual(['any/issuer', 'pl/issuer', 'generic/de', 'generic/pl']);
  });

  it('should expose size and version', () => {
    expect(store.size).toBe(4);
    expect(store.version).toBe(3);
  });

  it('should look up templates by id', () => {
    expect(store.getTemplate('pl/issuer')).toBe(issuerPl);
    expect(store.getTemplate('missing')).toBeNull();
  });

  it('should index templates by locale case-insensitively', () => {
    expect(store.getLocales()).toEqual(['de', 'pl']);
    expect(store.getByLocale('PL').map((t) => t.id)).toEqual(['pl/issuer', 'generic/pl']);
    expect(store.getByLocale('fr')).toEqual([]);
  });

  it('should offer locale and unrestricted templates as candidates for a hinted locale', () => {
    expect(store.getCandidates('pl').map((t) => t.id)).toEqual(['any/issuer', 'pl/issuer', 'generic/pl']);
  });

  it('should offer every template when no locale is hinted', () => {
    expect(store.getCandidates(null)).toHaveLength(4);
    expect(store.getCandidates(undefined)).toHaveLength(4);
  });

  it('should list only templates without issuer evidence as generic', () => {
    expect(store.getGenericTemplates('de').map((t) => t.id)).toEqual(['generic/de']);
    expect(store.getGenericTemplates().map((t) => t.id)).toEqual(['generic/de', 'generic/pl']);
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(store)).toBe(true);
    expect(Object.isFrozen(store.getAll())).toBe(true);
  });
});
