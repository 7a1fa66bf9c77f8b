import type { Template } from '../../models/Template';
import { isIssuerSpecific } from '../../models/Template';

function byPriorityThenId(a: Template, b: Template): number {
  if (a.priority !== b.priority) {
    return b.priority - a.priority;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

function pushGrouped(groups: Map<string, Template[]>, key: string, template: Template): void {
  const group = groups.get(key);
  if (group) {
    group.push(template);
  } else {
    groups.set(key, [template]);
  }
}

/**
 * Immutable set of loaded templates, indexed by id and locale. Every listing
 * is ordered by priority (highest first), then id.
 */
export class TemplateStore {
  private readonly ordered: readonly Template[];
  private readonly byId: ReadonlyMap<string, Template>;
  private readonly byLocale: ReadonlyMap<string, readonly Template[]>;
  private readonly unrestricted: readonly Template[];

  constructor(
    templates: readonly Template[],
    public readonly version: number = 1
  ) {
    const ordered = [...templates].sort(byPriorityThenId);
    const locales = new Map<string, Template[]>();
    const unrestricted: Template[] = [];

    for (const template of ordered) {
      if (template.locale === null) {
        unrestricted.push(template);
      } else {
        pushGrouped(locales, template.locale, template);
      }
    }

    this.ordered = Object.freeze(ordered);
    this.byId = new Map(ordered.map((template) => [template.id, template]));
    this.byLocale = new Map([...locales].map(([locale, group]) => [locale, Object.freeze(group)]));
    this.unrestricted = Object.freeze(unrestricted);
    Object.freeze(this);
  }

  get size(): number {
    return this.ordered.length;
  }

  getTemplate(id: string): Template | null {
    return this.byId.get(id) ?? null;
  }

  getAll(): readonly Template[] {
    return this.ordered;
  }

  getLocales(): string[] {
    return [...this.byLocale.keys()].sort();
  }

  getByLocale(locale: string): readonly Template[] {
    return this.byLocale.get(locale.toLowerCase()) ?? [];
  }

  /**
   * Templates eligible for a document: those of the hinted locale plus the
   * unrestricted ones, or everything when no hint is given.
   */
  getCandidates(localeHint?: string | null): readonly Template[] {
    if (!localeHint) {
      return this.ordered;
    }
    return [...this.getByLocale(localeHint), ...this.unrestricted].sort(byPriorityThenId);
  }

  getGenericTemplates(locale?: string | null): readonly Template[] {
    return this.getCandidates(locale).filter((template) => !isIssuerSpecific(template));
  }
}
