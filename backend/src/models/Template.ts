import type { FieldValidator, ValueType } from '@template-extract/shared/schemas/templateDocument.zod';

export interface FieldRule {
  readonly name: string;
  readonly patterns: readonly RegExp[];
  readonly group: number;
  readonly required: boolean;
  readonly valueType: ValueType;
  readonly formatHints: readonly string[];
  readonly validator: FieldValidator | null;
  readonly total: boolean;
}

export interface TableColumn {
  readonly name: string;
  readonly pattern: RegExp;
}

export interface TableRule {
  readonly name: string;
  readonly start: RegExp;
  readonly end: RegExp;
  readonly columns: readonly TableColumn[];
  readonly skip: readonly RegExp[];
}

/**
 * Evidence used to recognise a specific issuer. Keywords are stored
 * upper-cased, the fiscal id as upper-case alphanumerics. `fiscalIdPattern`
 * finds the id as a standalone token of upper-cased text.
 */
export interface IssuerSignature {
  readonly keywords: readonly string[];
  readonly fiscalId: string | null;
  readonly fiscalIdPattern: RegExp | null;
  readonly excludeKeywords: readonly string[];
}

export interface Template {
  readonly id: string;
  readonly name: string;
  readonly locale: string | null;
  readonly priority: number;
  readonly issuer: IssuerSignature;
  readonly fields: readonly FieldRule[];
  readonly tables: readonly TableRule[];
  readonly sourcePath: string;
}

export interface TemplateSummary {
  id: string;
  name: string;
  locale: string | null;
  priority: number;
  generic: boolean;
  fields: string[];
  tables: string[];
  source_path: string;
}

export function isIssuerSpecific(template: Template): boolean {
  return template.issuer.keywords.length > 0 || template.issuer.fiscalId !== null;
}

export function summarizeTemplate(template: Template): TemplateSummary {
  return {
    id: template.id,
    name: template.name,
    locale: template.locale,
    priority: template.priority,
    generic: !isIssuerSpecific(template),
    fields: template.fields.map((field) => field.name),
    tables: template.tables.map((table) => table.name),
    source_path: template.sourcePath,
  };
}
