import { z } from 'zod';

// ============================================================
// Limits
// ============================================================

export const MIN_PRIORITY = 0;
export const MAX_PRIORITY = 100;
export const DEFAULT_PRIORITY = 50;
export const MAX_ISSUER_KEYWORDS = 50;
export const MAX_PATTERN_LENGTH = 500;
export const DEFAULT_CAPTURE_GROUP = 1;

// ============================================================
// Enums
// ============================================================

export const ValueTypeEnum = z.enum(['text', 'date', 'amount', 'integer']);

export const FieldValidatorEnum = z.enum(['nip', 'cui', 'iban']);

/**
 * Amount format presets. The id names the decimal / thousands separator pair:
 * pl = 1 234,56, de = 1.234,56, de-space = 1 234,56, us = 1,234.56,
 * us-space = 1 234.56, simple = 1234.56, simple-comma = 1234,56.
 */
export const AmountFormatIdEnum = z.enum([
  'pl',
  'de',
  'de-space',
  'us',
  'us-space',
  'simple',
  'simple-comma',
]);

// ============================================================
// Template document sections
// ============================================================

const PatternSchema = z.string().min(1, 'pattern must not be empty').max(MAX_PATTERN_LENGTH);

const FormatHintSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const FieldRuleDocumentSchema = z
  .object({
    patterns: z.array(PatternSchema).min(1, 'patterns must contain at least one pattern'),
    required: z.boolean().default(false),
    type: ValueTypeEnum.default('text'),
    format_hint: FormatHintSchema.optional(),
    validator: FieldValidatorEnum.optional(),
    total: z.boolean().default(false),
    group: z.number().int().min(0).default(DEFAULT_CAPTURE_GROUP),
  })
  .passthrough()
  .superRefine((rule, ctx) => {
    if (rule.validator && rule.type !== 'text') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['validator'],
        message: `validator "${rule.validator}" applies to text fields only`,
      });
    }
    if (rule.total && rule.type !== 'amount') {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['total'],
        message: 'total applies to amount fields only',
      });
    }
    if (rule.type === 'amount' && rule.format_hint !== undefined) {
      const hints = Array.isArray(rule.format_hint) ? rule.format_hint : [rule.format_hint];
      for (const hint of hints) {
        if (!AmountFormatIdEnum.safeParse(hint).success) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['format_hint'],
            message: `unknown amount format "${hint}"`,
          });
        }
      }
    }
  });

export const TableColumnDocumentSchema = z
  .object({
    name: z.string().min(1),
    pattern: PatternSchema,
  })
  .passthrough();

export const TableRuleDocumentSchema = z
  .object({
    start_pattern: PatternSchema,
    end_pattern: PatternSchema,
    columns: z.array(TableColumnDocumentSchema).min(1, 'columns must contain at least one column'),
    skip: z.array(PatternSchema).default([]),
  })
  .passthrough();

export const TemplateSectionSchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1),
    locale: z.string().min(2).optional(),
    priority: z.number().int().min(MIN_PRIORITY).max(MAX_PRIORITY).default(DEFAULT_PRIORITY),
    description: z.string().optional(),
  })
  .passthrough();

export const IssuerSectionSchema = z
  .object({
    keywords: z.array(z.string().min(1)).max(MAX_ISSUER_KEYWORDS).default([]),
    fiscal_id: z.string().min(1).optional(),
    exclude_keywords: z.array(z.string().min(1)).default([]),
  })
  .passthrough();

// ============================================================
// Template document
// ============================================================

export const TemplateDocumentSchema = z
  .object({
    template: TemplateSectionSchema,
    issuer: IssuerSectionSchema.optional(),
    fields: z
      .record(FieldRuleDocumentSchema)
      .refine((fields) => Object.keys(fields).length > 0, {
        message: 'fields must declare at least one field',
      }),
    tables: z.record(TableRuleDocumentSchema).optional(),
  })
  .passthrough();

// ============================================================
// Type exports
// ============================================================

export type ValueType = z.infer<typeof ValueTypeEnum>;
export type FieldValidator = z.infer<typeof FieldValidatorEnum>;
export type AmountFormatId = z.infer<typeof AmountFormatIdEnum>;
export type FieldRuleDocument = z.infer<typeof FieldRuleDocumentSchema>;
export type TableRuleDocument = z.infer<typeof TableRuleDocumentSchema>;
export type TemplateDocument = z.infer<typeof TemplateDocumentSchema>;
