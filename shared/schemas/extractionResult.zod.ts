import { z } from 'zod';

// ============================================================
// Field values
// ============================================================

export const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const FIXED_POINT_AMOUNT_PATTERN = /^-?\d+\.\d{2}$/;

export const FieldValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text'), value: z.string() }),
  z.object({ type: z.literal('integer'), value: z.number().int() }),
  z.object({ type: z.literal('date'), value: z.string().regex(ISO_DATE_PATTERN) }),
  z.object({ type: z.literal('amount'), value: z.string().regex(FIXED_POINT_AMOUNT_PATTERN) }),
]);

export const FieldIssueKindEnum = z.enum(['missing', 'invalid']);

export const FieldIssueSchema = z.object({
  field: z.string(),
  kind: FieldIssueKindEnum,
  reason: z.string(),
  required: z.boolean(),
});

export const TableRowSchema = z.record(z.string());

// ============================================================
// Extraction result
// ============================================================

export const ExtractionResultSchema = z.object({
  template_id: z.string(),
  fields: z.record(FieldValueSchema.nullable()),
  tables: z.record(z.array(TableRowSchema)),
  completeness: z.boolean(),
  issues: z.array(FieldIssueSchema),
});

// ============================================================
// Matching
// ============================================================

export const MatchCandidateSchema = z.object({
  status: z.literal('matched'),
  template_id: z.string(),
  score: z.number(),
  matched_keywords: z.array(z.string()),
  matched_fiscal_id: z.boolean(),
});

export const NoMatchSchema = z.object({
  status: z.literal('no_match'),
  candidates_considered: z.number().int().nonnegative(),
});

export const MatchOutcomeSchema = z.discriminatedUnion('status', [MatchCandidateSchema, NoMatchSchema]);

// ============================================================
// Duplicate fingerprint
// ============================================================

export const FingerprintComponentEnum = z.enum(['fiscal_id', 'document_number', 'document_date', 'gross_amount']);

export const DuplicateKeySchema = z.object({
  status: z.literal('complete'),
  key: z.string().regex(/^[0-9a-f]{64}$/),
  canonical: z.string(),
  components: z.object({
    fiscal_id: z.string(),
    document_number: z.string(),
    document_date: z.string().regex(ISO_DATE_PATTERN),
    gross_amount: z.string().regex(FIXED_POINT_AMOUNT_PATTERN),
  }),
});

export const IncompleteFingerprintSchema = z.object({
  status: z.literal('incomplete'),
  missing: z.array(FingerprintComponentEnum),
});

export const FingerprintOutcomeSchema = z.discriminatedUnion('status', [
  DuplicateKeySchema,
  IncompleteFingerprintSchema,
]);

// ============================================================
// API requests
// ============================================================

export const ExtractRequestSchema = z.object({
  text: z.string(),
  locale: z.string().min(2).optional(),
  template_id: z.string().min(1).optional(),
  document_ref: z.string().min(1).optional(),
});

export const MatchRequestSchema = z.object({
  text: z.string(),
  locale: z.string().min(2).optional(),
});

// ============================================================
// Type exports
// ============================================================

export type FieldValue = z.infer<typeof FieldValueSchema>;
export type FieldIssueKind = z.infer<typeof FieldIssueKindEnum>;
export type FieldIssue = z.infer<typeof FieldIssueSchema>;
export type TableRow = z.infer<typeof TableRowSchema>;
export type ExtractionResult = z.infer<typeof ExtractionResultSchema>;
export type MatchCandidate = z.infer<typeof MatchCandidateSchema>;
export type NoMatch = z.infer<typeof NoMatchSchema>;
export type MatchOutcome = z.infer<typeof MatchOutcomeSchema>;
export type FingerprintComponent = z.infer<typeof FingerprintComponentEnum>;
export type DuplicateKey = z.infer<typeof DuplicateKeySchema>;
export type IncompleteFingerprint = z.infer<typeof IncompleteFingerprintSchema>;
export type FingerprintOutcome = z.infer<typeof FingerprintOutcomeSchema>;
export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;
export type MatchRequest = z.infer<typeof MatchRequestSchema>;
