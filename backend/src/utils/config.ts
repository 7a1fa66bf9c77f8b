/**
 * Centralized configuration
 *
 * Every value can be tuned through environment variables; `.env` is loaded by
 * the entry point before `getConfig()` runs.
 */
import path from 'path';
import { z } from 'zod';
import { MAX_ISSUER_KEYWORDS, MAX_PRIORITY } from '@template-extract/shared/schemas/templateDocument.zod';
import { ConfigError } from './errors';

const BACKEND_DIR = path.resolve(__dirname, '..', '..');
const DEFAULT_TEMPLATES_DIR = path.join(BACKEND_DIR, 'templates');
const DEFAULT_DATABASE_PATH = '../data/fingerprints.sqlite';
const IN_MEMORY_DATABASE = ':memory:';
const DEFAULT_NODE_ENV = 'development';
const FIXED_POINT_PATTERN = /^\d+(\.\d{1,2})?$/;

export interface MatchingConfig {
  keywordWeight: number;
  fiscalIdWeight: number;
  priorityWeight: number;
  minScore: number;
}

export interface ValidationConfig {
  earliestYear: number;
  maxFutureYears: number;
  amountCeiling: string;
}

export interface FingerprintFieldNames {
  fiscalId: string;
  documentNumber: string;
  documentDate: string;
  grossAmount: string;
}

export interface EngineConfig {
  nodeEnv: string;
  port: number;
  databasePath: string;
  templatesDir: string;
  userTemplatesDir: string | null;
  maskPii: boolean;
  matching: MatchingConfig;
  validation: ValidationConfig;
  fingerprint: FingerprintFieldNames;
}

const numberFromEnv = (fallback: number) => z.coerce.number().finite().default(fallback);
const fieldNameFromEnv = (fallback: string) => z.string().min(1).default(fallback);

const EnvSchema = z.object({
  NODE_ENV: z.string().default(DEFAULT_NODE_ENV),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  DATABASE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  TEMPLATES_DIR: z.string().min(1).default(DEFAULT_TEMPLATES_DIR),
  USER_TEMPLATES_DIR: z.string().min(1).optional(),
  MASK_PII: z.enum(['true', 'false']).default('true'),
  MATCH_KEYWORD_WEIGHT: numberFromEnv(10),
  MATCH_FISCAL_ID_WEIGHT: numberFromEnv(1000),
  MATCH_PRIORITY_WEIGHT: numberFromEnv(0.05),
  MATCH_MIN_SCORE: numberFromEnv(0),
  DATE_EARLIEST_YEAR: z.coerce.number().int().min(1000).default(1990),
  DATE_MAX_FUTURE_YEARS: z.coerce.number().int().min(0).default(2),
  AMOUNT_CEILING: z.string().regex(FIXED_POINT_PATTERN, 'must be a positive decimal amount').default('10000000.00'),
  FINGERPRINT_FISCAL_ID_FIELD: fieldNameFromEnv('seller_tax_id'),
  FINGERPRINT_NUMBER_FIELD: fieldNameFromEnv('invoice_number'),
  FINGERPRINT_DATE_FIELD: fieldNameFromEnv('issue_date'),
  FINGERPRINT_AMOUNT_FIELD: fieldNameFromEnv('total_gross'),
});

export const DEFAULT_MATCHING_CONFIG: MatchingConfig = {
  keywordWeight: 10,
  fiscalIdWeight: 1000,
  priorityWeight: 0.05,
  minScore: 0,
};

export const DEFAULT_VALIDATION_CONFIG: ValidationConfig = {
  earliestYear: 1990,
  maxFutureYears: 2,
  amountCeiling: '10000000.00',
};

export const DEFAULT_FINGERPRINT_FIELDS: FingerprintFieldNames = {
  fiscalId: 'seller_tax_id',
  documentNumber: 'invoice_number',
  documentDate: 'issue_date',
  grossAmount: 'total_gross',
};

/**
 * A fiscal-id match must outweigh the largest keyword and priority score a
 * template can reach without one, and a single keyword must outweigh the
 * largest possible priority difference.
 */
export function assertWeightOrdering(matching: MatchingConfig): void {
  const problems: string[] = [];

  if (matching.keywordWeight <= 0 || matching.priorityWeight < 0) {
    problems.push('MATCH_KEYWORD_WEIGHT must be positive and MATCH_PRIORITY_WEIGHT non-negative');
  }
  const bestWithoutFiscalId = matching.keywordWeight * MAX_ISSUER_KEYWORDS + matching.priorityWeight * MAX_PRIORITY;
  if (matching.fiscalIdWeight <= bestWithoutFiscalId) {
    problems.push(
      `MATCH_FISCAL_ID_WEIGHT (${matching.fiscalIdWeight}) must exceed MATCH_KEYWORD_WEIGHT x ${MAX_ISSUER_KEYWORDS} + MATCH_PRIORITY_WEIGHT x ${MAX_PRIORITY}`
    );
  }
  if (matching.keywordWeight <= matching.priorityWeight * MAX_PRIORITY) {
    problems.push(
      `MATCH_KEYWORD_WEIGHT (${matching.keywordWeight}) must exceed MATCH_PRIORITY_WEIGHT x ${MAX_PRIORITY}`
    );
  }

  if (problems.length > 0) {
    throw new ConfigError(`Invalid scoring weights: ${problems.join('; ')}`, [
      'MATCH_FISCAL_ID_WEIGHT',
      'MATCH_KEYWORD_WEIGHT',
      'MATCH_PRIORITY_WEIGHT',
    ]);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const keys = parsed.error.errors.map((issue) => issue.path.join('.'));
    const details = parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${details.join('; ')}`, keys);
  }

  const values = parsed.data;

  const matching: MatchingConfig = {
    keywordWeight: values.MATCH_KEYWORD_WEIGHT,
    fiscalIdWeight: values.MATCH_FISCAL_ID_WEIGHT,
    priorityWeight: values.MATCH_PRIORITY_WEIGHT,
    minScore: values.MATCH_MIN_SCORE,
  };
  assertWeightOrdering(matching);

  return {
    nodeEnv: values.NODE_ENV,
    port: values.PORT,
    // Relative database paths are taken from the backend directory
    databasePath:
      values.DATABASE_PATH === IN_MEMORY_DATABASE ? values.DATABASE_PATH : path.resolve(BACKEND_DIR, values.DATABASE_PATH),
    templatesDir: path.resolve(values.TEMPLATES_DIR),
    userTemplatesDir: values.USER_TEMPLATES_DIR ? path.resolve(values.USER_TEMPLATES_DIR) : null,
    maskPii: values.MASK_PII === 'true',
    matching,
    validation: {
      earliestYear: values.DATE_EARLIEST_YEAR,
      maxFutureYears: values.DATE_MAX_FUTURE_YEARS,
      amountCeiling: values.AMOUNT_CEILING,
    },
    fingerprint: {
      fiscalId: values.FINGERPRINT_FISCAL_ID_FIELD,
      documentNumber: values.FINGERPRINT_NUMBER_FIELD,
      documentDate: values.FINGERPRINT_DATE_FIELD,
      grossAmount: values.FINGERPRINT_AMOUNT_FIELD,
    },
  };
}

let config: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!config) {
    config = loadConfig();
  }
  return config;
}
