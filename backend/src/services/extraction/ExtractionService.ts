import type {
  ExtractionResult,
  FieldIssue,
  FieldValue,
  TableRow,
} from '@template-extract/shared/schemas/extractionResult.zod';
import type { FieldRule, Template } from '../../models/Template';
import { EmptyDocumentError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { extractTable } from './TableExtractor';
import { getTypeCoercionService } from './TypeCoercionService';
import type { TypeCoercionService } from './TypeCoercionService';
import { ValidationService } from './ValidationService';

export interface ExtractionOptions {
  now?: Date;
}

export interface Capture {
  raw: string;
  patternIndex: number;
}

type FieldOutcome = { value: FieldValue; issue: null } | { value: null; issue: FieldIssue | null };

/**
 * First pattern with a non-empty capture wins. The rule's group is read,
 * falling back to the whole match when that group did not participate.
 */
export function captureField(text: string, rule: Pick<FieldRule, 'patterns' | 'group'>): Capture | null {
  for (let index = 0; index < rule.patterns.length; index++) {
    const match = rule.patterns[index].exec(text);
    if (!match) {
      continue;
    }

    const raw = match[rule.group] ?? match[0];
    if (raw.trim() !== '') {
      return { raw, patternIndex: index };
    }
  }

  return null;
}

export class ExtractionService {
  constructor(
    private readonly coercion: TypeCoercionService = getTypeCoercionService(),
    private readonly validation: ValidationService = new ValidationService()
  ) {}

  extract(text: string, template: Template, options: ExtractionOptions = {}): ExtractionResult {
    if (text.trim() === '') {
      throw new EmptyDocumentError();
    }

    const now = options.now ?? new Date();
    const fields: Record<string, FieldValue | null> = {};
    const issues: FieldIssue[] = [];
    let completeness = true;

    for (const rule of template.fields) {
      const outcome = this.extractField(text, rule, template.locale, now);
      fields[rule.name] = outcome.value;

      if (outcome.issue) {
        issues.push(outcome.issue);
      }
      if (outcome.value === null && rule.required) {
        completeness = false;
      }
    }

    const tables: Record<string, TableRow[]> = {};
    for (const table of template.tables) {
      tables[table.name] = extractTable(text, table);
    }

    if (!completeness) {
      const missing = issues.filter((issue) => issue.required).map((issue) => issue.field);
      logger.info(`Template ${template.id}: incomplete extraction, required fields absent: ${missing.join(', ')}`);
    }

    return {
      template_id: template.id,
      fields,
      tables,
      completeness,
      issues,
    };
  }

  private extractField(text: string, rule: FieldRule, locale: string | null, now: Date): FieldOutcome {
    const capture = captureField(text, rule);

    if (!capture) {
      return {
        value: null,
        issue: rule.required
          ? { field: rule.name, kind: 'missing', reason: 'no pattern matched', required: true }
          : null,
      };
    }

    const coerced = this.coercion.coerce(capture.raw, rule, locale);
    if (!coerced.ok) {
      return {
        value: null,
        issue: { field: rule.name, kind: 'missing', reason: coerced.reason, required: rule.required },
      };
    }

    const validated = this.validation.validateField(rule, coerced.value, now);
    if (!validated.passed) {
      return {
        value: null,
        issue: { field: rule.name, kind: 'invalid', reason: validated.reason, required: rule.required },
      };
    }

    return { value: validated.value, issue: null };
  }
}
