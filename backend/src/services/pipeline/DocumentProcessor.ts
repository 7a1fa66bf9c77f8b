import type {
  ExtractionResult,
  FingerprintOutcome,
  MatchCandidate,
  NoMatch,
} from '@template-extract/shared/schemas/extractionResult.zod';
import { EmptyDocumentError, TemplateNotFoundError } from '../../utils/errors';
import type { Fingerprinter } from '../duplicates/Fingerprinter';
import type { ExtractionOptions, ExtractionService } from '../extraction/ExtractionService';
import type { TemplateMatcher } from '../matching/TemplateMatcher';
import type { TemplateRegistry } from '../templates/TemplateRegistry';

export interface ProcessDocumentInput {
  text: string;
  locale?: string | null;
  templateId?: string | null;
}

export interface ProcessedDocument {
  store_version: number;
  match: MatchCandidate | NoMatch;
  result: ExtractionResult | null;
  fingerprint: FingerprintOutcome | null;
}

export class DocumentProcessor {
  constructor(
    private readonly registry: TemplateRegistry,
    private readonly matcher: TemplateMatcher,
    private readonly extraction: ExtractionService,
    private readonly fingerprinter: Fingerprinter
  ) {}

  process(input: ProcessDocumentInput, options: ExtractionOptions = {}): ProcessedDocument {
    if (input.text.trim() === '') {
      throw new EmptyDocumentError();
    }

    // One snapshot for the whole document, even if a reload lands meanwhile
    const store = this.registry.current();

    let match: MatchCandidate | NoMatch;
    if (input.templateId) {
      if (!store.getTemplate(input.templateId)) {
        throw new TemplateNotFoundError(input.templateId);
      }
      match = {
        status: 'matched',
        template_id: input.templateId,
        score: 0,
        matched_keywords: [],
        matched_fiscal_id: false,
      };
    } else {
      match = this.matcher.match(input.text, input.locale, store);
    }

    if (match.status === 'no_match') {
      return { store_version: store.version, match, result: null, fingerprint: null };
    }

    const template = store.getTemplate(match.template_id);
    if (!template) {
      throw new TemplateNotFoundError(match.template_id);
    }

    const result = this.extraction.extract(input.text, template, options);

    return {
      store_version: store.version,
      match,
      result,
      fingerprint: this.fingerprinter.fingerprint(result),
    };
  }
}
