import type { MatchCandidate, NoMatch } from '@template-extract/shared/schemas/extractionResult.zod';
import type { Template } from '../../models/Template';
import { isIssuerSpecific } from '../../models/Template';
import { DEFAULT_MATCHING_CONFIG } from '../../utils/config';
import type { MatchingConfig } from '../../utils/config';
import { EmptyDocumentError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { TemplateStore } from '../templates/TemplateStore';

const SCORE_PRECISION = 1e6;

export interface ScoredTemplate {
  template: Template;
  candidate: MatchCandidate;
}

function roundScore(score: number): number {
  return Math.round(score * SCORE_PRECISION) / SCORE_PRECISION;
}

function compareScored(a: ScoredTemplate, b: ScoredTemplate): number {
  if (a.candidate.score !== b.candidate.score) {
    return b.candidate.score - a.candidate.score;
  }
  if (a.template.priority !== b.template.priority) {
    return b.template.priority - a.template.priority;
  }
  return a.template.id < b.template.id ? -1 : a.template.id > b.template.id ? 1 : 0;
}

/**
 * Chooses the template for a document. Score is
 *   keywordWeight * keywords found + fiscalIdWeight * fiscal id found + priorityWeight * priority,
 * issuer-specific templates need at least one piece of evidence, and ties go
 * to the higher priority, then the smaller id.
 */
export class TemplateMatcher {
  constructor(private readonly weights: MatchingConfig = DEFAULT_MATCHING_CONFIG) {}

  match(text: string, localeHint: string | null | undefined, store: TemplateStore): MatchCandidate | NoMatch {
    const candidates = store.getCandidates(localeHint);
    const ranking = this.rank(text, localeHint, store);

    if (ranking.length === 0) {
      logger.debug(`No template matched (${candidates.length} candidates, locale ${localeHint ?? 'any'})`);
      return { status: 'no_match', candidates_considered: candidates.length };
    }

    const winner = ranking[0].candidate;
    logger.debug(
      `Matched template ${winner.template_id} with score ${winner.score} (keywords: ${winner.matched_keywords.length}, fiscal id: ${winner.matched_fiscal_id})`
    );
    return winner;
  }

  /**
   * Every eligible template, best first.
   */
  rank(text: string, localeHint: string | null | undefined, store: TemplateStore): ScoredTemplate[] {
    if (text.trim() === '') {
      throw new EmptyDocumentError();
    }

    const upper = text.toUpperCase();
    const scored: ScoredTemplate[] = [];

    for (const template of store.getCandidates(localeHint)) {
      const candidate = this.scoreTemplate(template, upper);
      if (candidate) {
        scored.push({ template, candidate });
      }
    }

    return scored.sort(compareScored);
  }

  private scoreTemplate(template: Template, upper: string): MatchCandidate | null {
    const { issuer } = template;

    if (issuer.excludeKeywords.some((keyword) => upper.includes(keyword))) {
      return null;
    }

    const matchedKeywords = issuer.keywords.filter((keyword) => upper.includes(keyword));
    const matchedFiscalId = issuer.fiscalIdPattern !== null && issuer.fiscalIdPattern.test(upper);

    if (isIssuerSpecific(template) && matchedKeywords.length === 0 && !matchedFiscalId) {
      return null;
    }

    const score = roundScore(
      this.weights.keywordWeight * matchedKeywords.length +
        this.weights.fiscalIdWeight * (matchedFiscalId ? 1 : 0) +
        this.weights.priorityWeight * template.priority
    );

    if (score <= this.weights.minScore) {
      return null;
    }

    return {
      status: 'matched',
      template_id: template.id,
      score,
      matched_keywords: [...matchedKeywords],
      matched_fiscal_id: matchedFiscalId,
    };
  }
}
