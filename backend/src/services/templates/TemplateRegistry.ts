import { StoreEmptyError } from '../../utils/errors';
import type { LoadError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import type { LoadReport, TemplateLoader } from './TemplateLoader';
import type { TemplateStore } from './TemplateStore';

export interface ReloadSummary {
  version: number;
  template_count: number;
  errors: LoadError[];
  applied: boolean;
}

/**
 * Owns the active template store. Callers take one snapshot with `current()`
 * per document; `reload()` replaces the reference in a single assignment, so
 * a document in flight keeps the store it started with.
 */
export class TemplateRegistry {
  private active: TemplateStore | null = null;
  private lastErrors: LoadError[] = [];
  private generation = 0;
  private activeGeneration = 0;

  constructor(private readonly loader: TemplateLoader) {}

  current(): TemplateStore {
    if (!this.active) {
      throw new StoreEmptyError('No template store has been loaded');
    }
    return this.active;
  }

  hasStore(): boolean {
    return this.active !== null;
  }

  getLastErrors(): readonly LoadError[] {
    return this.lastErrors;
  }

  async reload(): Promise<ReloadSummary> {
    const generation = ++this.generation;

    let report: LoadReport;
    try {
      report = await this.loader.load(generation);
    } catch (err) {
      if (err instanceof StoreEmptyError) {
        logger.error(
          `Template reload ${generation} produced no usable templates; keeping store version ${this.active?.version ?? 'none'}`
        );
      }
      throw err;
    }

    // A slower reload that started earlier must not replace a newer store
    const applied = generation > this.activeGeneration;
    if (applied) {
      this.active = report.store;
      this.activeGeneration = generation;
      this.lastErrors = report.errors;
    } else {
      logger.warn(`Template reload ${generation} finished after reload ${this.activeGeneration}; discarded`);
    }

    return {
      version: report.store.version,
      template_count: report.store.size,
      errors: report.errors,
      applied,
    };
  }
}
