import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';
import { format as formatDate, isValid, parse as parseDate } from 'date-fns';
import { TemplateDocumentSchema } from '@template-extract/shared/schemas/templateDocument.zod';
import type {
  FieldRuleDocument,
  TableRuleDocument,
  TemplateDocument,
} from '@template-extract/shared/schemas/templateDocument.zod';
import type { FieldRule, TableRule, Template } from '../../models/Template';
import { StoreEmptyError } from '../../utils/errors';
import type { LoadError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { compilePattern } from './patternCompiler';
import { TemplateStore } from './TemplateStore';

const TEMPLATE_FILE_EXTENSION = '.json';
const UTF8_ENCODING = 'utf8';
const GENERIC_DIR = 'generic';
const LOCALES_DIR = 'locales';
const ISSUERS_DIR = 'issuers';
const FISCAL_ID_SEPARATORS = /[^A-Z0-9]/g;
const COUNTRY_PREFIXED_ID = /^([A-Z]{2})(\d+)$/;
const FISCAL_ID_GAP = '[ \\t./-]?';
const ANY_COUNTRY_PREFIX = '[A-Z]{2}';
const DATE_FORMAT_PROBE = new Date(2021, 10, 23);

export type SourceKind = 'builtin' | 'locale' | 'issuer' | 'user';

export interface TemplateSource {
  path: string;
  kind: SourceKind;
  locale?: string | null;
}

export type SourceResolver = () => Promise<readonly TemplateSource[]>;

export interface LoadReport {
  store: TemplateStore;
  errors: LoadError[];
}

export interface DocumentOrigin {
  path: string;
  relativeId: string;
  locale: string | null;
}

export type ParseOutcome = { ok: true; template: Template } | { ok: false; error: LoadError };

class RuleError extends Error {}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function compileOrThrow(source: string, where: string): RegExp {
  const compiled = compilePattern(source);
  if (!compiled.ok) {
    throw new RuleError(`${where}: ${compiled.reason}`);
  }
  return compiled.pattern;
}

function assertDateFormat(hint: string, where: string): void {
  let roundTrips = false;
  try {
    roundTrips = isValid(parseDate(formatDate(DATE_FORMAT_PROBE, hint), hint, DATE_FORMAT_PROBE));
  } catch (err) {
    throw new RuleError(`${where}: invalid date format "${hint}": ${describeError(err)}`);
  }
  if (!roundTrips) {
    throw new RuleError(`${where}: date format "${hint}" cannot be parsed back`);
  }
}

function buildFieldRule(name: string, doc: FieldRuleDocument): FieldRule {
  const where = `fields.${name}`;
  const formatHints = doc.format_hint === undefined ? [] : Array.isArray(doc.format_hint) ? doc.format_hint : [doc.format_hint];

  if (doc.type === 'date') {
    formatHints.forEach((hint) => assertDateFormat(hint, where));
  }

  return Object.freeze({
    name,
    patterns: Object.freeze(doc.patterns.map((pattern, index) => compileOrThrow(pattern, `${where}.patterns[${index}]`))),
    group: doc.group,
    required: doc.required,
    valueType: doc.type,
    formatHints: Object.freeze([...formatHints]),
    validator: doc.validator ?? null,
    total: doc.total,
  });
}

function buildTableRule(name: string, doc: TableRuleDocument): TableRule {
  const where = `tables.${name}`;
  return Object.freeze({
    name,
    start: compileOrThrow(doc.start_pattern, `${where}.start_pattern`),
    end: compileOrThrow(doc.end_pattern, `${where}.end_pattern`),
    columns: Object.freeze(
      doc.columns.map((column, index) =>
        Object.freeze({ name: column.name, pattern: compileOrThrow(column.pattern, `${where}.columns[${index}]`) })
      )
    ),
    skip: Object.freeze(doc.skip.map((pattern, index) => compileOrThrow(pattern, `${where}.skip[${index}]`))),
  });
}

export function normalizeFiscalId(value: string): string {
  return value.toUpperCase().replace(FISCAL_ID_SEPARATORS, '');
}

/**
 * Pattern for a normalized fiscal id written as one token: a single space,
 * tab, dot, slash or hyphen may sit between its characters, a country prefix
 * is optional, and no letter or digit may touch it on either side.
 */
export function buildFiscalIdPattern(fiscalId: string): RegExp {
  const prefixed = COUNTRY_PREFIXED_ID.exec(fiscalId);
  const country = prefixed ? prefixed[1] : ANY_COUNTRY_PREFIX;
  const body = prefixed ? prefixed[2] : fiscalId;
  const bodyPattern = body.split('').join(FISCAL_ID_GAP);
  return new RegExp(`(?<![A-Z0-9])(?:${country}${FISCAL_ID_GAP})?${bodyPattern}(?![A-Z0-9])`);
}

function buildTemplate(doc: TemplateDocument, origin: DocumentOrigin): Template {
  const issuer = doc.issuer;
  const locale = doc.template.locale ?? origin.locale;
  const fiscalId = issuer?.fiscal_id ? normalizeFiscalId(issuer.fiscal_id) : null;

  return Object.freeze({
    id: doc.template.id ?? origin.relativeId,
    name: doc.template.name,
    locale: locale ? locale.toLowerCase() : null,
    priority: doc.template.priority,
    issuer: Object.freeze({
      keywords: Object.freeze((issuer?.keywords ?? []).map((keyword) => keyword.toUpperCase())),
      fiscalId,
      fiscalIdPattern: fiscalId ? buildFiscalIdPattern(fiscalId) : null,
      excludeKeywords: Object.freeze((issuer?.exclude_keywords ?? []).map((keyword) => keyword.toUpperCase())),
    }),
    fields: Object.freeze(Object.entries(doc.fields).map(([name, rule]) => buildFieldRule(name, rule))),
    tables: Object.freeze(Object.entries(doc.tables ?? {}).map(([name, rule]) => buildTableRule(name, rule))),
    sourcePath: origin.path,
  });
}

/**
 * Validates one parsed template document and compiles it. Never throws: a
 * malformed document comes back as a LoadError.
 */
export function parseTemplateDocument(raw: unknown, origin: DocumentOrigin): ParseOutcome {
  const parsed = TemplateDocumentSchema.safeParse(raw);

  if (!parsed.success) {
    const reason = parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
    return { ok: false, error: { path: origin.path, reason } };
  }

  try {
    return { ok: true, template: buildTemplate(parsed.data, origin) };
  } catch (err) {
    if (err instanceof RuleError) {
      return { ok: false, error: { path: origin.path, reason: err.message } };
    }
    throw err;
  }
}

/**
 * Template files below a directory, sorted. A subdirectory that cannot be
 * read is recorded in `errors` and skipped.
 */
async function collectTemplateFiles(root: string, errors: LoadError[]): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch (err) {
    errors.push({ path: root, reason: `could not read template directory: ${describeError(err)}` });
    return [];
  }

  const files: string[] = [];
  for (const entry of entries) {
    const fullPath = path.join(root, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectTemplateFiles(fullPath, errors)));
    } else if (entry.isFile() && entry.name.endsWith(TEMPLATE_FILE_EXTENSION)) {
      files.push(fullPath);
    }
  }

  return files.sort();
}

// Ids from a locale directory carry the locale: locales/pl/orange_polska.json -> pl/orange_polska
function toRelativeId(root: string, filePath: string, locale: string | null): string {
  const relative = path.relative(root, filePath);
  const id = relative.slice(0, -TEMPLATE_FILE_EXTENSION.length).split(path.sep).join('/');
  return locale ? `${locale}/${id}` : id;
}

async function isDirectory(target: string): Promise<boolean | null> {
  try {
    return (await fs.stat(target)).isDirectory();
  } catch {
    return null;
  }
}

/**
 * Lists the default source locations under a templates root, in override
 * order: built-in generic, one per locale directory, issuer overrides, then
 * the user directory.
 */
export async function discoverTemplateSources(root: string, userDir?: string | null): Promise<TemplateSource[]> {
  const sources: TemplateSource[] = [];

  const genericRoot = path.join(root, GENERIC_DIR);
  if (await isDirectory(genericRoot)) {
    sources.push({ path: genericRoot, kind: 'builtin' });
  }

  const localesRoot = path.join(root, LOCALES_DIR);
  if (await isDirectory(localesRoot)) {
    const entries = await fs.readdir(localesRoot, { withFileTypes: true });
    const locales = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name).sort();
    for (const locale of locales) {
      sources.push({ path: path.join(localesRoot, locale), kind: 'locale', locale });
    }
  }

  const issuersRoot = path.join(root, ISSUERS_DIR);
  if (await isDirectory(issuersRoot)) {
    sources.push({ path: issuersRoot, kind: 'issuer' });
  }

  if (userDir) {
    sources.push({ path: userDir, kind: 'user' });
  }

  return sources;
}

export class TemplateLoader {
  constructor(private readonly sources: readonly TemplateSource[] | SourceResolver) {}

  /**
   * Loader over the default layout of a templates root; the directories are
   * discovered again on every load.
   */
  static fromDirectory(root: string, userDir?: string | null): TemplateLoader {
    return new TemplateLoader(() => discoverTemplateSources(root, userDir));
  }

  async resolveSources(): Promise<readonly TemplateSource[]> {
    return typeof this.sources === 'function' ? this.sources() : this.sources;
  }

  /**
   * Reads every source in order; a template id seen again in a later source
   * replaces the earlier one. Throws StoreEmptyError when nothing usable
   * remains.
   */
  async load(version = 1): Promise<LoadReport> {
    const errors: LoadError[] = [];
    const templates = new Map<string, Template>();

    for (const source of await this.resolveSources()) {
      for (const outcome of await this.loadSource(source)) {
        if (!outcome.ok) {
          errors.push(outcome.error);
          continue;
        }

        const previous = templates.get(outcome.template.id);
        if (previous) {
          logger.debug(`Template ${outcome.template.id} from ${outcome.template.sourcePath} overrides ${previous.sourcePath}`);
        }
        templates.set(outcome.template.id, outcome.template);
      }
    }

    for (const error of errors) {
      logger.warn(`Skipped template ${error.path}: ${error.reason}`);
    }

    if (templates.size === 0) {
      throw new StoreEmptyError('No usable templates were loaded', errors);
    }

    const store = new TemplateStore([...templates.values()], version);
    logger.info(`Loaded ${store.size} templates (${errors.length} skipped), store version ${version}`);

    return { store, errors };
  }

  private async loadSource(source: TemplateSource): Promise<ParseOutcome[]> {
    const directory = await isDirectory(source.path);

    if (directory === null) {
      return [{ ok: false, error: { path: source.path, reason: `${source.kind} template source not found` } }];
    }

    const root = directory ? source.path : path.dirname(source.path);
    const directoryErrors: LoadError[] = [];
    const files = directory ? await collectTemplateFiles(source.path, directoryErrors) : [source.path];
    const outcomes: ParseOutcome[] = directoryErrors.map((error): ParseOutcome => ({ ok: false, error }));

    for (const file of files) {
      outcomes.push(await this.loadFile(file, root, source.locale ?? null));
    }

    return outcomes;
  }

  private async loadFile(filePath: string, root: string, locale: string | null): Promise<ParseOutcome> {
    let raw: unknown;

    try {
      raw = JSON.parse(await fs.readFile(filePath, UTF8_ENCODING));
    } catch (err) {
      return { ok: false, error: { path: filePath, reason: `could not read template document: ${describeError(err)}` } };
    }

    return parseTemplateDocument(raw, { path: filePath, relativeId: toRelativeId(root, filePath, locale), locale });
  }
}
