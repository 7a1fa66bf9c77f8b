import { MAX_PATTERN_LENGTH } from '@template-extract/shared/schemas/templateDocument.zod';

const PATTERN_FLAGS = 'im';

// A quantified group whose body is itself quantified, e.g. (a+)+ or (\d*){2,}
const NESTED_QUANTIFIER = /\((?:[^()\\]|\\.)*(?:[*+]|\{\d+,\d*\})\)(?:[*+]|\{\d+,\d*\})/;

export type CompiledPattern = { ok: true; pattern: RegExp } | { ok: false; reason: string };

export function compilePattern(source: string): CompiledPattern {
  if (source.length > MAX_PATTERN_LENGTH) {
    return { ok: false, reason: `pattern is longer than ${MAX_PATTERN_LENGTH} characters` };
  }

  if (NESTED_QUANTIFIER.test(source)) {
    return { ok: false, reason: `pattern /${source}/ nests quantifiers and may backtrack catastrophically` };
  }

  try {
    return { ok: true, pattern: new RegExp(source, PATTERN_FLAGS) };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, reason: `invalid pattern /${source}/: ${message}` };
  }
}
