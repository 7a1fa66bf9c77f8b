import type { TableRow } from '@template-extract/shared/schemas/extractionResult.zod';
import type { TableRule } from '../../models/Template';

const LINE_BREAK = /\r?\n/;

/**
 * The text between the line holding the start match and the end match (or
 * the end of the document). Null when the start pattern does not occur.
 */
export function locateRegion(text: string, rule: TableRule): string | null {
  const start = rule.start.exec(text);
  if (!start) {
    return null;
  }

  const lineEnd = text.indexOf('\n', start.index + start[0].length);
  if (lineEnd === -1) {
    return '';
  }

  const rest = text.slice(lineEnd + 1);
  const end = rule.end.exec(rest);
  return end ? rest.slice(0, end.index) : rest;
}

/**
 * Applies the column patterns left to right, each to what remains of the
 * line after the previous column. Null unless every column yields a value.
 */
export function tokenizeLine(line: string, rule: TableRule): TableRow | null {
  const row: TableRow = {};
  let cursor = 0;

  for (const column of rule.columns) {
    const match = column.pattern.exec(line.slice(cursor));
    if (!match) {
      return null;
    }

    const value = (match[1] ?? match[0]).trim();
    if (value === '') {
      return null;
    }

    row[column.name] = value;
    cursor += match.index + match[0].length;
  }

  return row;
}

export function extractTable(text: string, rule: TableRule): TableRow[] {
  const region = locateRegion(text, rule);
  if (region === null) {
    return [];
  }

  const rows: TableRow[] = [];

  for (const rawLine of region.split(LINE_BREAK)) {
    const line = rawLine.trim();
    if (line === '' || rule.skip.some((pattern) => pattern.test(line))) {
      continue;
    }

    const row = tokenizeLine(line, rule);
    if (row) {
      rows.push(row);
    }
  }

  return rows;
}
