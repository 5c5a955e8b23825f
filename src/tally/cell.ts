import type { Cell } from '../types/paper.js';

export const DEFAULT_DELIMITER = ', ';

// str(list) output from the notebooks, e.g. "['Smith, J.', 'Doe, A.']"
const LIST_LITERAL = /^\[([\s\S]*)\]$/;

// Unquoted items that stand for "no value" inside a list literal
const PLACEHOLDER_ITEMS = new Set(['None', 'nan', 'NaN', 'null']);

const MISSING: Cell = { kind: 'missing' };

// One item of a list literal: a single- or double-quoted string, or a bare token
const LIST_ITEM = /'((?:[^'\\]|\\.)*)'|"((?:[^"\\]|\\.)*)"|([^,\s][^,]*)/g;

function unescape(text: string): string {
  return text.replace(/\\(.)/g, '$1');
}

/** Items of a list literal body, quotes removed; quoted items may contain commas. */
function readListItems(body: string): string[] {
  return Array.from(body.matchAll(LIST_ITEM), (match) => {
    const [, single, double, bare] = match;
    if (single !== undefined) return unescape(single).trim();
    if (double !== undefined) return unescape(double).trim();

    const token = bare.trim();
    return PLACEHOLDER_ITEMS.has(token) ? '' : token;
  });
}

/** Render values the way a stringified list is written, with None for absent slots. */
export function toListLiteral(values: readonly (string | null)[]): string {
  const items = values.map((value) => {
    if (value === null) return 'None';

    const escaped = value.replace(/\\/g, '\\\\');
    return escaped.includes("'") && !escaped.includes('"')
      ? `"${escaped}"`
      : `'${escaped.replace(/'/g, "\\'")}'`;
  });
  return `[${items.join(', ')}]`;
}

/**
 * Classify a raw cell. Anything that is not a string, or is empty once
 * trimmed and stripped of list-literal decoration, is missing.
 */
export function readCell(raw: unknown, delimiter: string = DEFAULT_DELIMITER): Cell {
  if (typeof raw !== 'string') {
    return MISSING;
  }

  const literal = LIST_LITERAL.exec(raw.trim());
  // Untrimmed, so a trailing delimiter still yields an empty item
  const body = literal ? literal[1] : raw;

  if (body.trim() === '') {
    return MISSING;
  }

  // List literals are split on their own commas; the delimiter applies to plain strings
  const items = literal
    ? readListItems(body)
    : body.split(delimiter).map((item) => item.trim());

  if (items.length === 0 || (items.length === 1 && items[0] === '')) {
    return MISSING;
  }
  if (items.length === 1) {
    return { kind: 'string', value: items[0] };
  }

  return { kind: 'multi', values: items };
}

export function cellValues(cell: Cell): string[] {
  switch (cell.kind) {
    case 'missing':
      return [];
    case 'string':
      return [cell.value];
    case 'multi':
      return [...cell.values];
  }
}
