import { loadTable } from '../data/table.js';
import { formatSummary, journalName, removeParentheticals, summarizeField } from '../report/corpus-report.js';
import type { FieldSummary } from '../types/paper.js';

// Columns counted whole, with the clean-up applied before counting
const SINGLE_VALUED_FIELDS = new Map<string, (value: string) => string>([['journal_ref', journalName]]);

// Columns the paper CSVs usually carry
export const DEFAULT_STATS_FIELDS = [
  'authors',
  'category',
  'categories',
  'primary_category',
  'keywords',
  'affiliation',
  'affiliations',
  'journal_ref',
];

export interface StatsCommandOptions {
  path: string;
  fields?: string[];
  k?: number;
  delimiter?: string;
  stripParens?: boolean;
  log?: (line: string) => void;
}

export async function runStats(options: StatsCommandOptions): Promise<FieldSummary[]> {
  const { path, k = 1, delimiter, stripParens = false, log = console.log } = options;

  const table = await loadTable(path);
  log(`Loaded ${table.rows.length} records from ${path}`);

  const fields = options.fields ?? DEFAULT_STATS_FIELDS.filter((field) => table.columns.includes(field));
  if (fields.length === 0) {
    log('No known columns to summarize');
    return [];
  }

  const summaries = fields.map((field) => {
    const clean = SINGLE_VALUED_FIELDS.get(field);
    if (clean) {
      return summarizeField(table, field, { k, split: false, normalize: clean });
    }
    return summarizeField(table, field, {
      k,
      delimiter,
      normalize: stripParens ? removeParentheticals : undefined,
    });
  });

  for (const summary of summaries) {
    log('');
    for (const line of formatSummary(summary)) {
      log(line);
    }
  }

  return summaries;
}
