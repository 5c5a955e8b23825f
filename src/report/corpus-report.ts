import { column, flatten, tally, toListLiteral, top } from '../tally/index.js';
import type { ArxivPaper, FieldSummary, Table } from '../types/paper.js';

export interface SummaryOptions {
  k?: number;
  delimiter?: string;
  /** false for single-valued columns, which are counted whole */
  split?: boolean;
  normalize?: (value: string) => string;
}

export const PAPER_COLUMNS = [
  'arxiv_id',
  'title',
  'authors',
  'affiliations',
  'journal_ref',
  'primary_category',
  'categories',
  'published',
  'pdf_url',
] as const;

/** "Astrophysics of Galaxies (astro-ph.GA)" -> "Astrophysics of Galaxies" */
export function removeParentheticals(value: string): string {
  return value.replace(/\(.*?\)/g, '').replace(/\s+/g, ' ').trim();
}

/** "Monthly Notices of the RAS, 527, 1-10" -> "Monthly Notices of the RAS" (text before the first , ; : or .) */
export function journalName(value: string): string {
  return value.split(/[,;:.]/)[0].trim();
}

export function summarizeField(table: Table, field: string, options: SummaryOptions = {}): FieldSummary {
  const { k = 1, delimiter, split = true, normalize } = options;

  let values = split ? flatten(table, field, delimiter) : column(table, field);
  if (normalize) {
    values = values.map(normalize);
  }

  const result = tally(values);

  return {
    field,
    total: result.total,
    distinct: result.counts.size,
    top: top(result, k),
  };
}

export function summarizeTable(
  table: Table,
  fields: readonly string[],
  options: SummaryOptions = {}
): FieldSummary[] {
  return fields.map((field) => summarizeField(table, field, options));
}

export function formatSummary(summary: FieldSummary): string[] {
  const lines = [`${summary.field}: ${summary.total} values, ${summary.distinct} distinct`];

  if (summary.top.length === 0) {
    lines.push('  (no values)');
  }
  summary.top.forEach((entry, index) => {
    lines.push(`  ${index + 1}. ${entry.value} (${entry.count})`);
  });

  return lines;
}

export function papersToTable(papers: readonly ArxivPaper[]): Table {
  return {
    columns: PAPER_COLUMNS,
    rows: papers.map((paper) => ({
      arxiv_id: paper.arxivId,
      title: paper.title,
      authors: paper.authors.join(', '),
      affiliations: toListLiteral(paper.affiliations),
      journal_ref: paper.journalRef ?? '',
      primary_category: paper.primaryCategory ?? '',
      categories: paper.categories.join(', '),
      published: paper.published ?? '',
      pdf_url: paper.pdfUrl ?? '',
    })),
  };
}

export function formatPaper(paper: ArxivPaper): string[] {
  return [
    `Title: ${paper.title}`,
    `Authors: ${paper.authors.join(', ')}`,
    `Journal ref: ${paper.journalRef ?? 'None'}`,
  ];
}
