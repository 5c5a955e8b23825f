import { z } from 'zod';
import { ArxivClient } from '../api/index.js';
import { SORT_FIELDS, SORT_ORDERS } from '../config/index.js';
import { saveTable } from '../data/table.js';
import { InvalidArgumentError } from '../errors.js';
import { formatPaper, papersToTable } from '../report/corpus-report.js';
import type { ArxivPaper, SortField, SortOrder } from '../types/paper.js';

export interface FetchCommandOptions {
  query: string;
  maxResults?: number;
  sortBy?: string;
  sortOrder?: string;
  out?: string;
  client?: ArxivClient;
  log?: (line: string) => void;
}

function parseSortField(value: string | undefined): SortField | undefined {
  if (value === undefined) return undefined;
  const result = z.enum(SORT_FIELDS).safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`--sort must be one of ${SORT_FIELDS.join(', ')}`);
  }
  return result.data;
}

function parseSortOrder(value: string | undefined): SortOrder | undefined {
  if (value === undefined) return undefined;
  const result = z.enum(SORT_ORDERS).safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`--order must be one of ${SORT_ORDERS.join(', ')}`);
  }
  return result.data;
}

export async function runFetch(options: FetchCommandOptions): Promise<ArxivPaper[]> {
  const { query, maxResults, out, log = console.log } = options;

  if (maxResults !== undefined && maxResults <= 0) {
    throw new InvalidArgumentError('--max must be a positive integer');
  }
  const sortBy = parseSortField(options.sortBy);
  const sortOrder = parseSortOrder(options.sortOrder);

  const client = options.client ?? new ArxivClient();
  log(`Querying arXiv: ${query}`);

  const papers = await client.search(query, { maxResults, sortBy, sortOrder });
  log(`Found ${papers.length} papers\n`);

  for (const paper of papers) {
    for (const line of formatPaper(paper)) {
      log(line);
    }
    log('');
  }

  if (out) {
    await saveTable(papersToTable(papers), out);
    log(`Saved ${papers.length} papers to ${out}`);
  }

  return papers;
}
