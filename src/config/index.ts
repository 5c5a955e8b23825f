import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import type { SortField, SortOrder } from '../types/paper.js';

dotenvConfig();

export const SORT_FIELDS = ['relevance', 'lastUpdatedDate', 'submittedDate'] as const satisfies readonly SortField[];
export const SORT_ORDERS = ['ascending', 'descending'] as const satisfies readonly SortOrder[];

const configSchema = z.object({
  // arXiv API
  arxivApiUrl: z.string().url().default('https://export.arxiv.org/api'),
  // arXiv asks for no more than one request every three seconds
  arxivRequestsPerSecond: z.number().positive().default(0.34),
  requestTimeoutMs: z.number().int().positive().default(30000),
  caCertPath: z.string().min(1).optional(),

  // Search defaults
  maxResults: z.number().int().positive().max(2000).default(100),
  sortBy: z.enum(SORT_FIELDS).default('submittedDate'),
  sortOrder: z.enum(SORT_ORDERS).default('descending'),

  // Tally
  delimiter: z.string().min(1).default(', '),
  exportHeader: z.string().min(1).default('Keyword'),
  papersCsvPath: z.string().default('./data/papers.csv'),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigValidationError';
    this.issues = issues;
  }
}

function optionalNumber(value: string | undefined, parse: (raw: string) => number): number | undefined {
  return value === undefined || value === '' ? undefined : parse(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const result = configSchema.safeParse({
    arxivApiUrl: env.ARXIV_API_URL || undefined,
    arxivRequestsPerSecond: optionalNumber(env.ARXIV_RATE_LIMIT, parseFloat),
    requestTimeoutMs: optionalNumber(env.ARXIV_TIMEOUT_MS, (raw) => parseInt(raw, 10)),
    caCertPath: env.SSL_CERT_FILE || undefined,
    maxResults: optionalNumber(env.ARXIV_MAX_RESULTS, (raw) => parseInt(raw, 10)),
    sortBy: env.ARXIV_SORT_BY || undefined,
    sortOrder: env.ARXIV_SORT_ORDER || undefined,
    delimiter: env.TALLY_DELIMITER || undefined,
    exportHeader: env.EXPORT_HEADER || undefined,
    papersCsvPath: env.PAPERS_CSV || undefined,
  });

  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return result.data;
}

export const config: Config = loadConfig();
