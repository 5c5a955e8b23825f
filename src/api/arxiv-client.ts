import axios from 'axios';
import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { config } from '../config/index.js';
import { ArxivApiError } from '../errors.js';
import type { ArxivPaper, SearchOptions } from '../types/paper.js';
import { type ApiClientOptions, BaseApiClient } from './base-client.js';

// Elements that may repeat inside a feed; always parsed as arrays
const ARRAY_TAGS = new Set(['entry', 'author', 'category', 'link', 'arxiv:affiliation']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => ARRAY_TAGS.has(name),
});

// Elements carrying an xmlns attribute come back as { '#text': ... }
const textNode = z.union([
  z.string(),
  z.object({ '#text': z.string() }).transform((node) => node['#text']),
]);

const atomEntrySchema = z.object({
  id: textNode,
  title: textNode,
  summary: textNode.optional(),
  published: textNode.optional(),
  updated: textNode.optional(),
  author: z
    .array(
      z.object({
        name: textNode,
        'arxiv:affiliation': z.array(textNode).optional(),
      })
    )
    .default([]),
  'arxiv:journal_ref': textNode.optional(),
  'arxiv:comment': textNode.optional(),
  'arxiv:primary_category': z.object({ term: z.string() }).optional(),
  category: z.array(z.object({ term: z.string() })).default([]),
  link: z
    .array(
      z.object({
        href: z.string(),
        rel: z.string().optional(),
        title: z.string().optional(),
        type: z.string().optional(),
      })
    )
    .default([]),
});

const atomFeedSchema = z.object({
  feed: z.object({
    'opensearch:totalResults': textNode.optional(),
    entry: z.array(atomEntrySchema).default([]),
  }),
});

type AtomEntry = z.infer<typeof atomEntrySchema>;

export interface ArxivFeed {
  papers: ArxivPaper[];
  totalResults: number;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function mapToPaper(entry: AtomEntry): ArxivPaper {
  const absUrl = entry.id;
  const arxivId = absUrl.split('/abs/')[1] ?? absUrl;
  const pdfLink = entry.link.find((l) => l.title === 'pdf' || l.type === 'application/pdf');

  return {
    arxivId,
    title: collapseWhitespace(entry.title),
    authors: entry.author.map((a) => collapseWhitespace(a.name)),
    affiliations: entry.author.map((a) => {
      const affiliations = a['arxiv:affiliation'] ?? [];
      return affiliations.length > 0 ? affiliations.join('; ') : null;
    }),
    summary: entry.summary ? collapseWhitespace(entry.summary) : undefined,
    comment: entry['arxiv:comment'] ? collapseWhitespace(entry['arxiv:comment']) : undefined,
    journalRef: entry['arxiv:journal_ref'] ? collapseWhitespace(entry['arxiv:journal_ref']) : null,
    primaryCategory: entry['arxiv:primary_category']?.term,
    categories: entry.category.map((c) => c.term),
    published: entry.published,
    updated: entry.updated,
    absUrl,
    pdfUrl: pdfLink?.href,
  };
}

/** Parse an arXiv Atom response into papers. */
export function parseArxivFeed(xml: string): ArxivFeed {
  const result = atomFeedSchema.safeParse(parser.parse(xml));
  if (!result.success) {
    throw new ArxivApiError(`Unexpected arXiv response: ${result.error.issues[0]?.message ?? 'invalid feed'}`);
  }

  const { feed } = result.data;

  // Malformed queries come back as a single pseudo-entry under /api/errors
  const errorEntry = feed.entry.find((entry) => entry.id.includes('/api/errors'));
  if (errorEntry) {
    throw new ArxivApiError(`arXiv rejected the query: ${errorEntry.summary ?? errorEntry.title}`);
  }

  const papers = feed.entry.map(mapToPaper);
  const total = feed['opensearch:totalResults'] ? parseInt(feed['opensearch:totalResults'], 10) : NaN;

  return {
    papers,
    totalResults: Number.isNaN(total) ? papers.length : total,
  };
}

export function categoryQuery(category: string): string {
  return `cat:${category}`;
}

export interface ArxivClientOptions extends Partial<ApiClientOptions> {
  baseURL?: string;
}

export class ArxivClient extends BaseApiClient {
  constructor(options: ArxivClientOptions = {}) {
    super(
      options.baseURL ?? config.arxivApiUrl,
      {
        requestsPerSecond: options.requestsPerSecond ?? config.arxivRequestsPerSecond,
        timeoutMs: options.timeoutMs ?? config.requestTimeoutMs,
        caCertPath: options.caCertPath ?? config.caCertPath,
        adapter: options.adapter,
      },
      {
        'Accept': 'application/atom+xml',
        'User-Agent': 'paper-tally/1.0',
      }
    );
  }

  async fetchFeed(query: string, options: SearchOptions = {}): Promise<ArxivFeed> {
    const {
      start = 0,
      maxResults = config.maxResults,
      sortBy = config.sortBy,
      sortOrder = config.sortOrder,
    } = options;

    let xml: string;
    try {
      xml = await this.request<string>({
        method: 'GET',
        url: '/query',
        responseType: 'text',
        params: {
          search_query: query,
          start,
          max_results: maxResults,
          sortBy,
          sortOrder,
        },
      });
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new ArxivApiError(
        `arXiv query "${query}" failed${status ? ` with status ${status}` : ''}`,
        status,
        error
      );
    }

    return parseArxivFeed(xml);
  }

  /**
   * Lazily yield the papers for one query. Each call issues a fresh request,
   * so the sequence can be restarted by calling again.
   */
  async *results(query: string, options: SearchOptions = {}): AsyncGenerator<ArxivPaper> {
    const feed = await this.fetchFeed(query, options);
    yield* feed.papers;
  }

  async search(query: string, options: SearchOptions = {}): Promise<ArxivPaper[]> {
    const papers: ArxivPaper[] = [];
    for await (const paper of this.results(query, options)) {
      papers.push(paper);
    }
    return papers;
  }

  async searchByCategory(category: string, options: SearchOptions = {}): Promise<ArxivPaper[]> {
    return this.search(categoryQuery(category), options);
  }
}
