export interface ArxivPaper {
  arxivId: string; // e.g. 2401.01234v2

  // Basic Info
  title: string;
  authors: string[];
  affiliations: (string | null)[]; // one slot per author
  summary?: string;
  comment?: string;
  journalRef: string | null;

  // Classification
  primaryCategory?: string;
  categories: string[];

  // Dates
  published?: string;
  updated?: string;

  // URLs
  absUrl?: string;
  pdfUrl?: string;
}

export type SortField = 'relevance' | 'lastUpdatedDate' | 'submittedDate';
export type SortOrder = 'ascending' | 'descending';

export interface SearchOptions {
  start?: number;
  maxResults?: number;
  sortBy?: SortField;
  sortOrder?: SortOrder;
}

/** One row of paper metadata. Cells are normally strings but are not trusted to be. */
export type PaperRecord = Readonly<Record<string, unknown>>;

export interface Table {
  columns: readonly string[];
  rows: readonly PaperRecord[];
}

export type Cell =
  | { kind: 'missing' }
  | { kind: 'string'; value: string }
  | { kind: 'multi'; values: string[] };

export interface TallyEntry {
  value: string;
  count: number;
}

export interface TallyResult {
  counts: ReadonlyMap<string, number>; // insertion order = first-seen order
  ranking: readonly TallyEntry[];
  total: number;
}

export interface FieldSummary {
  field: string;
  total: number;
  distinct: number;
  top: TallyEntry[];
}
