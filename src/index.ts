export * from './tally/index.js';
export * from './api/index.js';
export { createTable, parseTable, loadTable, saveTable } from './data/table.js';
export {
  PAPER_COLUMNS,
  removeParentheticals,
  journalName,
  summarizeField,
  summarizeTable,
  formatSummary,
  papersToTable,
  formatPaper,
} from './report/corpus-report.js';
export type { SummaryOptions } from './report/corpus-report.js';
export {
  TallyError,
  MissingFieldError,
  InvalidArgumentError,
  IOError,
  ArxivApiError,
} from './errors.js';
export type { TallyErrorCode } from './errors.js';
export { config, loadConfig, ConfigValidationError } from './config/index.js';
export type { Config } from './config/index.js';
export type * from './types/paper.js';
