export { parseArgs, stringOption, intOption, listOption } from './args.js';
export type { ParsedArgs } from './args.js';
export { runFetch } from './fetch.js';
export type { FetchCommandOptions } from './fetch.js';
export { runStats, DEFAULT_STATS_FIELDS } from './stats.js';
export type { StatsCommandOptions } from './stats.js';
export { runExport } from './export.js';
export type { ExportCommandOptions } from './export.js';
