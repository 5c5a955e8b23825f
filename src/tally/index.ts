export { DEFAULT_DELIMITER, readCell, cellValues, toListLiteral } from './cell.js';
export {
  DEFAULT_EXPORT_HEADER,
  TallyAccumulator,
  flatten,
  column,
  tally,
  tallyStream,
  top,
  exportColumn,
} from './tally-reporter.js';
