import { loadTable } from '../data/table.js';
import { exportColumn, flatten } from '../tally/index.js';

export interface ExportCommandOptions {
  path: string;
  field: string;
  out: string;
  header?: string;
  delimiter?: string;
  log?: (line: string) => void;
}

/** Flatten one column of a paper CSV and write it out, one value per row. */
export async function runExport(options: ExportCommandOptions): Promise<string[]> {
  const { path, field, out, header, delimiter, log = console.log } = options;

  const table = await loadTable(path);
  const values = flatten(table, field, delimiter).filter((value) => value !== '');

  await exportColumn(values, out, header);
  log(`Wrote ${values.length} ${field} values to ${out}`);

  return values;
}
