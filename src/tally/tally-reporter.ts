import { writeFile } from 'fs/promises';
import { stringify } from 'csv-stringify/sync';
import { IOError, InvalidArgumentError, MissingFieldError } from '../errors.js';
import type { Table, TallyEntry, TallyResult } from '../types/paper.js';
import { DEFAULT_DELIMITER, cellValues, readCell } from './cell.js';

export const DEFAULT_EXPORT_HEADER = 'Keyword';

/**
 * Flatten a multi-valued column into one sequence of values, in row order
 * and then in-cell order. Cells that are absent or not strings contribute
 * nothing. The result may contain empty strings (e.g. from "a, , b").
 */
export function flatten(table: Table, field: string, delimiter: string = DEFAULT_DELIMITER): string[] {
  if (!table.columns.includes(field)) {
    throw new MissingFieldError(field, table.columns);
  }
  if (delimiter === '') {
    throw new InvalidArgumentError('Delimiter must not be empty');
  }

  const values: string[] = [];
  for (const row of table.rows) {
    values.push(...cellValues(readCell(row[field], delimiter)));
  }
  return values;
}

/**
 * Whole-cell values of a single-valued column (e.g. a journal reference that
 * itself contains commas). Blank and non-string cells contribute nothing.
 */
export function column(table: Table, field: string): string[] {
  if (!table.columns.includes(field)) {
    throw new MissingFieldError(field, table.columns);
  }

  const values: string[] = [];
  for (const row of table.rows) {
    const cell = row[field];
    if (typeof cell === 'string' && cell.trim() !== '') {
      values.push(cell.trim());
    }
  }
  return values;
}

/**
 * Incremental counterpart of `tally`, for producers that hand over values
 * one at a time. Empty strings are ignored.
 */
export class TallyAccumulator {
  private counts = new Map<string, number>();
  private total = 0;

  add(value: string): void {
    if (value === '') return;
    this.counts.set(value, (this.counts.get(value) ?? 0) + 1);
    this.total++;
  }

  addAll(values: Iterable<string>): void {
    for (const value of values) {
      this.add(value);
    }
  }

  result(): TallyResult {
    const counts = new Map(this.counts);
    // Array.prototype.sort is stable, so equal counts keep first-seen order
    const ranking = Array.from(counts, ([value, count]) => ({ value, count })).sort(
      (a, b) => b.count - a.count
    );

    return { counts, ranking, total: this.total };
  }
}

export function tally(values: Iterable<string>): TallyResult {
  const accumulator = new TallyAccumulator();
  accumulator.addAll(values);
  return accumulator.result();
}

/** Fold a streaming producer (e.g. values mapped from arXiv results) into a tally. */
export async function tallyStream(values: AsyncIterable<string | string[]>): Promise<TallyResult> {
  const accumulator = new TallyAccumulator();

  for await (const value of values) {
    if (Array.isArray(value)) {
      accumulator.addAll(value);
    } else {
      accumulator.add(value);
    }
  }

  return accumulator.result();
}

/**
 * The k most frequent entries, highest count first. Ties keep the order in
 * which values were first seen. A k beyond the number of distinct values is
 * clamped rather than rejected.
 */
export function top(result: TallyResult, k: number = 1): TallyEntry[] {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidArgumentError(`k must be a positive integer, got ${k}`);
  }

  return result.ranking.slice(0, k).map((entry) => ({ ...entry }));
}

/** Write one value per row under a single header column. */
export async function exportColumn(
  values: readonly string[],
  path: string,
  header: string = DEFAULT_EXPORT_HEADER
): Promise<void> {
  const csv = stringify(
    values.map((value) => [value]),
    { header: true, columns: [header] }
  );

  try {
    await writeFile(path, csv, 'utf-8');
  } catch (error) {
    throw new IOError(`Cannot write export to ${path}`, path, error);
  }
}
