import { readFile, writeFile } from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { IOError } from '../errors.js';
import type { PaperRecord, Table } from '../types/paper.js';

/**
 * Build a Table from records. Without explicit columns the schema is taken
 * from the keys of the first record.
 */
export function createTable(rows: readonly PaperRecord[], columns?: readonly string[]): Table {
  return {
    columns: columns ? [...columns] : Object.keys(rows[0] ?? {}),
    rows,
  };
}

export function parseTable(csv: string): Table {
  // Without a columns option csv-parse yields one string array per line
  const parsed: string[][] = parse(csv, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });

  const [header = [], ...body] = parsed;
  const columns = header.map((name) => name.trim());

  const rows = body.map((cells) => {
    const record: Record<string, string> = {};
    // Short rows leave their trailing cells absent
    cells.forEach((cell, index) => {
      if (index < columns.length) {
        record[columns[index]] = cell;
      }
    });
    return record;
  });

  return { columns, rows };
}

export async function loadTable(path: string): Promise<Table> {
  let csv: string;
  try {
    csv = await readFile(path, 'utf-8');
  } catch (error) {
    throw new IOError(`Cannot read table from ${path}`, path, error);
  }
  return parseTable(csv);
}

function toCsvCell(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

export async function saveTable(table: Table, path: string): Promise<void> {
  const csv = stringify(
    table.rows.map((row) => table.columns.map((column) => toCsvCell(row[column]))),
    { header: true, columns: [...table.columns] }
  );

  try {
    await writeFile(path, csv, 'utf-8');
  } catch (error) {
    throw new IOError(`Cannot write table to ${path}`, path, error);
  }
}
