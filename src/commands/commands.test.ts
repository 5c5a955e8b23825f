import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { readFileSync } from 'fs';
import type { AxiosAdapter } from 'axios';
import { ArxivClient } from '../api/index.js';
import { loadTable } from '../data/table.js';
import { InvalidArgumentError, MissingFieldError } from '../errors.js';
import { intOption, listOption, parseArgs, stringOption } from './args.js';
import { runExport } from './export.js';
import { runFetch } from './fetch.js';
import { runStats } from './stats.js';

const PAPERS_CSV = "title,authors,keywords\nP1,\"A, B\",\"['dust', 'stars']\"\nP2,B,['stars']\n";

describe('parseArgs', () => {
  it('separates positionals from options', () => {
    const parsed = parseArgs(['data.csv', '--top', '3', '--strip-parens', '--fields', 'authors, keywords']);

    expect(parsed.positionals).toEqual(['data.csv']);
    expect(intOption(parsed, '--top')).toBe(3);
    expect(parsed.options.get('--strip-parens')).toBe(true);
    expect(listOption(parsed, '--fields')).toEqual(['authors', 'keywords']);
    expect(stringOption(parsed, '--header')).toBeUndefined();
  });

  it('treats --help as a flag without a value', () => {
    const parsed = parseArgs(['stats', '--help', 'data.csv']);

    expect(parsed.options.get('--help')).toBe(true);
    expect(parsed.positionals).toEqual(['stats', 'data.csv']);
  });

  it('requires a value after an option', () => {
    expect(() => parseArgs(['--top'])).toThrow(InvalidArgumentError);
  });

  it('rejects a non-integer where one is expected', () => {
    expect(() => intOption(parseArgs(['--top', 'many']), '--top')).toThrow('Option --top expects an integer, got "many"');
  });
});

describe('commands', () => {
  let dir: string;
  let csvPath: string;
  let lines: string[];
  const log = (line: string) => {
    lines.push(line);
  };

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'paper-tally-'));
    csvPath = join(dir, 'papers.csv');
    await writeFile(csvPath, PAPERS_CSV, 'utf-8');
    lines = [];
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('runStats', () => {
    it('summarizes the known multi-valued columns', async () => {
      const summaries = await runStats({ path: csvPath, log });

      expect(summaries.map((s) => s.field)).toEqual(['authors', 'keywords']);
      expect(lines).toEqual([
        `Loaded 2 records from ${csvPath}`,
        '',
        'authors: 3 values, 2 distinct',
        '  1. B (2)',
        '',
        'keywords: 3 values, 2 distinct',
        '  1. stars (2)',
      ]);
    });

    it('fails for a requested column the file lacks', async () => {
      await expect(runStats({ path: csvPath, fields: ['affiliation'], log })).rejects.toBeInstanceOf(
        MissingFieldError
      );
    });
  });

  describe('runExport', () => {
    it('writes the flattened column', async () => {
      const out = join(dir, 'keywords.csv');
      const values = await runExport({ path: csvPath, field: 'keywords', out, log });

      expect(values).toEqual(['dust', 'stars', 'stars']);
      expect(await readFile(out, 'utf-8')).toBe('Keyword\ndust\nstars\nstars\n');
      expect(lines).toEqual([`Wrote 3 keywords values to ${out}`]);
    });
  });

  describe('runFetch', () => {
    const feed = readFileSync(new URL('../api/fixtures/arxiv-feed.xml', import.meta.url), 'utf-8');
    const adapter: AxiosAdapter = async (config) => ({
      data: feed,
      status: 200,
      statusText: 'OK',
      headers: {},
      config,
    });

    it('prints and saves the papers', async () => {
      const out = join(dir, 'fetched.csv');
      const client = new ArxivClient({ baseURL: 'https://arxiv.test/api', requestsPerSecond: 1000, adapter });

      const papers = await runFetch({ query: 'cat:astro-ph.GA', maxResults: 2, out, client, log });

      expect(papers).toHaveLength(2);
      expect(lines.slice(0, 5)).toEqual([
        'Querying arXiv: cat:astro-ph.GA',
        'Found 2 papers\n',
        'Title: A Survey of Test Galaxies',
        'Authors: Ada Example, Bo Sample',
        'Journal ref: Test J. 1 (2024) 1-10',
      ]);
      expect(lines).toContain('Journal ref: None');

      const saved = await loadTable(out);
      expect(saved.rows.map((row) => row.authors)).toEqual(['Ada Example, Bo Sample', 'Bo Sample']);
      expect(saved.rows.map((row) => row.affiliations)).toEqual(["['Example University', None]", '[None]']);
    });

    it('saves papers whose affiliations and journals stats can rank', async () => {
      const out = join(dir, 'fetched.csv');
      const client = new ArxivClient({ baseURL: 'https://arxiv.test/api', requestsPerSecond: 1000, adapter });
      await runFetch({ query: 'cat:astro-ph.GA', out, client, log });
      lines = [];

      const summaries = await runStats({ path: out, fields: ['affiliations', 'journal_ref'], log });

      expect(summaries).toEqual([
        { field: 'affiliations', total: 1, distinct: 1, top: [{ value: 'Example University', count: 1 }] },
        { field: 'journal_ref', total: 1, distinct: 1, top: [{ value: 'Test J', count: 1 }] },
      ]);
    });

    it('rejects an unknown sort field', async () => {
      await expect(runFetch({ query: 'all:dust', sortBy: 'popularity', log })).rejects.toThrow(
        '--sort must be one of relevance, lastUpdatedDate, submittedDate'
      );
    });

    it('rejects a non-positive result count', async () => {
      await expect(runFetch({ query: 'all:dust', maxResults: 0, log })).rejects.toBeInstanceOf(
        InvalidArgumentError
      );
    });
  });
});
