import { describe, it, expect } from 'vitest';
import { cellValues, readCell, toListLiteral } from './cell.js';

describe('readCell', () => {
  it('splits a comma-joined string into values', () => {
    expect(readCell('a, b, a')).toEqual({ kind: 'multi', values: ['a', 'b', 'a'] });
  });

  it('treats non-strings as missing', () => {
    expect(readCell(null)).toEqual({ kind: 'missing' });
    expect(readCell(undefined)).toEqual({ kind: 'missing' });
    expect(readCell(42)).toEqual({ kind: 'missing' });
    expect(readCell(['a', 'b'])).toEqual({ kind: 'missing' });
  });

  it('treats blank strings as missing', () => {
    expect(readCell('')).toEqual({ kind: 'missing' });
    expect(readCell('   ')).toEqual({ kind: 'missing' });
  });

  it('returns a single value when there is no delimiter', () => {
    expect(readCell('  astro-ph.GA ')).toEqual({ kind: 'string', value: 'astro-ph.GA' });
  });

  it('strips list-literal decoration', () => {
    expect(readCell("['x', 'y']")).toEqual({ kind: 'multi', values: ['x', 'y'] });
    expect(readCell('["Ada Example", "Bo Sample"]')).toEqual({
      kind: 'multi',
      values: ['Ada Example', 'Bo Sample'],
    });
    expect(readCell("['only']")).toEqual({ kind: 'string', value: 'only' });
  });

  it('keeps quoted list items whole when they contain the delimiter', () => {
    expect(readCell("['Smith, J.', 'Doe, A.']")).toEqual({ kind: 'multi', values: ['Smith, J.', 'Doe, A.'] });
    expect(readCell("['Smith, J.']")).toEqual({ kind: 'string', value: 'Smith, J.' });
  });

  it('reads double-quoted items containing apostrophes', () => {
    expect(readCell(`["O'Brien", 'x']`)).toEqual({ kind: 'multi', values: ["O'Brien", 'x'] });
  });

  it('unescapes quotes inside single-quoted items', () => {
    expect(readCell("['it\\'s', 'b']")).toEqual({ kind: 'multi', values: ["it's", 'b'] });
  });

  it('treats an empty list literal as missing', () => {
    expect(readCell('[]')).toEqual({ kind: 'missing' });
    expect(readCell('[None]')).toEqual({ kind: 'missing' });
  });

  it('turns placeholder items into empty values', () => {
    expect(readCell("[None, 'Example University']")).toEqual({
      kind: 'multi',
      values: ['', 'Example University'],
    });
  });

  it('keeps empty items between delimiters', () => {
    expect(readCell('a, , b')).toEqual({ kind: 'multi', values: ['a', '', 'b'] });
  });

  it('honours a custom delimiter', () => {
    expect(readCell('a; b;c', '; ')).toEqual({ kind: 'multi', values: ['a', 'b;c'] });
  });

  it('leaves apostrophes alone outside list literals', () => {
    expect(readCell("O'Neil, D'Arcy")).toEqual({ kind: 'multi', values: ["O'Neil", "D'Arcy"] });
  });
});

describe('toListLiteral', () => {
  it('writes None for absent slots', () => {
    expect(toListLiteral([null, 'Example University'])).toBe("[None, 'Example University']");
    expect(toListLiteral([])).toBe('[]');
  });

  it('switches to double quotes for values with apostrophes', () => {
    expect(toListLiteral(["King's College", 'MIT'])).toBe(`["King's College", 'MIT']`);
  });

  it('is read back by readCell', () => {
    const literal = toListLiteral(['Dept. of Physics, Example University', null, "King's College"]);

    expect(readCell(literal)).toEqual({
      kind: 'multi',
      values: ['Dept. of Physics, Example University', '', "King's College"],
    });
  });
});

describe('cellValues', () => {
  it('returns the values of each cell kind', () => {
    expect(cellValues({ kind: 'missing' })).toEqual([]);
    expect(cellValues({ kind: 'string', value: 'x' })).toEqual(['x']);
    expect(cellValues({ kind: 'multi', values: ['x', 'y'] })).toEqual(['x', 'y']);
  });

  it('does not hand out the cell array itself', () => {
    const cell = { kind: 'multi' as const, values: ['x', 'y'] };
    cellValues(cell).push('z');
    expect(cell.values).toEqual(['x', 'y']);
  });
});
