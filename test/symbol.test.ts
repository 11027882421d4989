import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  decodeSymbol, plainSymbol, symbolToString, symbolsEqual, withoutCoindex,
} from '../src/symbol.js';
import { MalformedLabelError } from '../src/errors.js';

describe('decodeSymbol', () => {
  it('reads a bare label', () => {
    expect(decodeSymbol('NP')).toEqual({ label: 'NP', tags: [], coindex: null, parindex: null });
  });

  it('reads function tags and a coindex', () => {
    expect(decodeSymbol('NP-SBJ-1')).toEqual({ label: 'NP', tags: ['SBJ'], coindex: '1', parindex: null });
    expect(decodeSymbol('S-TPC-1')).toEqual({ label: 'S', tags: ['TPC'], coindex: '1', parindex: null });
  });

  it('keeps tags in order of appearance', () => {
    expect(decodeSymbol('PP-LOC-CLR').tags).toEqual(['LOC', 'CLR']);
    expect(decodeSymbol('NP-SBJ-SBJ').tags).toEqual(['SBJ', 'SBJ']);
  });

  it('tells the gap index from the coindex by its marker', () => {
    expect(decodeSymbol('WHNP-2=3')).toEqual({ label: 'WHNP', tags: [], coindex: '2', parindex: '3' });
    expect(decodeSymbol('NP=3-2')).toEqual({ label: 'NP', tags: [], coindex: '2', parindex: '3' });
    expect(decodeSymbol('NP=2')).toEqual({ label: 'NP', tags: [], coindex: null, parindex: '2' });
  });

  it('accepts any non-digit characters in the label', () => {
    expect(decodeSymbol('PRT|ADVP').label).toBe('PRT|ADVP');
    expect(decodeSymbol('ADJP*').label).toBe('ADJP*');
  });

  it('skips characters that fit no part', () => {
    expect(decodeSymbol('NP-SBJ-1x')).toEqual({ label: 'NP', tags: ['SBJ'], coindex: '1', parindex: null });
  });

  it('rejects labels without a leading category', () => {
    expect(() => decodeSymbol('-NONE-')).toThrow(MalformedLabelError);
    expect(() => decodeSymbol('123')).toThrow(MalformedLabelError);
    expect(() => decodeSymbol('')).toThrow(MalformedLabelError);
  });

  it('rejects a repeated coindex or gap index', () => {
    expect(() => decodeSymbol('NP-1-2')).toThrow(/more than one coindex/);
    expect(() => decodeSymbol('NP=1=2')).toThrow(/more than one gap index/);
  });

  it('reports where the label came from', () => {
    try {
      decodeSymbol('=1', { line: 3, col: 4 });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof MalformedLabelError)) throw err;
      expect(err.atom).toBe('=1');
      expect(err.position).toEqual({ line: 3, col: 4 });
      expect(err.message).toBe("Label '=1' does not start with a category at line 3, column 4");
    }
  });
});

describe('symbolToString', () => {
  it('writes tags, then gap index, then coindex', () => {
    expect(symbolToString(decodeSymbol('NP-SBJ-1'))).toBe('NP-SBJ-1');
    expect(symbolToString(decodeSymbol('WHNP-2=3'))).toBe('WHNP=3-2');
    expect(symbolToString(plainSymbol('VP'))).toBe('VP');
  });

  it('round-trips through decodeSymbol', () => {
    const parts = fc.record({
      label: fc.constantFrom('S', 'NP', 'VP', 'WHNP', 'PP', 'ADVP', 'SBAR'),
      tags: fc.array(fc.constantFrom('SBJ', 'TPC', 'LOC', 'CLR', 'PRD', 'TMP'), { maxLength: 3 }),
      coindex: fc.option(fc.integer({ min: 0, max: 99 }).map(String), { nil: null }),
      parindex: fc.option(fc.integer({ min: 0, max: 99 }).map(String), { nil: null }),
      coindexFirst: fc.boolean(),
    });
    fc.assert(fc.property(parts, ({ label, tags, coindex, parindex, coindexFirst }) => {
      const co = coindex === null ? '' : `-${coindex}`;
      const par = parindex === null ? '' : `=${parindex}`;
      const atom = label + tags.map(t => `-${t}`).join('') + (coindexFirst ? co + par : par + co);

      const sym = decodeSymbol(atom);
      expect(sym).toEqual({ label, tags, coindex, parindex });
      expect(symbolToString(sym)).toBe(label + tags.map(t => `-${t}`).join('') + par + co);
      expect(decodeSymbol(symbolToString(sym))).toEqual(sym);
    }));
  });
});

describe('symbol helpers', () => {
  it('symbolsEqual compares every field, tags in order', () => {
    expect(symbolsEqual(decodeSymbol('NP-SBJ-1'), decodeSymbol('NP-SBJ-1'))).toBe(true);
    expect(symbolsEqual(decodeSymbol('NP-SBJ-1'), decodeSymbol('NP-SBJ-2'))).toBe(false);
    expect(symbolsEqual(decodeSymbol('NP-A-B'), decodeSymbol('NP-B-A'))).toBe(false);
    expect(symbolsEqual(decodeSymbol('NP=1'), decodeSymbol('NP-1'))).toBe(false);
  });

  it('withoutCoindex keeps tags and gap index', () => {
    const sym = decodeSymbol('NP-SBJ=2-1');
    expect(symbolToString(withoutCoindex(sym))).toBe('NP-SBJ=2');
    expect(sym.coindex).toBe('1');
  });
});
