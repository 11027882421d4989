/**
 * TreeSymbol — a decoded non-terminal label.
 *
 * A label such as `NP-SBJ-1=2` carries a bare category (`NP`), function
 * tags (`SBJ`), a coindex (`1`) and a gap index (`2`).
 */

import { MalformedLabelError, type SourcePosition } from './errors.js';

export interface TreeSymbol {
  label: string;
  tags: string[];
  coindex: string | null;
  parindex: string | null;
}

// label | -tag | =parindex | -coindex; characters matching none are skipped
const LABEL_PART = /(^[^0-9=-]+)|-([^0-9=-]+)|=([0-9]+)|-([0-9]+)/g;

/** Decode a label atom. Throws MalformedLabelError when there is no leading category. */
export function decodeSymbol(atom: string, position: SourcePosition | null = null): TreeSymbol {
  let label: string | null = null;
  const tags: string[] = [];
  let coindex: string | null = null;
  let parindex: string | null = null;

  for (const m of atom.matchAll(LABEL_PART)) {
    const [, head, tag, par, co] = m;
    if (head !== undefined) {
      label = head;
    } else if (tag !== undefined) {
      tags.push(tag);
    } else if (par !== undefined) {
      if (parindex !== null) {
        throw new MalformedLabelError(`Label '${atom}' has more than one gap index`, atom, position);
      }
      parindex = par;
    } else if (co !== undefined) {
      if (coindex !== null) {
        throw new MalformedLabelError(`Label '${atom}' has more than one coindex`, atom, position);
      }
      coindex = co;
    }
  }

  if (label === null) {
    throw new MalformedLabelError(`Label '${atom}' does not start with a category`, atom, position);
  }
  return { label, tags, coindex, parindex };
}

/** A symbol with a bare label and no decorations. */
export function plainSymbol(label: string): TreeSymbol {
  return { label, tags: [], coindex: null, parindex: null };
}

/** Canonical form: label, then -tags, then =parindex, then -coindex. */
export function symbolToString(sym: TreeSymbol): string {
  let s = sym.label;
  for (const tag of sym.tags) s += `-${tag}`;
  if (sym.parindex !== null) s += `=${sym.parindex}`;
  if (sym.coindex !== null) s += `-${sym.coindex}`;
  return s;
}

export function symbolsEqual(a: TreeSymbol, b: TreeSymbol): boolean {
  return a.label === b.label
    && a.coindex === b.coindex
    && a.parindex === b.parindex
    && a.tags.length === b.tags.length
    && a.tags.every((t, i) => t === b.tags[i]);
}

/** Copy of a symbol with the coindex dropped. */
export function withoutCoindex(sym: TreeSymbol): TreeSymbol {
  return { ...sym, tags: [...sym.tags], coindex: null };
}
