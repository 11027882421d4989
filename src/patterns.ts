/**
 * Top-level structure of a tree: the root label and a summary of each
 * immediate constituent, e.g. `S => NP-SBJ VP ./.`.
 */

import { type TreeNode, type Terminal, type NonTerminal, unwrap, nodeLabel } from './tree.js';
import { symbolToString, withoutCoindex } from './symbol.js';

export const REPORT_VERBS: readonly string[] = ['say', 'says', 'said', 'announce', 'announces', 'announced'];

export interface PatternOptions {
  /** Show a constituent headed by a reporting verb as `LABEL/verb`. */
  reportVerbs?: boolean;
}

export interface TopLevelPattern {
  label: string;
  children: string[];
}

function isVerbal(node: Terminal | NonTerminal): boolean {
  return nodeLabel(node).startsWith('V');
}

/**
 * The rightmost verb reached by descending only through constituents whose
 * label starts with `V`. Null when the path ends without a verb.
 */
export function headVerb(node: TreeNode): string | null {
  const n = unwrap(node);
  if (n.kind === 'terminal') {
    return isVerbal(n) ? n.word : null;
  }
  const verbal = n.children.map(unwrap).filter(isVerbal);
  if (verbal.length === 0) return null;
  return headVerb(verbal[verbal.length - 1]);
}

/**
 * `word/tag` for a terminal; otherwise the canonical label without its
 * coindex, wherever the source wrote it (`NP-1=2` prints as `NP=2`).
 */
function describeConstituent(node: TreeNode, options: PatternOptions): string {
  const n = unwrap(node);
  if (n.kind === 'terminal') return `${n.word}/${n.tag}`;
  const label = symbolToString(withoutCoindex(n.symbol));
  if (options.reportVerbs) {
    const verb = headVerb(n);
    if (verb !== null && REPORT_VERBS.includes(verb)) return `${label}/${verb}`;
  }
  return label;
}

export function topLevelPattern(tree: TreeNode, options: PatternOptions = {}): TopLevelPattern {
  const top = unwrap(tree);
  if (top.kind === 'terminal') {
    return { label: top.tag, children: [top.word] };
  }
  return {
    label: symbolToString(top.symbol),
    children: top.children.map(c => describeConstituent(c, options)),
  };
}

export function formatPattern(pattern: TopLevelPattern): string {
  return [pattern.label, '=>', ...pattern.children].join(' ');
}
