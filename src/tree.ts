/**
 * Treebank tree nodes.
 *
 * A node is a terminal `(TAG word)`, a labelled non-terminal, or the
 * label-less wrapper `( ... )` that treebank files put around each sentence.
 * Children are ordered and owned by their parent; there are no back-pointers.
 */

import { type TreeSymbol, symbolToString } from './symbol.js';

/** POS tag marking an empty (trace or null) element. */
export const NONE_TAG = '-NONE-';

export interface Terminal {
  kind: 'terminal';
  tag: string;
  word: string;
}

export interface NonTerminal {
  kind: 'nonterminal';
  symbol: TreeSymbol;
  children: TreeNode[];
}

export interface Wrapper {
  kind: 'wrapper';
  child: TreeNode;
}

export type TreeNode = Terminal | NonTerminal | Wrapper;

// --- Creation ---

export function newTerminal(tag: string, word: string): Terminal {
  return { kind: 'terminal', tag, word };
}

export function newNonTerminal(symbol: TreeSymbol, children: TreeNode[]): NonTerminal {
  return { kind: 'nonterminal', symbol, children };
}

export function newWrapper(child: TreeNode): Wrapper {
  return { kind: 'wrapper', child };
}

// --- Predicates ---

export function isTerminal(node: TreeNode): node is Terminal {
  return node.kind === 'terminal';
}

export function isNonTerminal(node: TreeNode): node is NonTerminal {
  return node.kind === 'nonterminal';
}

export function isWrapper(node: TreeNode): node is Wrapper {
  return node.kind === 'wrapper';
}

/** True for a `-NONE-` terminal. */
export function isEmptyElement(node: TreeNode): node is Terminal {
  return node.kind === 'terminal' && node.tag === NONE_TAG;
}

// --- Navigation ---

/** Strip any number of wrappers. */
export function unwrap(node: TreeNode): Terminal | NonTerminal {
  let n = node;
  while (n.kind === 'wrapper') n = n.child;
  return n;
}

/** Children as seen through wrappers: a wrapper has its one child, a terminal none. */
export function childrenOf(node: TreeNode): TreeNode[] {
  switch (node.kind) {
    case 'terminal':
      return [];
    case 'nonterminal':
      return node.children;
    case 'wrapper':
      return [node.child];
  }
}

/** Get the nth child (1-indexed). Returns null if out of bounds. */
export function childAt(node: TreeNode, index: number): TreeNode | null {
  return childrenOf(node)[index - 1] ?? null;
}

export function childCount(node: TreeNode): number {
  return childrenOf(node).length;
}

/** Label as written in a bracketing: the tag of a terminal, the symbol of a non-terminal. */
export function nodeLabel(node: Terminal | NonTerminal): string {
  return node.kind === 'terminal' ? node.tag : symbolToString(node.symbol);
}

/** Deep clone a tree. */
export function clone<T extends TreeNode>(node: T): T;
export function clone(node: TreeNode): TreeNode {
  switch (node.kind) {
    case 'terminal':
      return newTerminal(node.tag, node.word);
    case 'nonterminal':
      return newNonTerminal(
        { ...node.symbol, tags: [...node.symbol.tags] },
        node.children.map(c => clone(c)),
      );
    case 'wrapper':
      return newWrapper(clone(node.child));
  }
}

// --- Serialization ---

/** One-line bracketing. A wrapper prints as its child. */
export function treeToString(node: TreeNode): string {
  switch (node.kind) {
    case 'terminal':
      return `(${node.tag} ${node.word})`;
    case 'nonterminal':
      return `(${symbolToString(node.symbol)} ${node.children.map(treeToString).join(' ')})`;
    case 'wrapper':
      return treeToString(node.child);
  }
}

/** Indented bracketing, one non-terminal per line. */
export function treeToPrettyString(node: TreeNode, indent = 0): string {
  const n = unwrap(node);
  const prefix = '  '.repeat(indent);
  if (n.kind === 'terminal') return `${prefix}(${n.tag} ${n.word})`;
  if (n.children.every(c => unwrap(c).kind === 'terminal')) {
    return `${prefix}${treeToString(n)}`;
  }
  let s = `${prefix}(${symbolToString(n.symbol)}\n`;
  s += n.children.map(c => treeToPrettyString(c, indent + 1)).join('\n');
  return `${s})`;
}

/** Convert tree to a plain JSON-serializable object. Wrappers are dropped. */
export function treeToJSON(node: TreeNode): object {
  const n = unwrap(node);
  if (n.kind === 'terminal') return { tag: n.tag, word: n.word };
  const obj: Record<string, unknown> = { label: n.symbol.label };
  if (n.symbol.tags.length > 0) obj.tags = [...n.symbol.tags];
  if (n.symbol.coindex !== null) obj.coindex = n.symbol.coindex;
  if (n.symbol.parindex !== null) obj.parindex = n.symbol.parindex;
  obj.children = n.children.map(treeToJSON);
  return obj;
}
