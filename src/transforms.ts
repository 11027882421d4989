/**
 * In-place tree transforms built on traverse().
 */

import {
  type TreeNode, type NonTerminal, isEmptyElement, newNonTerminal, unwrap,
} from './tree.js';
import { decodeSymbol, plainSymbol, symbolsEqual } from './symbol.js';
import { traverse } from './traverse.js';
import { EmptyTreeError } from './errors.js';
import { DEFAULT_ROOT_LABEL } from './config.js';

/** What removeEmptyElements returns when nothing of the tree survives. */
export interface EmptyTree {
  kind: 'empty';
}

export const EMPTY_TREE: EmptyTree = Object.freeze({ kind: 'empty' });

/** Labels treated as an existing dummy root by addRoot(). */
export const ROOT_LABELS: readonly string[] = ['ROOT', 'TOP'];

export function isEmptyTree(result: TreeNode | EmptyTree): result is EmptyTree {
  return result.kind === 'empty';
}

/** Narrow a transform result to a tree, throwing EmptyTreeError if it was deleted. */
export function expectTree(result: TreeNode | EmptyTree): TreeNode {
  if (isEmptyTree(result)) throw new EmptyTreeError();
  return result;
}

/** A node with nothing left to dominate. Children are pruned before their parent is checked. */
function isVacant(node: TreeNode): boolean {
  switch (node.kind) {
    case 'terminal':
      return isEmptyElement(node);
    case 'nonterminal':
      return node.children.length === 0;
    case 'wrapper':
      return isVacant(node.child);
  }
}

/**
 * Delete `-NONE-` terminals, then every non-terminal left without children.
 * Surviving siblings keep their order.
 */
export function removeEmptyElements(tree: TreeNode): TreeNode | EmptyTree {
  traverse<void>(tree, {
    post: node => {
      if (node.kind === 'nonterminal') {
        node.children = node.children.filter(c => !isVacant(c));
      }
    },
  }, undefined);
  return isVacant(tree) ? EMPTY_TREE : tree;
}

/** Drop function tags, coindices and gap indices from every non-terminal. */
export function simplifyLabels(tree: TreeNode): TreeNode {
  traverse<void>(tree, {
    pre: node => {
      if (node.kind === 'nonterminal') {
        node.symbol = plainSymbol(node.symbol.label);
      }
    },
  }, undefined);
  return tree;
}

/**
 * Put the tree under a root labelled `rootLabel`.
 *
 * Wrappers are stripped first. A top node labelled ROOT or TOP, or one whose
 * whole symbol equals `rootLabel`, is relabelled instead of wrapped again.
 * Any other top is wrapped, even when its category matches.
 */
export function addRoot(tree: TreeNode, rootLabel: string = DEFAULT_ROOT_LABEL): NonTerminal {
  const symbol = decodeSymbol(rootLabel);
  const top = unwrap(tree);
  if (top.kind === 'nonterminal' && (ROOT_LABELS.includes(top.symbol.label) || symbolsEqual(top.symbol, symbol))) {
    top.symbol = symbol;
    return top;
  }
  return newNonTerminal(symbol, [top]);
}
