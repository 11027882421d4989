/**
 * Depth-first traversal with pre/post hooks and a threaded state.
 *
 * State flows through the walk in visiting order: `pre` sees the state the
 * node is entered with and returns the state for its first child; each child
 * hands its result to the next sibling; `post` gets the state produced by
 * the last child along with the state `pre` returned, and its result is what
 * the node hands on. Omitted hooks pass the state through unchanged.
 */

import { type TreeNode, childrenOf } from './tree.js';

export interface TraverseHooks<S> {
  pre?: (node: TreeNode, state: S) => S;
  post?: (node: TreeNode, state: S, entered: S) => S;
}

export function traverse<S>(node: TreeNode, hooks: TraverseHooks<S>, initial: S): S {
  const entered = hooks.pre ? hooks.pre(node, initial) : initial;
  let state = entered;
  // Snapshot: post hooks may replace a node's child list.
  for (const child of [...childrenOf(node)]) {
    state = traverse(child, hooks, state);
  }
  return hooks.post ? hooks.post(node, state, entered) : state;
}

/** Depth-first walk of all nodes, wrappers included. Calls fn(node) for each. */
export function walk(node: TreeNode, fn: (n: TreeNode) => void): void {
  traverse<void>(node, { pre: n => fn(n) }, undefined);
}
