/**
 * Span extraction — the half-open range of terminal positions each node covers.
 *
 * Positions count terminals left to right, skipping `-NONE-` elements, which
 * get a zero-width span where they occur. Every terminal and non-terminal
 * yields one span; wrappers yield none.
 */

import { type TreeNode, isEmptyElement, nodeLabel } from './tree.js';
import { traverse } from './traverse.js';

export interface Span {
  label: string;
  begin: number;
  end: number;
}

interface SpanState {
  position: number;
  /** Index in `spans` reserved for the node being visited. */
  slot: number;
  spans: Span[];
}

/**
 * begin ascending; at equal begin, empty spans first, then end descending.
 * Array.prototype.sort is stable, so remaining ties keep pre-order.
 */
export function compareSpans(a: Span, b: Span): number {
  if (a.begin !== b.begin) return a.begin - b.begin;
  const aEmpty = a.begin === a.end;
  const bEmpty = b.begin === b.end;
  if (aEmpty !== bEmpty) return aEmpty ? -1 : 1;
  return b.end - a.end;
}

export function allSpans(tree: TreeNode): Span[] {
  const { spans } = traverse<SpanState>(tree, {
    pre: (node, state) => {
      if (node.kind === 'wrapper') return state;
      const slot = state.spans.length;
      // Reserved in pre-order, filled in once the children are counted.
      state.spans.push({ label: nodeLabel(node), begin: state.position, end: state.position });
      return { ...state, slot };
    },
    post: (node, state, entered) => {
      if (node.kind === 'wrapper') return state;
      const position = node.kind === 'terminal' && !isEmptyElement(node)
        ? state.position + 1
        : state.position;
      state.spans[entered.slot].end = position;
      return { ...state, position };
    },
  }, { position: 0, slot: -1, spans: [] });

  return spans.sort(compareSpans);
}

/** Number of positions the tree covers: its non-empty terminals. */
export function yieldLength(tree: TreeNode): number {
  return traverse<number>(tree, {
    post: (node, count) => (node.kind === 'terminal' && !isEmptyElement(node) ? count + 1 : count),
  }, 0);
}
