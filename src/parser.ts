/**
 * Tree builder — turns a token stream into treebank trees.
 *
 * Shift/reduce over an explicit stack: `(` pushes a frame marker, atoms are
 * shifted as they arrive, and `)` reduces everything shifted since the last
 * marker into one node:
 *
 *   (TAG word)        → terminal
 *   (LABEL node+)     → non-terminal with a decoded symbol
 *   ( node )          → label-less wrapper
 *
 * One tree is yielded per balanced top-level group.
 */

import { type Token, TokenType, lex } from './tokenizer.js';
import { decodeSymbol } from './symbol.js';
import { type TreeNode, newTerminal, newNonTerminal, newWrapper } from './tree.js';
import {
  MalformedLabelError, MalformedTreeError, TreebankError, UnbalancedParenthesesError,
  type SourcePosition,
} from './errors.js';
import { createLogger } from './logger.js';

type StackItem =
  | { kind: 'open'; token: Token }
  | { kind: 'atom'; token: Token }
  | { kind: 'node'; node: TreeNode; token: Token };

export type RecoverableParseError = MalformedLabelError | MalformedTreeError;

export interface ParseOptions {
  /**
   * Report malformed trees here instead of throwing. The rest of the
   * offending top-level group is skipped and parsing resumes after it.
   */
  onError?: (error: RecoverableParseError) => void;
}

function positionOf(token: Token): SourcePosition {
  return { line: token.line, col: token.col };
}

const parserLogger = createLogger('parser');

class TreeBuilder {
  private stack: StackItem[] = [];
  private depth = 0;

  /** Open frames on the stack. */
  get openFrames(): number {
    return this.depth;
  }

  /** The unmatched `(` nearest the bottom of the stack, if any. */
  get outermostOpen(): Token | null {
    const first = this.stack.find(item => item.kind === 'open');
    return first ? first.token : null;
  }

  reset(): void {
    this.stack = [];
    this.depth = 0;
  }

  open(token: Token): void {
    this.stack.push({ kind: 'open', token });
    this.depth++;
  }

  atom(token: Token): void {
    if (this.depth === 0) {
      throw new MalformedTreeError(`Unexpected atom '${token.value}' outside of brackets`, positionOf(token));
    }
    this.stack.push({ kind: 'atom', token });
  }

  /** Reduce the innermost frame. Returns a finished tree when the stack empties. */
  close(token: Token): TreeNode | null {
    if (this.depth === 0) {
      throw new UnbalancedParenthesesError(`Unmatched ')'`, positionOf(token));
    }
    let start = this.stack.length - 1;
    while (this.stack[start].kind !== 'open') start--;
    const openToken = this.stack[start].token;
    const items = this.stack.splice(start);
    items.shift();
    this.depth--;

    const node = this.reduce(items, openToken);
    if (this.depth === 0) {
      return node;
    }
    this.stack.push({ kind: 'node', node, token: openToken });
    return null;
  }

  private reduce(items: StackItem[], openToken: Token): TreeNode {
    const where = positionOf(openToken);
    if (items.length === 0) {
      throw new MalformedTreeError('Empty brackets', where);
    }

    const [head, ...rest] = items;
    if (head.kind === 'atom') {
      if (rest.length === 1 && rest[0].kind === 'atom') {
        return newTerminal(head.token.value, rest[0].token.value);
      }
      if (rest.length === 0) {
        throw new MalformedTreeError(`Node '${head.token.value}' has no children`, where);
      }
      const children: TreeNode[] = [];
      for (const item of rest) {
        if (item.kind !== 'node') {
          throw new MalformedTreeError(
            `Unexpected atom '${item.token.value}' among the children of '${head.token.value}'`,
            positionOf(item.token),
          );
        }
        children.push(item.node);
      }
      return newNonTerminal(decodeSymbol(head.token.value, positionOf(head.token)), children);
    }

    const stray = items.find(item => item.kind === 'atom');
    if (stray) {
      throw new MalformedTreeError(`Unexpected atom '${stray.token.value}' after a child node`, positionOf(stray.token));
    }
    if (items.length !== 1 || head.kind !== 'node') {
      throw new MalformedTreeError(`Unlabelled group with ${items.length} children`, where);
    }
    return newWrapper(head.node);
  }
}

/**
 * Parse treebank text into trees, lazily.
 *
 * @param source - A string, or an iterable of lines
 * @throws UnbalancedParenthesesError on a stray `)` or an unterminated `(`
 * @throws MalformedLabelError, MalformedTreeError unless `options.onError` is set
 */
export function* parse(source: string | Iterable<string>, options: ParseOptions = {}): Generator<TreeNode> {
  const builder = new TreeBuilder();
  // Open parens still to be discarded after a recovered error.
  let skipping = 0;
  // Outermost `(` of the group being discarded.
  let skippedOpen: Token | null = null;

  for (const token of lex(source)) {
    if (skipping > 0) {
      if (token.type === TokenType.LPAREN) skipping++;
      else if (token.type === TokenType.RPAREN) skipping--;
      continue;
    }

    try {
      if (token.type === TokenType.LPAREN) {
        builder.open(token);
      } else if (token.type === TokenType.ATOM) {
        builder.atom(token);
      } else {
        const tree = builder.close(token);
        if (tree) yield tree;
      }
    } catch (err) {
      const onError = options.onError;
      if (!onError || !(err instanceof MalformedLabelError || err instanceof MalformedTreeError)) {
        throw err;
      }
      onError(err);
      skipping = builder.openFrames;
      skippedOpen = builder.outermostOpen;
      parserLogger.debug('Skipping rest of malformed tree', { depth: skipping, line: token.line });
      builder.reset();
    }
  }

  const unclosed = skipping > 0 ? skippedOpen : builder.outermostOpen;
  if (unclosed) {
    throw new UnbalancedParenthesesError(`Unmatched '('`, positionOf(unclosed));
  }
}

/** Parse exactly the first tree in the source. */
export function parseOne(source: string | Iterable<string>): TreeNode {
  for (const tree of parse(source)) return tree;
  throw new TreebankError('No tree in input');
}
