/**
 * Error taxonomy for reading and transforming treebank trees.
 */

/** 1-based line and column of a token in the source. */
export interface SourcePosition {
  line: number;
  col: number;
}

export class TreebankError extends Error {
  constructor(message: string, public readonly position: SourcePosition | null = null) {
    super(position ? `${message} at line ${position.line}, column ${position.col}` : message);
    this.name = 'TreebankError';
  }
}

/** Stray `)` or an unterminated `(`. Ends the input stream. */
export class UnbalancedParenthesesError extends TreebankError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'UnbalancedParenthesesError';
  }
}

/** A node label with no leading category, or with a repeated index. */
export class MalformedLabelError extends TreebankError {
  constructor(message: string, public readonly atom: string, position: SourcePosition | null = null) {
    super(message, position);
    this.name = 'MalformedLabelError';
  }
}

/** Balanced brackets that still do not describe a tree node. */
export class MalformedTreeError extends TreebankError {
  constructor(message: string, position: SourcePosition) {
    super(message, position);
    this.name = 'MalformedTreeError';
  }
}

/** Raised when a caller requires a tree that removeEmptyElements deleted entirely. */
export class EmptyTreeError extends TreebankError {
  constructor(message = 'Tree has no remaining elements') {
    super(message);
    this.name = 'EmptyTreeError';
  }
}
