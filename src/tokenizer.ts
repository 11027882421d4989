/**
 * Bracket tokenizer — splits treebank text into parens and atoms.
 *
 * Lazy and single-pass: a source is read one chunk at a time and tokens
 * are yielded as soon as they are complete.
 */

export enum TokenType {
  LPAREN = 'LPAREN',
  RPAREN = 'RPAREN',
  ATOM = 'ATOM',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  col: number;
}

function isSpace(c: string): boolean {
  return c === ' ' || c === '\t' || c === '\n' || c === '\r' || c === '\f' || c === '\v';
}

/**
 * Tokenize a string, or an iterable of lines.
 *
 * Each element of an iterable counts as a line; its end separates tokens
 * even when it carries no trailing newline.
 */
export function* lex(source: string | Iterable<string>): Generator<Token> {
  const chunks: Iterable<string> = typeof source === 'string' ? [source] : source;
  let line = 1;

  for (const chunk of chunks) {
    let col = 1;
    let atomStart = -1;
    let atomCol = 0;

    for (let i = 0; i < chunk.length; i++) {
      const c = chunk[i];
      const boundary = c === '(' || c === ')' || isSpace(c);

      if (boundary && atomStart >= 0) {
        yield { type: TokenType.ATOM, value: chunk.slice(atomStart, i), line, col: atomCol };
        atomStart = -1;
      }

      if (c === '(') {
        yield { type: TokenType.LPAREN, value: c, line, col };
      } else if (c === ')') {
        yield { type: TokenType.RPAREN, value: c, line, col };
      } else if (!boundary && atomStart < 0) {
        atomStart = i;
        atomCol = col;
      }

      if (c === '\n') {
        line++;
        col = 1;
      } else {
        col++;
      }
    }

    if (atomStart >= 0) {
      yield { type: TokenType.ATOM, value: chunk.slice(atomStart), line, col: atomCol };
    }
    if (typeof source !== 'string' && !chunk.endsWith('\n')) line++;
  }
}
