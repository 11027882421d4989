/**
 * treebank-trees — Penn Treebank bracketed trees in TypeScript.
 *
 * Public API surface.
 */

// --- Tokens and labels ---
export { lex, TokenType, type Token } from './tokenizer.js';
export {
  type TreeSymbol,
  decodeSymbol, plainSymbol, symbolToString, symbolsEqual, withoutCoindex,
} from './symbol.js';

// --- Trees ---
export {
  type TreeNode, type Terminal, type NonTerminal, type Wrapper,
  NONE_TAG,
  newTerminal, newNonTerminal, newWrapper,
  isTerminal, isNonTerminal, isWrapper, isEmptyElement,
  unwrap, childrenOf, childAt, childCount, nodeLabel, clone,
  treeToString, treeToPrettyString, treeToJSON,
} from './tree.js';
export { parse, parseOne, type ParseOptions, type RecoverableParseError } from './parser.js';

// --- Traversal and transforms ---
export { traverse, walk, type TraverseHooks } from './traverse.js';
export {
  type EmptyTree, EMPTY_TREE, ROOT_LABELS,
  isEmptyTree, expectTree,
  removeEmptyElements, simplifyLabels, addRoot,
} from './transforms.js';

// --- Queries ---
export { allSpans, compareSpans, yieldLength, type Span } from './spans.js';
export {
  terminals, toParsedSentence, wordAt, tagAt, sentenceText,
  indexSentences, formatSentenceRecord,
  type TerminalOptions, type ParsedSentence, type SentenceRecord,
} from './sentence.js';
export {
  topLevelPattern, formatPattern, headVerb, REPORT_VERBS,
  type PatternOptions, type TopLevelPattern,
} from './patterns.js';

// --- Errors, config, logging ---
export {
  TreebankError, UnbalancedParenthesesError, MalformedLabelError, MalformedTreeError, EmptyTreeError,
  type SourcePosition,
} from './errors.js';
export { ConfigService, DEFAULT_ROOT_LABEL } from './config.js';
export { Logger, LogLevel, createLogger, type LogMetadata, type LogSink } from './logger.js';
