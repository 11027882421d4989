/**
 * Command implementations for the `treebank` CLI. Each command turns input
 * text into output lines; reading files and printing stays in cli.ts.
 */

import { parse, type RecoverableParseError } from '../parser.js';
import { type TreeNode, treeToString, treeToPrettyString } from '../tree.js';
import {
  type EmptyTree, isEmptyTree, removeEmptyElements, simplifyLabels, addRoot,
} from '../transforms.js';
import { allSpans } from '../spans.js';
import { terminals, indexSentences, formatSentenceRecord } from '../sentence.js';
import { topLevelPattern, formatPattern } from '../patterns.js';
import { type Logger, createLogger } from '../logger.js';

export interface CommandInput {
  text: string;
  /** Name shown in output and diagnostics. */
  file: string;
  /** Report malformed trees and continue with the next one. */
  keepGoing?: boolean;
  logger?: Logger;
}

export interface TransformOptions {
  removeEmpty?: boolean;
  simplify?: boolean;
  /** Root label to add, or null to leave the root alone. */
  addRoot?: string | null;
}

function loggerFor(input: CommandInput): Logger {
  return input.logger ?? createLogger('cli');
}

function* readTrees(input: CommandInput): Generator<TreeNode> {
  const logger = loggerFor(input);
  const onError = input.keepGoing
    ? (err: RecoverableParseError): void => {
        logger.warn(`${input.file}: ${err.message}`, { error: err.name });
      }
    : undefined;
  yield* parse(input.text, { onError });
}

/** Apply the selected transforms in the fixed order: remove empties, simplify, add root. */
export function applyTransforms(tree: TreeNode, options: TransformOptions): TreeNode | EmptyTree {
  let result: TreeNode | EmptyTree = tree;
  if (options.removeEmpty) result = removeEmptyElements(result);
  if (isEmptyTree(result)) return result;
  if (options.simplify) result = simplifyLabels(result);
  if (options.addRoot) result = addRoot(result, options.addRoot);
  return result;
}

function* transformedTrees(input: CommandInput, options: TransformOptions): Generator<TreeNode> {
  const logger = loggerFor(input);
  let sentence = 0;
  for (const tree of readTrees(input)) {
    const result = applyTransforms(tree, options);
    if (isEmptyTree(result)) {
      logger.warn(`${input.file}: tree ${sentence} has no elements left`, { sentence });
    } else {
      yield result;
    }
    sentence++;
  }
}

export function* printCommand(
  input: CommandInput,
  options: TransformOptions & { pretty?: boolean },
): Generator<string> {
  for (const tree of transformedTrees(input, options)) {
    yield options.pretty ? treeToPrettyString(tree) : treeToString(tree);
  }
}

/** `label begin end` per span, with a blank line after each tree. */
export function* spansCommand(input: CommandInput, options: TransformOptions): Generator<string> {
  for (const tree of transformedTrees(input, options)) {
    for (const span of allSpans(tree)) {
      yield `${span.label} ${span.begin} ${span.end}`;
    }
    yield '';
  }
}

export function* leavesCommand(input: CommandInput, options: { includeNulls?: boolean }): Generator<string> {
  for (const tree of readTrees(input)) {
    yield '----';
    for (const leaf of terminals(tree, options)) {
      yield `${leaf.word}/${leaf.tag}`;
    }
    yield '----';
  }
}

export function* indexCommand(input: CommandInput): Generator<string> {
  for (const record of indexSentences(readTrees(input), input.file)) {
    yield formatSentenceRecord(record);
  }
}

export function* patternsCommand(input: CommandInput, options: { reportVerbs?: boolean }): Generator<string> {
  for (const tree of readTrees(input)) {
    yield formatPattern(topLevelPattern(tree, options));
  }
}
