/**
 * Sentence-level views of a tree: its leaves, and an index line per tree.
 */

import { type Terminal, type TreeNode, isEmptyElement, treeToString } from './tree.js';
import { traverse } from './traverse.js';

export interface TerminalOptions {
  /** Keep `-NONE-` elements (default false). */
  includeNulls?: boolean;
}

/** Terminals in source order. */
export function terminals(tree: TreeNode, options: TerminalOptions = {}): Terminal[] {
  return traverse<Terminal[]>(tree, {
    pre: (node, leaves) => {
      if (node.kind === 'terminal' && (options.includeNulls || !isEmptyElement(node))) {
        leaves.push(node);
      }
      return leaves;
    },
  }, []);
}

/** A tree paired with its leaves, for lookups by word position. */
export interface ParsedSentence {
  leaves: Terminal[];
  tree: TreeNode;
}

/** Leaves exclude `-NONE-` elements, so leaf i is word position i in allSpans(). */
export function toParsedSentence(tree: TreeNode): ParsedSentence {
  return { leaves: terminals(tree), tree };
}

export function wordAt(sentence: ParsedSentence, index: number): string | null {
  return sentence.leaves[index]?.word ?? null;
}

export function tagAt(sentence: ParsedSentence, index: number): string | null {
  return sentence.leaves[index]?.tag ?? null;
}

export function sentenceText(sentence: ParsedSentence): string {
  return sentence.leaves.map(l => l.word).join(' ');
}

export interface SentenceRecord {
  file: string;
  /** 0-based position of the tree in its file. */
  sentence: number;
  /** Non-empty leaves. */
  length: number;
  text: string;
}

export function* indexSentences(trees: Iterable<TreeNode>, file: string): Generator<SentenceRecord> {
  let sentence = 0;
  for (const tree of trees) {
    yield { file, sentence, length: terminals(tree).length, text: treeToString(tree) };
    sentence++;
  }
}

export function formatSentenceRecord(record: SentenceRecord): string {
  return `${record.file}|${record.sentence}|${record.length}|${record.text}`;
}
