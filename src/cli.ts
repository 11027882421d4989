#!/usr/bin/env node
import fs from 'node:fs';
import { cac } from 'cac';
import {
  type CommandInput, type TransformOptions,
  printCommand, spansCommand, leavesCommand, indexCommand, patternsCommand,
} from './cli/commands.js';
import { handleError } from './cli/error-handler.js';
import { ConfigService } from './config.js';

interface CommonFlags {
  keepGoing?: boolean;
}

interface TransformFlags extends CommonFlags {
  removeEmpty?: boolean;
  simplify?: boolean;
  addRoot?: string | boolean;
}

/** Read a file, or standard input for `-` or no argument. */
function readInput(file: string | undefined, flags: CommonFlags): CommandInput {
  if (file === undefined || file === '-') {
    return { text: fs.readFileSync(0, 'utf8'), file: '<stdin>', keepGoing: Boolean(flags.keepGoing) };
  }
  return { text: fs.readFileSync(file, 'utf8'), file, keepGoing: Boolean(flags.keepGoing) };
}

function toTransformOptions(flags: TransformFlags): TransformOptions {
  let addRoot: string | null = null;
  if (typeof flags.addRoot === 'string') addRoot = flags.addRoot;
  else if (flags.addRoot === true) addRoot = ConfigService.getInstance().rootLabel;
  return {
    removeEmpty: Boolean(flags.removeEmpty),
    simplify: Boolean(flags.simplify),
    addRoot,
  };
}

function emit(lines: Iterable<string>): void {
  for (const line of lines) console.log(line);
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => void) {
  return (...args: Args): void => {
    const file = typeof args[0] === 'string' ? args[0] : undefined;
    try {
      fn(...args);
    } catch (error) {
      handleError(error, file);
    }
  };
}

function main(): void {
  const cli = cac('treebank');

  cli
    .command('print [file]', 'Print trees, optionally transformed')
    .option('--remove-empty', 'Delete -NONE- elements and constituents left empty')
    .option('--simplify', 'Strip function tags and indices from labels')
    .option('--add-root [label]', 'Put each tree under a root node (default ROOT)')
    .option('--pretty', 'Indent one constituent per line')
    .option('--keep-going', 'Skip malformed trees instead of stopping')
    .action(
      wrapAction((file: string | undefined, flags: TransformFlags & { pretty?: boolean }) => {
        emit(printCommand(readInput(file, flags), { ...toTransformOptions(flags), pretty: Boolean(flags.pretty) }));
      })
    );

  cli
    .command('spans [file]', 'Print the span of every node as "label begin end"')
    .option('--remove-empty', 'Delete -NONE- elements first')
    .option('--simplify', 'Strip function tags and indices first')
    .option('--add-root [label]', 'Put each tree under a root node first')
    .option('--keep-going', 'Skip malformed trees instead of stopping')
    .action(
      wrapAction((file: string | undefined, flags: TransformFlags) => {
        emit(spansCommand(readInput(file, flags), toTransformOptions(flags)));
      })
    );

  cli
    .command('leaves [file]', 'Print word/tag for every leaf')
    .option('--include-nulls', 'Include -NONE- elements')
    .option('--keep-going', 'Skip malformed trees instead of stopping')
    .action(
      wrapAction((file: string | undefined, flags: CommonFlags & { includeNulls?: boolean }) => {
        emit(leavesCommand(readInput(file, flags), { includeNulls: Boolean(flags.includeNulls) }));
      })
    );

  cli
    .command('index [file]', 'Print file|sentence|length|tree for every tree')
    .option('--keep-going', 'Skip malformed trees instead of stopping')
    .action(
      wrapAction((file: string | undefined, flags: CommonFlags) => {
        emit(indexCommand(readInput(file, flags)));
      })
    );

  cli
    .command('patterns [file]', 'Print the top-level structure of every tree')
    .option('--report-verbs', 'Mark constituents headed by a reporting verb')
    .option('--keep-going', 'Skip malformed trees instead of stopping')
    .action(
      wrapAction((file: string | undefined, flags: CommonFlags & { reportVerbs?: boolean }) => {
        emit(patternsCommand(readInput(file, flags), { reportVerbs: Boolean(flags.reportVerbs) }));
      })
    );

  cli.help();
  cli.parse();
}

try {
  main();
} catch (error) {
  handleError(error);
}
