#!/usr/bin/env node
import fs from 'fs';
import yargs from 'yargs/yargs';
import { hideBin } from 'yargs/helpers';
import * as debug from '../utils/debug.js';
import { analyzeText, answerLines, ParserChoice } from './cli.js';

const parserChoices: readonly ParserChoice[] = ['auto', 'll1', 'slr1'];
const defaultParser: ParserChoice = 'auto';

const parser = yargs(hideBin(process.argv))
  .scriptName('grammarlab')
  .command({
    command: 'analyze <file>',
    describe:
      'print first/follow sets and whether a grammar is LL(1) or SLR(1), then parse sentences',
    aliases: ['$0'],
    builder: (yargs) =>
      yargs
        .positional('file', {
          describe: 'grammar file, one `A -> a b | e` rule per line',
          type: 'string',
          demandOption: true,
        })
        .option('parser', {
          alias: 'p',
          choices: parserChoices,
          default: defaultParser,
          describe: 'which parser answers the sentences',
        })
        .option('sentence', {
          alias: 's',
          type: 'string',
          array: true,
          describe: 'sentence to parse, e.g. "id+id*id$"',
        })
        .option('interactive', {
          alias: 'i',
          type: 'boolean',
          default: false,
          describe: 'read sentences from stdin until a blank line',
        })
        .option('tables', {
          type: 'boolean',
          default: false,
          describe: 'also print the parse tables and LR(0) states',
        })
        .option('epsilon', {
          type: 'string',
          default: 'e',
          describe: 'alternative that stands for the empty string',
        })
        .option('color', {
          type: 'boolean',
          default: process.stdout.isTTY === true,
        }),
    handler: async (argv) => {
      debug.useColors(argv.color);
      const text = fs.readFileSync(argv.file, { encoding: 'utf-8' });
      const write = (line: string) => console.log(line);
      const { code, analysis, kind } = analyzeText(
        text,
        {
          parser: argv.parser,
          sentences: argv.sentence ?? [],
          tables: argv.tables,
          epsilon: argv.epsilon,
        },
        write
      );
      if (argv.interactive && analysis && kind) {
        await answerLines(analysis, kind, process.stdin, write);
      }
      process.exitCode = code;
    },
  })
  .strict();

parser.parseAsync().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
