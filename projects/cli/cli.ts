import readline from 'readline';
import {
  analyzeGrammar,
  GrammarAnalysis,
  ParserKind,
} from '../grammar/analysis.js';
import { readGrammar, ReaderOptions } from '../grammar/grammar-reader.js';
import * as debug from '../utils/debug.js';
import { formatAnalysis } from './report.js';

const { colors } = debug;

export type ParserChoice = ParserKind | 'auto';

export type AnalyzeOptions = ReaderOptions & {
  parser: ParserChoice;
  sentences: readonly string[];
  tables: boolean;
};

export type Write = (line: string) => void;

/**
 * The parser to run sentences through: the one asked for, or with `auto`
 * LL(1) when the grammar allows it and SLR(1) otherwise. Undefined when the
 * grammar is outside the chosen class.
 */
export function pickParser(
  analysis: GrammarAnalysis,
  choice: ParserChoice
): ParserKind | undefined {
  switch (choice) {
    case 'll1':
      return analysis.isLL1() ? 'll1' : undefined;
    case 'slr1':
      return analysis.isSLR1() ? 'slr1' : undefined;
    case 'auto':
      if (analysis.isLL1()) {
        return 'll1';
      }
      return analysis.isSLR1() ? 'slr1' : undefined;
  }
}

export function answer(
  analysis: GrammarAnalysis,
  kind: ParserKind,
  sentence: string
): string {
  const result = analysis.parseWith(kind, sentence);
  if (result.isErr()) {
    debug.log(colors.yellow(result.error.message));
  }
  return result.isOk() ? 'Yes' : 'No';
}

/**
 * Print the analysis of a grammar and the verdict for each sentence.
 * @returns the process exit code
 */
export function analyzeText(
  text: string,
  options: AnalyzeOptions,
  write: Write
): { code: number; analysis?: GrammarAnalysis; kind?: ParserKind } {
  const grammar = readGrammar(text, options);
  if (grammar.isErr()) {
    write(colors.red(grammar.error.message));
    return { code: 2 };
  }
  const analysis = analyzeGrammar(grammar.value, {
    endMarker: options.endMarker,
  });
  write(formatAnalysis(analysis, { tables: options.tables }));

  const kind = pickParser(analysis, options.parser);
  if (!kind) {
    if (options.sentences.length > 0) {
      write(colors.red(`No ${options.parser} parser for this grammar.`));
      return { code: 1, analysis };
    }
    return { code: 0, analysis };
  }
  for (const sentence of options.sentences) {
    write(answer(analysis, kind, sentence));
  }
  return { code: 0, analysis, kind };
}

/**
 * Answer one sentence per line of `input` until a blank line or the end of
 * the stream.
 */
export async function answerLines(
  analysis: GrammarAnalysis,
  kind: ParserKind,
  input: NodeJS.ReadableStream,
  write: Write
): Promise<void> {
  const lines = readline.createInterface({ input, terminal: false });
  try {
    for await (const line of lines) {
      const sentence = line.trim();
      if (sentence.length === 0) {
        break;
      }
      write(answer(analysis, kind, sentence));
    }
  } finally {
    lines.close();
  }
}
