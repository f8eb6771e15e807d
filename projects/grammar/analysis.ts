import { err, Result } from 'neverthrow';
import { LL1Conflict, ParseRejection, SLR1Conflict } from './errors.js';
import { FirstFollow } from './first-follow.js';
import type { Grammar } from './grammar.js';
import { buildLL1Table, LL1Parser, LL1Table } from './LL1-parser.js';
import { buildLR0Automaton, LR0Automaton } from './LR0-automaton.js';
import { Sentence, toTokens } from './sentence.js';
import { buildSLR1Table, SLR1Parser, SLR1Table } from './SLR1-parser.js';

export type ParserKind = 'll1' | 'slr1';

export type AnalysisOptions = {
  /** Text standing for the end of input in sentences. Defaults to `$`. */
  endMarker?: string;
};

/**
 * Everything derived from one grammar: its first/follow sets, the LR(0)
 * automaton, and the outcome of building each parse table.
 */
export class GrammarAnalysis {
  readonly grammar: Grammar;
  readonly sets: FirstFollow;
  readonly automaton: LR0Automaton;
  readonly ll1: Result<LL1Table, LL1Conflict>;
  readonly slr1: Result<SLR1Table, SLR1Conflict>;
  private readonly endMarker: string;
  private readonly ll1Parser: LL1Parser | undefined;
  private readonly slr1Parser: SLR1Parser | undefined;

  constructor(grammar: Grammar, options: AnalysisOptions = {}) {
    this.grammar = grammar;
    this.endMarker = options.endMarker ?? '$';
    this.sets = new FirstFollow(grammar);
    this.automaton = buildLR0Automaton(grammar);
    this.ll1 = buildLL1Table(grammar, this.sets);
    this.slr1 = buildSLR1Table(this.automaton, this.sets);
    this.ll1Parser = this.ll1.isOk() ? new LL1Parser(this.ll1.value) : undefined;
    this.slr1Parser = this.slr1.isOk()
      ? new SLR1Parser(this.slr1.value)
      : undefined;
  }

  isLL1(): boolean {
    return this.ll1.isOk();
  }

  isSLR1(): boolean {
    return this.slr1.isOk();
  }

  get ll1Conflict(): LL1Conflict | undefined {
    return this.ll1.isErr() ? this.ll1.error : undefined;
  }

  get slr1Conflict(): SLR1Conflict | undefined {
    return this.slr1.isErr() ? this.slr1.error : undefined;
  }

  parseLL1(sentence: Sentence): boolean {
    return this.parseWith('ll1', sentence).isOk();
  }

  parseSLR1(sentence: Sentence): boolean {
    return this.parseWith('slr1', sentence).isOk();
  }

  /**
   * Run one of the two drivers. A grammar outside the parser's class
   * rejects every sentence.
   */
  parseWith(
    kind: ParserKind,
    sentence: Sentence
  ): Result<true, ParseRejection> {
    const parser = kind === 'll1' ? this.ll1Parser : this.slr1Parser;
    if (!parser) {
      return err(
        new ParseRejection(
          'not-in-class',
          0,
          `Grammar is not ${kind === 'll1' ? 'LL(1)' : 'SLR(1)'}`
        )
      );
    }
    return toTokens(this.grammar, sentence, this.endMarker).andThen((tokens) =>
      parser.parse(tokens)
    );
  }
}

export function analyzeGrammar(
  grammar: Grammar,
  options?: AnalysisOptions
): GrammarAnalysis {
  return new GrammarAnalysis(grammar, options);
}
