import { err, ok, Result } from 'neverthrow';
import { Table } from '../utils/data-structures/table.js';
import { log } from '../utils/debug.js';
import { LL1Conflict, lookaheadString, ParseRejection } from './errors.js';
import type { FirstFollow } from './first-follow.js';
import {
  EOF,
  Eof,
  EPSILON,
  Grammar,
  GrammarSymbol,
  Lookahead,
  NonTerminal,
  Production,
} from './grammar.js';
import { withEndMarker } from './sentence.js';

/**
 * Predictive parse table: for each (non-terminal, lookahead) pair, at most
 * one production. A missing cell means the input is rejected.
 */
export class LL1Table {
  readonly grammar: Grammar;
  private readonly rows: ReadonlyMap<
    NonTerminal,
    ReadonlyMap<Lookahead, Production>
  >;

  constructor(
    grammar: Grammar,
    rows: ReadonlyMap<NonTerminal, ReadonlyMap<Lookahead, Production>>
  ) {
    this.grammar = grammar;
    this.rows = rows;
  }

  get(nonTerminal: NonTerminal, lookahead: Lookahead): Production | undefined {
    return this.rows.get(nonTerminal)?.get(lookahead);
  }

  get size(): number {
    let size = 0;
    for (const cols of this.rows.values()) {
      size += cols.size;
    }
    return size;
  }

  *entries(): Generator<[NonTerminal, Lookahead, Production]> {
    for (const [row, cols] of this.rows.entries()) {
      for (const [col, cell] of cols.entries()) {
        yield [row, col, cell];
      }
    }
  }

  /**
   * One row per non-terminal, one column per terminal plus `$`; cells hold
   * the right hand side of the chosen production.
   */
  toString(): string {
    const nonTerminals = this.grammar.getNonTerminals();
    const columns: Lookahead[] = [...this.grammar.getTerminals(), EOF];
    const table = Table.init(
      nonTerminals.length + 1,
      columns.length + 1,
      () => ''
    );
    columns.forEach((col, c) => table.setCell(0, c + 1, lookaheadString(col)));
    nonTerminals.forEach((A, r) => {
      table.setCell(r + 1, 0, A);
      columns.forEach((col, c) => {
        const production = this.get(A, col);
        if (production) {
          const body = production.isEpsilon()
            ? 'ϵ'
            : production.symbols.join(' ');
          table.setCell(r + 1, c + 1, body);
        }
      });
    });
    return table.toDebugStr();
  }
}

/**
 * Algorithm for construction of an LL(1) table.
 * See page 113 of Engineering a Compiler 2nd Edition
 *
 * Stops at the first cell that two different productions claim; no partial
 * table is returned in that case.
 */
export function buildLL1Table(
  grammar: Grammar,
  sets: FirstFollow
): Result<LL1Table, LL1Conflict> {
  const rows: Map<NonTerminal, Map<Lookahead, Production>> = new Map();
  for (const A of grammar.getNonTerminals()) {
    const cols: Map<Lookahead, Production> = new Map();
    rows.set(A, cols);
    for (const p of grammar.productionsOf(A)) {
      const firstB = sets.firstOfSuffix(p);
      const lookaheads: Lookahead[] = [];
      for (const w of firstB) {
        if (w !== EPSILON) {
          lookaheads.push(w);
        }
      }
      if (firstB.has(EPSILON)) {
        lookaheads.push(...sets.follow(A));
      }
      for (const w of lookaheads) {
        const existing = cols.get(w);
        if (existing && existing !== p) {
          const conflict = new LL1Conflict(A, w, existing, p);
          log(conflict.message);
          return err(conflict);
        }
        cols.set(w, p);
      }
    }
  }
  return ok(new LL1Table(grammar, rows));
}

export type LL1Step = {
  stack: readonly (GrammarSymbol | Eof)[];
  position: number;
  lookahead: Lookahead;
};

export class LL1Parser {
  readonly grammar: Grammar;
  readonly table: LL1Table;
  constructor(table: LL1Table) {
    this.grammar = table.grammar;
    this.table = table;
  }

  accepts(tokens: Iterable<Lookahead>): boolean {
    return this.parse(tokens).isOk();
  }

  parseOrThrow(tokens: Iterable<Lookahead>): true {
    const result = this.parse(tokens);
    if (result.isOk()) {
      return result.value;
    }
    throw result.error;
  }

  parse(tokens: Iterable<Lookahead>): Result<true, ParseRejection> {
    const generator = this.parseGen(tokens);
    for (;;) {
      const state = generator.next();
      if (state.done) {
        return state.value;
      }
    }
  }

  /**
   * Implements the table driven LL(1) skeleton parser described on
   * page 112 of Engineering a Compiler 2nd Edition, yielding the stack
   * before each move.
   */
  *parseGen(
    tokens: Iterable<Lookahead>
  ): Generator<LL1Step, Result<true, ParseRejection>> {
    const input = withEndMarker(tokens);
    const stack: (GrammarSymbol | Eof)[] = [EOF, this.grammar.start];
    let i = 0;
    let focus = stack.pop();
    while (focus !== undefined) {
      const word = i < input.length ? input[i] : EOF;
      yield { stack: [...stack, focus], position: i, lookahead: word };
      if (focus === EOF || this.grammar.isTerminal(focus)) {
        if (focus !== word) {
          return err(
            new ParseRejection(
              'mismatch',
              i,
              `Expected ${lookaheadString(focus)} but found ${lookaheadString(
                word
              )}`
            )
          );
        }
        i++;
      } else {
        const production = this.table.get(focus, word);
        if (!production) {
          return err(
            new ParseRejection(
              'no-entry',
              i,
              `Failed to expand ${focus} on ${lookaheadString(word)}`
            )
          );
        }
        // push body onto the stack in reverse
        const B = production.symbols;
        for (let j = B.length - 1; j >= 0; j--) {
          stack.push(B[j]);
        }
      }
      focus = stack.pop();
    }
    if (i === input.length || (i === input.length - 1 && input[i] === EOF)) {
      return ok(true);
    }
    return err(
      new ParseRejection(
        'trailing-input',
        i,
        `Input continues after the end marker`
      )
    );
  }
}
