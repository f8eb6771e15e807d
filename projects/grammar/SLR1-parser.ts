import { err, ok, Result } from 'neverthrow';
import { Table } from '../utils/data-structures/table.js';
import { log } from '../utils/debug.js';
import {
  ConflictKind,
  lookaheadString,
  ParseRejection,
  SLR1Conflict,
} from './errors.js';
import type { FirstFollow } from './first-follow.js';
import {
  EOF,
  Eof,
  Grammar,
  GrammarSymbol,
  Lookahead,
  NonTerminal,
  Production,
} from './grammar.js';
import { AUGMENTED_START, LR0Automaton } from './LR0-automaton.js';
import { withEndMarker } from './sentence.js';

export type Action =
  | { type: 'shift'; state: number }
  | { type: 'reduce'; production: Production }
  | { type: 'accept' };

function sameAction(a: Action, b: Action): boolean {
  switch (a.type) {
    case 'shift':
      return b.type === 'shift' && a.state === b.state;
    case 'reduce':
      return b.type === 'reduce' && a.production === b.production;
    case 'accept':
      return b.type === 'accept';
  }
}

export function actionString(action: Action): string {
  switch (action.type) {
    case 'shift':
      return `s${action.state}`;
    case 'reduce':
      return `r${action.production.index}`;
    case 'accept':
      return 'acc';
  }
}

function describeAction(action: Action): string {
  switch (action.type) {
    case 'shift':
      return `shift to ${action.state}`;
    case 'reduce':
      return `reduce ${action.production.toString()}`;
    case 'accept':
      return 'accept';
  }
}

/**
 * ACTION and GOTO tables, one row per LR(0) state.
 */
export class SLR1Table {
  readonly grammar: Grammar;
  private readonly actions: readonly ReadonlyMap<Lookahead, Action>[];
  private readonly gotos: readonly ReadonlyMap<NonTerminal, number>[];

  constructor(
    grammar: Grammar,
    actions: readonly ReadonlyMap<Lookahead, Action>[],
    gotos: readonly ReadonlyMap<NonTerminal, number>[]
  ) {
    this.grammar = grammar;
    this.actions = actions;
    this.gotos = gotos;
  }

  get stateCount(): number {
    return this.actions.length;
  }

  action(state: number, lookahead: Lookahead): Action | undefined {
    return this.actions[state]?.get(lookahead);
  }

  goto(state: number, nonTerminal: NonTerminal): number | undefined {
    return this.gotos[state]?.get(nonTerminal);
  }

  /**
   * `sN` shifts to state N, `rN` reduces by production N of
   * {@link Grammar.allProductions}, GOTO columns hold bare state numbers.
   */
  toString(): string {
    const terminals: Lookahead[] = [...this.grammar.getTerminals(), EOF];
    const nonTerminals = this.grammar.getNonTerminals();
    const table = Table.init(
      this.stateCount + 1,
      1 + terminals.length + nonTerminals.length,
      () => ''
    );
    table.setCell(0, 0, 'state');
    terminals.forEach((t, c) => table.setCell(0, c + 1, lookaheadString(t)));
    nonTerminals.forEach((A, c) =>
      table.setCell(0, c + 1 + terminals.length, A)
    );
    for (let state = 0; state < this.stateCount; state++) {
      table.setCell(state + 1, 0, `${state}`);
      terminals.forEach((t, c) => {
        const action = this.action(state, t);
        if (action) {
          table.setCell(state + 1, c + 1, actionString(action));
        }
      });
      nonTerminals.forEach((A, c) => {
        const target = this.goto(state, A);
        if (target !== undefined) {
          table.setCell(state + 1, c + 1 + terminals.length, `${target}`);
        }
      });
    }
    return table.toDebugStr();
  }
}

/**
 * Fill in ACTION and GOTO from the canonical LR(0) collection, using follow
 * sets to decide where reductions go. Stops at the first cell that would
 * receive two different actions.
 */
export function buildSLR1Table(
  automaton: LR0Automaton,
  sets: FirstFollow
): Result<SLR1Table, SLR1Conflict> {
  const grammar = automaton.grammar;
  const actions: Map<Lookahead, Action>[] = [];
  const gotos: Map<NonTerminal, number>[] = [];

  for (let i = 0; i < automaton.states.length; i++) {
    const row: Map<Lookahead, Action> = new Map();
    actions.push(row);
    const setAction = (
      lookahead: Lookahead,
      action: Action
    ): SLR1Conflict | undefined => {
      const existing = row.get(lookahead);
      if (existing && !sameAction(existing, action)) {
        const kind: ConflictKind = `${existing.type}/${action.type}`;
        return new SLR1Conflict(
          i,
          lookahead,
          kind,
          `${describeAction(existing)} vs ${describeAction(action)}`
        );
      }
      row.set(lookahead, action);
      return undefined;
    };

    for (const item of automaton.itemsOf(i)) {
      const next = item.next();
      let conflict: SLR1Conflict | undefined;
      if (next !== undefined) {
        const j = automaton.transition(i, next);
        if (grammar.isTerminal(next) && j !== undefined) {
          conflict = setAction(next, { type: 'shift', state: j });
        }
      } else if (item.rule === AUGMENTED_START) {
        conflict = setAction(EOF, { type: 'accept' });
      } else if (item.production) {
        const reduce: Action = { type: 'reduce', production: item.production };
        for (const t of sets.follow(item.rule)) {
          conflict = setAction(t, reduce);
          if (conflict) {
            break;
          }
        }
      }
      if (conflict) {
        log(conflict.message);
        return err(conflict);
      }
    }

    const gotoRow: Map<NonTerminal, number> = new Map();
    for (const A of grammar.getNonTerminals()) {
      const j = automaton.transition(i, A);
      if (j !== undefined) {
        gotoRow.set(A, j);
      }
    }
    gotos.push(gotoRow);
  }
  return ok(new SLR1Table(grammar, actions, gotos));
}

export type SLR1Step = {
  /** state indices alternating with the symbols between them */
  stack: readonly (number | GrammarSymbol)[];
  position: number;
  lookahead: Lookahead;
};

export class SLR1Parser {
  readonly grammar: Grammar;
  readonly table: SLR1Table;
  constructor(table: SLR1Table) {
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
   * Shift-reduce skeleton parser. The stack is kept as the states and the
   * symbols between them; `symbols[k]` sits between `states[k]` and
   * `states[k + 1]`.
   */
  *parseGen(
    tokens: Iterable<Lookahead>
  ): Generator<SLR1Step, Result<true, ParseRejection>> {
    const input = withEndMarker(tokens);
    const states: number[] = [0];
    const symbols: (GrammarSymbol | Eof)[] = [];
    let i = 0;
    while (i < input.length) {
      const state = states[states.length - 1];
      const word = input[i];
      yield { stack: interleave(states, symbols), position: i, lookahead: word };

      const action = this.table.action(state, word);
      if (!action) {
        return err(
          new ParseRejection(
            'no-entry',
            i,
            `No action in state ${state} on ${lookaheadString(word)}`
          )
        );
      }
      switch (action.type) {
        case 'shift':
          symbols.push(word);
          states.push(action.state);
          i++;
          break;
        case 'reduce': {
          const { rule, symbols: body } = action.production;
          // never pop below what earlier shifts and gotos put on the stack
          if (states.length - 1 < body.length) {
            return err(
              new ParseRejection(
                'stack-underflow',
                i,
                `Cannot reduce ${action.production.toString()} with ${
                  states.length - 1
                } symbols on the stack`
              )
            );
          }
          states.splice(states.length - body.length, body.length);
          symbols.splice(symbols.length - body.length, body.length);
          const exposed = states[states.length - 1];
          const target = this.table.goto(exposed, rule);
          if (target === undefined) {
            return err(
              new ParseRejection(
                'no-goto',
                i,
                `No goto from state ${exposed} on ${rule}`
              )
            );
          }
          symbols.push(rule);
          states.push(target);
          break;
        }
        case 'accept':
          if (i < input.length - 1) {
            return err(
              new ParseRejection(
                'trailing-input',
                i + 1,
                'Input continues after the end marker'
              )
            );
          }
          return ok(true);
      }
    }
    return err(
      new ParseRejection('no-entry', i, 'Ran past the end of the input')
    );
  }
}

function interleave(
  states: readonly number[],
  symbols: readonly (GrammarSymbol | Eof)[]
): (number | GrammarSymbol)[] {
  const stack: (number | GrammarSymbol)[] = [states[0]];
  for (let k = 0; k < symbols.length; k++) {
    const symbol = symbols[k];
    stack.push(symbol === EOF ? '$' : symbol, states[k + 1]);
  }
  return stack;
}
