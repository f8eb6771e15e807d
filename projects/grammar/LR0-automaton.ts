import { log } from '../utils/debug.js';
import { NumberSet } from '../utils/sets.js';
import type {
  Grammar,
  GrammarSymbol,
  NonTerminal,
  Production,
} from './grammar.js';

/**
 * Left hand side of the synthetic production `S' -> S` added to recognize
 * acceptance. It never appears in a user facing table.
 */
export const AUGMENTED_START = Symbol("S'");
export type ItemRule = NonTerminal | typeof AUGMENTED_START;

/**
 * A production with a dot marking how much of it has been recognized.
 */
export class LR0Item {
  readonly id: number;
  /** null for the augmented start production */
  readonly production: Production | null;
  readonly rule: ItemRule;
  readonly symbols: readonly GrammarSymbol[];
  readonly dot: number;

  constructor(
    id: number,
    rule: ItemRule,
    symbols: readonly GrammarSymbol[],
    dot: number,
    production: Production | null
  ) {
    this.id = id;
    this.rule = rule;
    this.symbols = symbols;
    this.dot = dot;
    this.production = production;
  }

  /** The symbol right after the dot, if any */
  next(): GrammarSymbol | undefined {
    return this.symbols[this.dot];
  }

  isComplete(): boolean {
    return this.dot >= this.symbols.length;
  }

  toString(): string {
    const rule = this.rule === AUGMENTED_START ? "S'" : this.rule;
    const body = [...this.symbols];
    body.splice(this.dot, 0, '•');
    return `${rule} -> ${body.join(' ')}`;
  }
}

/**
 * Hands out one {@link LR0Item} per (production, dot) pair so that item sets
 * can be kept as sets of integers.
 */
class ItemArena {
  private readonly items: LR0Item[] = [];
  private readonly ids: Map<string, number> = new Map();

  constructor(private readonly start: NonTerminal) {}

  item(production: Production | null, dot: number): LR0Item {
    const key = `${production ? production.index : 'start'}:${dot}`;
    const id = this.ids.get(key);
    if (id !== undefined) {
      return this.items[id];
    }
    const item = production
      ? new LR0Item(
          this.items.length,
          production.rule,
          production.symbols,
          dot,
          production
        )
      : new LR0Item(this.items.length, AUGMENTED_START, [this.start], dot, null);
    this.items.push(item);
    this.ids.set(key, item.id);
    return item;
  }

  get(id: number): LR0Item {
    return this.items[id];
  }
}

/**
 * The canonical collection of LR(0) item sets for a grammar, along with the
 * goto transitions between them.
 */
export class LR0Automaton {
  readonly grammar: Grammar;
  private readonly arena: ItemArena;
  private readonly _states: NumberSet[] = [];
  private readonly stateIndex: Map<string, number> = new Map();
  private readonly transitions: Map<GrammarSymbol, number>[] = [];

  constructor(grammar: Grammar) {
    this.grammar = grammar;
    this.arena = new ItemArena(grammar.start);
    this.build();
  }

  get states(): readonly NumberSet[] {
    return this._states;
  }

  /** The item `S' -> • S` */
  get startItem(): LR0Item {
    return this.arena.item(null, 0);
  }

  itemsOf(state: number): LR0Item[] {
    return this._states[state]
      .toSortedArray()
      .map((id) => this.arena.get(id));
  }

  transition(state: number, symbol: GrammarSymbol): number | undefined {
    return this.transitions[state]?.get(symbol);
  }

  transitionsFrom(state: number): ReadonlyMap<GrammarSymbol, number> {
    return this.transitions[state] ?? new Map();
  }

  /**
   * Index of the state holding exactly these items, if there is one.
   */
  findState(items: NumberSet): number | undefined {
    return this.stateIndex.get(items.hash());
  }

  /**
   * Add, for every item whose dot sits before a non-terminal X, the items
   * `X -> • γ` for each production of X, until nothing more is added.
   */
  closure(items: Iterable<number>): NumberSet {
    const result: Set<number> = new Set(items);
    const work = [...result];
    let id = work.pop();
    while (id !== undefined) {
      const X = this.arena.get(id).next();
      if (X !== undefined && this.grammar.isNonTerminal(X)) {
        for (const production of this.grammar.productionsOf(X)) {
          const added = this.arena.item(production, 0).id;
          if (!result.has(added)) {
            result.add(added);
            work.push(added);
          }
        }
      }
      id = work.pop();
    }
    return new NumberSet(result);
  }

  /**
   * Advance the dot over `symbol` in every item that allows it, then close.
   * Empty when no item has `symbol` after its dot.
   */
  goto(items: Iterable<number>, symbol: GrammarSymbol): NumberSet {
    const kernel: number[] = [];
    for (const id of items) {
      const item = this.arena.get(id);
      if (item.next() === symbol) {
        kernel.push(this.arena.item(item.production, item.dot + 1).id);
      }
    }
    if (kernel.length === 0) {
      return new NumberSet();
    }
    return this.closure(kernel);
  }

  private addState(items: NumberSet): number {
    const index = this._states.length;
    this._states.push(items);
    this.stateIndex.set(items.hash(), index);
    this.transitions.push(new Map());
    return index;
  }

  private build() {
    const symbols: GrammarSymbol[] = [
      ...this.grammar.getTerminals(),
      ...this.grammar.getNonTerminals(),
    ];
    const worklist = [this.addState(this.closure([this.startItem.id]))];
    for (let head = 0; head < worklist.length; head++) {
      const state = worklist[head];
      for (const symbol of symbols) {
        const target = this.goto(this._states[state], symbol);
        if (target.size === 0) {
          continue;
        }
        let j = this.findState(target);
        if (j === undefined) {
          j = this.addState(target);
          worklist.push(j);
        }
        this.transitions[state].set(symbol, j);
      }
    }
    log(`LR(0) automaton has ${this._states.length} states`);
  }

  toString(): string {
    const out: string[] = [];
    this._states.forEach((_, i) => {
      out.push(`I${i}:`);
      for (const item of this.itemsOf(i)) {
        out.push(`  ${item.toString()}`);
      }
      for (const [symbol, target] of this.transitionsFrom(i)) {
        out.push(`  ${symbol} => I${target}`);
      }
    });
    return out.join('\n');
  }
}

export function buildLR0Automaton(grammar: Grammar): LR0Automaton {
  return new LR0Automaton(grammar);
}
