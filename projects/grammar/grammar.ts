import { OrderedMap } from '../utils/data-structures/OrderedMap.js';

export const EPSILON = Symbol('ϵ');
export const EOF = Symbol('EOF');
export type Epsilon = typeof EPSILON;
export type Eof = typeof EOF;

export type Terminal = string;
export type NonTerminal = string;
export type GrammarSymbol = Terminal | NonTerminal;

/**
 * Something the parse drivers can look at next: a terminal or the end of input.
 */
export type Lookahead = Terminal | Eof;

export class Production {
  /**
   * Position of this production in {@link Grammar.allProductions}. Two
   * productions with the same rule and symbols still get distinct indexes.
   */
  readonly index: number;

  /**
   * The left hand symbol. So for the production:
   *   Expr -> Term Op Term
   * the `rule` would be `Expr`
   */
  readonly rule: NonTerminal;

  /**
   * The right hand side. So for the production:
   *   Expr -> Term Op Term
   * the `symbols` would be `[Term, Op, Term]`. Empty for an epsilon production.
   */
  readonly symbols: readonly GrammarSymbol[];

  constructor(index: number, rule: NonTerminal, symbols: readonly string[]) {
    this.index = index;
    this.rule = rule;
    this.symbols = symbols;
  }

  isEpsilon(): boolean {
    return this.symbols.length === 0;
  }

  toString(): string {
    const body = this.isEpsilon() ? 'ϵ' : this.symbols.join(' ');
    return `${this.rule} -> ${body}`;
  }
}

/**
 * Alternatives for one non-terminal. An empty alternative is epsilon.
 */
export type Alternatives = readonly (readonly string[])[];

/**
 * A context free grammar. It is read only once constructed: every analysis
 * (first/follow sets, tables, automata) is derived from it without changing it.
 *
 * Any symbol that appears on a left hand side is a non-terminal. Every other
 * symbol on a right hand side is a terminal.
 */
export class Grammar {
  /** The first non-terminal declared. */
  readonly start: NonTerminal;
  private readonly productions: OrderedMap<NonTerminal, Production[]> =
    new OrderedMap();
  private readonly ordered: Production[] = [];
  private readonly terminals: Set<Terminal> = new Set();

  constructor(rules: Iterable<readonly [NonTerminal, Alternatives]>) {
    const entries = [...rules];
    for (const [rule] of entries) {
      if (!this.productions.has(rule)) {
        this.productions.push(rule, []);
      }
    }
    for (const [rule, alternatives] of entries) {
      const list = this.productions.get(rule) ?? [];
      for (const symbols of alternatives) {
        const production = new Production(this.ordered.length, rule, [
          ...symbols,
        ]);
        list.push(production);
        this.ordered.push(production);
        for (const s of symbols) {
          if (!this.productions.has(s)) {
            this.terminals.add(s);
          }
        }
      }
    }
    const start = this.productions.keys().next();
    if (start.done) {
      throw new Error('A grammar needs at least one non-terminal');
    }
    this.start = start.value;
  }

  productionsOf(rule: NonTerminal): readonly Production[] {
    return this.productions.get(rule) ?? [];
  }

  allProductions(): readonly Production[] {
    return this.ordered;
  }

  hasEpsilonProduction(rule: NonTerminal): boolean {
    return this.productionsOf(rule).some((p) => p.isEpsilon());
  }

  getNonTerminals(): readonly NonTerminal[] {
    return [...this.productions.keys()];
  }

  getTerminals(): ReadonlySet<Terminal> {
    return this.terminals;
  }

  isNonTerminal(symbol: GrammarSymbol | Eof | Epsilon): boolean {
    return typeof symbol === 'string' && this.productions.has(symbol);
  }

  isTerminal(symbol: GrammarSymbol | Eof | Epsilon): boolean {
    return typeof symbol === 'string' && this.terminals.has(symbol);
  }

  /**
   * Renders the grammar one non-terminal per line, as `A -> a B | e`.
   */
  toString(epsilon: string = 'e') {
    const lines: string[] = [];
    for (const [, rule, productions] of this.productions.entries()) {
      const bodies = productions.map((p) =>
        p.isEpsilon() ? epsilon : p.symbols.join(' ')
      );
      lines.push(`${rule} -> ${bodies.join(' | ')}`);
    }
    return lines.join('\n');
  }
}

export type GrammarSpec = { [index: string]: string[][] };

/**
 * Build a grammar from an object literal, one key per non-terminal in
 * declaration order. The first key is the start symbol.
 *
 *   buildGrammar({ S: [['(', 'S', ')'], []] })
 */
export function buildGrammar(spec: GrammarSpec): Grammar {
  return new Grammar(Object.entries(spec));
}
