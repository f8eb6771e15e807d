import { log } from '../utils/debug.js';
import { addAll } from '../utils/sets.js';
import {
  EOF,
  EPSILON,
  Epsilon,
  Grammar,
  GrammarSymbol,
  Lookahead,
  NonTerminal,
  Production,
  Terminal,
} from './grammar.js';

export type FirstSet = ReadonlySet<Terminal | Epsilon>;
export type FirstMap = ReadonlyMap<GrammarSymbol, FirstSet>;
export type FollowSet = ReadonlySet<Lookahead>;
export type FollowMap = ReadonlyMap<NonTerminal, FollowSet>;

/**
 * Called after every full pass over the productions with the sets as they
 * stand at the end of that pass.
 */
export type PassListener<K, V> = (
  pass: number,
  sets: ReadonlyMap<K, ReadonlySet<V>>
) => void;

const EMPTY: ReadonlySet<never> = new Set();

/**
 * First set of a string of symbols: the first sets of its symbols up to and
 * including the first one that is not nullable. Contains epsilon only when
 * every symbol is nullable, so the empty string gives `{ϵ}`.
 */
export function firstOfSequence(
  first: FirstMap,
  symbols: readonly GrammarSymbol[]
): FirstSet {
  const result: Set<Terminal | Epsilon> = new Set();
  for (const symbol of symbols) {
    const firstSymbol = first.get(symbol) ?? EMPTY;
    addAll(result, firstSymbol, EPSILON);
    if (!firstSymbol.has(EPSILON)) {
      return result;
    }
  }
  result.add(EPSILON);
  return result;
}

/**
 * Algorithm to calculate the set of terminal symbols
 * that can appear as the first word in some string derived from a symbol.
 * Sets only ever grow, and iteration stops after a pass that adds nothing.
 *
 * See Page 104 of Engineering a Compiler 2nd Edition
 */
export function calcFirst(
  grammar: Grammar,
  onPass?: PassListener<GrammarSymbol, Terminal | Epsilon>
): Map<GrammarSymbol, FirstSet> {
  const firstMap: Map<GrammarSymbol, Set<Terminal | Epsilon>> = new Map();
  for (const terminal of grammar.getTerminals()) {
    firstMap.set(terminal, new Set([terminal]));
  }
  for (const nonTerminal of grammar.getNonTerminals()) {
    firstMap.set(
      nonTerminal,
      grammar.hasEpsilonProduction(nonTerminal) ? new Set([EPSILON]) : new Set()
    );
  }
  const getFirst = (s: GrammarSymbol) => {
    let set = firstMap.get(s);
    if (!set) {
      set = new Set();
      firstMap.set(s, set);
    }
    return set;
  };

  let pass = 0;
  let changed = true;
  while (changed) {
    changed = false;
    pass++;
    for (const production of grammar.allProductions()) {
      const firstA = getFirst(production.rule);
      let nullable = true;
      for (const symbol of production.symbols) {
        const firstB = getFirst(symbol);
        if (addAll(firstA, firstB, EPSILON)) {
          changed = true;
        }
        if (!firstB.has(EPSILON)) {
          nullable = false;
          break;
        }
      }
      if (nullable && !firstA.has(EPSILON)) {
        firstA.add(EPSILON);
        changed = true;
      }
    }
    onPass?.(pass, firstMap);
  }
  log(`first sets settled after ${pass} passes`);
  return firstMap;
}

function terminalsOf(set: FirstSet): Terminal[] {
  const terminals: Terminal[] = [];
  for (const w of set) {
    if (w !== EPSILON) {
      terminals.push(w);
    }
  }
  return terminals;
}

/**
 * Memoized first sets of production suffixes, keyed by production and dot
 * position. Only valid once the first map is complete.
 */
class SuffixFirsts {
  private readonly cache: Map<string, FirstSet> = new Map();
  constructor(private readonly first: FirstMap) {}

  get(production: Production, dot: number): FirstSet {
    const key = `${production.index}:${dot}`;
    let set = this.cache.get(key);
    if (!set) {
      set = firstOfSequence(this.first, production.symbols.slice(dot));
      this.cache.set(key, set);
    }
    return set;
  }
}

/**
 * Calculate follow sets as described on page 106 of
 * Engineering a Compiler 2nd Edition
 *
 * @param first the first sets calculated with {@link calcFirst}
 * @returns a mapping from non terminal symbols in the given grammar
 * to their follow sets
 */
export function calcFollow(
  grammar: Grammar,
  first: FirstMap,
  onPass?: PassListener<NonTerminal, Lookahead>
): Map<NonTerminal, FollowSet> {
  return followWith(grammar, new SuffixFirsts(first), onPass);
}

function followWith(
  grammar: Grammar,
  suffixes: SuffixFirsts,
  onPass?: PassListener<NonTerminal, Lookahead>
): Map<NonTerminal, FollowSet> {
  const followMap: Map<NonTerminal, Set<Lookahead>> = new Map();
  for (const nonTerminal of grammar.getNonTerminals()) {
    followMap.set(nonTerminal, new Set());
  }
  followMap.get(grammar.start)?.add(EOF);

  let pass = 0;
  let changed = true;
  while (changed) {
    changed = false;
    pass++;
    for (const production of grammar.allProductions()) {
      const followA = followMap.get(production.rule);
      const B = production.symbols;
      for (let i = 0; i < B.length; i++) {
        const followBi = followMap.get(B[i]);
        if (!followBi) {
          // terminal
          continue;
        }
        const firstBeta = suffixes.get(production, i + 1);
        if (addAll(followBi, terminalsOf(firstBeta))) {
          changed = true;
        }
        if (firstBeta.has(EPSILON) && followA && addAll(followBi, followA)) {
          changed = true;
        }
      }
    }
    onPass?.(pass, followMap);
  }
  log(`follow sets settled after ${pass} passes`);
  return followMap;
}

/**
 * First and follow sets of one grammar, computed once.
 */
export class FirstFollow {
  readonly grammar: Grammar;
  readonly firstMap: FirstMap;
  readonly followMap: FollowMap;
  private readonly suffixes: SuffixFirsts;

  constructor(grammar: Grammar) {
    this.grammar = grammar;
    this.firstMap = calcFirst(grammar);
    this.suffixes = new SuffixFirsts(this.firstMap);
    this.followMap = followWith(grammar, this.suffixes);
  }

  first(symbol: GrammarSymbol): FirstSet {
    return this.firstMap.get(symbol) ?? EMPTY;
  }

  follow(nonTerminal: NonTerminal): FollowSet {
    return this.followMap.get(nonTerminal) ?? EMPTY;
  }

  isNullable(symbol: GrammarSymbol): boolean {
    return this.first(symbol).has(EPSILON);
  }

  firstOfSequence(symbols: readonly GrammarSymbol[]): FirstSet {
    return firstOfSequence(this.firstMap, symbols);
  }

  /**
   * First set of `production.symbols.slice(dot)`.
   */
  firstOfSuffix(production: Production, dot: number = 0): FirstSet {
    return this.suffixes.get(production, dot);
  }
}
