import { lookaheadString, ParseRejection } from '../errors.js';
import { FirstFollow } from '../first-follow.js';
import { EOF, Grammar } from '../grammar.js';
import { buildLL1Table, LL1Parser, LL1Table } from '../LL1-parser.js';
import {
  balancedGrammar,
  expressionGrammar,
  leftRecursiveGrammar,
} from './grammars.js';

const tableFor = (grammar: Grammar) =>
  buildLL1Table(grammar, new FirstFollow(grammar));

const cells = (table: LL1Table) =>
  [...table.entries()].map(
    ([A, w, p]) => `${A},${lookaheadString(w)} => ${p.toString()}`
  );

describe('buildLL1Table', () => {
  let table: LL1Table;
  beforeAll(() => {
    table = tableFor(expressionGrammar())._unsafeUnwrap();
  });

  it('predicts productions from first sets', () => {
    expect(table.get('F', '(')?.toString()).toBe('F -> ( E )');
    expect(table.get('F', 'id')?.toString()).toBe('F -> id');
    expect(table.get("T'", '*')?.toString()).toBe("T' -> * F T'");
  });

  it('predicts epsilon productions from follow sets', () => {
    expect(table.get("E'", EOF)?.toString()).toBe("E' -> ϵ");
    expect(table.get("E'", ')')?.toString()).toBe("E' -> ϵ");
    expect(table.get("T'", '+')?.toString()).toBe("T' -> ϵ");
  });

  it('leaves every other cell empty', () => {
    expect(table.size).toBe(13);
    expect(table.get('F', '+')).toBeUndefined();
    expect(table.get('E', EOF)).toBeUndefined();
  });

  it('builds the same table every time', () => {
    const again = tableFor(expressionGrammar())._unsafeUnwrap();
    expect(cells(again)).toEqual(cells(table));
  });

  it('reports the first conflicting cell', () => {
    const result = tableFor(leftRecursiveGrammar());
    expect(result.isErr()).toBe(true);
    const conflict = result._unsafeUnwrapErr();
    expect(conflict.nonTerminal).toBe('S');
    expect(conflict.lookahead).toBe('id');
    expect(conflict.existing.index).toBe(0);
    expect(conflict.incoming.index).toBe(1);
    expect(conflict.message).toBe(
      'LL(1) conflict at [S, id]: S -> S + id vs S -> id'
    );
  });

  it('treats identical alternatives as a conflict', () => {
    const grammar = new Grammar([['A', [['x'], ['x']]]]);
    expect(tableFor(grammar).isErr()).toBe(true);
  });

  it('renders as text', () => {
    const text = tableFor(balancedGrammar())._unsafeUnwrap().toString();
    expect(text).toBe(['   a      b  $', 'S  a S b  ϵ  ϵ'].join('\n'));
  });
});

describe('LL1Parser', () => {
  let parser: LL1Parser;
  beforeAll(() => {
    parser = new LL1Parser(tableFor(expressionGrammar())._unsafeUnwrap());
  });

  const valid: string[][] = [
    ['id'],
    ['id', '+', 'id', '*', 'id'],
    ['(', 'id', ')', '*', 'id'],
    ['(', '(', 'id', '+', 'id', ')', ')'],
  ];
  test.each(valid)('accepts %j', (...tokens) => {
    expect(parser.accepts(tokens)).toBe(true);
  });

  const invalid: string[][] = [
    [],
    ['id', '+', '*', 'id'],
    ['(', 'id'],
    ['id', 'id'],
    ['name'],
  ];
  test.each(invalid)('rejects %j', (...tokens) => {
    expect(parser.accepts(tokens)).toBe(false);
  });

  it('takes an explicit end marker', () => {
    expect(parser.accepts(['id', '*', 'id', EOF])).toBe(true);
  });

  it('rejects input after the end marker', () => {
    const result = parser.parse(['id', EOF, 'id']);
    expect(result._unsafeUnwrapErr().reason).toBe('trailing-input');
  });

  it('explains rejections', () => {
    const reject = (tokens: string[]) =>
      parser.parse(tokens)._unsafeUnwrapErr();
    expect(reject(['(', 'id']).message).toBe(
      'Expected ) but found $ (at token 2)'
    );
    expect(reject(['id', ')']).message).toBe(
      'Expected $ but found ) (at token 1)'
    );
    const noEntry = reject(['id', '+']);
    expect(noEntry.reason).toBe('no-entry');
    expect(noEntry.message).toBe('Failed to expand T on $ (at token 2)');
  });

  it('parseOrThrow()', () => {
    expect(parser.parseOrThrow(['id'])).toBe(true);
    expect(() => parser.parseOrThrow(['+'])).toThrow(ParseRejection);
  });

  it('yields the stack before every move', () => {
    const balanced = new LL1Parser(tableFor(balancedGrammar())._unsafeUnwrap());
    const stacks = [...balanced.parseGen(['a', 'b'])].map((step) =>
      step.stack.map(lookaheadString).join(' ')
    );
    expect(stacks).toEqual(['$ S', '$ b S a', '$ b S', '$ b', '$']);
  });
});
