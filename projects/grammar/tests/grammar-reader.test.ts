import { readGrammar, ReaderOptions } from '../grammar-reader.js';

const syntaxError = (text: string, options?: ReaderOptions) =>
  readGrammar(text, options)._unsafeUnwrapErr().message;

describe('readGrammar', () => {
  test('reads a count followed by rules', () => {
    const grammar = readGrammar(
      ['3', 'E -> T X', 'X -> + T X | e', 'T -> id'].join('\n')
    )._unsafeUnwrap();
    expect(grammar.start).toBe('E');
    expect(grammar.getNonTerminals()).toEqual(['E', 'X', 'T']);
    expect([...grammar.getTerminals()]).toEqual(['+', 'id']);
    expect(grammar.hasEpsilonProduction('X')).toBe(true);
    expect(grammar.toString()).toBe(
      ['E -> T X', 'X -> + T X | e', 'T -> id'].join('\n')
    );
  });

  test('the count is optional', () => {
    const grammar = readGrammar('S -> a S b | e\r\n')._unsafeUnwrap();
    expect(grammar.toString()).toBe('S -> a S b | e');
  });

  test('skips blank lines and comments', () => {
    const grammar = readGrammar(
      ['# balanced', '', '1', '  S -> a S b | e  ', ''].join('\n')
    )._unsafeUnwrap();
    expect(grammar.allProductions().length).toBe(2);
  });

  test('merges rules with the same left hand side', () => {
    const grammar = readGrammar(
      ['S -> a', 'T -> b', 'S -> T'].join('\n')
    )._unsafeUnwrap();
    expect(grammar.toString()).toBe(['S -> a | T', 'T -> b'].join('\n'));
  });

  test('takes another word for epsilon', () => {
    const grammar = readGrammar('S -> e S | eps', {
      epsilon: 'eps',
    })._unsafeUnwrap();
    expect([...grammar.getTerminals()]).toEqual(['e']);
    expect(grammar.hasEpsilonProduction('S')).toBe(true);
  });

  test.each([
    ['', 'GrammarSyntaxError at line 1: No productions'],
    [
      '2\nS -> a',
      'GrammarSyntaxError at line 1: Expected 2 production lines but found 1',
    ],
    ['S -> a\nS b', "GrammarSyntaxError at line 2: Missing '->'"],
    [
      'S T -> a',
      "GrammarSyntaxError at line 1: Left hand side must be a single symbol, got 'S T'",
    ],
    [
      ' -> a',
      "GrammarSyntaxError at line 1: Left hand side must be a single symbol, got ''",
    ],
    ['$ -> a', "GrammarSyntaxError at line 1: '$' is reserved"],
    ['e -> a', "GrammarSyntaxError at line 1: 'e' is reserved"],
    [
      'S -> a |',
      "GrammarSyntaxError at line 1: Empty alternative for S, write 'e' for the empty string",
    ],
    [
      'S -> a $',
      "GrammarSyntaxError at line 1: '$' is reserved for the end of input",
    ],
    [
      'S -> a e',
      "GrammarSyntaxError at line 1: 'e' must be an alternative on its own",
    ],
  ])('rejects %j', (text, message) => {
    expect(syntaxError(text)).toBe(message);
  });

  test('counts lines from the top of the text', () => {
    const error = readGrammar('# comment\n\nS -> a\nS b')._unsafeUnwrapErr();
    expect(error.line).toBe(4);
  });

  test('can insist on a count', () => {
    expect(syntaxError('S -> a', { expectCount: true })).toBe(
      'GrammarSyntaxError at line 1: Expected a count'
    );
  });

  test('can read a number as a rule line', () => {
    expect(syntaxError('1', { expectCount: false })).toBe(
      "GrammarSyntaxError at line 1: Missing '->'"
    );
  });
});
