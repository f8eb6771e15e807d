import { Readable } from 'stream';
import { analyzeGrammar } from '../grammar/analysis.js';
import { readGrammar } from '../grammar/grammar-reader.js';
import { logger } from '../utils/debug.js';
import {
  analyzeText,
  AnalyzeOptions,
  answer,
  answerLines,
  pickParser,
} from './cli.js';

const balanced = '1\nS -> a S b | e\n';
const leftRecursive = 'S -> S + id | id';

const run = (text: string, options: Partial<AnalyzeOptions> = {}) => {
  const lines: string[] = [];
  const result = analyzeText(
    text,
    { parser: 'auto', sentences: [], tables: false, ...options },
    (line) => lines.push(line)
  );
  return { ...result, lines };
};

describe('analyzeText', () => {
  it('prints the sets and the classification', () => {
    const { code, lines } = run(balanced);
    expect(code).toBe(0);
    expect(lines).toEqual([
      [
        'Grammar',
        'S -> a S b | e',
        '',
        'Sets',
        'First(S) = { a, ϵ }',
        'Follow(S) = { b, $ }',
        '',
        'The grammar is LL(1) and SLR(1).',
      ].join('\n'),
    ]);
  });

  it('answers each sentence', () => {
    const { code, kind, lines } = run(balanced, { sentences: ['ab', 'aab'] });
    expect(code).toBe(0);
    expect(kind).toBe('ll1');
    expect(lines.slice(1)).toEqual(['Yes', 'No']);
  });

  it('falls back to SLR(1)', () => {
    const { kind, lines } = run(leftRecursive, { sentences: ['id+id'] });
    expect(kind).toBe('slr1');
    expect(lines[0].endsWith('The grammar is SLR(1).')).toBe(true);
    expect(lines.slice(1)).toEqual(['Yes']);
  });

  it('fails when the chosen parser does not fit the grammar', () => {
    const { code, lines } = run(leftRecursive, {
      parser: 'll1',
      sentences: ['id'],
    });
    expect(code).toBe(1);
    expect(lines[lines.length - 1]).toBe('No ll1 parser for this grammar.');
  });

  it('prints tables on request', () => {
    const { lines } = run('S -> a', { tables: true });
    expect(lines[0].split('\n').slice(7)).toEqual([
      'LL(1) table',
      '   a  $',
      'S  a',
      '',
      'LR(0) states',
      'I0:',
      "  S' -> • S",
      '  S -> • a',
      '  a => I1',
      '  S => I2',
      'I1:',
      '  S -> a •',
      'I2:',
      "  S' -> S •",
      '',
      'SLR(1) table',
      'state  a   $    S',
      '0      s1       2',
      '1          r0',
      '2          acc',
      '',
      'The grammar is LL(1) and SLR(1).',
    ]);
  });

  it('reports syntax errors', () => {
    const { code, lines } = run('S a');
    expect(code).toBe(2);
    expect(lines).toEqual(["GrammarSyntaxError at line 1: Missing '->'"]);
  });
});

describe('pickParser', () => {
  const ll1 = analyzeGrammar(readGrammar(balanced)._unsafeUnwrap());
  const slr1 = analyzeGrammar(readGrammar(leftRecursive)._unsafeUnwrap());

  it('prefers LL(1)', () => {
    expect(pickParser(ll1, 'auto')).toBe('ll1');
    expect(pickParser(ll1, 'slr1')).toBe('slr1');
    expect(pickParser(slr1, 'auto')).toBe('slr1');
    expect(pickParser(slr1, 'll1')).toBeUndefined();
  });
});

describe('answer', () => {
  const analysis = analyzeGrammar(readGrammar(balanced)._unsafeUnwrap());

  it('logs why a sentence was rejected', () => {
    const logs: string[] = [];
    const verdict = logger.capture(() => answer(analysis, 'll1', 'aab'), logs);
    expect(verdict).toBe('No');
    expect(logs).toEqual(['Expected b but found $ (at token 3)']);
  });

  it('answers lines until a blank one', async () => {
    const lines: string[] = [];
    await answerLines(
      analysis,
      'slr1',
      Readable.from(['ab\n', 'aab\n', '\n', 'ab\n']),
      (line) => lines.push(line)
    );
    expect(lines).toEqual(['Yes', 'No']);
  });
});
