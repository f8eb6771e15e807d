import { err, ok, Result } from 'neverthrow';
import { GrammarSyntaxError } from './errors.js';
import { Grammar, NonTerminal } from './grammar.js';

export type ReaderOptions = {
  /** The alternative standing for the empty string. Defaults to `e`. */
  epsilon?: string;
  /** Reserved text for the end of input. Defaults to `$`. */
  endMarker?: string;
  /**
   * Whether the first line holds the number of production lines. When left
   * out, a first line made only of digits is read as that count.
   */
  expectCount?: boolean;
};

type Line = { number: number; text: string };

/**
 * Read a grammar written one rule per line:
 *
 *   3
 *   S -> a S b | e
 *   ...
 *
 * Symbols are separated by whitespace and alternatives by `|`. A rule may be
 * split across several lines with the same left hand side; its alternatives
 * are kept in the order they appear. Blank lines and lines starting with `#`
 * are ignored.
 */
export function readGrammar(
  text: string,
  options: ReaderOptions = {}
): Result<Grammar, GrammarSyntaxError> {
  const epsilon = options.epsilon ?? 'e';
  const endMarker = options.endMarker ?? '$';

  let lines: Line[] = text
    .split(/\r?\n/)
    .map((line, i) => ({ number: i + 1, text: line.trim() }))
    .filter((line) => line.text.length > 0 && !line.text.startsWith('#'));

  const first = lines[0];
  const hasCount =
    options.expectCount ?? (first !== undefined && /^\d+$/.test(first.text));
  if (hasCount) {
    if (!first || !/^\d+$/.test(first.text)) {
      return err(
        new GrammarSyntaxError(first ? first.number : 1, 'Expected a count')
      );
    }
    const count = parseInt(first.text, 10);
    lines = lines.slice(1);
    if (lines.length !== count) {
      return err(
        new GrammarSyntaxError(
          first.number,
          `Expected ${count} production lines but found ${lines.length}`
        )
      );
    }
  }
  if (lines.length === 0) {
    return err(new GrammarSyntaxError(1, 'No productions'));
  }

  const rules: Map<NonTerminal, string[][]> = new Map();
  for (const line of lines) {
    const arrow = line.text.indexOf('->');
    if (arrow < 0) {
      return err(new GrammarSyntaxError(line.number, `Missing '->'`));
    }
    const lhs = line.text.slice(0, arrow).trim();
    if (lhs.length === 0 || /\s/.test(lhs)) {
      return err(
        new GrammarSyntaxError(
          line.number,
          `Left hand side must be a single symbol, got '${lhs}'`
        )
      );
    }
    if (lhs === endMarker || lhs === epsilon) {
      return err(
        new GrammarSyntaxError(line.number, `'${lhs}' is reserved`)
      );
    }
    const alternatives = rules.get(lhs) ?? [];
    rules.set(lhs, alternatives);

    for (const alternative of line.text.slice(arrow + 2).split('|')) {
      const symbols = alternative.trim().split(/\s+/).filter(Boolean);
      if (symbols.length === 0) {
        return err(
          new GrammarSyntaxError(
            line.number,
            `Empty alternative for ${lhs}, write '${epsilon}' for the empty string`
          )
        );
      }
      if (symbols.includes(endMarker)) {
        return err(
          new GrammarSyntaxError(
            line.number,
            `'${endMarker}' is reserved for the end of input`
          )
        );
      }
      if (symbols.includes(epsilon)) {
        if (symbols.length > 1) {
          return err(
            new GrammarSyntaxError(
              line.number,
              `'${epsilon}' must be an alternative on its own`
            )
          );
        }
        alternatives.push([]);
      } else {
        alternatives.push(symbols);
      }
    }
  }
  return ok(new Grammar(rules.entries()));
}
