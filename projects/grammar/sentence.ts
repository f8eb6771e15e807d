import { err, ok, Result } from 'neverthrow';
import { ParseRejection } from './errors.js';
import { EOF, Grammar, Lookahead } from './grammar.js';

/**
 * Input to the parse drivers: tokens, or a string to be split into tokens
 * with {@link splitSentence}.
 */
export type Sentence = string | Iterable<Lookahead>;

/**
 * Copy the tokens, appending the end marker unless it is already last.
 */
export function withEndMarker(tokens: Iterable<Lookahead>): Lookahead[] {
  const input = [...tokens];
  if (input.length === 0 || input[input.length - 1] !== EOF) {
    input.push(EOF);
  }
  return input;
}

/**
 * Split a sentence like `id+id*id$` into terminals of the grammar. Longer
 * terminals are tried first, falling back to shorter ones when the rest of
 * the text cannot be split. Whitespace between tokens is skipped and
 * `endMarker` reads as {@link EOF}.
 */
export function splitSentence(
  grammar: Grammar,
  text: string,
  endMarker: string = '$'
): Result<Lookahead[], ParseRejection> {
  const candidates: [string, Lookahead][] = [
    ...[...grammar.getTerminals()].map((t): [string, Lookahead] => [t, t]),
    [endMarker, EOF],
  ];
  candidates.sort(([a], [b]) => b.length - a.length);

  // positions from which the rest of the text has no split
  const dead: Set<number> = new Set();
  let stuck = { pos: 0, tokens: 0 };

  const split = (from: number, tokens: Lookahead[]): Lookahead[] | null => {
    let pos = from;
    while (pos < text.length && /\s/.test(text[pos])) {
      pos++;
    }
    if (pos >= text.length) {
      return tokens;
    }
    if (dead.has(pos)) {
      return null;
    }
    for (const [word, token] of candidates) {
      if (word.length > 0 && text.startsWith(word, pos)) {
        const rest = split(pos + word.length, [...tokens, token]);
        if (rest) {
          return rest;
        }
      }
    }
    dead.add(pos);
    if (pos >= stuck.pos) {
      stuck = { pos, tokens: tokens.length };
    }
    return null;
  };

  const tokens = split(0, []);
  if (!tokens) {
    return err(
      new ParseRejection(
        'unknown-token',
        stuck.tokens,
        `No terminal matches '${text.slice(stuck.pos)}'`
      )
    );
  }
  return ok(tokens);
}

function endMarkerLast(
  tokens: Lookahead[]
): Result<Lookahead[], ParseRejection> {
  const end = tokens.indexOf(EOF);
  if (end >= 0 && end < tokens.length - 1) {
    return err(
      new ParseRejection(
        'trailing-input',
        end + 1,
        'Input continues after the end marker'
      )
    );
  }
  return ok(withEndMarker(tokens));
}

/**
 * Turn either form of {@link Sentence} into a token list ending in the
 * end marker. In token lists the `endMarker` text also stands for {@link EOF}.
 * An end marker anywhere but last is rejected.
 */
export function toTokens(
  grammar: Grammar,
  sentence: Sentence,
  endMarker: string = '$'
): Result<Lookahead[], ParseRejection> {
  if (typeof sentence === 'string') {
    return splitSentence(grammar, sentence, endMarker).andThen(endMarkerLast);
  }
  return endMarkerLast([...sentence].map((t) => (t === endMarker ? EOF : t)));
}
