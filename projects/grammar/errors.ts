import type { Lookahead, Production } from './grammar.js';
import { EOF } from './grammar.js';

export const lookaheadString = (lookahead: Lookahead) =>
  lookahead === EOF ? '$' : lookahead;

/**
 * A table cell would have received two different entries. This is an
 * ordinary outcome of classification: the grammar is just not of that class.
 */
export class GrammarConflict extends Error {
  readonly lookahead: Lookahead;
  constructor(lookahead: Lookahead, message: string) {
    super(message);
    this.lookahead = lookahead;
  }
}

export class LL1Conflict extends GrammarConflict {
  readonly nonTerminal: string;
  readonly existing: Production;
  readonly incoming: Production;

  constructor(
    nonTerminal: string,
    lookahead: Lookahead,
    existing: Production,
    incoming: Production
  ) {
    super(
      lookahead,
      `LL(1) conflict at [${nonTerminal}, ${lookaheadString(
        lookahead
      )}]: ${existing.toString()} vs ${incoming.toString()}`
    );
    this.nonTerminal = nonTerminal;
    this.existing = existing;
    this.incoming = incoming;
  }
}

export type ConflictKind = `${'shift' | 'reduce' | 'accept'}/${
  | 'shift'
  | 'reduce'
  | 'accept'}`;

export class SLR1Conflict extends GrammarConflict {
  readonly state: number;
  readonly kind: ConflictKind;

  constructor(
    state: number,
    lookahead: Lookahead,
    kind: ConflictKind,
    detail: string
  ) {
    super(
      lookahead,
      `SLR(1) ${kind} conflict in state ${state} on ${lookaheadString(
        lookahead
      )}: ${detail}`
    );
    this.state = state;
    this.kind = kind;
  }
}

export type RejectionReason =
  | 'mismatch'
  | 'no-entry'
  | 'no-goto'
  | 'trailing-input'
  | 'stack-underflow'
  | 'unknown-token'
  | 'not-in-class';

/**
 * The input is not a sentence of the grammar under the constructed table.
 */
export class ParseRejection extends Error {
  readonly reason: RejectionReason;
  readonly position: number;
  constructor(reason: RejectionReason, position: number, message: string) {
    super(`${message} (at token ${position})`);
    this.reason = reason;
    this.position = position;
  }
}

export class GrammarSyntaxError extends Error {
  readonly line: number;
  constructor(line: number, message: string) {
    super(`GrammarSyntaxError at line ${line}: ${message}`);
    this.line = line;
  }
}
