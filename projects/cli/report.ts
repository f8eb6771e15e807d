import type { GrammarAnalysis } from '../grammar/analysis.js';
import { EOF, EPSILON, Epsilon, Lookahead } from '../grammar/grammar.js';
import { colors } from '../utils/debug.js';

export type ReportOptions = {
  /** Also print the LL(1) table, the LR(0) states and ACTION/GOTO */
  tables?: boolean;
};

/**
 * Members in terminal declaration order, then `$`, then `ϵ`.
 */
export function formatSet(
  analysis: GrammarAnalysis,
  set: ReadonlySet<Lookahead | Epsilon>
): string {
  const members: string[] = [];
  for (const t of analysis.grammar.getTerminals()) {
    if (set.has(t)) {
      members.push(t);
    }
  }
  if (set.has(EOF)) {
    members.push('$');
  }
  if (set.has(EPSILON)) {
    members.push('ϵ');
  }
  return `{ ${members.join(', ')} }`;
}

export function formatSets(analysis: GrammarAnalysis): string[] {
  const lines: string[] = [];
  for (const A of analysis.grammar.getNonTerminals()) {
    lines.push(`First(${A}) = ${formatSet(analysis, analysis.sets.first(A))}`);
  }
  for (const A of analysis.grammar.getNonTerminals()) {
    lines.push(
      `Follow(${A}) = ${formatSet(analysis, analysis.sets.follow(A))}`
    );
  }
  return lines;
}

export function classification(analysis: GrammarAnalysis): string {
  if (analysis.isLL1() && analysis.isSLR1()) {
    return 'The grammar is LL(1) and SLR(1).';
  } else if (analysis.isLL1()) {
    return 'The grammar is LL(1).';
  } else if (analysis.isSLR1()) {
    return 'The grammar is SLR(1).';
  }
  return 'The grammar is neither LL(1) nor SLR(1).';
}

export function formatAnalysis(
  analysis: GrammarAnalysis,
  options: ReportOptions = {}
): string {
  const lines = [
    colors.bold('Grammar'),
    analysis.grammar.toString(),
    '',
    colors.bold('Sets'),
    ...formatSets(analysis),
    '',
  ];
  const { ll1, slr1 } = analysis;
  if (options.tables) {
    lines.push(colors.bold('LL(1) table'));
    lines.push(ll1.isOk() ? ll1.value.toString() : colors.red(ll1.error.message));
    lines.push('', colors.bold('LR(0) states'), analysis.automaton.toString());
    lines.push('', colors.bold('SLR(1) table'));
    lines.push(
      slr1.isOk() ? slr1.value.toString() : colors.red(slr1.error.message)
    );
    lines.push('');
  }
  lines.push(classification(analysis));
  return lines.join('\n');
}
