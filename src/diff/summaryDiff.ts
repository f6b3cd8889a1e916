import { diffArrays } from 'diff';
import { summaryBody } from './summary.js';

export const SUMMARY_DIFF_HEADER = ['--- PHAR A', '+++ PHAR B', '@@ @@'] as const;

/**
 * Unified-style diff of two rendered summaries, ignoring their `Archive:`
 * line. The result is a single hunk carrying every line as context, or an
 * empty list when the summaries match.
 */
export function diffSummaries(summaryA: readonly string[], summaryB: readonly string[]): string[] {
  const changes = diffArrays(summaryBody(summaryA), summaryBody(summaryB));
  if (!changes.some((change) => change.added || change.removed)) {
    return [];
  }

  const lines: string[] = [...SUMMARY_DIFF_HEADER];
  for (const change of changes) {
    const prefix = change.added ? '+' : change.removed ? '-' : ' ';
    for (const value of change.value) {
      lines.push(`${prefix}${value}`);
    }
  }
  return lines;
}
