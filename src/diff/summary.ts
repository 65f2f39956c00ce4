/**
 * Summary rendering: one `<marker> <path>` line per change, never values.
 */

import { NO_CHANGES, SUMMARY_LEGEND, SUMMARY_RULE, SUMMARY_TITLE } from '../strings/index.js';
import type { ChangeEntry, ChangeKind } from './changes.js';

export const SUMMARY_MARKERS: Record<ChangeKind, string> = {
  modified: '!',
  added: '+',
  removed: '-',
};

export function formatSummaryLines(changes: readonly ChangeEntry[]): string[] {
  return changes.map((change) => `${SUMMARY_MARKERS[change.kind]} ${change.path}`);
}

/**
 * Full summary report, or the "no changes" line when the list is empty.
 */
export function renderSummary(changes: readonly ChangeEntry[]): string {
  if (changes.length === 0) {
    return `${NO_CHANGES}\n`;
  }
  const lines = [SUMMARY_TITLE, SUMMARY_LEGEND, SUMMARY_RULE, ...formatSummaryLines(changes)];
  return `${lines.join('\n')}\n`;
}
