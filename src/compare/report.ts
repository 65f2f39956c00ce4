/**
 * Presentation of a comparison: full diff, summary, JSON or external tool.
 */

import type { ChangeEntry } from '../diff/changes.js';
import { renderSummary } from '../diff/summary.js';
import { unifiedDiff } from '../diff/unified.js';
import type { Format } from '../document/types.js';
import type { ToolRunner } from '../utils/external-tool.js';
import { withSecureTempDir } from '../utils/secure-temp.js';
import type { Comparison } from './compare.js';

export type JsonReport =
  | { format: Format; changes: ChangeEntry[] }
  | { format: Format; diff: string };

/**
 * Unified diff of the canonical texts; empty when they match.
 */
export function renderFullDiff(comparison: Comparison): string {
  return unifiedDiff(
    `a/${comparison.first.source.name}`,
    `b/${comparison.second.source.name}`,
    comparison.first.canonical,
    comparison.second.canonical,
  );
}

export function renderReport(comparison: Comparison, summary: boolean): string {
  return summary ? renderSummary(comparison.changes) : renderFullDiff(comparison);
}

export function toJsonReport(comparison: Comparison, summary: boolean): JsonReport {
  if (summary) {
    return { format: comparison.format, changes: comparison.changes };
  }
  return { format: comparison.format, diff: renderFullDiff(comparison) };
}

/**
 * Hand the comparison to an interactive tool through owner-only temp files:
 * the summary as one file, or both canonical texts as two.
 */
export async function openInDiffTool(
  comparison: Comparison,
  tool: string,
  summary: boolean,
  runTool: ToolRunner,
): Promise<void> {
  await withSecureTempDir('secretdiff-', async (dir) => {
    if (summary) {
      const file = await dir.write('summary.txt', renderSummary(comparison.changes));
      runTool(tool, [file]);
      return;
    }
    const first = await dir.write(`a-${comparison.first.source.name}`, comparison.first.canonical);
    const second = await dir.write(`b-${comparison.second.source.name}`, comparison.second.canonical);
    runTool(tool, [first, second]);
  });
}
