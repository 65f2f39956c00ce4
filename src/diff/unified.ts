/**
 * Line-based unified diff (Myers shortest edit script).
 */

export type LineEditType = 'equal' | 'delete' | 'insert';

export interface LineEdit {
  type: LineEditType;
  line: string;
}

export interface Hunk {
  oldStart: number;
  oldLines: number;
  newStart: number;
  newLines: number;
  lines: string[];
}

export const DEFAULT_CONTEXT = 3;

/**
 * Split text into lines without terminators. A trailing newline does not
 * produce an extra empty line.
 */
export function splitLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function backtrack(trace: number[][], oldLines: string[], newLines: string[], offset: number): LineEdit[] {
  const edits: LineEdit[] = [];
  let x = oldLines.length;
  let y = newLines.length;

  for (let d = trace.length - 1; d >= 0; d -= 1) {
    const v = trace[d];
    const k = x - y;
    const prevK = k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1]) ? k + 1 : k - 1;
    const prevX = v[offset + prevK];
    const prevY = prevX - prevK;

    while (x > prevX && y > prevY) {
      edits.push({ type: 'equal', line: oldLines[x - 1] });
      x -= 1;
      y -= 1;
    }

    if (d > 0) {
      if (x === prevX) {
        edits.push({ type: 'insert', line: newLines[y - 1] });
      } else {
        edits.push({ type: 'delete', line: oldLines[x - 1] });
      }
    }

    x = prevX;
    y = prevY;
  }

  return edits.reverse();
}

/**
 * Within each run of changed lines, deletions come before insertions.
 */
function groupDeletionsFirst(edits: LineEdit[]): LineEdit[] {
  const result: LineEdit[] = [];
  let deletes: LineEdit[] = [];
  let inserts: LineEdit[] = [];

  const flush = () => {
    result.push(...deletes, ...inserts);
    deletes = [];
    inserts = [];
  };

  for (const edit of edits) {
    if (edit.type === 'equal') {
      flush();
      result.push(edit);
    } else if (edit.type === 'delete') {
      deletes.push(edit);
    } else {
      inserts.push(edit);
    }
  }
  flush();
  return result;
}

/**
 * Shortest edit script turning oldLines into newLines.
 */
export function diffLines(oldLines: string[], newLines: string[]): LineEdit[] {
  const n = oldLines.length;
  const m = newLines.length;
  const max = n + m;
  const offset = max;
  const v = new Array<number>(2 * max + 2).fill(0);
  const trace: number[][] = [];

  search: for (let d = 0; d <= max; d += 1) {
    trace.push(v.slice());
    for (let k = -d; k <= d; k += 2) {
      let x = k === -d || (k !== d && v[offset + k - 1] < v[offset + k + 1])
        ? v[offset + k + 1]
        : v[offset + k - 1] + 1;
      let y = x - k;
      while (x < n && y < m && oldLines[x] === newLines[y]) {
        x += 1;
        y += 1;
      }
      v[offset + k] = x;
      if (x >= n && y >= m) {
        break search;
      }
    }
  }

  return groupDeletionsFirst(backtrack(trace, oldLines, newLines, offset));
}

function formatRange(start: number, length: number): string {
  const beginning = start + 1;
  if (length === 1) {
    return `${beginning}`;
  }
  return `${length === 0 ? beginning - 1 : beginning},${length}`;
}

const PREFIX: Record<LineEditType, string> = {
  equal: ' ',
  delete: '-',
  insert: '+',
};

/**
 * Group edits into hunks. Changes separated by at most 2 * context unchanged
 * lines share a hunk.
 */
export function buildHunks(edits: LineEdit[], context = DEFAULT_CONTEXT): Hunk[] {
  const oldPos: number[] = [];
  const newPos: number[] = [];
  const changed: number[] = [];
  let o = 0;
  let n = 0;

  edits.forEach((edit, index) => {
    oldPos.push(o);
    newPos.push(n);
    if (edit.type !== 'insert') o += 1;
    if (edit.type !== 'delete') n += 1;
    if (edit.type !== 'equal') changed.push(index);
  });

  if (changed.length === 0) {
    return [];
  }

  const ranges: Array<[number, number]> = [];
  let start = Math.max(0, changed[0] - context);
  let last = changed[0];
  for (const index of changed.slice(1)) {
    if (index - last - 1 > 2 * context) {
      ranges.push([start, Math.min(edits.length - 1, last + context)]);
      start = index - context;
    }
    last = index;
  }
  ranges.push([start, Math.min(edits.length - 1, last + context)]);

  return ranges.map(([from, to]) => {
    const slice = edits.slice(from, to + 1);
    return {
      oldStart: oldPos[from],
      oldLines: slice.filter((edit) => edit.type !== 'insert').length,
      newStart: newPos[from],
      newLines: slice.filter((edit) => edit.type !== 'delete').length,
      lines: slice.map((edit) => `${PREFIX[edit.type]}${edit.line}`),
    };
  });
}

/**
 * Unified diff of two texts with `--- fromName` / `+++ toName` headers.
 * Returns the empty string when the texts have no line differences.
 */
export function unifiedDiff(
  fromName: string,
  toName: string,
  oldText: string,
  newText: string,
  context = DEFAULT_CONTEXT,
): string {
  const hunks = buildHunks(diffLines(splitLines(oldText), splitLines(newText)), context);
  if (hunks.length === 0) {
    return '';
  }

  const out = [`--- ${fromName}`, `+++ ${toName}`];
  for (const hunk of hunks) {
    out.push(
      `@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`,
      ...hunk.lines,
    );
  }
  return `${out.join('\n')}\n`;
}
