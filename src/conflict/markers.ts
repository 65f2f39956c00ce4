/**
 * Version-control conflict marker lines.
 */

export const START_MARKER = '<<<<<<< ';
export const BASE_MARKER = '|||||||';
export const SEPARATOR = '=======';
export const END_MARKER = '>>>>>>> ';

export type MarkerKind = 'start' | 'base' | 'separator' | 'end';

/**
 * Classify a single line (without its terminator) as a marker, or null.
 */
export function classifyMarker(line: string): MarkerKind | null {
  if (line.startsWith(START_MARKER)) return 'start';
  if (line === SEPARATOR) return 'separator';
  if (line.startsWith(END_MARKER)) return 'end';
  if (line === BASE_MARKER || line.startsWith(`${BASE_MARKER} `)) return 'base';
  return null;
}

/**
 * Split text into lines the way a line scanner does: LF or CRLF terminators,
 * no empty line after a final terminator.
 */
export function scanLines(text: string): string[] {
  if (text === '') {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Whether any line opens a conflict.
 */
export function hasConflictMarkers(text: string): boolean {
  return scanLines(text).some((line) => line.startsWith(START_MARKER));
}
