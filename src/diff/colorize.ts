import type { ChalkInstance } from 'chalk';

/**
 * Color a unified diff for the terminal: additions green, deletions red,
 * hunk headers cyan. Only escape codes are added; stripping them gives back
 * the input.
 */
export function colorizeDiff(diff: string, colors: ChalkInstance): string {
  return diff
    .split('\n')
    .map((line) => {
      if (line.startsWith('+') && !line.startsWith('+++')) {
        return colors.green(line);
      }
      if (line.startsWith('-') && !line.startsWith('---')) {
        return colors.red(line);
      }
      if (line.startsWith('@@')) {
        return colors.cyan(line);
      }
      return line;
    })
    .join('\n');
}
