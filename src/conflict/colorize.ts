import type { ChalkInstance } from 'chalk';
import { classifyMarker } from './markers.js';

/**
 * Color a marked conflict: markers cyan, ours red, theirs green, base gray.
 */
export function colorizeConflict(content: string, colors: ChalkInstance): string {
  let region: 'common' | 'ours' | 'base' | 'theirs' = 'common';

  return content
    .split('\n')
    .map((line) => {
      switch (classifyMarker(line)) {
        case 'start':
          region = 'ours';
          return colors.cyan(line);
        case 'base':
          region = 'base';
          return colors.cyan(line);
        case 'separator':
          region = 'theirs';
          return colors.cyan(line);
        case 'end':
          region = 'common';
          return colors.cyan(line);
        case null:
          break;
      }
      if (region === 'ours') return colors.red(line);
      if (region === 'theirs') return colors.green(line);
      if (region === 'base') return colors.gray(line);
      return line;
    })
    .join('\n');
}
