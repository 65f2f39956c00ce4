/**
 * Conflict extraction and composition.
 */

export type { MarkerKind } from './markers.js';
export {
  BASE_MARKER,
  END_MARKER,
  SEPARATOR,
  START_MARKER,
  classifyMarker,
  hasConflictMarkers,
  scanLines,
} from './markers.js';
export type { ConflictSides } from './extract.js';
export { extractSides } from './extract.js';
export type { ConflictLabels } from './compose.js';
export { assertResolved, composeConflict, composeMergeDraft, validateResolved } from './compose.js';
export { colorizeConflict } from './colorize.js';
