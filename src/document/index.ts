/**
 * Document model: parsing, canonical rendering and format resolution.
 */

export type { Document, DocumentMap, Format, Scalar } from './types.js';
export {
  DocumentSchema,
  FORMATS,
  FORMAT_LABELS,
  isDocumentMap,
} from './types.js';
export type { FormatChoice } from './format.js';
export { detectFormat, resolveFormat } from './format.js';
export type { EnvMap } from './env.js';
export { parseEnv, renderEnv } from './env.js';
export { parseDocument } from './parse.js';
export { renderDocument, sortDocument } from './render.js';
