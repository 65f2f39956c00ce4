/**
 * Canonical text rendering of a Document.
 *
 * Mapping keys are sorted so that two documents with the same content render
 * identically regardless of source ordering.
 */

import * as YAML from 'yaml';
import { SecretDiffError } from '../errors.js';
import { formatErrors } from '../strings/index.js';
import { flattenDocument, scalarToString } from '../diff/flatten.js';
import { renderEnv, type EnvMap } from './env.js';
import { isDocumentMap, type Document, type Format } from './types.js';

/**
 * Copy of a document with every mapping's keys in code-unit order.
 */
export function sortDocument(doc: Document): Document {
  if (Array.isArray(doc)) {
    return doc.map(sortDocument);
  }
  if (isDocumentMap(doc)) {
    return Object.fromEntries(
      Object.keys(doc)
        .sort()
        .map((key): [string, Document] => [key, sortDocument(doc[key])]),
    );
  }
  return doc;
}

function toEnvMap(doc: Document): EnvMap {
  if (!isDocumentMap(doc)) {
    throw new SecretDiffError(formatErrors.envNotFlat, 'MALFORMED_INPUT', { stage: 'render' });
  }
  return Object.fromEntries(
    [...flattenDocument(doc).values()].map(({ path, value }): [string, string] => [path, scalarToString(value)]),
  );
}

/**
 * Render a document as canonical text. Output always ends with a newline.
 */
export function renderDocument(doc: Document, format: Format): string {
  switch (format) {
    case 'env':
      return renderEnv(toEnvMap(doc));
    case 'json':
      return `${JSON.stringify(sortDocument(doc), null, 2)}\n`;
    case 'yaml':
      return YAML.stringify(doc, {
        indent: 2,
        lineWidth: 0,
        sortMapEntries: true,
      });
  }
}
