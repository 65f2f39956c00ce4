/**
 * Comparison pipeline: read, decrypt, parse, flatten, diff, canonicalize.
 */

import type { ChangeEntry, ComparisonMode } from '../diff/changes.js';
import { computeChanges } from '../diff/changes.js';
import { flattenDocument } from '../diff/flatten.js';
import { resolveFormat, type FormatChoice } from '../document/format.js';
import { parseDocument } from '../document/parse.js';
import { renderDocument } from '../document/render.js';
import type { Document, Format } from '../document/types.js';
import type { SecretStore } from '../secrets/types.js';
import { plaintextNotices } from '../strings/index.js';
import { decryptSource, type DecryptedSource, type DecryptOptions, type Notifier } from './decrypt.js';
import type { SourcePair, SourceReader, SourceInput } from './sources.js';

export interface CompareOptions {
  format: FormatChoice;
  errorOnDecrypted: boolean;
  comparison: ComparisonMode;
  summary: boolean;
}

export interface CompareDeps {
  store: SecretStore;
  reader: SourceReader;
  notifier: Notifier;
}

export interface LoadedSource {
  source: SourceInput;
  document: Document;
  /** Canonical rendering used for the full diff */
  canonical: string;
  plaintext: boolean;
}

export interface Comparison {
  format: Format;
  first: LoadedSource;
  second: LoadedSource;
  changes: ChangeEntry[];
}

function notePlaintext(first: DecryptedSource, second: DecryptedSource, options: CompareOptions, notifier: Notifier): void {
  if (options.summary) {
    return;
  }
  if (first.plaintext && second.plaintext) {
    notifier.info(plaintextNotices.bothPlaintext);
  } else if (first.plaintext || second.plaintext) {
    notifier.warn(plaintextNotices.mixed);
  }
}

async function readSide(source: SourceInput, reader: SourceReader): Promise<string> {
  return source.missing ? '' : reader.read(source.location);
}

function decryptSide(
  source: SourceInput,
  content: string,
  format: Format,
  deps: CompareDeps,
  options: DecryptOptions,
): DecryptedSource {
  if (source.missing) {
    deps.notifier.debug(`${source.location} is absent, compared as an empty document`);
    return { text: '', plaintext: false };
  }
  return decryptSource(content, format, source.location, deps.store, options);
}

/**
 * A missing side is an empty mapping with no canonical text, so every key on
 * the other side shows up as added or removed.
 */
function loadSide(source: SourceInput, decrypted: DecryptedSource, format: Format): LoadedSource {
  if (source.missing) {
    return { source, document: {}, canonical: '', plaintext: false };
  }
  const document = parseDocument(decrypted.text, format, source.location);
  return { source, document, canonical: renderDocument(document, format), plaintext: decrypted.plaintext };
}

/**
 * Compare two sources under one resolved format.
 *
 * Stages run in order and the first failure aborts the comparison.
 */
export async function compareSources(
  pair: SourcePair,
  options: CompareOptions,
  deps: CompareDeps,
): Promise<Comparison> {
  const format = resolveFormat(pair.first.formatHint, pair.second.formatHint, options.format);
  deps.notifier.debug(`comparing ${pair.first.location} with ${pair.second.location} as ${format}`);

  const firstContent = await readSide(pair.first, deps.reader);
  const secondContent = await readSide(pair.second, deps.reader);

  const decryptOptions = { allowPlaintext: !options.errorOnDecrypted, notifier: deps.notifier };
  const firstText = decryptSide(pair.first, firstContent, format, deps, decryptOptions);
  const secondText = decryptSide(pair.second, secondContent, format, deps, decryptOptions);
  notePlaintext(firstText, secondText, options, deps.notifier);

  const first = loadSide(pair.first, firstText, format);
  const second = loadSide(pair.second, secondText, format);

  const changes = computeChanges(flattenDocument(first.document), flattenDocument(second.document), options.comparison);
  deps.notifier.debug(`${changes.length} changed path(s)`);

  return { format, first, second, changes };
}
