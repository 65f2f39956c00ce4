/**
 * In-memory model of a decrypted secrets document.
 */

import { z } from 'zod';

/**
 * Leaf value. YAML integers outside the safe range are kept as bigint.
 */
export type Scalar = string | number | bigint | boolean | null;

/**
 * Ordered mapping, sequence or scalar. Acyclic by construction.
 */
export type Document = Scalar | Document[] | DocumentMap;

export interface DocumentMap {
  [key: string]: Document;
}

export const FORMATS = ['yaml', 'json', 'env'] as const;

export type Format = (typeof FORMATS)[number];

export const FORMAT_LABELS: Record<Format, string> = {
  yaml: 'YAML',
  json: 'JSON',
  env: 'ENV',
};

const IntegerSchema = z
  .bigint()
  .transform((value) => (Number.isSafeInteger(Number(value)) ? Number(value) : value));

export const ScalarSchema = z.union([z.string(), z.number(), z.nan(), IntegerSchema, z.boolean(), z.null()]);

/**
 * Validates values produced by the YAML and JSON libraries.
 */
export const DocumentSchema: z.ZodType<Document> = z.lazy(() =>
  z.union([ScalarSchema, z.array(DocumentSchema), z.record(DocumentSchema)]),
);

export function isDocumentMap(value: Document): value is DocumentMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
