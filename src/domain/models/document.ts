import { isDeepStrictEqual } from "node:util";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { formatZodIssues } from "../../utils/validation.ts";
import { type ValidationError, validationError } from "./errors.ts";

/**
 * Primary key of a stored document (a guild id or a user id). Snowflake ids
 * exceed 2^53, so they are carried as 64-bit integers.
 */
export type DocumentId = bigint;

export const MAX_DOCUMENT_ID = (1n << 63n) - 1n;

export type DocumentValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | DocumentValue[]
  | DocumentData;

export interface DocumentData {
  [field: string]: DocumentValue;
}

export interface StoredDocument extends DocumentData {
  _id: DocumentId;
}

export type ReadonlyValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | ReadonlyArray<ReadonlyValue>
  | ReadonlyDocument;

/**
 * View of a cached document that callers may read but not modify
 */
export interface ReadonlyDocument {
  readonly [field: string]: ReadonlyValue;
}

export function isDocumentData(value: unknown): value is DocumentData {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep, independent copy of a document value. Cached documents are only ever
 * handed out through this.
 */
export function cloneDocument<T extends DocumentValue>(value: T): T {
  return structuredClone(value);
}

export function documentsEqual(left: ReadonlyValue | undefined, right: ReadonlyValue | undefined): boolean {
  return isDeepStrictEqual(left, right);
}

export function isNumeric(value: ReadonlyValue | undefined): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

/**
 * Equality as the database compares values: numbers and 64-bit integers
 * compare by magnitude, everything else deeply.
 */
export function valuesEqual(left: ReadonlyValue | undefined, right: ReadonlyValue | undefined): boolean {
  if (isNumeric(left) && isNumeric(right)) {
    return left <= right && left >= right;
  }
  return documentsEqual(left, right);
}

/**
 * JSON-safe form of a document value; 64-bit integers become decimal strings
 */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [field: string]: JsonValue };

export function toJsonValue(value: ReadonlyValue): JsonValue {
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: ReadonlyValue) => toJsonValue(item));
  }
  const result: { [field: string]: JsonValue } = {};
  for (const [field, item] of Object.entries(value)) {
    result[field] = toJsonValue(item);
  }
  return result;
}

/**
 * `JSON.stringify` replacer writing 64-bit integers as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

// Stored ids arrive as bigint (Int64), number (Int32) or, from text, digits.
export const documentIdSchema = z
  .union([
    z.bigint(),
    z.number().int().safe().transform((value) => BigInt(value)),
    z.string().regex(/^\d+$/, "Expected a decimal id").transform((value) => BigInt(value)),
  ])
  .pipe(z.bigint().nonnegative().lte(MAX_DOCUMENT_ID));

export const documentValueSchema: z.ZodLazy<z.ZodType<DocumentValue>> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.bigint(),
    z.boolean(),
    z.null(),
    z.array(documentValueSchema),
    z.record(documentValueSchema),
  ])
);

export const documentDataSchema = z.record(documentValueSchema);

const storedDocumentSchema = z.object({ _id: documentIdSchema }).catchall(documentValueSchema);

/**
 * Validate a document read from an external source
 */
export function parseStoredDocument(raw: unknown): Result<StoredDocument, ValidationError> {
  const parsed = storedDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return err(validationError("Malformed stored document", formatZodIssues(parsed.error)));
  }
  return ok(parsed.data);
}

export function parseDocumentId(raw: unknown): Result<DocumentId, ValidationError> {
  const parsed = documentIdSchema.safeParse(raw);
  if (!parsed.success) {
    return err(validationError(`Invalid document id: ${String(raw)}`));
  }
  return ok(parsed.data);
}
