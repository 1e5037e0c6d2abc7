// @author lockerdb contributors
// @date 2026-10-19
import { randomUUID } from 'node:crypto';
import { InvalidEncodingError, getErrorMessage } from './errors.mjs';

// JSON value as stored in a record
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface JsonObject {
  [key: string]: JsonValue;
}

// Stored record: caller fields plus the four system-managed fields
export interface JsonRecord extends JsonObject {
  _id: string;
  createdAt: string;
  updatedAt: string;
  _version: number;
}

export const RESERVED_FIELDS = ['_id', 'createdAt', 'updatedAt', '_version'] as const;

export type ReservedField = (typeof RESERVED_FIELDS)[number];

/**
 * Record payload accepted by the store: raw JSON object text (CLI, forms, API `data` field)
 * or an already parsed object.
 */
export type RecordInput = string | JsonObject;

const RESERVED_FIELD_SET: ReadonlySet<string> = new Set(RESERVED_FIELDS);

function isReservedField(key: string): key is ReservedField {
  return RESERVED_FIELD_SET.has(key);
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Formats a date as an RFC3339 UTC timestamp at second precision, e.g. `2024-05-01T12:30:00Z`.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Parses a stored collection: a JSON array of JSON objects.
 * Fields are kept verbatim, including unknown ones.
 *
 * @throws {InvalidEncodingError} On malformed JSON, a non-array top level or a non-object element.
 */
export function decodeRecords(bytes: Buffer): JsonObject[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytes.toString('utf8'));
  } catch (error) {
    throw new InvalidEncodingError(`Failed to parse collection JSON: ${getErrorMessage(error)}`, { cause: error });
  }

  if (!Array.isArray(parsed)) {
    throw new InvalidEncodingError('Collection JSON must be an array of records');
  }

  const entries: unknown[] = parsed;
  const records: JsonObject[] = [];
  for (const [index, entry] of entries.entries()) {
    if (!isJsonObject(entry)) {
      throw new InvalidEncodingError(`Collection entry ${index} is not a record object`);
    }
    records.push(entry);
  }
  return records;
}

export function encodeRecords(records: readonly JsonObject[]): Buffer {
  return Buffer.from(JSON.stringify(records), 'utf8');
}

/**
 * Parses caller-supplied record text. Surrounding whitespace and quote characters are trimmed,
 * since some shells pass the quotes of `'{"name":"bob"}'` through to the program.
 *
 * @throws {InvalidEncodingError} If the text is not a JSON object.
 */
export function parseRecordInput(input: RecordInput): JsonObject {
  if (typeof input !== 'string') {
    if (!isJsonObject(input)) {
      throw new InvalidEncodingError('Record data must be a JSON object');
    }
    return input;
  }

  const cleaned = input.trim().replace(/^['"]+|['"]+$/g, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch (error) {
    throw new InvalidEncodingError(`Failed to parse JSON data: ${getErrorMessage(error)}`, { cause: error });
  }

  if (!isJsonObject(parsed)) {
    throw new InvalidEncodingError('Record data must be a JSON object');
  }
  return parsed;
}

/**
 * Copy of `fields` without `_id`, `createdAt`, `updatedAt` and `_version`.
 */
export function stripReserved(fields: JsonObject): JsonObject {
  return Object.fromEntries(Object.entries(fields).filter(([key]) => !isReservedField(key)));
}

/**
 * Builds a new record: fresh `_id`, both timestamps set to `now`, `_version` 0.
 * Caller values for reserved fields are discarded.
 */
export function stampNew(fields: JsonObject, now: Date = new Date()): JsonRecord {
  const timestamp = formatTimestamp(now);
  return {
    ...stripReserved(fields),
    _id: randomUUID(),
    createdAt: timestamp,
    updatedAt: timestamp,
    _version: 0,
  };
}

/**
 * Builds the edited version of `existing`. Identity and creation time are carried forward,
 * `_version` goes up by one and the caller fields replace every non-reserved field
 * (fields absent from `fields` are dropped).
 *
 * @throws {InvalidEncodingError} If the stored record lacks a string `_id`, a `createdAt` or a valid `_version`.
 */
export function stampEdit(existing: JsonObject, fields: JsonObject, now: Date = new Date()): JsonRecord {
  const { _id: id, createdAt, _version: version } = existing;
  if (typeof id !== 'string') {
    throw new InvalidEncodingError('Stored record has no string _id');
  }
  if (typeof createdAt !== 'string') {
    throw new InvalidEncodingError(`Record ${id} has no createdAt timestamp`);
  }
  if (typeof version !== 'number' || !Number.isSafeInteger(version) || version < 0) {
    throw new InvalidEncodingError(`Record ${id} has an invalid _version`);
  }

  return {
    ...stripReserved(fields),
    _id: id,
    createdAt,
    updatedAt: formatTimestamp(now),
    _version: version + 1,
  };
}
