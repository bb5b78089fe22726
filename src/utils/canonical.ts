/**
 * Document Serialization
 * ======================
 *
 * Deterministic serialization for persisted revisions and comparisons.
 *
 * Persisted form (what gets written and hashed):
 * - Objects: keys in insertion order of the source document
 * - Indentation: 2 spaces, `": "` between key and value
 * - Encoding: UTF-8, no BOM, non-ASCII characters left unescaped
 * - No trailing newline
 * - Numbers: written with the exact text they were read with, so an
 *   unedited `12345678901234567890` or `1.0` survives a commit unchanged
 *
 * Canonical form (comparison and diff only, never persisted):
 * - Same layout, keys sorted lexicographically by UTF-16 code units
 *
 * Rejected: NaN, Infinity, BigInt, undefined, functions, symbols
 */

import { createHash } from 'node:crypto';
import { isLosslessNumber, LosslessNumber, parse, stringify } from 'lossless-json';

import type { JsonObject, JsonValue } from '../types/document.js';
import { isJsonObject } from '../types/document.js';

export interface SerializeOptions {
  /**
   * Sort object keys. Use for comparison and diffs only.
   * Default: false.
   */
  sortKeys?: boolean;
}

/**
 * Values that cannot be serialized - will throw
 */
function isUnsupportedValue(value: unknown): boolean {
  if (typeof value === 'number') {
    return !Number.isFinite(value);
  }
  if (typeof value === 'bigint') return true;
  if (typeof value === 'function') return true;
  if (typeof value === 'symbol') return true;
  if (typeof value === 'undefined') return true;
  return false;
}

/**
 * Walk a value, rejecting anything JSON cannot represent faithfully.
 * A plain stringify would silently drop or null these.
 */
function assertSerializable(value: unknown, path: string): void {
  if (isUnsupportedValue(value)) {
    throw new Error(`Unsupported value at ${path}: ${typeof value} cannot be serialized`);
  }
  if (Array.isArray(value)) {
    value.forEach((el, i) => assertSerializable(el, `${path}[${i}]`));
    return;
  }
  if (isLosslessNumber(value)) return;
  if (value !== null && typeof value === 'object') {
    for (const [key, el] of Object.entries(value)) {
      assertSerializable(el, `${path}.${key}`);
    }
  }
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Rebuild a value with object keys in sorted order.
 */
function sortValue(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map(sortValue);
  }
  if (isJsonObject(value)) {
    const sorted: JsonObject = {};
    for (const key of Object.keys(value).sort(compareKeys)) {
      const el = value[key];
      if (el === undefined) continue;
      // defineProperty keeps "__proto__" an own key
      Object.defineProperty(sorted, key, {
        value: sortValue(el),
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
    return sorted;
  }
  return value;
}

function stringifyChecked(value: JsonValue, space?: number): string {
  const text = stringify(value, undefined, space);
  if (text === undefined) {
    throw new Error('Document serialized to nothing');
  }
  return text;
}

/**
 * Serialize a document to its text form.
 *
 * @throws Error if the value contains unsupported types
 */
export function serializeDocument(value: JsonValue, options: SerializeOptions = {}): string {
  assertSerializable(value, '$');
  const source = options.sortKeys ? sortValue(value) : value;
  return stringifyChecked(source, 2);
}

/**
 * Serialize a document to the exact UTF-8 bytes that get written and hashed.
 */
export function serializeToBytes(value: JsonValue, options: SerializeOptions = {}): Buffer {
  return Buffer.from(serializeDocument(value, options), 'utf-8');
}

/**
 * Compact sorted-key form. Two structurally equal documents produce the
 * same string regardless of key order.
 */
export function canonicalize(value: JsonValue): string {
  assertSerializable(value, '$');
  return stringifyChecked(sortValue(value));
}

/**
 * SHA-256 of raw bytes, hex.
 */
export function sha256Hex(bytes: Buffer | string): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * SHA-256 of a document's persisted form.
 */
export function documentDigest(value: JsonValue): string {
  return sha256Hex(serializeToBytes(value));
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Keep a number as a JS number only when that reproduces its text.
 */
function parseNumber(text: string): number | LosslessNumber {
  const value = Number(text);
  return String(value) === text ? value : new LosslessNumber(text);
}

/**
 * Check that an arbitrary value is a document fragment and rebuild it as
 * one. Object keys are defined as own properties, "__proto__" included.
 *
 * @throws Error naming the offending location
 */
export function toDocumentValue(value: unknown, path = '$'): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new Error(`Non-finite number at ${path}`);
    return value;
  }
  if (isLosslessNumber(value)) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((el: unknown, i) => toDocumentValue(el, `${path}[${i}]`));
  }
  if (typeof value === 'object') {
    const out: JsonObject = {};
    for (const [key, el] of Object.entries(value)) {
      Object.defineProperty(out, key, {
        value: toDocumentValue(el, `${path}.${key}`),
        writable: true,
        enumerable: true,
        configurable: true,
      });
    }
    return out;
  }
  throw new Error(`Unsupported ${typeof value} at ${path}`);
}

/**
 * Parse UTF-8 bytes into a document. A leading BOM is tolerated.
 * Number text is preserved (see parseNumber).
 *
 * @throws SyntaxError for malformed JSON
 */
export function parseDocument(bytes: Buffer | string): JsonValue {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf-8');
  return toDocumentValue(parse(text.replace(/^\uFEFF/, ''), null, parseNumber));
}
