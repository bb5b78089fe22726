/**
 * Document Types
 * ==============
 *
 * Value model for documents edited by the patch engine, plus the
 * operation, patch and revision records that flow between modules.
 *
 * A document is a closed variant of three cases:
 * - Object: ordered string-keyed mapping (insertion order, unique keys)
 * - Array: ordered sequence
 * - Scalar: string, finite number, boolean or null
 *
 * Numbers whose source text a JS number cannot reproduce (integers past
 * 2^53, `1.0`, `1e5`, `-0`) are held as `LosslessNumber`, which keeps the
 * text exactly as read.
 */

import { isLosslessNumber } from 'lossless-json';
import type { LosslessNumber } from 'lossless-json';

// =============================================================================
// Document Values
// =============================================================================

/**
 * Leaf value.
 */
export type JsonScalar = string | number | LosslessNumber | boolean | null;

/**
 * Object node. Key order is the insertion order of the source document.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Array node.
 */
export type JsonArray = JsonValue[];

/**
 * Any document fragment, including a whole document.
 */
export type JsonValue = JsonScalar | JsonArray | JsonObject;

/**
 * Narrow a fragment to the object case.
 */
export function isJsonObject(value: JsonValue): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value) && !isLosslessNumber(value);
}

/**
 * Narrow a fragment to the number case, in either representation.
 */
export function isJsonNumber(value: JsonValue): value is number | LosslessNumber {
  return typeof value === 'number' || isLosslessNumber(value);
}

/**
 * Narrow a fragment to the array case.
 */
export function isJsonArray(value: JsonValue): value is JsonArray {
  return Array.isArray(value);
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Operation names accepted in a patch.
 */
export type PatchOpType = 'add' | 'remove' | 'replace' | 'move' | 'copy' | 'test';

export interface AddOperation {
  op: 'add';
  path: string;
  value: JsonValue;
}

export interface RemoveOperation {
  op: 'remove';
  path: string;
}

export interface ReplaceOperation {
  op: 'replace';
  path: string;
  value: JsonValue;
}

export interface MoveOperation {
  op: 'move';
  from: string;
  path: string;
}

export interface CopyOperation {
  op: 'copy';
  from: string;
  path: string;
}

export interface TestOperation {
  op: 'test';
  path: string;
  value: JsonValue;
}

/**
 * Single patch operation, tagged by `op`.
 */
export type PatchOperation =
  | AddOperation
  | RemoveOperation
  | ReplaceOperation
  | MoveOperation
  | CopyOperation
  | TestOperation;

/**
 * Ordered list of operations. Applied strictly in order.
 */
export type Patch = PatchOperation[];

// =============================================================================
// Engine Options
// =============================================================================

/**
 * How `add` treats an object key that is already present.
 *
 * - 'strict': fail with TARGET_EXISTS (default)
 * - 'upsert': overwrite the existing value
 */
export type AddMode = 'strict' | 'upsert';

/**
 * Options shared by the resolver, executor and clone helper.
 */
export interface EditOptions {
  /**
   * Behavior of `add` on an existing object key.
   * Default: 'strict'.
   */
  addMode?: AddMode;

  /**
   * Create missing intermediate object levels (as `{}`) when resolving
   * the container of the final token. Array elements are never created.
   * Default: false.
   */
  createParents?: boolean;
}

// =============================================================================
// Revisions
// =============================================================================

/**
 * A document as read from storage.
 */
export interface LoadedDocument {
  /** Parsed document */
  document: JsonValue;

  /** Exact bytes read from disk */
  raw: Buffer;

  /** SHA-256 of `raw`, hex */
  digest: string;
}

/**
 * Outcome of committing a new revision.
 */
export interface CommitResult {
  /** Absolute path of the committed file */
  path: string;

  /** SHA-256 of the bytes written, hex */
  digest: string;

  /** Path of the backup of the prior revision, when one was made */
  backup_path: string | null;
}
