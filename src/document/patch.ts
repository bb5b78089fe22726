/**
 * Patch Operation Executor
 * ========================
 *
 * Applies an ordered patch (add, remove, replace, move, copy, test) to a
 * document using the pointer resolver.
 *
 * Execution contract:
 * - The whole patch is structurally validated before any operation runs
 * - Operations run strictly in order; each sees the result of the previous
 * - Pointer and resolution errors surface when their operation runs
 * - The first failure is raised; earlier operations are NOT rolled back
 *
 * For all-or-nothing semantics use applyPatchAtomic, which works on a
 * private copy and only returns it once every operation has succeeded.
 */

import type { LosslessNumber } from 'lossless-json';

import type {
  EditOptions,
  JsonArray,
  JsonObject,
  JsonValue,
  Patch,
  PatchOperation,
  PatchOpType,
} from '../types/document.js';
import { isJsonNumber, isJsonObject } from '../types/document.js';
import { toDocumentValue } from '../utils/canonical.js';
import { DocumentError, PatchAssertionError } from './errors.js';
import { addAt, getAt, parsePointer, removeAt, replaceAt } from './pointer.js';

/**
 * Valid operation types.
 */
const VALID_OPS: ReadonlySet<string> = new Set<PatchOpType>(['add', 'remove', 'replace', 'move', 'copy', 'test']);

// =============================================================================
// Value Helpers
// =============================================================================

/**
 * Structural duplicate sharing no mutable state with the source.
 * Exact numbers are immutable and are shared.
 */
export function deepCopy(value: JsonObject): JsonObject;
export function deepCopy(value: JsonArray): JsonArray;
export function deepCopy(value: JsonValue): JsonValue;
export function deepCopy(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    return value.map((el) => deepCopy(el));
  }
  if (isJsonObject(value)) {
    const out: JsonObject = {};
    for (const [key, el] of Object.entries(value)) {
      Object.defineProperty(out, key, { value: deepCopy(el), writable: true, enumerable: true, configurable: true });
    }
    return out;
  }
  return value;
}

const INTEGER_TEXT = /^-?\d+$/;

/**
 * Numeric equality across both number representations. Integers compare
 * exactly at any size; `1` equals `1.0`.
 */
function numbersEqual(a: number | LosslessNumber, b: number | LosslessNumber): boolean {
  const left = String(a);
  const right = String(b);
  if (INTEGER_TEXT.test(left) && INTEGER_TEXT.test(right)) {
    return BigInt(left) === BigInt(right);
  }
  return Number(left) === Number(right);
}

/**
 * Structural equality. Object key order is ignored; array order is not.
 */
export function jsonEquals(a: JsonValue, b: JsonValue): boolean {
  if (a === b) return true;

  if (isJsonNumber(a) && isJsonNumber(b)) {
    return numbersEqual(a, b);
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((el, i) => {
      const other = b[i];
      return other !== undefined && jsonEquals(el, other);
    });
  }

  if (isJsonObject(a) && isJsonObject(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const left = a[key];
      const right = b[key];
      return left !== undefined && right !== undefined && Object.hasOwn(b, key) && jsonEquals(left, right);
    });
  }

  return false;
}

// =============================================================================
// Structural Validation
// =============================================================================

function malformed(index: number, message: string): DocumentError {
  return new DocumentError('MALFORMED_OPERATION', `Patch[${index}] ${message}`, { opIndex: index });
}

function requireValue(raw: Record<string, unknown>, index: number, op: string): JsonValue {
  if (!Object.hasOwn(raw, 'value') || raw['value'] === undefined) {
    throw malformed(index, `missing 'value' for ${op}`);
  }
  return toJsonValue(raw['value'], index);
}

function requireFrom(raw: Record<string, unknown>, index: number, op: string): string {
  const from = raw['from'];
  if (typeof from !== 'string') {
    throw malformed(index, `missing 'from' for ${op}`);
  }
  return from;
}

/**
 * Check that an arbitrary value is a document fragment.
 */
function toJsonValue(value: unknown, index: number): JsonValue {
  try {
    return toDocumentValue(value, 'value');
  } catch (err) {
    throw malformed(index, err instanceof Error ? err.message : String(err));
  }
}

function validateOperation(raw: unknown, index: number): PatchOperation {
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw malformed(index, 'is not an object');
  }
  const record: Record<string, unknown> = { ...raw };

  const op = record['op'];
  if (typeof op !== 'string' || !VALID_OPS.has(op)) {
    throw malformed(index, `unsupported op: ${String(op)}`);
  }

  const path = record['path'];
  if (typeof path !== 'string') {
    throw malformed(index, `missing valid 'path'`);
  }

  switch (op) {
    case 'add':
      return { op, path, value: requireValue(record, index, op) };
    case 'replace':
      return { op, path, value: requireValue(record, index, op) };
    case 'test':
      return { op, path, value: requireValue(record, index, op) };
    case 'remove':
      return { op, path };
    case 'move':
      return { op, from: requireFrom(record, index, op), path };
    case 'copy':
      return { op, from: requireFrom(record, index, op), path };
    default:
      throw malformed(index, `unsupported op: ${op}`);
  }
}

/**
 * Structurally validate a patch before anything executes.
 * Pointer syntax is not checked here; it is checked when each operation runs.
 *
 * @throws DocumentError MALFORMED_OPERATION
 */
export function validatePatch(input: unknown): Patch {
  if (!Array.isArray(input)) {
    throw new DocumentError('MALFORMED_OPERATION', 'Patch must be an array of operations');
  }
  return input.map((raw: unknown, index) => validateOperation(raw, index));
}

// =============================================================================
// Execution
// =============================================================================

function applyOperation(
  document: JsonValue,
  operation: PatchOperation,
  index: number,
  options: EditOptions
): JsonValue {
  switch (operation.op) {
    case 'add':
      return addAt(document, parsePointer(operation.path), operation.value, options);

    case 'remove':
      return removeAt(document, parsePointer(operation.path), options);

    case 'replace':
      return replaceAt(document, parsePointer(operation.path), operation.value, options);

    case 'move': {
      const fromTokens = parsePointer(operation.from);
      const pathTokens = parsePointer(operation.path);
      const value = getAt(document, fromTokens);
      const removed = removeAt(document, fromTokens, options);
      return addAt(removed, pathTokens, value, options);
    }

    case 'copy': {
      const fromTokens = parsePointer(operation.from);
      const pathTokens = parsePointer(operation.path);
      const value = getAt(document, fromTokens);
      return addAt(document, pathTokens, deepCopy(value), options);
    }

    case 'test': {
      const actual = getAt(document, parsePointer(operation.path));
      if (!jsonEquals(actual, operation.value)) {
        throw new PatchAssertionError(operation.path, operation.value, deepCopy(actual), index);
      }
      return document;
    }
  }
}

/**
 * Apply a patch in order against the evolving document.
 *
 * The document may be mutated in place even when an operation fails;
 * callers that must not observe partial results should pass a copy
 * (or use applyPatchAtomic).
 *
 * @param document - Working document (the caller's scratch copy)
 * @param patch - Operations, or raw parsed patch-file content
 * @returns The new root
 */
export function applyPatch(document: JsonValue, patch: unknown, options: EditOptions = {}): JsonValue {
  const operations = validatePatch(patch);

  let current = document;
  operations.forEach((operation, index) => {
    current = applyOperation(current, operation, index, options);
  });
  return current;
}

/**
 * Apply a patch to a private copy. The input document is never modified;
 * the copy is returned only if every operation succeeds.
 */
export function applyPatchAtomic(document: JsonValue, patch: unknown, options: EditOptions = {}): JsonValue {
  return applyPatch(deepCopy(document), patch, options);
}

/**
 * Concatenate patches, in the order given, into one consolidated patch.
 * Each input is validated first; validation builds fresh operations.
 */
export function concatPatches(patches: readonly unknown[]): Patch {
  const out: Patch = [];
  for (const patch of patches) {
    for (const operation of validatePatch(patch)) {
      out.push(operation);
    }
  }
  return out;
}
