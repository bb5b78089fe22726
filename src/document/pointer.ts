/**
 * Pointer Resolver
 * ================
 *
 * Parses JSON Pointer strings (RFC 6901) into tokens and navigates or
 * mutates documents along them.
 *
 * Mutating functions return the new root. For a non-empty pointer the
 * document is edited in place and returned; for the empty pointer the
 * given value becomes the root. Callers that need the prior state must
 * snapshot it first.
 *
 * Array tokens:
 * - Must be canonical base-10 indices ("0", "7", never "07" or "+1")
 * - '-' means one past the last element, valid only as an add target
 */

import type { EditOptions, JsonArray, JsonObject, JsonValue } from '../types/document.js';
import { isJsonNumber, isJsonObject } from '../types/document.js';
import { DocumentError } from './errors.js';

const APPEND_TOKEN = '-';

const INDEX_PATTERN = /^(0|[1-9][0-9]*)$/;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Unescape one token. `~0` and `~1` are decoded in a single scan so that
 * `~01` yields `~1` rather than `/`.
 */
function unescapeToken(token: string, pointer: string): string {
  if (!token.includes('~')) return token;

  let out = '';
  for (let i = 0; i < token.length; i++) {
    const ch = token.charAt(i);
    if (ch !== '~') {
      out += ch;
      continue;
    }
    const next = token.charAt(i + 1);
    if (next === '0') {
      out += '~';
    } else if (next === '1') {
      out += '/';
    } else {
      throw new DocumentError('INVALID_TOKEN', `Invalid escape in pointer token "${token}": ${pointer}`, {
        pointer,
      });
    }
    i++;
  }
  return out;
}

function escapeToken(token: string): string {
  return token.replace(/~/g, '~0').replace(/\//g, '~1');
}

/**
 * Parse a pointer string into unescaped tokens.
 * The empty string is the root and yields no tokens.
 *
 * @throws DocumentError MALFORMED_POINTER if non-empty without a leading '/'
 */
export function parsePointer(pointer: string): string[] {
  if (pointer === '') return [];
  if (!pointer.startsWith('/')) {
    throw new DocumentError('MALFORMED_POINTER', `Invalid JSON Pointer (must start with '/'): ${pointer}`, {
      pointer,
    });
  }
  return pointer
    .slice(1)
    .split('/')
    .map((token) => unescapeToken(token, pointer));
}

/**
 * Format tokens back into a pointer string.
 */
export function formatPointer(tokens: readonly string[]): string {
  if (tokens.length === 0) return '';
  return '/' + tokens.map(escapeToken).join('/');
}

// =============================================================================
// Navigation
// =============================================================================

/**
 * Resolve an array token to an existing element index.
 */
function existingIndex(arr: JsonArray, token: string, pointer: string): number {
  if (token === APPEND_TOKEN) {
    throw new DocumentError('INVALID_TOKEN', `'-' does not address an existing element: ${pointer}`, {
      pointer,
    });
  }
  const index = parseIndex(token);
  if (index === null || index >= arr.length) {
    throw new DocumentError(
      'INDEX_OUT_OF_RANGE',
      `Array index "${token}" out of range (length ${arr.length}): ${pointer}`,
      { pointer }
    );
  }
  return index;
}

function parseIndex(token: string): number | null {
  if (!INDEX_PATTERN.test(token)) return null;
  const index = Number(token);
  return Number.isSafeInteger(index) ? index : null;
}

/**
 * Step from a container into one child.
 */
function step(current: JsonValue, token: string, pointer: string): JsonValue {
  if (Array.isArray(current)) {
    const child = current[existingIndex(current, token, pointer)];
    if (child === undefined) {
      throw new DocumentError('INDEX_OUT_OF_RANGE', `Array index "${token}" out of range: ${pointer}`, {
        pointer,
      });
    }
    return child;
  }
  if (isJsonObject(current)) {
    if (!Object.hasOwn(current, token)) {
      throw new DocumentError('NOT_FOUND', `Key "${token}" not found: ${pointer}`, { pointer });
    }
    const child = current[token];
    if (child === undefined) {
      throw new DocumentError('NOT_FOUND', `Key "${token}" not found: ${pointer}`, { pointer });
    }
    return child;
  }
  throw new DocumentError(
    'TYPE_MISMATCH',
    `Cannot resolve "${token}" inside a ${describe(current)}: ${pointer}`,
    { pointer }
  );
}

function describe(value: JsonValue): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (isJsonNumber(value)) return 'number';
  return typeof value;
}

/**
 * Resolve the container holding the final token.
 * Missing object levels are created only when `createParents` is set.
 */
function resolveParent(
  document: JsonValue,
  tokens: readonly string[],
  pointer: string,
  createParents: boolean
): JsonArray | JsonObject {
  let current = document;

  for (const token of tokens.slice(0, -1)) {
    if (createParents && isJsonObject(current) && !Object.hasOwn(current, token)) {
      const created: JsonObject = {};
      setKey(current, token, created);
      current = created;
      continue;
    }
    current = step(current, token, pointer);
  }

  if (Array.isArray(current) || isJsonObject(current)) {
    return current;
  }
  throw new DocumentError('TYPE_MISMATCH', `Parent of ${pointer} is a ${describe(current)}, not a container`, {
    pointer,
  });
}

/**
 * Define an own enumerable key. Plain assignment would treat "__proto__"
 * as the prototype setter instead of a key.
 */
function setKey(obj: JsonObject, key: string, value: JsonValue): void {
  Object.defineProperty(obj, key, { value, writable: true, enumerable: true, configurable: true });
}

function lastToken(tokens: readonly string[]): string {
  const last = tokens[tokens.length - 1];
  if (last === undefined) {
    throw new Error('lastToken called with an empty pointer');
  }
  return last;
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Read the fragment at a pointer. The returned fragment is not copied.
 *
 * @throws DocumentError NOT_FOUND | INDEX_OUT_OF_RANGE | TYPE_MISMATCH | INVALID_TOKEN
 */
export function getAt(document: JsonValue, tokens: readonly string[]): JsonValue {
  const pointer = formatPointer(tokens);
  let current = document;
  for (const token of tokens) {
    current = step(current, token, pointer);
  }
  return current;
}

/**
 * Insert a value.
 *
 * Object parent: strict insert, TARGET_EXISTS on a present key unless
 * `addMode` is 'upsert'. Array parent: '-' appends, an index in
 * [0, length] inserts and shifts later elements right.
 *
 * @returns The new root
 */
export function addAt(
  document: JsonValue,
  tokens: readonly string[],
  value: JsonValue,
  options: EditOptions = {}
): JsonValue {
  if (tokens.length === 0) return value;

  const pointer = formatPointer(tokens);
  const parent = resolveParent(document, tokens, pointer, options.createParents ?? false);
  const last = lastToken(tokens);

  if (Array.isArray(parent)) {
    if (last === APPEND_TOKEN) {
      parent.push(value);
      return document;
    }
    const index = parseIndex(last);
    if (index === null || index > parent.length) {
      throw new DocumentError(
        'INDEX_OUT_OF_RANGE',
        `Insert index "${last}" out of range (length ${parent.length}): ${pointer}`,
        { pointer }
      );
    }
    parent.splice(index, 0, value);
    return document;
  }

  if (Object.hasOwn(parent, last) && (options.addMode ?? 'strict') === 'strict') {
    throw new DocumentError('TARGET_EXISTS', `Add target exists: ${pointer}`, { pointer });
  }
  setKey(parent, last, value);
  return document;
}

/**
 * Replace an existing value.
 *
 * @returns The new root
 */
export function replaceAt(
  document: JsonValue,
  tokens: readonly string[],
  value: JsonValue,
  options: EditOptions = {}
): JsonValue {
  if (tokens.length === 0) return value;

  const pointer = formatPointer(tokens);
  const parent = resolveParent(document, tokens, pointer, options.createParents ?? false);
  const last = lastToken(tokens);

  if (Array.isArray(parent)) {
    const index = parseIndex(last);
    if (index === null || index >= parent.length) {
      throw new DocumentError(
        'INDEX_OUT_OF_RANGE',
        `Replace index "${last}" out of range (length ${parent.length}): ${pointer}`,
        { pointer }
      );
    }
    parent[index] = value;
    return document;
  }

  if (!Object.hasOwn(parent, last)) {
    throw new DocumentError('NOT_FOUND', `Replace target missing: ${pointer}`, { pointer });
  }
  setKey(parent, last, value);
  return document;
}

/**
 * Remove a value. Later array elements shift left.
 *
 * @returns The new root (always the same document)
 * @throws DocumentError ROOT_REMOVAL_FORBIDDEN for the empty pointer
 */
export function removeAt(
  document: JsonValue,
  tokens: readonly string[],
  options: EditOptions = {}
): JsonValue {
  if (tokens.length === 0) {
    throw new DocumentError('ROOT_REMOVAL_FORBIDDEN', 'Cannot remove document root', { pointer: '' });
  }

  const pointer = formatPointer(tokens);
  const parent = resolveParent(document, tokens, pointer, options.createParents ?? false);
  const last = lastToken(tokens);

  if (Array.isArray(parent)) {
    parent.splice(existingIndex(parent, last, pointer), 1);
    return document;
  }

  if (!Object.hasOwn(parent, last)) {
    throw new DocumentError('NOT_FOUND', `Remove target missing: ${pointer}`, { pointer });
  }
  delete parent[last];
  return document;
}
