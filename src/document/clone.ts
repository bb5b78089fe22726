/**
 * Template Instantiation
 * ======================
 *
 * Duplicates an existing subtree (typically a layer object) at a new
 * location, optionally renaming the copy.
 */

import type { EditOptions, JsonValue } from '../types/document.js';
import { isJsonObject } from '../types/document.js';
import { deepCopy } from './patch.js';
import { addAt, getAt, parsePointer } from './pointer.js';

/**
 * Clone the fragment at `sourcePointer` to `destPointer`.
 *
 * The copy shares no state with the source. When `overrideName` is given
 * and the copy is an object, its `name` field is set. Insertion follows
 * `add` rules: into an array it appends or inserts, onto a populated
 * object key it fails with TARGET_EXISTS (unless upsert mode).
 *
 * @returns The new root
 */
export function cloneSubtree(
  document: JsonValue,
  sourcePointer: string,
  destPointer: string,
  overrideName?: string,
  options: EditOptions = {}
): JsonValue {
  const source = getAt(document, parsePointer(sourcePointer));
  const copy = deepCopy(source);

  if (overrideName !== undefined && overrideName !== '' && isJsonObject(copy)) {
    copy['name'] = overrideName;
  }

  return addAt(document, parsePointer(destPointer), copy, options);
}
