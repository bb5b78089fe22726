/**
 * Document Merge
 * ==============
 *
 * Combines an existing plan document with a freshly materialized one
 * (for example, the output of a template renderer). Both inputs are
 * plain documents; nothing here interprets template syntax.
 *
 * Strategies:
 * - replace:       result is the incoming document
 * - merge_layers:  existing document with `layers` (and `orchestrator`,
 *                  when present) taken from the incoming one
 * - append_layers: existing document with incoming layers appended
 */

import type { JsonArray, JsonObject, JsonValue } from '../types/document.js';
import { isJsonObject } from '../types/document.js';
import { DocumentError } from './errors.js';
import { deepCopy } from './patch.js';

export type MergeStrategy = 'replace' | 'merge_layers' | 'append_layers';

export const MERGE_STRATEGIES: readonly MergeStrategy[] = ['replace', 'merge_layers', 'append_layers'];

export function isMergeStrategy(value: string): value is MergeStrategy {
  return MERGE_STRATEGIES.some((s) => s === value);
}

function requireObject(value: JsonValue, role: string): JsonObject {
  if (!isJsonObject(value)) {
    throw new DocumentError('TYPE_MISMATCH', `${role} document must be an object to merge layers`, {
      pointer: '',
    });
  }
  return value;
}

function layersOf(doc: JsonObject, role: string): JsonArray {
  const layers = doc['layers'];
  if (layers === undefined) return [];
  if (!Array.isArray(layers)) {
    throw new DocumentError('TYPE_MISMATCH', `${role} document has non-array 'layers'`, {
      pointer: '/layers',
    });
  }
  return layers;
}

/**
 * Merge two documents. Inputs are not modified; the result shares no
 * state with either.
 */
export function mergeDocuments(existing: JsonValue, incoming: JsonValue, strategy: MergeStrategy): JsonValue {
  if (strategy === 'replace') {
    return deepCopy(incoming);
  }

  const base = requireObject(existing, 'Existing');
  const next = requireObject(incoming, 'Incoming');
  const merged = deepCopy(base);

  if (strategy === 'merge_layers') {
    merged['layers'] = deepCopy(layersOf(next, 'Incoming'));
    const orchestrator = next['orchestrator'];
    if (orchestrator !== undefined) {
      merged['orchestrator'] = deepCopy(orchestrator);
    }
    return merged;
  }

  merged['layers'] = [...layersOf(merged, 'Existing'), ...deepCopy(layersOf(next, 'Incoming'))];
  return merged;
}
