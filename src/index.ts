/**
 * docpatch
 * ========
 *
 * Structured-document patch engine: JSON Pointer addressing, ordered
 * patch application, unified-diff previews and crash-safe commits.
 *
 * Key Guarantees:
 * - Operations apply strictly in order and stop at the first failure
 * - applyPatchAtomic never exposes a partially patched document
 * - A committed file always holds either the full old or full new revision
 * - With backups on, the prior bytes are preserved before they become unreachable
 *
 * @packageDocumentation
 */

// Types
export type {
  JsonScalar,
  JsonObject,
  JsonArray,
  JsonValue,
  PatchOpType,
  AddOperation,
  RemoveOperation,
  ReplaceOperation,
  MoveOperation,
  CopyOperation,
  TestOperation,
  PatchOperation,
  Patch,
  AddMode,
  EditOptions,
  LoadedDocument,
  CommitResult,
} from './types/document.js';
export { isJsonObject, isJsonArray } from './types/document.js';

// Errors
export { DocumentError, PatchAssertionError, isDocumentError } from './document/errors.js';
export type { DocumentErrorCode, DocumentErrorDetails } from './document/errors.js';

// Pointer resolver
export { parsePointer, formatPointer, getAt, addAt, replaceAt, removeAt } from './document/pointer.js';

// Patch executor
export {
  validatePatch,
  applyPatch,
  applyPatchAtomic,
  concatPatches,
  deepCopy,
  jsonEquals,
} from './document/patch.js';

// Template instantiation and merge
export { cloneSubtree } from './document/clone.js';
export { mergeDocuments, isMergeStrategy, MERGE_STRATEGIES } from './document/merge.js';
export type { MergeStrategy } from './document/merge.js';

// Diff
export { unifiedDiff, diffDocuments } from './document/diff.js';
export type { DiffLabels, DiffDocumentsOptions } from './document/diff.js';

// Store
export { loadDocument, commitDocument, backupPathFor, formatBackupTimestamp } from './store/index.js';
export type { CommitOptions } from './store/index.js';

// Serialization
export {
  serializeDocument,
  serializeToBytes,
  canonicalize,
  sha256Hex,
  documentDigest,
  parseDocument,
} from './utils/canonical.js';
export type { SerializeOptions } from './utils/canonical.js';

// Configuration
export { resolveEngineConfig, toEditOptions, parseAddMode, ConfigError } from './config/index.js';
export type { EngineConfig, EngineConfigOverrides, ConfigEnv } from './config/index.js';
