/**
 * Document Errors
 * ===============
 *
 * Every failure raised by the resolver, executor, diff generator and store
 * is a DocumentError carrying one of the codes below. Callers branch on
 * `code`, never on the message.
 */

import { stringify } from 'lossless-json';

import type { JsonValue } from '../types/document.js';

/**
 * Error codes for document operations.
 */
export type DocumentErrorCode =
  | 'MALFORMED_POINTER'       // Non-empty pointer without leading '/'
  | 'INVALID_TOKEN'           // Bad escape, or '-' where an element must exist
  | 'NOT_FOUND'               // Object key absent
  | 'INDEX_OUT_OF_RANGE'      // Array index out of bounds or not numeric
  | 'TYPE_MISMATCH'           // Navigated into a scalar, or wrong container kind
  | 'TARGET_EXISTS'           // Strict add onto a present key
  | 'ROOT_REMOVAL_FORBIDDEN'  // remove with the empty pointer
  | 'MALFORMED_OPERATION'     // Patch failed its structural pre-check
  | 'PATCH_ASSERTION_FAILED'  // test operation mismatch
  | 'PARSE_ERROR'             // Stored bytes are not a document
  | 'IO_ERROR';               // Read/write failure

/**
 * Context attached to a DocumentError.
 */
export interface DocumentErrorDetails {
  /** Pointer being resolved when the error occurred */
  pointer?: string;

  /** Index of the failing operation within its patch */
  opIndex?: number;

  /** File involved (store errors) */
  file?: string;

  /** Underlying error */
  cause?: unknown;
}

/**
 * Structured error from document operations.
 */
export class DocumentError extends Error {
  readonly pointer?: string;
  readonly opIndex?: number;
  readonly file?: string;

  constructor(
    public readonly code: DocumentErrorCode,
    message: string,
    details: DocumentErrorDetails = {}
  ) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = 'DocumentError';
    if (details.pointer !== undefined) this.pointer = details.pointer;
    if (details.opIndex !== undefined) this.opIndex = details.opIndex;
    if (details.file !== undefined) this.file = details.file;
  }
}

function formatValue(value: JsonValue): string {
  return stringify(value) ?? String(value);
}

/**
 * Raised by a failing `test` operation.
 */
export class PatchAssertionError extends DocumentError {
  constructor(
    pointer: string,
    public readonly expected: JsonValue,
    public readonly actual: JsonValue,
    opIndex?: number
  ) {
    const prefix = opIndex === undefined ? '' : `Patch[${opIndex}] `;
    super(
      'PATCH_ASSERTION_FAILED',
      `${prefix}test failed at ${pointer}: ${formatValue(actual)} != ${formatValue(expected)}`,
      opIndex === undefined ? { pointer } : { pointer, opIndex }
    );
    this.name = 'PatchAssertionError';
  }
}

/**
 * Type guard for DocumentError, optionally matching a code.
 */
export function isDocumentError(err: unknown, code?: DocumentErrorCode): err is DocumentError {
  return err instanceof DocumentError && (code === undefined || err.code === code);
}
