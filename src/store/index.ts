/**
 * Atomic Document Store
 * =====================
 *
 * Loads documents from disk and commits new revisions crash-safely.
 *
 * Commit sequence:
 * 1. Serialize the document and compute its SHA-256
 * 2. Write a temp file in the target's directory (same filesystem)
 * 3. fsync the temp file
 * 4. If backups are on and the target exists, copy the current bytes to
 *    `<path>.bak.<YYYYMMDDThhmmssZ>.<first 8 hex of new digest>` and fsync
 *    the copy. An existing backup of that name is never overwritten: it is
 *    kept if it already holds the current bytes, otherwise the commit fails
 * 5. Rename the temp file onto the target, then fsync the directory
 *
 * The target therefore always holds either the full previous revision or
 * the full new one, and a backup exists before the previous revision
 * becomes unreachable. Any failure before step 5 leaves the target
 * untouched.
 *
 * A replaced target keeps its permission bits; a new one gets 0644.
 *
 * All calls are synchronous. One writer per path is assumed; concurrent
 * writers race and the last rename wins.
 */

import {
  closeSync,
  constants,
  copyFileSync,
  existsSync,
  fchmodSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeSync,
} from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import { randomBytes } from 'node:crypto';

import type { CommitResult, JsonValue, LoadedDocument } from '../types/document.js';
import { DocumentError } from '../document/errors.js';
import { parseDocument, serializeToBytes, sha256Hex } from '../utils/canonical.js';

// =============================================================================
// Types
// =============================================================================

export interface CommitOptions {
  /**
   * Preserve the pre-commit bytes as a timestamped backup.
   * Default: true.
   */
  makeBackup?: boolean;

  /**
   * Clock for the backup timestamp.
   * Default: current time.
   */
  now?: Date;
}

// =============================================================================
// Naming
// =============================================================================

/**
 * UTC timestamp in backup form, e.g. `20250101T093000Z`.
 */
export function formatBackupTimestamp(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}Z$/, 'Z')
    .replace(/[-:]/g, '');
}

/**
 * Backup path for a target, given the digest of the revision replacing it.
 */
export function backupPathFor(path: string, newDigest: string, now: Date): string {
  return `${path}.bak.${formatBackupTimestamp(now)}.${newDigest.slice(0, 8)}`;
}

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.tmp-${randomBytes(6).toString('hex')}`);
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// =============================================================================
// Load
// =============================================================================

/**
 * Read and parse a document.
 *
 * @throws DocumentError IO_ERROR if unreadable, PARSE_ERROR if not valid JSON
 */
export function loadDocument(path: string): LoadedDocument {
  const file = resolve(path);

  let raw: Buffer;
  try {
    raw = readFileSync(file);
  } catch (err) {
    throw new DocumentError('IO_ERROR', `Failed to read ${path}: ${describeError(err)}`, {
      file,
      cause: err,
    });
  }

  let document: JsonValue;
  try {
    document = parseDocument(raw);
  } catch (err) {
    throw new DocumentError('PARSE_ERROR', `Failed to parse JSON from ${path}: ${describeError(err)}`, {
      file,
      cause: err,
    });
  }

  return { document, raw, digest: sha256Hex(raw) };
}

// =============================================================================
// Commit
// =============================================================================

const DEFAULT_MODE = 0o644;

/**
 * Write bytes to a fresh file with the given mode and force them to disk.
 */
function writeDurably(path: string, bytes: Buffer, mode: number): void {
  const fd = openSync(path, 'wx', mode);
  try {
    // openSync applies the umask
    fchmodSync(fd, mode);
    let offset = 0;
    while (offset < bytes.length) {
      offset += writeSync(fd, bytes, offset, bytes.length - offset);
    }
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

function fsyncFile(path: string): void {
  const fd = openSync(path, 'r');
  try {
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

/**
 * Copy the target to its backup path and force the copy to disk.
 *
 * @throws Error if a different file already occupies the backup path
 */
function writeBackup(target: string, backupPath: string): void {
  try {
    copyFileSync(target, backupPath, constants.COPYFILE_EXCL);
  } catch (err) {
    if (!isAlreadyExists(err)) throw err;
    if (!readFileSync(backupPath).equals(readFileSync(target))) {
      throw new Error(`Backup ${backupPath} already exists with different contents`, { cause: err });
    }
  }
  fsyncFile(backupPath);
}

/**
 * Permission bits of an existing regular file, if any.
 */
function existingMode(path: string): number | undefined {
  if (!existsSync(path)) return undefined;
  const stats = statSync(path);
  return stats.isFile() ? stats.mode & 0o7777 : undefined;
}

/**
 * Persist a rename by syncing its directory. Directories cannot be opened
 * for sync on Windows.
 */
function syncDirectory(dir: string): void {
  if (process.platform === 'win32') return;
  const fd = openSync(dir, 'r');
  try {
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

/**
 * Remove a leftover temp file. Returns false if it could not be removed.
 */
function removeTemp(path: string): boolean {
  try {
    rmSync(path, { force: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Commit a new revision of a document.
 *
 * @throws DocumentError IO_ERROR on any filesystem failure; the target is
 *   unchanged unless the failure happened after the rename
 */
export function commitDocument(path: string, document: JsonValue, options: CommitOptions = {}): CommitResult {
  const target = resolve(path);
  const makeBackup = options.makeBackup ?? true;

  const bytes = serializeToBytes(document);
  const digest = sha256Hex(bytes);

  const dir = dirname(target);
  try {
    mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new DocumentError('IO_ERROR', `Failed to create directory ${dir}: ${describeError(err)}`, {
      file: target,
      cause: err,
    });
  }

  const tempPath = tempPathFor(target);
  let backupPath: string | null = null;

  try {
    writeDurably(tempPath, bytes, existingMode(target) ?? DEFAULT_MODE);

    if (makeBackup && existsSync(target)) {
      backupPath = backupPathFor(target, digest, options.now ?? new Date());
      writeBackup(target, backupPath);
    }

    renameSync(tempPath, target);
  } catch (err) {
    const cleaned = removeTemp(tempPath);
    const suffix = cleaned ? '' : ` (temporary file left at ${tempPath})`;
    throw new DocumentError('IO_ERROR', `Failed to write ${path}: ${describeError(err)}${suffix}`, {
      file: target,
      cause: err,
    });
  }

  try {
    syncDirectory(dir);
  } catch (err) {
    throw new DocumentError(
      'IO_ERROR',
      `Wrote ${path} but failed to sync directory ${dir}: ${describeError(err)}`,
      { file: target, cause: err }
    );
  }

  return { path: target, digest, backup_path: backupPath };
}
