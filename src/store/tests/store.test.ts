/**
 * Atomic Document Store Tests
 * ===========================
 *
 * Loading, atomic commit, backup naming and failure behavior.
 * Each test works in its own temp directory.
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { chmodSync, existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createHash } from 'node:crypto';

import { backupPathFor, commitDocument, formatBackupTimestamp, loadDocument } from '../index.js';
import { isDocumentError } from '../../document/errors.js';

function sha256(bytes: Buffer | string): string {
  return createHash('sha256').update(bytes).digest('hex');
}

describe('Atomic Document Store', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docpatch-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('loadDocument', () => {
    it('returns document, raw bytes and digest', () => {
      const file = join(dir, 'plan.json');
      writeFileSync(file, '{"layers": [1, 2]}\n');

      const loaded = loadDocument(file);
      assert.deepEqual(loaded.document, { layers: [1, 2] });
      assert.equal(loaded.raw.toString('utf-8'), '{"layers": [1, 2]}\n');
      assert.equal(loaded.digest, sha256('{"layers": [1, 2]}\n'));
    });

    it('missing file is IO_ERROR', () => {
      assert.throws(
        () => loadDocument(join(dir, 'absent.json')),
        (err: unknown) => isDocumentError(err, 'IO_ERROR')
      );
    });

    it('invalid JSON is PARSE_ERROR carrying the path and cause', () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, '{"a": ');

      assert.throws(
        () => loadDocument(file),
        (err: unknown) => {
          assert.ok(isDocumentError(err, 'PARSE_ERROR'));
          assert.equal(err.file, file);
          assert.ok(err.cause instanceof Error);
          return true;
        }
      );
    });
  });

  describe('commitDocument', () => {
    it('writes the serialized document and returns its digest', () => {
      const file = join(dir, 'plan.json');
      const result = commitDocument(file, { name: 'café', layers: [] });

      const expected = '{\n  "name": "café",\n  "layers": []\n}';
      assert.equal(readFileSync(file, 'utf-8'), expected);
      assert.equal(result.path, file);
      assert.equal(result.digest, sha256(Buffer.from(expected, 'utf-8')));
      assert.equal(result.backup_path, null);
    });

    it('leaves no temp files behind', () => {
      const file = join(dir, 'plan.json');
      commitDocument(file, { a: 1 });
      commitDocument(file, { a: 2 }, { makeBackup: false });
      assert.deepEqual(readdirSync(dir), ['plan.json']);
    });

    it('creates missing directories', () => {
      const file = join(dir, 'nested', 'deeper', 'plan.json');
      commitDocument(file, [1]);
      assert.equal(readFileSync(file, 'utf-8'), '[\n  1\n]');
    });

    it('backs up the exact pre-commit bytes', () => {
      const file = join(dir, 'plan.json');
      const previous = '{"a":1}\n';
      writeFileSync(file, previous);
      const now = new Date(Date.UTC(2025, 0, 2, 3, 4, 5));

      const result = commitDocument(file, { a: 2 }, { now });

      const expectedBackup = `${file}.bak.20250102T030405Z.${result.digest.slice(0, 8)}`;
      assert.equal(result.backup_path, expectedBackup);
      assert.equal(readFileSync(expectedBackup, 'utf-8'), previous);
      assert.equal(readFileSync(file, 'utf-8'), '{\n  "a": 2\n}');
    });

    it('skips the backup when disabled', () => {
      const file = join(dir, 'plan.json');
      writeFileSync(file, '{}');
      const result = commitDocument(file, { a: 1 }, { makeBackup: false });
      assert.equal(result.backup_path, null);
      assert.deepEqual(readdirSync(dir), ['plan.json']);
    });

    it('makes no backup for a new file', () => {
      const file = join(dir, 'plan.json');
      const result = commitDocument(file, {}, { makeBackup: true });
      assert.equal(result.backup_path, null);
      assert.deepEqual(readdirSync(dir), ['plan.json']);
    });

    it('failed rename leaves the target untouched and cleans up', () => {
      const target = join(dir, 'plan.json');
      mkdirSync(target);

      assert.throws(
        () => commitDocument(target, { a: 1 }, { makeBackup: false }),
        (err: unknown) => isDocumentError(err, 'IO_ERROR')
      );
      assert.ok(statSync(target).isDirectory());
      assert.deepEqual(readdirSync(dir), ['plan.json']);
    });

    it('failed backup aborts before the rename', () => {
      const target = join(dir, 'plan.json');
      mkdirSync(target);

      assert.throws(
        () => commitDocument(target, { a: 1 }),
        (err: unknown) => isDocumentError(err, 'IO_ERROR')
      );
      assert.ok(statSync(target).isDirectory());
    });

    it('refuses to overwrite a different backup with the same name', () => {
      const file = join(dir, 'plan.json');
      writeFileSync(file, '{"a":1}\n');
      const now = new Date(Date.UTC(2025, 0, 2, 3, 4, 5));

      const first = commitDocument(file, { a: 2 }, { now });
      assert.throws(
        () => commitDocument(file, { a: 2 }, { now }),
        (err: unknown) => isDocumentError(err, 'IO_ERROR')
      );

      assert.equal(readFileSync(`${first.backup_path}`, 'utf-8'), '{"a":1}\n');
      assert.equal(readFileSync(file, 'utf-8'), '{\n  "a": 2\n}');
      assert.equal(readdirSync(dir).length, 2);
    });

    it('reuses an existing backup that holds the same bytes', () => {
      const file = join(dir, 'plan.json');
      writeFileSync(file, '{"a":1}\n');
      const now = new Date(Date.UTC(2025, 0, 2, 3, 4, 5));

      const first = commitDocument(file, { a: 2 }, { now });
      writeFileSync(file, '{"a":1}\n');
      const second = commitDocument(file, { a: 2 }, { now });

      assert.equal(second.backup_path, first.backup_path);
      assert.equal(readFileSync(`${second.backup_path}`, 'utf-8'), '{"a":1}\n');
      assert.equal(readFileSync(file, 'utf-8'), '{\n  "a": 2\n}');
    });

    it('keeps the permission bits of a replaced file', { skip: process.platform === 'win32' }, () => {
      const file = join(dir, 'plan.json');
      writeFileSync(file, '{}');
      chmodSync(file, 0o600);

      commitDocument(file, { a: 1 });
      assert.equal(statSync(file).mode & 0o777, 0o600);
    });

    it('keeps integers beyond double precision and number spelling', () => {
      const file = join(dir, 'plan.json');
      const text = '{\n  "id": 12345678901234567890,\n  "ratio": 1.0,\n  "a": 1\n}';
      writeFileSync(file, text);

      const result = commitDocument(file, loadDocument(file).document, { makeBackup: false });
      assert.equal(readFileSync(file, 'utf-8'), text);
      assert.equal(result.digest, sha256(text));
    });

    it('target always holds a complete revision', () => {
      const file = join(dir, 'plan.json');
      const first = commitDocument(file, { rev: 1, body: 'x'.repeat(4096) }, { makeBackup: false });
      assert.equal(sha256(readFileSync(file)), first.digest);

      const second = commitDocument(file, { rev: 2 }, { makeBackup: false });
      assert.equal(sha256(readFileSync(file)), second.digest);
      assert.equal(readFileSync(file, 'utf-8'), '{\n  "rev": 2\n}');
    });

    it('commit then load round-trips', () => {
      const file = join(dir, 'plan.json');
      const doc = { layers: [{ id: 'T001', tags: ['ü', '✓'] }], count: 2, ok: true, none: null };
      const result = commitDocument(file, doc);
      const loaded = loadDocument(file);
      assert.deepEqual(loaded.document, doc);
      assert.equal(loaded.digest, result.digest);
      assert.ok(existsSync(file));
    });
  });

  describe('backup naming', () => {
    it('formats UTC timestamps', () => {
      assert.equal(formatBackupTimestamp(new Date(Date.UTC(2024, 11, 31, 23, 59, 58, 999))), '20241231T235958Z');
    });

    it('uses the first 8 hex chars of the new digest', () => {
      const now = new Date(Date.UTC(2025, 5, 15, 12, 0, 0));
      assert.equal(
        backupPathFor('/data/plan.json', 'abcdef0123456789', now),
        '/data/plan.json.bak.20250615T120000Z.abcdef01'
      );
    });
  });
});
