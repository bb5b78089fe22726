/**
 * Apply Patches CLI Tests
 * =======================
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { run, summarizeLayers } from '../apply_patches.js';
import type { CliIO } from '../cli_io.js';

// =============================================================================
// Helper: Run CLI
// =============================================================================

interface CliResult {
  stdout: string[];
  stderr: string[];
  exitCode: number;
}

function runCli(args: string[], env: Record<string, string> = {}): CliResult {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIO = {
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
  };
  const exitCode = run(args, io, env);
  return { stdout, stderr, exitCode };
}

// =============================================================================
// Tests
// =============================================================================

describe('Apply Patches CLI', () => {
  let dir: string;
  let base: string;
  let out: string;
  const baseText = '{"name": "plan"}';

  function writePatch(name: string, ops: unknown[]): string {
    const path = join(dir, name);
    writeFileSync(path, JSON.stringify(ops));
    return path;
  }

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'docpatch-apply-'));
    base = join(dir, 'base.json');
    out = join(dir, 'out', 'final.json');
    writeFileSync(base, baseText);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('applies patches in the order given', () => {
    const first = writePatch('01.json', [
      { op: 'add', path: '/layers', value: [] },
      { op: 'add', path: '/layers/-', value: { id: 'T001' } },
    ]);
    const second = writePatch('02.json', [
      { op: 'add', path: '/layers/0', value: { id: 'T000' } },
      { op: 'test', path: '/layers/1/id', value: 'T001' },
    ]);

    const result = runCli(['--base', base, '--out', out, '--patch', first, '--patch', second]);
    assert.equal(result.exitCode, 0);
    assert.deepEqual(result.stdout, [`Wrote ${out}`, 'layers: 2; first_id: T000']);
    assert.deepEqual(JSON.parse(readFileSync(out, 'utf-8')), {
      name: 'plan',
      layers: [{ id: 'T000' }, { id: 'T001' }],
    });
    assert.equal(readFileSync(base, 'utf-8'), baseText);
  });

  it('omits the summary when the result has no layers', () => {
    const patch = writePatch('p.json', [{ op: 'replace', path: '/name', value: 'renamed' }]);
    const result = runCli(['--base', base, '--out', out, '--patch', patch]);
    assert.deepEqual(result.stdout, [`Wrote ${out}`]);
  });

  it('a failing patch writes nothing', () => {
    const good = writePatch('01.json', [{ op: 'add', path: '/a', value: 1 }]);
    const bad = writePatch('02.json', [{ op: 'remove', path: '/missing' }]);

    const result = runCli(['--base', base, '--out', out, '--patch', good, '--patch', bad]);
    assert.equal(result.exitCode, 3);
    assert.equal(result.stderr[0]?.split(':')[0], 'NOT_FOUND');
    assert.equal(existsSync(out), false);
  });

  it('DOCPATCH_ADD_MODE=upsert lets add overwrite', () => {
    const patch = writePatch('p.json', [{ op: 'add', path: '/name', value: 'other' }]);
    const strict = runCli(['--base', base, '--out', out, '--patch', patch]);
    assert.equal(strict.exitCode, 3);

    const upsert = runCli(['--base', base, '--out', out, '--patch', patch], { DOCPATCH_ADD_MODE: 'upsert' });
    assert.equal(upsert.exitCode, 0);
    assert.equal(readFileSync(out, 'utf-8'), '{\n  "name": "other"\n}');
  });

  it('--dry-run prints the diff from base to result', () => {
    writeFileSync(base, '{\n  "name": "plan"\n}');
    const patch = writePatch('p.json', [{ op: 'replace', path: '/name', value: 'next' }]);

    const result = runCli(['--base', base, '--out', out, '--patch', patch, '--dry-run']);
    assert.equal(result.exitCode, 0);
    assert.deepEqual(result.stdout, [
      [
        `--- ${base}`,
        `+++ ${out}`,
        '@@ -1,3 +1,3 @@',
        ' {',
        '-  "name": "plan"',
        '+  "name": "next"',
        ' }',
        '\\ No newline at end of file',
      ].join('\n'),
    ]);
    assert.equal(existsSync(out), false);
  });

  it('requires at least one patch', () => {
    const result = runCli(['--base', base, '--out', out]);
    assert.equal(result.exitCode, 1);
    assert.equal(result.stderr[0], 'ERROR: at least one --patch is required');
  });

  it('rejects unknown arguments', () => {
    const result = runCli(['--base', base, '--verbose']);
    assert.equal(result.exitCode, 1);
    assert.equal(result.stderr[0], 'ERROR: Unknown argument: --verbose');
  });

  describe('summarizeLayers', () => {
    it('reports n/a for an empty layers array', () => {
      assert.equal(summarizeLayers({ layers: [] }), 'layers: 0; first_id: n/a');
    });

    it('returns null without a layers array', () => {
      assert.equal(summarizeLayers({ layers: {} }), null);
      assert.equal(summarizeLayers([1]), null);
    });
  });
});
