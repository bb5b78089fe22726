#!/usr/bin/env node
/**
 * Apply Patches CLI
 * =================
 *
 * Applies several patch files, in the order given, to a base document
 * and writes the result to an output path.
 *
 * Usage:
 *   json-apply-patches --base <file> --out <file> --patch <file> [--patch <file> ...] [--dry-run]
 *
 * The base document is never modified. With --dry-run the unified diff
 * from base to result is printed and nothing is written.
 *
 * Exit codes match json-plan.
 */

import type { JsonValue } from '../types/document.js';
import { isJsonObject } from '../types/document.js';
import { applyPatchAtomic } from '../document/patch.js';
import { unifiedDiff } from '../document/diff.js';
import { commitDocument, loadDocument } from '../store/index.js';
import { resolveEngineConfig, toEditOptions } from '../config/index.js';
import type { ConfigEnv } from '../config/index.js';
import { serializeToBytes } from '../utils/canonical.js';
import { consoleIO, EXIT_OK, isMainModule, reportError, takeValue, UsageError } from './cli_io.js';
import type { CliIO } from './cli_io.js';

interface ParsedArgs {
  base: string;
  out: string;
  patches: string[];
  dryRun: boolean;
}

const USAGE = `Usage: json-apply-patches --base <file> --out <file> --patch <file> [--patch <file> ...] [--dry-run]

Apply patch files in the order given to produce a final document.

Options:
  --base <file>     Base document (not modified)
  --out <file>      Destination path for the result
  --patch <file>    Patch file; repeat to apply several in order
  --dry-run         Show the unified diff only; do not write
  --help, -h        Show this help message`;

function parseArgs(args: readonly string[]): ParsedArgs | null {
  let base: string | undefined;
  let out: string | undefined;
  const patches: string[] = [];
  let dryRun = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return null;
    } else if (arg === '--base') {
      base = takeValue(args, i++, arg);
    } else if (arg === '--out') {
      out = takeValue(args, i++, arg);
    } else if (arg === '--patch') {
      patches.push(takeValue(args, i++, arg));
    } else if (arg === '--dry-run') {
      dryRun = true;
    } else {
      throw new UsageError(`Unknown argument: ${String(arg)}`);
    }
  }

  if (base === undefined) throw new UsageError('--base is required');
  if (out === undefined) throw new UsageError('--out is required');
  if (patches.length === 0) throw new UsageError('at least one --patch is required');

  return { base, out, patches, dryRun };
}

/**
 * One-line summary of a plan's layers, if it has any.
 */
export function summarizeLayers(doc: JsonValue): string | null {
  if (!isJsonObject(doc)) return null;
  const layers = doc['layers'];
  if (!Array.isArray(layers)) return null;

  const first = layers[0];
  const firstId = first !== undefined && isJsonObject(first) && first['id'] !== undefined ? String(first['id']) : 'n/a';
  return `layers: ${layers.length}; first_id: ${firstId}`;
}

/**
 * Run the CLI and return its exit code.
 */
export function run(args: readonly string[], io: CliIO = consoleIO, env: ConfigEnv = process.env): number {
  try {
    const parsed = parseArgs(args);
    if (parsed === null) {
      io.stdout(USAGE);
      return EXIT_OK;
    }

    const config = resolveEngineConfig(env);
    const options = toEditOptions(config);
    const base = loadDocument(parsed.base);

    let doc = base.document;
    for (const patchFile of parsed.patches) {
      doc = applyPatchAtomic(doc, loadDocument(patchFile).document, options);
    }

    if (parsed.dryRun) {
      const diff = unifiedDiff(base.raw, serializeToBytes(doc), parsed.base, parsed.out);
      io.stdout(diff === '' ? '(no changes)' : diff.replace(/\n$/, ''));
      return EXIT_OK;
    }

    commitDocument(parsed.out, doc, { makeBackup: config.make_backup });
    io.stdout(`Wrote ${parsed.out}`);
    const summary = summarizeLayers(doc);
    if (summary !== null) io.stdout(summary);
    return EXIT_OK;
  } catch (err) {
    const code = reportError(err, io);
    if (err instanceof UsageError) io.stderr(USAGE);
    return code;
  }
}

// Only run CLI when this file is the entry point
if (isMainModule(import.meta.url)) {
  process.exitCode = run(process.argv.slice(2));
}
