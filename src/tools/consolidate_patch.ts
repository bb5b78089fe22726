#!/usr/bin/env node
/**
 * Consolidate Patch CLI
 * =====================
 *
 * Concatenates patch files, in the order given, into a single patch that
 * can be applied in one step.
 *
 * Usage:
 *   json-consolidate-patch --out <file> --patch <file> [--patch <file> ...]
 */

import { concatPatches } from '../document/patch.js';
import { commitDocument, loadDocument } from '../store/index.js';
import { consoleIO, EXIT_OK, isMainModule, reportError, takeValue, UsageError } from './cli_io.js';
import type { CliIO } from './cli_io.js';

const USAGE = `Usage: json-consolidate-patch --out <file> --patch <file> [--patch <file> ...]

Concatenate patch files in the order given into one patch.

Options:
  --out <file>      Destination path for the consolidated patch
  --patch <file>    Patch file; repeat for each, in order
  --help, -h        Show this help message`;

/**
 * Run the CLI and return its exit code.
 */
export function run(args: readonly string[], io: CliIO = consoleIO): number {
  try {
    let out: string | undefined;
    const patchFiles: string[] = [];

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      if (arg === '--help' || arg === '-h') {
        io.stdout(USAGE);
        return EXIT_OK;
      } else if (arg === '--out') {
        out = takeValue(args, i++, arg);
      } else if (arg === '--patch') {
        patchFiles.push(takeValue(args, i++, arg));
      } else {
        throw new UsageError(`Unknown argument: ${String(arg)}`);
      }
    }

    if (out === undefined) throw new UsageError('--out is required');
    if (patchFiles.length === 0) throw new UsageError('at least one --patch is required');

    const consolidated = concatPatches(patchFiles.map((file) => loadDocument(file).document));
    // Spread: operation interfaces carry no index signature
    commitDocument(out, consolidated.map((operation) => ({ ...operation })), { makeBackup: false });

    io.stdout(`Wrote ${out} with ${consolidated.length} ops`);
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
