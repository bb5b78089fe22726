#!/usr/bin/env node
/**
 * JSON Plan CLI
 * =============
 *
 * Edits a JSON document by pointer or patch, previews changes as a
 * unified diff, and commits atomically with a timestamped backup.
 *
 * Usage:
 *   json-plan <file> validate [--print-keys]
 *   json-plan <file> get --pointer <ptr>
 *   json-plan <file> set --pointer <ptr> --value <json> [--dry-run]
 *   json-plan <file> add --pointer <ptr> --value <json> [--dry-run]
 *   json-plan <file> remove --pointer <ptr> [--dry-run]
 *   json-plan <file> apply-patch --patch <file> [--dry-run]
 *   json-plan <file> clone-layer --from-pointer <ptr> --to-pointer <ptr> [--name <n>] [--dry-run]
 *   json-plan <file> merge --incoming <file> [--strategy <s>] [--dry-run]
 *   json-plan <file> diff --against <file> [--sort-keys]
 *
 * Exit codes:
 *   0 - Success
 *   1 - IO or usage error
 *   2 - Parse error (invalid JSON)
 *   3 - Document error (bad pointer, missing target, malformed patch)
 *   4 - Patch test assertion failed
 */

import type { JsonValue } from '../types/document.js';
import { isJsonObject } from '../types/document.js';
import { DocumentError } from '../document/errors.js';
import { addAt, getAt, parsePointer, removeAt, replaceAt } from '../document/pointer.js';
import { applyPatch, deepCopy } from '../document/patch.js';
import { cloneSubtree } from '../document/clone.js';
import { isMergeStrategy, mergeDocuments, MERGE_STRATEGIES } from '../document/merge.js';
import type { MergeStrategy } from '../document/merge.js';
import { unifiedDiff, diffDocuments } from '../document/diff.js';
import { commitDocument, loadDocument } from '../store/index.js';
import { parseAddMode, resolveEngineConfig, toEditOptions } from '../config/index.js';
import type { ConfigEnv, EngineConfig, EngineConfigOverrides } from '../config/index.js';
import { parseDocument, serializeDocument, serializeToBytes } from '../utils/canonical.js';
import {
  consoleIO,
  EXIT_OK,
  isMainModule,
  reportError,
  takeValue,
  UsageError,
} from './cli_io.js';
import type { CliIO } from './cli_io.js';

// =============================================================================
// Arguments
// =============================================================================

type Command =
  | { cmd: 'validate'; printKeys: boolean }
  | { cmd: 'get'; pointer: string }
  | { cmd: 'set'; pointer: string; value: string }
  | { cmd: 'add'; pointer: string; value: string }
  | { cmd: 'remove'; pointer: string }
  | { cmd: 'apply-patch'; patchFile: string }
  | { cmd: 'clone-layer'; fromPointer: string; toPointer: string; name?: string }
  | { cmd: 'merge'; incomingFile: string; strategy: MergeStrategy }
  | { cmd: 'diff'; againstFile: string; sortKeys: boolean };

interface ParsedArgs {
  file: string;
  command: Command;
  dryRun: boolean;
  overrides: EngineConfigOverrides;
}

const USAGE = `Usage: json-plan <file> <command> [options]

Reliable JSON editor (JSON Pointer ops, ordered patches, dry-run diff, atomic writes).

Commands:
  validate [--print-keys]                      Check the file parses; print SHA256
  get --pointer <ptr>                          Print the value at a pointer
  set --pointer <ptr> --value <json>           Replace the value at a pointer
  add --pointer <ptr> --value <json>           Insert a value at a pointer
  remove --pointer <ptr>                       Remove the value at a pointer
  apply-patch --patch <file>                   Apply a patch file (array of operations)
  clone-layer --from-pointer <ptr> --to-pointer <ptr> [--name <n>]
                                               Copy a subtree, optionally renaming it
  merge --incoming <file> [--strategy <s>]     Merge a rendered document (${MERGE_STRATEGIES.join(', ')})
  diff --against <file> [--sort-keys]          Show differences against another document

Options:
  --dry-run                 Print a unified diff instead of writing
  --add-mode <mode>         'strict' (default) or 'upsert' for add on existing keys
  --create-parents          Create missing intermediate objects
  --no-backup               Do not keep a backup of the previous revision
  --help, -h                Show this help message

Environment:
  DOCPATCH_ADD_MODE, DOCPATCH_CREATE_PARENTS, DOCPATCH_BACKUP

Exit codes:
  0 - Success
  1 - IO or usage error
  2 - Parse error (invalid JSON)
  3 - Document error
  4 - Patch test assertion failed`;

function required(value: string | undefined, name: string, cmd: string): string {
  if (value === undefined) {
    throw new UsageError(`${cmd} requires ${name}`);
  }
  return value;
}

/**
 * Parse command line arguments. Returns null when help was requested.
 */
function parseArgs(args: readonly string[]): ParsedArgs | null {
  const positional: string[] = [];
  const opts = new Map<string, string>();
  const flags = new Set<string>();
  const overrides: EngineConfigOverrides = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    switch (arg) {
      case '--help':
      case '-h':
        return null;
      case '--dry-run':
      case '--print-keys':
      case '--sort-keys':
        flags.add(arg);
        break;
      case '--no-backup':
        overrides.make_backup = false;
        break;
      case '--create-parents':
        overrides.create_parents = true;
        break;
      case '--add-mode':
        overrides.add_mode = parseAddMode(takeValue(args, i, arg), arg);
        i++;
        break;
      case '--pointer':
      case '--value':
      case '--patch':
      case '--from-pointer':
      case '--to-pointer':
      case '--name':
      case '--incoming':
      case '--strategy':
      case '--against':
        opts.set(arg, takeValue(args, i, arg));
        i++;
        break;
      default:
        if (arg.startsWith('--')) {
          throw new UsageError(`Unknown option: ${arg}`);
        }
        positional.push(arg);
    }
  }

  const [file, cmd, ...extra] = positional;
  if (file === undefined || cmd === undefined) {
    throw new UsageError('expected <file> <command>');
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  let command: Command;
  switch (cmd) {
    case 'validate':
      command = { cmd, printKeys: flags.has('--print-keys') };
      break;
    case 'get':
    case 'remove':
      command = { cmd, pointer: required(opts.get('--pointer'), '--pointer', cmd) };
      break;
    case 'set':
    case 'add':
      command = {
        cmd,
        pointer: required(opts.get('--pointer'), '--pointer', cmd),
        value: required(opts.get('--value'), '--value', cmd),
      };
      break;
    case 'apply-patch':
      command = { cmd, patchFile: required(opts.get('--patch'), '--patch', cmd) };
      break;
    case 'clone-layer': {
      const name = opts.get('--name');
      command = {
        cmd,
        fromPointer: required(opts.get('--from-pointer'), '--from-pointer', cmd),
        toPointer: required(opts.get('--to-pointer'), '--to-pointer', cmd),
        ...(name === undefined ? {} : { name }),
      };
      break;
    }
    case 'merge': {
      const strategy = opts.get('--strategy') ?? 'replace';
      if (!isMergeStrategy(strategy)) {
        throw new UsageError(`--strategy must be one of ${MERGE_STRATEGIES.join(', ')}`);
      }
      command = { cmd, incomingFile: required(opts.get('--incoming'), '--incoming', cmd), strategy };
      break;
    }
    case 'diff':
      command = {
        cmd,
        againstFile: required(opts.get('--against'), '--against', cmd),
        sortKeys: flags.has('--sort-keys'),
      };
      break;
    default:
      throw new UsageError(`Unknown command: ${cmd}`);
  }

  return { file, command, dryRun: flags.has('--dry-run'), overrides };
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Parse a --value argument.
 */
function parseValueArg(text: string): JsonValue {
  try {
    return parseDocument(text);
  } catch (err) {
    throw new DocumentError('PARSE_ERROR', `--value is not valid JSON: ${text}`, { cause: err });
  }
}

/**
 * Produce the edited document. Works on a scratch copy; the loaded
 * document is never modified.
 */
function edit(document: JsonValue, command: Command, config: EngineConfig): JsonValue {
  const options = toEditOptions(config);
  const scratch = deepCopy(document);

  switch (command.cmd) {
    case 'set':
      return replaceAt(scratch, parsePointer(command.pointer), parseValueArg(command.value), options);
    case 'add':
      return addAt(scratch, parsePointer(command.pointer), parseValueArg(command.value), options);
    case 'remove':
      return removeAt(scratch, parsePointer(command.pointer), options);
    case 'apply-patch':
      return applyPatch(scratch, loadDocument(command.patchFile).document, options);
    case 'clone-layer':
      return cloneSubtree(scratch, command.fromPointer, command.toPointer, command.name, options);
    case 'merge':
      return mergeDocuments(scratch, loadDocument(command.incomingFile).document, command.strategy);
    default:
      throw new UsageError(`${command.cmd} does not modify the document`);
  }
}

function execute(parsed: ParsedArgs, env: ConfigEnv, io: CliIO): number {
  const config = resolveEngineConfig(env, parsed.overrides);
  const { command, file } = parsed;
  const loaded = loadDocument(file);

  switch (command.cmd) {
    case 'validate': {
      io.stdout(`OK: parsed ${file}`);
      io.stdout(`SHA256: ${loaded.digest}`);
      if (command.printKeys) {
        io.stdout(
          isJsonObject(loaded.document)
            ? `Top-level keys: ${Object.keys(loaded.document).join(', ')}`
            : 'Top-level is not an object'
        );
      }
      return EXIT_OK;
    }

    case 'get':
      io.stdout(serializeDocument(getAt(loaded.document, parsePointer(command.pointer))));
      return EXIT_OK;

    case 'diff': {
      const against = loadDocument(command.againstFile);
      const diff = diffDocuments(
        loaded.document,
        against.document,
        { before: file, after: command.againstFile },
        { sortKeys: command.sortKeys }
      );
      io.stdout(diff === '' ? '(no changes)' : diff.replace(/\n$/, ''));
      return EXIT_OK;
    }

    default:
      break;
  }

  const updated = edit(loaded.document, command, config);

  if (parsed.dryRun) {
    const diff = unifiedDiff(loaded.raw, serializeToBytes(updated), file, `${file} (new)`);
    io.stdout(diff === '' ? '(no changes)' : diff.replace(/\n$/, ''));
    return EXIT_OK;
  }

  const result = commitDocument(file, updated, { makeBackup: config.make_backup });
  io.stdout(`Wrote ${result.path} (SHA256 ${result.digest})`);
  if (result.backup_path !== null) {
    io.stdout(`Backup: ${result.backup_path}`);
  }
  return EXIT_OK;
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
    return execute(parsed, env, io);
  } catch (err) {
    const code = reportError(err, io);
    if (err instanceof UsageError) {
      io.stderr(USAGE);
    }
    return code;
  }
}

// Only run CLI when this file is the entry point
if (isMainModule(import.meta.url)) {
  process.exitCode = run(process.argv.slice(2));
}
