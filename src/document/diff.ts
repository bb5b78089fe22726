/**
 * Snapshot Diff
 * =============
 *
 * Unified diff between two serialized revisions, for previews.
 *
 * diff-match-patch computes the line-level edit script (each line is
 * mapped to one character, diffed, then mapped back); hunks are then
 * grouped with 3 lines of context and formatted as:
 *
 *   --- before-label
 *   +++ after-label
 *   @@ -start,count +start,count @@
 *    context
 *   -removed
 *   +added
 *
 * A line that has no terminating newline is followed by
 * `\ No newline at end of file`.
 */

import DiffMatchPatch from 'diff-match-patch';

import type { JsonValue } from '../types/document.js';
import { serializeToBytes } from '../utils/canonical.js';

const CONTEXT_LINES = 3;

const NO_NEWLINE_MARKER = '\\ No newline at end of file';

type LineKind = 'equal' | 'delete' | 'insert';

interface DiffLine {
  kind: LineKind;
  /** Line text including its newline, if it had one */
  text: string;
  /** 0-based index in the before text for equal/delete lines, else the next before index */
  oldIndex: number;
  /** 0-based index in the after text for equal/insert lines, else the next after index */
  newIndex: number;
}

export interface DiffLabels {
  before: string;
  after: string;
}

export interface DiffDocumentsOptions {
  /** Compare with object keys sorted, so key order changes are not reported */
  sortKeys?: boolean;
}

// =============================================================================
// Line Diff
// =============================================================================

function splitLines(text: string): string[] {
  return text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}

function kindOf(op: number): LineKind {
  if (op < 0) return 'delete';
  if (op > 0) return 'insert';
  return 'equal';
}

// Line tokens: one UTF-16 code unit per distinct line, skipping the
// surrogate block. Two units are reserved for lines found in only one text.
const BEFORE_ONLY = '\u0000';
const AFTER_ONLY = '\u0001';
const FIRST_SHARED_CODE = 2;
const SURROGATE_START = 0xd800;
const SURROGATE_SIZE = 0x800;
const MAX_SHARED_TOKENS = 0x10000 - SURROGATE_SIZE - FIRST_SHARED_CODE;

function sharedToken(n: number): string {
  const code = FIRST_SHARED_CODE + n;
  return String.fromCharCode(code < SURROGATE_START ? code : code + SURROGATE_SIZE);
}

/**
 * Encode two line lists for diff-match-patch.
 *
 * Only lines present in both lists can ever match, so only those get a
 * shared token; every other line maps to its side's reserved token. Past
 * the token space, shared tokens are reused in order, so a token match
 * does not by itself mean the lines are equal.
 */
function encodeLines(before: readonly string[], after: readonly string[]): [string, string] {
  const inAfter = new Set(after);
  const tokens = new Map<string, string>();

  let encodedBefore = '';
  for (const line of before) {
    let token = tokens.get(line);
    if (token === undefined && inAfter.has(line)) {
      token = sharedToken(tokens.size % MAX_SHARED_TOKENS);
      tokens.set(line, token);
    }
    encodedBefore += token ?? BEFORE_ONLY;
  }

  let encodedAfter = '';
  for (const line of after) {
    encodedAfter += tokens.get(line) ?? AFTER_ONLY;
  }

  return [encodedBefore, encodedAfter];
}

/**
 * Line-level edit script between two texts. Common leading and trailing
 * lines are matched directly; the middle is diffed by diff-match-patch.
 */
function diffLines(before: string, after: string): DiffLine[] {
  const oldLines = splitLines(before);
  const newLines = splitLines(after);

  let prefix = 0;
  while (prefix < oldLines.length && prefix < newLines.length && oldLines[prefix] === newLines[prefix]) {
    prefix++;
  }
  let suffix = 0;
  while (
    suffix < oldLines.length - prefix &&
    suffix < newLines.length - prefix &&
    oldLines[oldLines.length - 1 - suffix] === newLines[newLines.length - 1 - suffix]
  ) {
    suffix++;
  }

  const oldMiddle = oldLines.slice(prefix, oldLines.length - suffix);
  const newMiddle = newLines.slice(prefix, newLines.length - suffix);
  const [chars1, chars2] = encodeLines(oldMiddle, newMiddle);

  const dmp = new DiffMatchPatch();
  dmp.Diff_Timeout = 0;
  const diffs = dmp.diff_main(chars1, chars2, false);

  const lines: DiffLine[] = [];
  let oldIndex = 0;
  let newIndex = 0;

  const push = (kind: LineKind, text: string | undefined): void => {
    if (text === undefined) {
      throw new Error(`Line diff ran past the end of the input at ${oldIndex}/${newIndex}`);
    }
    lines.push({ kind, text, oldIndex, newIndex });
    if (kind !== 'insert') oldIndex++;
    if (kind !== 'delete') newIndex++;
  };

  for (let i = 0; i < prefix; i++) {
    push('equal', oldLines[i]);
  }

  // Each code unit of the edit script stands for one line of its side
  for (const [op, text] of diffs) {
    const kind = kindOf(op);
    for (let i = 0; i < text.length; i++) {
      const oldLine = oldLines[oldIndex];
      const newLine = newLines[newIndex];
      if (kind === 'equal' && oldLine !== newLine) {
        // Reused token
        push('delete', oldLine);
        push('insert', newLine);
      } else {
        push(kind, kind === 'insert' ? newLine : oldLine);
      }
    }
  }

  for (let i = oldLines.length - suffix; i < oldLines.length; i++) {
    push('equal', oldLines[i]);
  }

  return lines;
}

// =============================================================================
// Hunks
// =============================================================================

/**
 * Group change positions into [start, end] ranges of the line list,
 * merging changes separated by at most 2 * CONTEXT_LINES equal lines.
 */
function groupHunks(lines: DiffLine[]): Array<[number, number]> {
  const changes: number[] = [];
  lines.forEach((line, i) => {
    if (line.kind !== 'equal') changes.push(i);
  });

  const groups: Array<[number, number]> = [];
  let first = -1;
  let last = -1;

  for (const i of changes) {
    if (first === -1) {
      first = i;
    } else if (i - last - 1 > 2 * CONTEXT_LINES) {
      groups.push([first, last]);
      first = i;
    }
    last = i;
  }
  if (first !== -1) groups.push([first, last]);

  return groups.map(([start, end]) => [
    Math.max(0, start - CONTEXT_LINES),
    Math.min(lines.length - 1, end + CONTEXT_LINES),
  ]);
}

/**
 * Range in hunk-header form. A single line is just its number; an empty
 * range points at the line before it.
 */
function formatRange(start: number, length: number): string {
  if (length === 1) return String(start + 1);
  if (length === 0) return `${start},0`;
  return `${start + 1},${length}`;
}

function formatLine(prefix: string, text: string): string {
  if (text.endsWith('\n')) return prefix + text;
  return `${prefix}${text}\n${NO_NEWLINE_MARKER}\n`;
}

function formatHunk(lines: DiffLine[], start: number, end: number): string {
  const slice = lines.slice(start, end + 1);
  const head = slice[0];
  if (head === undefined) return '';

  const oldLength = slice.filter((l) => l.kind !== 'insert').length;
  const newLength = slice.filter((l) => l.kind !== 'delete').length;

  let out = `@@ -${formatRange(head.oldIndex, oldLength)} +${formatRange(head.newIndex, newLength)} @@\n`;
  for (const line of slice) {
    const prefix = line.kind === 'equal' ? ' ' : line.kind === 'delete' ? '-' : '+';
    out += formatLine(prefix, line.text);
  }
  return out;
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Unified diff of two serialized revisions.
 * Returns an empty string when the inputs are byte-identical.
 */
export function unifiedDiff(
  beforeBytes: Buffer | string,
  afterBytes: Buffer | string,
  beforeLabel: string,
  afterLabel: string
): string {
  const before = typeof beforeBytes === 'string' ? beforeBytes : beforeBytes.toString('utf-8');
  const after = typeof afterBytes === 'string' ? afterBytes : afterBytes.toString('utf-8');
  if (before === after) return '';

  const lines = diffLines(before, after);
  const hunks = groupHunks(lines);
  if (hunks.length === 0) return '';

  let out = `--- ${beforeLabel}\n+++ ${afterLabel}\n`;
  for (const [start, end] of hunks) {
    out += formatHunk(lines, start, end);
  }
  return out;
}

/**
 * Serialize two documents and diff them.
 */
export function diffDocuments(
  before: JsonValue,
  after: JsonValue,
  labels: DiffLabels,
  options: DiffDocumentsOptions = {}
): string {
  const serializeOptions = { sortKeys: options.sortKeys ?? false };
  return unifiedDiff(
    serializeToBytes(before, serializeOptions),
    serializeToBytes(after, serializeOptions),
    labels.before,
    labels.after
  );
}
