import { structuredPatch } from 'diff';
import { diffFiles, showFile } from './git.js';
import { sanitize } from './sanitize.js';
import type { FileSnapshot, MirrorContext, MirrorRepository } from './types.js';

const MISSING_PATH_MESSAGES = ['does not exist', 'invalid object name', 'exists on disk, but not in'];

export interface FileVersions {
  path: string;
  before: string | undefined;
  after: string | undefined;
}

export interface ChangeSetContent {
  diff: string;
  before: FileSnapshot[];
  after: FileSnapshot[];
}

/**
 * Content of `filePath` at `rev` decoded as UTF-8, or `undefined` when the
 * file does not exist there (or git cannot read it). Bytes that are not valid
 * UTF-8 come back as U+FFFD.
 */
export async function readFileAt(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  rev: string,
  filePath: string,
): Promise<string | undefined> {
  if (!rev || !filePath) return undefined;
  const result = await showFile(ctx.runner, mirror.path, rev, filePath);
  if (result.exitCode === 0) return result.stdout;

  const stderr = result.stderr.toLowerCase();
  if (!MISSING_PATH_MESSAGES.some((msg) => stderr.includes(msg))) {
    console.warn(
      `git --git-dir=${mirror.path} show ${rev}:${filePath} failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
    );
  }
  return undefined;
}

async function readVersions(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
  files: string[],
): Promise<FileVersions[]> {
  const versions: FileVersions[] = [];
  for (const path of files) {
    versions.push({
      path,
      before: await readFileAt(ctx, mirror, from, path),
      after: await readFileAt(ctx, mirror, to, path),
    });
  }
  return versions;
}

const NO_NEWLINE = '\\ No newline at end of file';

function formatRange(start: number, lines: number): string {
  // A hunk side with no lines only happens for an empty file.
  if (lines === 0) return '0,0';
  if (lines === 1) return `${start}`;
  return `${start},${lines}`;
}

// Whole-file hunk for an addition or deletion, where one side is empty.
function wholeFileHunk(content: string, sign: '+' | '-'): string[] {
  const lines = content.split('\n');
  const endsWithNewline = content.endsWith('\n');
  if (endsWithNewline) lines.pop();

  const range = formatRange(1, lines.length);
  const header = sign === '+' ? `@@ -0,0 +${range} @@` : `@@ -${range} +0,0 @@`;
  const body = lines.map((line) => `${sign}${line}`);
  return endsWithNewline ? [header, ...body] : [header, ...body, NO_NEWLINE];
}

/**
 * Unified diff of one file with `a/` and `b/` headers, or `''` when both
 * sides are equal. Absent content diffs as an empty file.
 */
export function diffFragment(filePath: string, before: string | undefined, after: string | undefined): string {
  const oldText = before ?? '';
  const newText = after ?? '';
  if (oldText === newText) return '';

  const lines = [`--- a/${filePath}`, `+++ b/${filePath}`];
  if (oldText === '' || newText === '') {
    lines.push(...wholeFileHunk(oldText || newText, oldText === '' ? '+' : '-'));
    return `${lines.join('\n')}\n`;
  }

  const patch = structuredPatch(`a/${filePath}`, `b/${filePath}`, oldText, newText, '', '', { context: 3 });
  if (patch.hunks.length === 0) return '';

  for (const hunk of patch.hunks) {
    lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    lines.push(...hunk.lines);
  }
  return `${lines.join('\n')}\n`;
}

function assembleDiff(versions: FileVersions[], shouldSanitize: boolean): string {
  const fragments: string[] = [];
  for (const { path, before, after } of versions) {
    if (before === undefined && after === undefined) continue;
    const fragment = shouldSanitize
      ? diffFragment(path, sanitize(before, path), sanitize(after, path))
      : diffFragment(path, before, after);
    if (fragment) fragments.push(fragment);
  }
  return fragments.join('');
}

function toSnapshots(versions: FileVersions[], side: 'before' | 'after', shouldSanitize: boolean): FileSnapshot[] {
  return versions.map((v) => ({
    path: v.path,
    content: shouldSanitize ? sanitize(v[side], v.path) : v[side],
  }));
}

function nothingToCompare(from: string, to: string, files: string[]): boolean {
  return !from || !to || from === to || files.length === 0;
}

/**
 * Concatenated per-file diffs for `files` between two commits, computed from
 * the file contents so that sanitized content can be compared.
 */
export async function buildDiff(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
  files: string[],
  shouldSanitize: boolean,
): Promise<string> {
  if (nothingToCompare(from, to, files)) return '';
  const versions = await readVersions(ctx, mirror, from, to, files);
  return assembleDiff(versions, shouldSanitize);
}

export async function fileSnapshots(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
  files: string[],
  shouldSanitize: boolean,
): Promise<{ before: FileSnapshot[]; after: FileSnapshot[] }> {
  const versions = await readVersions(ctx, mirror, from, to, files);
  return {
    before: toSnapshots(versions, 'before', shouldSanitize),
    after: toSnapshots(versions, 'after', shouldSanitize),
  };
}

/** Diff and snapshots in one pass over the files, reading each version once. */
export async function extractChangeSet(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
  files: string[],
  shouldSanitize: boolean,
): Promise<ChangeSetContent> {
  const versions = await readVersions(ctx, mirror, from, to, files);
  return {
    diff: nothingToCompare(from, to, files) ? '' : assembleDiff(versions, shouldSanitize),
    before: toSnapshots(versions, 'before', shouldSanitize),
    after: toSnapshots(versions, 'after', shouldSanitize),
  };
}

/** git's own diff of `files`, without `a/` and `b/` prefixes. */
export async function nativeDiff(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
  files: string[],
): Promise<string> {
  if (nothingToCompare(from, to, files)) return '';
  return (await diffFiles(ctx.runner, mirror.path, from, to, files)).trim();
}
