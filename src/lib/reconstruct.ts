import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  addPaths,
  applyPatch,
  checkout,
  cloneWorktree,
  commit,
  diffRevisions,
  objectExists,
  pushCommit,
  revParseHead,
} from './git.js';
import { CommitFetchError, isCommitDetail } from './github.js';
import { repoKey } from './mirror.js';
import { errorMessage } from './errors.js';
import { retryOnRateLimit } from './retry.js';
import type { CommitResolution, MirrorContext, MirrorRepository } from './types.js';

export type ReconstructionOutcome =
  | { kind: 'root-commit' }
  | { kind: 'replayed'; hash: string; verified: boolean };

export function orphanBranchFor(hash: string): string {
  return `orphaned-${hash.slice(0, 7)}`;
}

export function normalizeLineEndings(text: string): string {
  return text.replace(/\r/g, '');
}

const C_ESCAPES: Record<string, number> = { a: 7, b: 8, t: 9, n: 10, v: 11, f: 12, r: 13, '"': 34, '\\': 92 };

/**
 * Undo git's C-style quoting of a path (`"src/\303\251.c"` → `src/é.c`).
 * Unquoted input is returned as is.
 */
export function unquotePath(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) return raw;
  const body = raw.slice(1, -1);
  const bytes: number[] = [];

  for (let i = 0; i < body.length; i++) {
    const ch = body.charAt(i);
    if (ch !== '\\') {
      bytes.push(...Buffer.from(ch, 'utf-8'));
      continue;
    }
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
      continue;
    }
    const next = body.charAt(i + 1);
    bytes.push(C_ESCAPES[next] ?? next.charCodeAt(0));
    i++;
  }
  return Buffer.from(bytes).toString('utf-8');
}

const SAME_PATH_HEADER = /^diff --git (?:a\/(.+) b\/\1|"a\/(.+)" "b\/\2")$/;
const FILE_HEADER = /^(---|\+\+\+|rename from|rename to) (.+)$/;
const HEADER_PREFIX: Record<string, string> = { '---': 'a/', '+++': 'b/' };

/**
 * Paths named in the file headers of a git-style patch, in order of
 * appearance. Both sides of renames are included so the old path is staged
 * as a deletion.
 */
export function touchedPaths(patch: string): string[] {
  const paths = new Set<string>();
  let inHeader = false;

  for (const line of normalizeLineEndings(patch).split('\n')) {
    if (line.startsWith('diff --git ')) {
      inHeader = true;
      const same = SAME_PATH_HEADER.exec(line);
      if (same?.[1]) paths.add(same[1]);
      else if (same?.[2]) paths.add(unquotePath(`"${same[2]}"`));
      continue;
    }
    if (!inHeader) continue;
    if (line.startsWith('@@')) {
      inHeader = false;
      continue;
    }

    const header = FILE_HEADER.exec(line);
    if (!header?.[1] || !header[2]) continue;
    const value = unquotePath(header[2].replace(/\t$/, ''));
    const prefix = HEADER_PREFIX[header[1]] ?? '';
    if (value !== '/dev/null' && value.startsWith(prefix) && value.length > prefix.length) {
      paths.add(value.slice(prefix.length));
    }
  }

  return [...paths];
}

/**
 * Rebuild a commit the mirror no longer has from its API patch, replaying it
 * onto the first parent in a throwaway clone. The result is pushed to the
 * mirror only when the replayed diff matches the original patch.
 */
export async function reconstructCommit(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  hash: string,
): Promise<ReconstructionOutcome> {
  const label = `${mirror.owner}/${mirror.name}@${hash}`;
  const result = await retryOnRateLimit(
    ctx.retryPolicy,
    ctx.sleep,
    () => ctx.commits.fetchCommit(mirror.owner, mirror.name, hash),
    label,
  );

  if (result.status === 401) {
    console.warn('Got 401, the GITHUB_TOKEN in use is probably out of date.');
  }
  if (result.status === 422) {
    return { kind: 'root-commit' };
  }
  if (!isCommitDetail(result)) {
    throw new CommitFetchError(result.status, mirror.owner, mirror.name, hash, result.message);
  }

  const { commit: detail } = result;
  const paths = touchedPaths(detail.patch);
  if (paths.length === 0) {
    throw new Error(`Patch for ${label} touches no files`);
  }

  const tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), 'diffset-'));
  try {
    const worktree = path.join(tempRoot, 'worktree');
    const patchFile = path.join(tempRoot, 'commit.diff');
    fs.writeFileSync(patchFile, detail.patch, 'utf-8');

    await cloneWorktree(ctx.runner, mirror.path, worktree);
    await checkout(ctx.runner, worktree, detail.parentSha);
    await applyPatch(ctx.runner, worktree, patchFile);
    await addPaths(ctx.runner, worktree, paths);
    await commit(ctx.runner, worktree, detail.message, detail.author, detail.committer);

    const newHash = await revParseHead(ctx.runner, worktree);
    const replayed = await diffRevisions(ctx.runner, worktree, detail.parentSha, newHash);
    const verified = normalizeLineEndings(replayed) === normalizeLineEndings(detail.patch);

    if (verified) {
      await pushCommit(ctx.runner, worktree, newHash, orphanBranchFor(hash));
    } else {
      console.warn(`Replayed diff for ${label} differs from the original patch; not publishing ${newHash}.`);
    }
    return { kind: 'replayed', hash: newHash, verified };
  } finally {
    fs.rmSync(tempRoot, { recursive: true, force: true });
  }
}

/**
 * Prove `hash` is present in the mirror, reconstructing it if needed. Never
 * throws: reconstruction failures are logged and reported as `absent`.
 */
export async function resolveCommit(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  hash: string,
): Promise<CommitResolution> {
  if (!hash) {
    return { status: 'absent', hash, originalHash: hash, reason: 'missing-hash' };
  }
  if (ctx.failedRepositories.has(repoKey(mirror))) {
    return { status: 'absent', hash, originalHash: hash, reason: 'failed-repository' };
  }
  if (await objectExists(ctx.runner, mirror.path, hash)) {
    return { status: 'present', hash, originalHash: hash, reconstructed: false };
  }

  let outcome: ReconstructionOutcome;
  try {
    outcome = await reconstructCommit(ctx, mirror, hash);
  } catch (err) {
    console.error(`Could not reconstruct ${mirror.url} ${hash}: ${errorMessage(err)}`);
    return { status: 'absent', hash, originalHash: hash, reason: 'error' };
  }

  if (outcome.kind === 'root-commit') {
    return { status: 'absent', hash, originalHash: hash, reason: 'root-commit' };
  }
  if (await objectExists(ctx.runner, mirror.path, outcome.hash)) {
    return { status: 'present', hash: outcome.hash, originalHash: hash, reconstructed: true };
  }
  return { status: 'absent', hash: outcome.hash, originalHash: hash, reason: 'verification-failed' };
}
