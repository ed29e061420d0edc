import fs from 'node:fs';
import path from 'node:path';
import type { ProcessResult, ProcessRunner, RunOptions } from './process.js';

// Keeps git from blocking on a credential prompt for private or deleted repos.
const NO_PROMPT = { GIT_TERMINAL_PROMPT: '0' };
const NO_LFS = { GIT_LFS_SKIP_SMUDGE: '1' };

export class GitCommandError extends Error {
  constructor(
    readonly args: string[],
    readonly exitCode: number,
    readonly stderr: string,
  ) {
    super(`git ${args.join(' ')} failed (exit ${exitCode}): ${stderr.trim()}`);
    this.name = 'GitCommandError';
  }
}

export interface CommitIdentity {
  name: string;
  email: string;
  /** ISO 8601 timestamp. */
  date: string;
}

export function runGit(runner: ProcessRunner, args: string[], options?: RunOptions): Promise<ProcessResult> {
  return runner.run('git', args, options);
}

async function gitOrThrow(runner: ProcessRunner, args: string[], options?: RunOptions): Promise<string> {
  const result = await runGit(runner, args, options);
  if (result.exitCode !== 0) {
    throw new GitCommandError(args, result.exitCode, result.stderr);
  }
  return result.stdout;
}

// ── Bare mirror commands ─────────────────────────────────────────────────────

export function cloneMirror(runner: ProcessRunner, url: string, dest: string): Promise<ProcessResult> {
  return runGit(runner, ['clone', '--quiet', '--mirror', url, dest], { env: NO_PROMPT });
}

export function remoteUpdate(runner: ProcessRunner, gitDir: string): Promise<ProcessResult> {
  return runGit(runner, [`--git-dir=${gitDir}`, 'remote', 'update'], { env: NO_PROMPT });
}

export async function objectExists(runner: ProcessRunner, gitDir: string, rev: string): Promise<boolean> {
  const result = await runGit(runner, [`--git-dir=${gitDir}`, 'cat-file', '-e', rev]);
  return result.exitCode === 0;
}

/** NUL-separated, so paths come back verbatim instead of C-quoted. */
export async function diffNameOnly(runner: ProcessRunner, gitDir: string, from: string, to: string): Promise<string[]> {
  const output = await gitOrThrow(runner, [`--git-dir=${gitDir}`, 'diff', '--name-only', '-z', from, to]);
  return output.split('\0').filter((p) => p.length > 0);
}

export function diffFiles(
  runner: ProcessRunner,
  gitDir: string,
  from: string,
  to: string,
  files: string[],
): Promise<string> {
  return gitOrThrow(runner, [`--git-dir=${gitDir}`, 'diff', '--no-prefix', from, to, '--', ...files]);
}

export function showFile(runner: ProcessRunner, gitDir: string, rev: string, filePath: string): Promise<ProcessResult> {
  return runGit(runner, [`--git-dir=${gitDir}`, 'show', `${rev}:${filePath}`]);
}

/** HEAD, objects/ and refs/ at the root and no nested .git directory. */
export function isBareRepository(dir: string): boolean {
  try {
    return (
      fs.statSync(path.join(dir, 'HEAD')).isFile() &&
      fs.statSync(path.join(dir, 'objects')).isDirectory() &&
      fs.statSync(path.join(dir, 'refs')).isDirectory() &&
      !fs.existsSync(path.join(dir, '.git'))
    );
  } catch {
    return false;
  }
}

// ── Working-tree commands ────────────────────────────────────────────────────

export async function cloneWorktree(runner: ProcessRunner, source: string, dest: string): Promise<void> {
  await gitOrThrow(runner, ['clone', '--quiet', source, dest], { env: NO_LFS });
}

export async function checkout(runner: ProcessRunner, worktree: string, rev: string): Promise<void> {
  await gitOrThrow(runner, ['-C', worktree, 'checkout', '--quiet', rev], { env: NO_LFS });
}

export async function applyPatch(runner: ProcessRunner, worktree: string, patchFile: string): Promise<void> {
  await gitOrThrow(runner, ['-C', worktree, 'apply', '--quiet', patchFile]);
}

export async function addPaths(runner: ProcessRunner, worktree: string, paths: string[]): Promise<void> {
  await gitOrThrow(runner, ['-C', worktree, 'add', '-A', '--', ...paths]);
}

export async function commit(
  runner: ProcessRunner,
  worktree: string,
  message: string,
  author: CommitIdentity,
  committer: CommitIdentity,
): Promise<void> {
  await gitOrThrow(runner, ['-C', worktree, 'commit', '--quiet', '-m', message], {
    env: {
      GIT_AUTHOR_NAME: author.name,
      GIT_AUTHOR_EMAIL: author.email,
      GIT_AUTHOR_DATE: author.date,
      GIT_COMMITTER_NAME: committer.name,
      GIT_COMMITTER_EMAIL: committer.email,
      GIT_COMMITTER_DATE: committer.date,
    },
  });
}

export async function revParseHead(runner: ProcessRunner, worktree: string): Promise<string> {
  const output = await gitOrThrow(runner, ['-C', worktree, 'rev-parse', 'HEAD']);
  return output.trim();
}

/** Full unified diff between two revisions, untrimmed so it can be compared byte for byte. */
export function diffRevisions(runner: ProcessRunner, worktree: string, from: string, to: string): Promise<string> {
  return gitOrThrow(runner, ['-C', worktree, 'diff', from, to]);
}

export async function pushCommit(runner: ProcessRunner, worktree: string, hash: string, branch: string): Promise<void> {
  await gitOrThrow(runner, ['-C', worktree, 'push', '--quiet', 'origin', `${hash}:refs/heads/${branch}`], {
    env: NO_PROMPT,
  });
}
