import fs from 'node:fs';
import { vi, type Mock } from 'vitest';
import type { CommitFetchResult, CommitSource } from '../github.js';
import type { ProcessResult, ProcessRunner, RunOptions } from '../process.js';
import type { MirrorContext, MirrorRepository } from '../types.js';

export interface FakeCall {
  args: string[];
  options?: RunOptions;
}

const ok = (stdout = ''): ProcessResult => ({ exitCode: 0, stdout, stderr: '' });
const fail = (stderr: string, exitCode = 128): ProcessResult => ({ exitCode, stdout: '', stderr });

/**
 * In-process stand-in for git: commits are plain path → content maps, and the
 * working-tree commands used for reconstruction answer from `replay`.
 */
export class FakeGit implements ProcessRunner {
  readonly calls: FakeCall[] = [];
  readonly commits = new Map<string, Record<string, string>>();
  readonly pushed: Array<{ hash: string; branch: string }> = [];

  cloneExitCode = 0;
  updateExitCode = 0;
  nameOnlyExitCode = 0;
  replay = { newHash: 'f00dfeed', diff: '' };
  nativeDiffOutput = 'native diff\n';

  addCommit(hash: string, files: Record<string, string>): this {
    this.commits.set(hash, files);
    return this;
  }

  /** Calls whose subcommand (after `--git-dir` or `-C`) is `name`. */
  callsTo(name: string): FakeCall[] {
    return this.calls.filter((c) => subcommandArgs(c.args)[0] === name);
  }

  async run(command: string, args: string[], options?: RunOptions): Promise<ProcessResult> {
    if (command !== 'git') return fail(`unexpected command ${command}`, 127);
    this.calls.push({ args, options });
    const rest = subcommandArgs(args);

    switch (rest[0]) {
      case 'clone': {
        if (!rest.includes('--mirror')) return ok();
        if (this.cloneExitCode !== 0) return fail('fatal: repository not found', this.cloneExitCode);
        const dest = rest[rest.length - 1];
        if (dest) fs.mkdirSync(dest, { recursive: true });
        return ok();
      }
      case 'remote':
        return this.updateExitCode === 0 ? ok() : fail('fatal: unable to access remote', this.updateExitCode);
      case 'cat-file':
        return this.commits.has(rest[2] ?? '') ? ok() : fail('', 1);
      case 'show':
        return this.show(rest[1] ?? '');
      case 'diff':
        return this.diff(rest);
      case 'rev-parse':
        return ok(`${this.replay.newHash}\n`);
      case 'push': {
        const [hash = '', ref = ''] = (rest[3] ?? '').split(':');
        this.pushed.push({ hash, branch: ref.replace('refs/heads/', '') });
        this.commits.set(hash, {});
        return ok();
      }
      default:
        return ok();
    }
  }

  private show(spec: string): ProcessResult {
    const [rev = '', filePath = ''] = spec.split(':');
    const files = this.commits.get(rev);
    if (!files) return fail(`fatal: invalid object name '${rev}'.`);
    const content = files[filePath];
    if (content === undefined) return fail(`fatal: path '${filePath}' does not exist in '${rev}'`);
    return ok(content);
  }

  private diff(rest: string[]): ProcessResult {
    if (rest[1] === '--name-only') {
      if (this.nameOnlyExitCode !== 0) return fail('fatal: bad revision', this.nameOnlyExitCode);
      const [from = '', to = ''] = rest.slice(1).filter((arg) => !arg.startsWith('-'));
      const a = this.commits.get(from);
      const b = this.commits.get(to);
      if (!a || !b) return fail('fatal: bad revision');
      const paths = [...new Set([...Object.keys(a), ...Object.keys(b)])].sort();
      return ok(paths.filter((p) => a[p] !== b[p]).map((p) => `${p}\0`).join(''));
    }
    if (rest[1] === '--no-prefix') return ok(this.nativeDiffOutput);
    return ok(this.replay.diff);
  }
}

export function subcommandArgs(args: string[]): string[] {
  if (args[0]?.startsWith('--git-dir=')) return args.slice(1);
  if (args[0] === '-C') return args.slice(2);
  return args;
}

export function fakeCommitSource(...results: CommitFetchResult[]): { fetchCommit: Mock<CommitSource['fetchCommit']> } {
  const queue = [...results];
  return {
    fetchCommit: vi.fn<CommitSource['fetchCommit']>(async () => {
      const next = queue.length > 1 ? queue.shift() : queue[0];
      if (!next) throw new Error('no fake commit result queued');
      return next;
    }),
  };
}

export function createTestContext(runner: FakeGit, overrides: Partial<MirrorContext> = {}): MirrorContext {
  return {
    reposDir: '/tmp/diffset-test-repos',
    runner,
    commits: fakeCommitSource({ status: 404, message: 'Not Found' }),
    retryPolicy: { waitMs: 1000, maxAttempts: Infinity, jitterMs: 0 },
    sleep: vi.fn(async () => {}),
    failedRepositories: new Set(),
    ...overrides,
  };
}

export function testMirror(overrides: Partial<MirrorRepository> = {}): MirrorRepository {
  return {
    host: 'github.com',
    owner: 'test-org',
    name: 'engine',
    url: 'https://github.com/test-org/engine',
    path: '/tmp/diffset-test-repos/github.com/test-org/engine',
    ...overrides,
  };
}
