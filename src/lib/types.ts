import type { ProcessRunner } from './process.js';
import type { CommitSource } from './github.js';
import type { RetryPolicy } from './retry.js';

export interface RepoIdentity {
  /** Host name, e.g. `github.com`. */
  host: string;
  /** User or organisation owning the repository. */
  owner: string;
  /** Repository name without a `.git` suffix. */
  name: string;
}

export interface MirrorRepository extends RepoIdentity {
  /** URL the mirror was cloned from. */
  url: string;
  /** Absolute path of the bare mirror on disk. */
  path: string;
}

export type MirrorResult =
  | { ok: true; mirror: MirrorRepository }
  | { ok: false; url: string; reason: 'unparseable-url' | 'failed-repository' | 'clone-failed' | 'not-mirrored' };

export type AbsentReason = 'missing-hash' | 'failed-repository' | 'root-commit' | 'verification-failed' | 'error';

/**
 * Outcome of proving a reported commit hash is reachable in a mirror.
 * `hash` is the hash actually stored locally, which differs from
 * `originalHash` once a commit has been replayed.
 */
export type CommitResolution =
  | { status: 'present'; hash: string; originalHash: string; reconstructed: boolean }
  | { status: 'absent'; hash: string; originalHash: string; reason: AbsentReason };

export interface FileSnapshot {
  path: string;
  /** `undefined` when the file does not exist at that commit. */
  content: string | undefined;
}

/**
 * Process-scoped state shared by every mirror and reconstruction call.
 */
export interface MirrorContext {
  /** Directory holding `<host>/<owner>/<name>` mirrors. */
  reposDir: string;
  runner: ProcessRunner;
  commits: CommitSource;
  retryPolicy: RetryPolicy;
  sleep: (ms: number) => Promise<void>;
  /** Repository keys that could not be cloned during this run. */
  failedRepositories: Set<string>;
}

export interface DatasetProgress {
  phase: 'mirror' | 'enrich' | 'done';
  /** Index of the entry being processed (0-based). */
  index: number;
  total: number;
  url?: string;
  message?: string;
}
