import { Octokit } from '@octokit/rest';
import { throttling } from '@octokit/plugin-throttling';
import type { CommitIdentity } from './git.js';

const ThrottledOctokit = Octokit.plugin(throttling);

export type GitHubClient = InstanceType<typeof ThrottledOctokit>;

// Waits the server asks for up to this long are absorbed by the throttling
// plugin; anything longer surfaces as a 403/429 for the caller's retry policy.
const MAX_INLINE_RETRY_AFTER_S = 60;

export interface OctokitOptions {
  /** API root, for GitHub Enterprise hosts. */
  baseUrl?: string;
  /** Replacement fetch, used by tests. */
  fetch?: typeof fetch;
}

export function createOctokit(token?: string, options: OctokitOptions = {}): GitHubClient {
  return new ThrottledOctokit({
    auth: token,
    baseUrl: options.baseUrl,
    request: options.fetch ? { fetch: options.fetch } : undefined,
    throttle: {
      onRateLimit(retryAfter: number, options: { method: string; url: string }, _octokit: unknown, retryCount: number) {
        console.warn(
          `Rate limit hit for ${options.method} ${options.url}. ` +
            `Server asks to wait ${retryAfter}s (retry #${retryCount}).`,
        );
        return retryCount < 1 && retryAfter <= MAX_INLINE_RETRY_AFTER_S;
      },
      onSecondaryRateLimit(retryAfter: number, options: { method: string; url: string }) {
        console.warn(
          `Secondary rate limit hit for ${options.method} ${options.url}. ` +
            `Server asks to wait ${retryAfter}s.`,
        );
        return retryAfter <= MAX_INLINE_RETRY_AFTER_S;
      },
    },
  });
}

export interface CommitDetail {
  sha: string;
  /** First parent; merge commits are replayed against it. */
  parentSha: string;
  author: CommitIdentity;
  committer: CommitIdentity;
  message: string;
  /** Unified diff of the commit against its first parent, as served by the API. */
  patch: string;
}

export type CommitFetchResult =
  | { status: 200; commit: CommitDetail }
  | { status: number; message: string };

export interface CommitSource {
  fetchCommit(owner: string, repo: string, sha: string): Promise<CommitFetchResult>;
}

export class CommitFetchError extends Error {
  constructor(
    readonly status: number,
    readonly owner: string,
    readonly repo: string,
    readonly sha: string,
    detail: string,
  ) {
    super(`Failed to get commit ${owner}/${repo}@${sha}: ${status} ${detail}`);
    this.name = 'CommitFetchError';
  }
}

export function isCommitDetail(result: CommitFetchResult): result is { status: 200; commit: CommitDetail } {
  return result.status === 200 && 'commit' in result;
}

function isRequestError(err: unknown): err is Error & { status: number } {
  return err instanceof Error && 'status' in err && typeof err.status === 'number';
}

type GitUser = { name?: string; email?: string; date?: string } | null | undefined;

function toIdentity(user: GitUser, role: string, sha: string): CommitIdentity {
  if (!user?.name || !user.email || !user.date) {
    throw new Error(`Commit ${sha} is missing ${role} name, email or date`);
  }
  return { name: user.name, email: user.email, date: user.date };
}

/**
 * Commit metadata and patch from the GitHub REST API. Non-200 answers are
 * returned as values so the caller decides which ones to retry.
 */
export function createCommitSource(octokit: GitHubClient): CommitSource {
  return {
    async fetchCommit(owner, repo, sha) {
      try {
        const { data } = await octokit.rest.repos.getCommit({ owner, repo, ref: sha });
        const parent = data.parents[0];
        if (!parent) {
          return { status: 422, message: `Commit ${sha} has no parents` };
        }

        const diff = await octokit.request('GET /repos/{owner}/{repo}/commits/{ref}', {
          owner,
          repo,
          ref: sha,
          mediaType: { format: 'diff' },
        });
        const patch: unknown = diff.data;
        if (typeof patch !== 'string') {
          throw new Error(`Expected a diff body for ${owner}/${repo}@${sha}`);
        }

        return {
          status: 200,
          commit: {
            sha: data.sha,
            parentSha: parent.sha,
            author: toIdentity(data.commit.author, 'author', sha),
            committer: toIdentity(data.commit.committer, 'committer', sha),
            message: data.commit.message,
            patch,
          },
        };
      } catch (err) {
        if (isRequestError(err)) {
          return { status: err.status, message: err.message };
        }
        throw err;
      }
    },
  };
}
