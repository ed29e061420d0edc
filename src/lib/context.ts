import type { DatasetConfig } from './config.js';
import { createCommitSource, createOctokit } from './github.js';
import { spawnRunner } from './process.js';
import { sleep } from './retry.js';
import type { MirrorContext } from './types.js';

export function createMirrorContext(
  config: Pick<DatasetConfig, 'reposDir' | 'token' | 'apiUrl' | 'retryPolicy'>,
  overrides: Partial<MirrorContext> = {},
): MirrorContext {
  return {
    reposDir: config.reposDir,
    runner: spawnRunner,
    commits: createCommitSource(createOctokit(config.token, { baseUrl: config.apiUrl })),
    retryPolicy: config.retryPolicy,
    sleep,
    failedRepositories: new Set(),
    ...overrides,
  };
}
