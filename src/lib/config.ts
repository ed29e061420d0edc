import path from 'node:path';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retry.js';

/** Files holding the search code of the engines in the dataset. */
export const DEFAULT_FILTER_PATTERNS = [
  '*search.*',
  '*searches.*',
  '*negamax.*',
  '*mybot.*',
  '*alphabeta.*',
  '*pvs.*',
  '*search_manager.*',
  '*search_worker.*',
  '*searcher.*',
  '*chess_search.*',
  '*Searcher.*',
  '*caps.*',
  '*engine.*',
  '*IterativeSearch.*',
  '*main.*',
  '*BasicSearch.*',
  '*search/mod.*',
  '*search/engine.*',
];

export type Command = 'mirror' | 'enrich' | 'all';

export interface DatasetConfig {
  command: Command;
  input: string;
  output: string;
  reposDir: string;
  token?: string;
  apiUrl?: string;
  removeComments: boolean;
  nativeDiff: boolean;
  filters: string[];
  retryPolicy: RetryPolicy;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function toCommand(raw: string): Command {
  if (raw === '') return 'all';
  if (raw === 'mirror' || raw === 'enrich') return raw;
  throw new ConfigError(`Unknown command "${raw}".`);
}

function toNumber(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(`${name} must be a non-negative number, got "${raw}".`);
  }
  return value;
}

function splitPatterns(raw: string): string[] {
  return raw
    .split(',')
    .map((p) => p.trim())
    .filter(Boolean);
}

/**
 * Resolve every option as `--flag`, then environment variable, then default.
 */
export function resolveConfig(
  command: string,
  flags: Record<string, string>,
  env: Record<string, string | undefined> = process.env,
): DatasetConfig {
  const input = flags['input'] ?? env['INPUT_FILE'];
  if (!input) {
    throw new ConfigError('--input or INPUT_FILE environment variable is required.');
  }

  const filterRaw = flags['filter'] ?? env['FILTER_PATHS'];
  const filters = flags['no-filter'] ? [] : filterRaw !== undefined ? splitPatterns(filterRaw) : DEFAULT_FILTER_PATTERNS;

  const waitMinutes = toNumber(flags['rate-limit-wait'] ?? env['RATE_LIMIT_WAIT'], '--rate-limit-wait', DEFAULT_RETRY_POLICY.waitMs / 60_000);
  const attempts = toNumber(flags['rate-limit-attempts'] ?? env['RATE_LIMIT_ATTEMPTS'], '--rate-limit-attempts', DEFAULT_RETRY_POLICY.maxAttempts);

  return {
    command: toCommand(command),
    input,
    output: flags['output'] ?? env['OUTPUT_FILE'] ?? input,
    reposDir: path.resolve(flags['repos-dir'] ?? env['REPOS_DIR'] ?? './repos'),
    token: flags['token'] ?? (env['GITHUB_TOKEN'] || undefined),
    apiUrl: flags['api-url'] ?? env['GITHUB_API_URL'],
    removeComments: flags['remove-comments'] === 'true',
    nativeDiff: flags['native-diff'] === 'true',
    filters,
    retryPolicy: {
      waitMs: waitMinutes * 60_000,
      maxAttempts: Math.max(1, attempts),
      jitterMs: DEFAULT_RETRY_POLICY.jitterMs,
    },
  };
}
