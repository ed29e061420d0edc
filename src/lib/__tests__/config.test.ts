import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigError, DEFAULT_FILTER_PATTERNS, resolveConfig } from '../config.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    const config = resolveConfig('', { input: 'tests.json' }, {});

    expect(config).toEqual({
      command: 'all',
      input: 'tests.json',
      output: 'tests.json',
      reposDir: path.resolve('./repos'),
      token: undefined,
      apiUrl: undefined,
      removeComments: false,
      nativeDiff: false,
      filters: DEFAULT_FILTER_PATTERNS,
      retryPolicy: { waitMs: 600_000, maxAttempts: Infinity, jitterMs: 0 },
    });
  });

  it('reads the environment', () => {
    const config = resolveConfig(
      'mirror',
      {},
      {
        INPUT_FILE: 'in.json',
        OUTPUT_FILE: 'out.json',
        REPOS_DIR: '/data/repos',
        GITHUB_TOKEN: 'test-token',
        GITHUB_API_URL: 'https://git.example.com/api/v3',
        FILTER_PATHS: '*.rs, src/*.go',
        RATE_LIMIT_WAIT: '1',
        RATE_LIMIT_ATTEMPTS: '3',
      },
    );

    expect(config).toMatchObject({
      command: 'mirror',
      input: 'in.json',
      output: 'out.json',
      reposDir: '/data/repos',
      token: 'test-token',
      apiUrl: 'https://git.example.com/api/v3',
      filters: ['*.rs', 'src/*.go'],
      retryPolicy: { waitMs: 60_000, maxAttempts: 3, jitterMs: 0 },
    });
  });

  it('prefers flags over the environment', () => {
    const config = resolveConfig(
      'enrich',
      { input: 'flag.json', 'repos-dir': '/flag/repos', token: 'flag-token', filter: '*.c' },
      { INPUT_FILE: 'env.json', REPOS_DIR: '/env/repos', GITHUB_TOKEN: 'env-token', FILTER_PATHS: '*.go' },
    );

    expect(config.input).toBe('flag.json');
    expect(config.reposDir).toBe('/flag/repos');
    expect(config.token).toBe('flag-token');
    expect(config.filters).toEqual(['*.c']);
  });

  it('treats an empty token as no token', () => {
    expect(resolveConfig('', { input: 'tests.json' }, { GITHUB_TOKEN: '' }).token).toBeUndefined();
  });

  it('turns filtering off with --no-filter', () => {
    const config = resolveConfig('', { input: 'tests.json', 'no-filter': 'true', filter: '*.c' }, {});
    expect(config.filters).toEqual([]);
  });

  it('reads boolean switches', () => {
    const config = resolveConfig('', { input: 'tests.json', 'remove-comments': 'true', 'native-diff': 'true' }, {});
    expect(config.removeComments).toBe(true);
    expect(config.nativeDiff).toBe(true);
  });

  it('allows at least one attempt', () => {
    const config = resolveConfig('', { input: 'tests.json', 'rate-limit-attempts': '0' }, {});
    expect(config.retryPolicy.maxAttempts).toBe(1);
  });

  it('requires an input file', () => {
    expect(() => resolveConfig('', {}, {})).toThrow(ConfigError);
  });

  it('rejects an unknown command', () => {
    expect(() => resolveConfig('scrape', { input: 'tests.json' }, {})).toThrow('Unknown command "scrape".');
  });

  it('rejects a negative wait', () => {
    expect(() => resolveConfig('', { input: 'tests.json', 'rate-limit-wait': '-1' }, {})).toThrow(
      '--rate-limit-wait must be a non-negative number, got "-1".',
    );
  });
});
