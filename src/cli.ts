#!/usr/bin/env node
/**
 * diffset CLI
 *
 * Usage:
 *   diffset [command] [options]
 *
 * Commands:
 *   mirror   Mirror repositories and resolve (or reconstruct) every commit
 *   enrich   Add diffs and file versions from the existing mirrors
 *   (none)   Run mirror + enrich (default)
 */

import { ConfigError, resolveConfig, type DatasetConfig } from './lib/config.js';
import { createMirrorContext } from './lib/context.js';
import { enrichEntries, mirrorEntries } from './lib/dataset.js';
import { loadEntryFile, saveEntryFile } from './lib/entries.js';
import type { DatasetProgress } from './lib/types.js';

// ── Helpers ──────────────────────────────────────────────────────────────────

function parseArgs(argv: string[]): { command: string; flags: Record<string, string> } {
  const args = argv.slice(2);
  let command = '';
  const flags: Record<string, string> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg === '--help' || arg === '-h') {
      flags['help'] = 'true';
    } else if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = 'true';
      }
    } else if (!command) {
      command = arg;
    }
  }

  return { command, flags };
}

function printHelp(): void {
  console.log(`
diffset — Regression-test entries → commit diffs and file versions

Usage:
  diffset [command] [options]

Commands:
  mirror    Mirror repositories and resolve every base/new commit,
            replaying force-pushed commits from the GitHub API
  enrich    Add git_diff and old/new file versions from existing mirrors
  (default) Run mirror followed by enrich

Options:
  --input                Entry file to process               (env: INPUT_FILE)
  --output               Where to write the result           (env: OUTPUT_FILE, default: --input)
  --repos-dir            Directory holding the bare mirrors  (env: REPOS_DIR, default: ./repos)
  --token                GitHub personal access token        (env: GITHUB_TOKEN)
  --api-url              GitHub API root                     (env: GITHUB_API_URL)
  --remove-comments      Strip C-style comments before diffing
  --native-diff          Use git's own diff (without comment removal)
  --filter               Comma-separated path globs          (env: FILTER_PATHS)
  --no-filter            Accept every change set
  --rate-limit-wait      Minutes to wait when rate limited   (env: RATE_LIMIT_WAIT, default: 10)
  --rate-limit-attempts  Attempts before giving up           (env: RATE_LIMIT_ATTEMPTS, default: unbounded)
  -h, --help             Show this help message

Examples:
  # Resolve commits, then extract comment-free diffs
  diffset --input tests.json --output dataset.json --remove-comments

  # Only refresh mirrors and hashes
  diffset mirror --input tests.json --repos-dir ./git_repos
`.trim());
}

function reportProgress(p: DatasetProgress): void {
  if (p.message) process.stdout.write(`\r[${p.index + 1}/${p.total}] ${p.message}`.padEnd(100));
  if (p.phase === 'done') process.stdout.write('\n');
}

// ── Main ─────────────────────────────────────────────────────────────────────

async function run(config: DatasetConfig): Promise<void> {
  const loaded = loadEntryFile(config.input);
  const entries = loaded.entries.map((e) => e.entry);
  console.log(`Loaded ${entries.length} entries from ${config.input} (${loaded.invalid.length} malformed).`);

  const ctx = createMirrorContext(config);

  if (config.command !== 'enrich') {
    const summary = await mirrorEntries(ctx, entries, reportProgress);
    console.log(
      `Mirror: ${summary.resolved} resolved (${summary.reconstructed} reconstructed), ${summary.unresolved} unresolved.`,
    );
    if (ctx.failedRepositories.size > 0) {
      console.warn(`Repositories that could not be cloned: ${[...ctx.failedRepositories].join(', ')}`);
    }
  }

  if (config.command !== 'mirror') {
    console.log(`remove comments: ${config.removeComments}`);
    console.log(`filter paths: ${config.filters.length > 0 ? config.filters.join(' ') : '(none)'}`);
    const summary = await enrichEntries(ctx, entries, {
      removeComments: config.removeComments,
      nativeDiff: config.nativeDiff,
      filters: config.filters,
      onProgress: reportProgress,
    });
    console.log(`Enrich: ${summary.enriched} enriched, ${summary.filtered} filtered out, ${summary.skipped} skipped.`);
  }

  saveEntryFile(config.output, loaded);
  console.log(`Wrote ${loaded.file.list.length} entries to ${config.output}.`);
}

async function main(): Promise<void> {
  const { command, flags } = parseArgs(process.argv);

  if (flags['help']) {
    printHelp();
    process.exit(0);
  }

  let config: DatasetConfig;
  try {
    config = resolveConfig(command, flags);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      console.error('Run diffset --help for usage information.');
      process.exit(1);
    }
    throw err;
  }

  await run(config);
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
