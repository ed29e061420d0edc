import { changedFiles, matchesFilters } from './changes.js';
import { extractChangeSet, nativeDiff } from './diff.js';
import type { FileContent, TestEntry } from './entries.js';
import { errorMessage } from './errors.js';
import { ensureMirror, locateMirror } from './mirror.js';
import { resolveCommit } from './reconstruct.js';
import type { DatasetProgress, FileSnapshot, MirrorContext } from './types.js';

export interface MirrorSummary {
  /** Entries whose two commits are both present in their mirror. */
  resolved: number;
  /** Entries with at least one commit replayed from the API. */
  reconstructed: number;
  unresolved: number;
}

export interface EnrichOptions {
  removeComments: boolean;
  /** Use git's own diff instead of per-file diffs; ignored when removing comments. */
  nativeDiff?: boolean;
  filters: string[];
  onProgress?: (p: DatasetProgress) => void;
}

export interface EnrichSummary {
  enriched: number;
  filtered: number;
  skipped: number;
}

function toFileContents(snapshots: FileSnapshot[]): FileContent[] {
  return snapshots.map((s) => ({ filepath: s.path, content: s.content ?? null }));
}

/**
 * Mirror every entry's repository and prove both of its commits exist,
 * replaying orphaned commits where possible. Resolved hashes and the
 * `exists` flag are written back onto the entries.
 */
export async function mirrorEntries(
  ctx: MirrorContext,
  entries: TestEntry[],
  onProgress?: (p: DatasetProgress) => void,
): Promise<MirrorSummary> {
  const summary: MirrorSummary = { resolved: 0, reconstructed: 0, unresolved: 0 };

  for (const [index, entry] of entries.entries()) {
    onProgress?.({ phase: 'mirror', index, total: entries.length, url: entry.url, message: `Mirroring ${entry.url}` });
    entry.exists = false;

    try {
      if (!entry.base_hash || !entry.new_hash) {
        console.warn(`Entry #${index + 1} (${entry.url}) is missing a base or new hash.`);
        summary.unresolved++;
        continue;
      }

      const result = await ensureMirror(ctx, entry.url);
      if (!result.ok) {
        summary.unresolved++;
        continue;
      }

      const base = await resolveCommit(ctx, result.mirror, entry.base_hash);
      const next = await resolveCommit(ctx, result.mirror, entry.new_hash);
      entry.base_hash = base.hash;
      entry.new_hash = next.hash;
      entry.exists = base.status === 'present' && next.status === 'present';

      if (entry.exists) {
        summary.resolved++;
        if ((base.status === 'present' && base.reconstructed) || (next.status === 'present' && next.reconstructed)) {
          summary.reconstructed++;
        }
      } else {
        summary.unresolved++;
      }
    } catch (err) {
      console.error(`Failed to mirror entry #${index + 1} (${entry.url}): ${errorMessage(err)}`);
      summary.unresolved++;
    }
  }

  onProgress?.({ phase: 'done', index: entries.length, total: entries.length });
  return summary;
}

/**
 * Fill in `git_diff` and the before/after file versions of every entry whose
 * change set passes the path filters. Reads only from existing mirrors.
 */
export async function enrichEntries(
  ctx: MirrorContext,
  entries: TestEntry[],
  options: EnrichOptions,
): Promise<EnrichSummary> {
  const { removeComments, filters, onProgress } = options;
  const summary: EnrichSummary = { enriched: 0, filtered: 0, skipped: 0 };

  for (const [index, entry] of entries.entries()) {
    onProgress?.({ phase: 'enrich', index, total: entries.length, url: entry.url, message: `Diffing ${entry.new_hash}` });

    const located = locateMirror(ctx, entry.url);
    if (!located.ok) {
      console.error(`No usable mirror for ${entry.url} (${located.reason}). Skipping.`);
      summary.skipped++;
      continue;
    }
    if (!entry.base_hash || !entry.new_hash) {
      console.warn(`Skipping entry for new hash '${entry.new_hash}': missing base or new hash.`);
      summary.skipped++;
      continue;
    }

    try {
      const { mirror } = located;
      const files = await changedFiles(ctx, mirror, entry.base_hash, entry.new_hash);

      if (!matchesFilters(files, filters)) {
        summary.filtered++;
        continue;
      }

      const content = await extractChangeSet(ctx, mirror, entry.base_hash, entry.new_hash, files, removeComments);
      entry.git_diff =
        options.nativeDiff && !removeComments
          ? await nativeDiff(ctx, mirror, entry.base_hash, entry.new_hash, files)
          : content.diff;
      entry.old_file_versions = toFileContents(content.before);
      entry.new_file_versions = toFileContents(content.after);
      summary.enriched++;
    } catch (err) {
      console.error(`Could not enrich entry for new hash '${entry.new_hash}' (${entry.url}): ${errorMessage(err)}`);
      summary.skipped++;
    }
  }

  onProgress?.({ phase: 'done', index: entries.length, total: entries.length });
  return summary;
}
