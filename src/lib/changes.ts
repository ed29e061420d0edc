import picomatch from 'picomatch';
import { diffNameOnly } from './git.js';
import type { MirrorContext, MirrorRepository } from './types.js';

/**
 * Paths that differ between two commits, in git's traversal order. Empty or
 * identical hashes mean there is nothing to compare and no git call is made.
 * A failing git command throws `GitCommandError`.
 */
export async function changedFiles(
  ctx: MirrorContext,
  mirror: MirrorRepository,
  from: string,
  to: string,
): Promise<string[]> {
  if (!from || !to) {
    console.warn(`Base hash ('${from}') or new hash ('${to}') is empty for ${mirror.url}.`);
    return [];
  }
  if (from === to) return [];
  return diffNameOnly(ctx.runner, mirror.path, from, to);
}

// Whole-path shell matching: `*` also crosses `/`, braces and a leading `!`
// are literal characters.
const GLOB_OPTIONS: picomatch.PicomatchOptions = {
  bash: true,
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
};

export function globMatches(filePath: string, pattern: string): boolean {
  return picomatch.isMatch(filePath, pattern, GLOB_OPTIONS);
}

/**
 * True when every path matches at least one pattern. No patterns accepts
 * anything; no paths with patterns is rejected.
 */
export function matchesFilters(paths: string[], patterns: string[]): boolean {
  if (patterns.length === 0) return true;
  if (paths.length === 0) return false;
  return paths.every((p) => patterns.some((pattern) => globMatches(p, pattern)));
}
