import fs from 'node:fs';
import path from 'node:path';
import { cloneMirror, isBareRepository, remoteUpdate } from './git.js';
import type { MirrorContext, MirrorRepository, MirrorResult, RepoIdentity } from './types.js';

const HTTPS_URL = /^https?:\/\/([^/]+)\/([^/]+)\/([^/#?]+)/i;
const SCP_URL = /^[\w.-]+@([^:]+):([^/]+)\/([^/#?]+)/;

/**
 * Extract host, owner and repository name from an https or scp-style remote.
 * Trailing path segments (`/tree/main`, `/commit/<sha>`) and `.git` are dropped.
 */
export function parseRepoUrl(url: string): RepoIdentity | undefined {
  const match = HTTPS_URL.exec(url.trim()) ?? SCP_URL.exec(url.trim());
  if (!match || !match[1] || !match[2] || !match[3]) return undefined;
  const name = match[3].replace(/\.git$/i, '');
  if (!name) return undefined;
  return { host: match[1].toLowerCase(), owner: match[2], name };
}

export function repoKey(identity: RepoIdentity): string {
  return `${identity.host}/${identity.owner}/${identity.name}`;
}

export function mirrorPathFor(reposDir: string, identity: RepoIdentity): string {
  return path.resolve(reposDir, identity.host, identity.owner, identity.name);
}

export function cloneUrlFor(identity: RepoIdentity): string {
  return `https://${identity.host}/${identity.owner}/${identity.name}.git`;
}

function toMirror(ctx: MirrorContext, url: string, identity: RepoIdentity): MirrorRepository {
  return { ...identity, url, path: mirrorPathFor(ctx.reposDir, identity) };
}

/**
 * Make sure a bare mirror of `url` exists and is as fresh as the remote allows.
 * A failed clone blacklists the repository for the rest of the run; a failed
 * refresh keeps the stale mirror.
 */
export async function ensureMirror(ctx: MirrorContext, url: string): Promise<MirrorResult> {
  const identity = parseRepoUrl(url);
  if (!identity) {
    console.warn(`Could not parse repository URL: ${url}`);
    return { ok: false, url, reason: 'unparseable-url' };
  }

  const key = repoKey(identity);
  if (ctx.failedRepositories.has(key)) {
    return { ok: false, url, reason: 'failed-repository' };
  }

  const mirror = toMirror(ctx, url, identity);

  if (!fs.existsSync(mirror.path)) {
    fs.mkdirSync(path.dirname(mirror.path), { recursive: true });
    const result = await cloneMirror(ctx.runner, cloneUrlFor(identity), mirror.path);
    if (result.exitCode !== 0) {
      console.error(`Couldn't clone repo ${url}, status: ${result.exitCode}. ${result.stderr.trim()}`);
      ctx.failedRepositories.add(key);
      return { ok: false, url, reason: 'clone-failed' };
    }
    return { ok: true, mirror };
  }

  const result = await remoteUpdate(ctx.runner, mirror.path);
  if (result.exitCode !== 0) {
    console.warn(`WARNING: Couldn't update repo ${url}, status: ${result.exitCode}. Using the existing mirror.`);
  }
  return { ok: true, mirror };
}

/** Find an existing mirror without touching the network. */
export function locateMirror(ctx: MirrorContext, url: string): MirrorResult {
  const identity = parseRepoUrl(url);
  if (!identity) return { ok: false, url, reason: 'unparseable-url' };
  if (ctx.failedRepositories.has(repoKey(identity))) {
    return { ok: false, url, reason: 'failed-repository' };
  }
  const mirror = toMirror(ctx, url, identity);
  if (!isBareRepository(mirror.path)) return { ok: false, url, reason: 'not-mirrored' };
  return { ok: true, mirror };
}
