import path from 'node:path';
import os from 'node:os';

export const PROMPTRAIL_DIR =
  process.env.PROMPTRAIL_HOME ?? path.join(os.homedir(), '.promptrail');

export const PROMPTRAIL_DB_PATH = path.join(PROMPTRAIL_DIR, 'store.db');

export const PROMPTRAIL_CONFIG_PATH = path.join(PROMPTRAIL_DIR, 'config.yml');

// Written inside the repository's git dir between prepare-commit-msg and
// post-commit.
export const PENDING_SNAPSHOT_FILE = 'promptrail-pending.json';

/**
 * Normalize a filesystem path into the form used as a repository key:
 * absolute, without a trailing separator.
 */
export function normalizeKey(p: string): string {
  // path.resolve drops trailing separators (except for the filesystem root)
  return path.resolve(p);
}

/**
 * Express `filePath` relative to `root` when it lives inside it.
 * Returns null for paths outside the root.
 */
export function relativeToRoot(root: string, filePath: string): string | null {
  const rel = path.relative(root, filePath);
  if (!rel || rel.startsWith('..') || path.isAbsolute(rel)) {
    return null;
  }
  return rel.split(path.sep).join('/');
}
