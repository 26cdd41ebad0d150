import fs from 'node:fs';
import path from 'node:path';
import { gitAt } from '../git/client.js';
import { ResolutionError, describeError } from '../utils/errors.js';
import { normalizeKey } from '../utils/paths.js';
import { debug } from '../utils/logger.js';

/**
 * Resolve symlinks for as much of `p` as exists on disk. The part of the path
 * that does not exist yet (a file about to be written) is kept verbatim.
 */
export function canonicalPath(p: string): string {
  const absolute = normalizeKey(p);
  const missing: string[] = [];
  let current = absolute;

  for (;;) {
    try {
      const real = fs.realpathSync(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return absolute;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function nearestDirectory(p: string): string | null {
  let current = normalizeKey(p);
  for (;;) {
    try {
      return fs.statSync(current).isDirectory() ? current : path.dirname(current);
    } catch {
      const parent = path.dirname(current);
      if (parent === current) return null;
      current = parent;
    }
  }
}

/**
 * The canonical root of the git repository enclosing `p` (a file or a
 * directory). Throws ResolutionError when `p` is not inside a repository.
 */
export async function resolveRepoRoot(p: string): Promise<string> {
  const dir = nearestDirectory(p);
  if (!dir) throw new ResolutionError(p);

  let toplevel: string;
  try {
    toplevel = (await gitAt(dir).revparse(['--show-toplevel'])).trim();
  } catch (err) {
    debug(`git rev-parse failed in ${dir}: ${describeError(err)}`);
    throw new ResolutionError(p);
  }
  if (!toplevel) throw new ResolutionError(p);

  return canonicalPath(toplevel);
}

/**
 * Repository key for `p`: its git root, or the canonical directory itself
 * when `p` lies outside any repository.
 */
export async function resolveRepoKey(p: string): Promise<string> {
  try {
    return await resolveRepoRoot(p);
  } catch (err) {
    if (!(err instanceof ResolutionError)) throw err;
    const dir = nearestDirectory(p) ?? p;
    debug(`${p} is not in a git repository; keying by ${dir}`);
    return canonicalPath(dir);
  }
}
