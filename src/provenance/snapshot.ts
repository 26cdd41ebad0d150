import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { PENDING_SNAPSHOT_FILE } from '../utils/paths.js';
import { describeError } from '../utils/errors.js';
import { warn } from '../utils/logger.js';

const SnapshotSchema = z.object({
  repoKey: z.string(),
  promptIds: z.array(z.string()),
  renderedAt: z.string(),
});

/** Prompt ids handed from prepare-commit-msg to post-commit. */
export type PendingSnapshot = z.infer<typeof SnapshotSchema>;

function snapshotPath(gitDir: string): string {
  return path.join(gitDir, PENDING_SNAPSHOT_FILE);
}

export async function writeSnapshot(
  gitDir: string,
  snapshot: PendingSnapshot,
): Promise<void> {
  await fs.writeFile(snapshotPath(gitDir), JSON.stringify(snapshot, null, 2), 'utf-8');
}

/** Null when no snapshot is pending or the file cannot be used. */
export async function readSnapshot(gitDir: string): Promise<PendingSnapshot | null> {
  let raw: string;
  try {
    raw = await fs.readFile(snapshotPath(gitDir), 'utf-8');
  } catch {
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    warn(`Ignoring unreadable ${PENDING_SNAPSHOT_FILE}: ${describeError(err)}`);
    return null;
  }

  const result = SnapshotSchema.safeParse(json);
  if (!result.success) {
    warn(`Ignoring malformed ${PENDING_SNAPSHOT_FILE}`);
    return null;
  }
  return result.data;
}

export async function clearSnapshot(gitDir: string): Promise<void> {
  await fs.rm(snapshotPath(gitDir), { force: true });
}
