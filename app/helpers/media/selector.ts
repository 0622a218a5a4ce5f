/**
 * Result Selector
 *
 * Picks the single file to deliver out of a fetch's output. Files are
 * checked and classified concurrently; the final sort makes the winner
 * independent of completion order.
 */

import { stat } from 'node:fs/promises';
import { NoMediaFoundError } from './errors';
import { detectMediaKind } from './media-kind';
import type { MediaCandidate, MediaKind } from './types';

export const MAX_CLASSIFY_CONCURRENCY = 8;

const KIND_RANK: Record<MediaKind, number> = {
  video: 0,
  image: 1,
  unknown: 2,
};

export interface SelectOptions {
  /** Classifier override for tests */
  classify?: (filePath: string) => Promise<MediaKind>;
  concurrency?: number;
}

/**
 * Total order: kind preference, then path
 */
export function compareCandidates(a: MediaCandidate, b: MediaCandidate): number {
  const byKind = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (byKind !== 0) return byKind;
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

async function inspect(
  filePath: string,
  classify: (filePath: string) => Promise<MediaKind>,
): Promise<MediaCandidate | null> {
  try {
    const info = await stat(filePath);
    if (!info.isFile() || info.size === 0) return null;
  } catch {
    // Vanished or unreadable
    return null;
  }

  const kind = await classify(filePath);
  return kind === 'unknown' ? null : { path: filePath, kind };
}

/**
 * Run `task` over `items` with at most `limit` in flight
 */
async function mapConcurrent<T, R>(items: readonly T[], limit: number, task: (item: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      results[index] = await task(item);
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);
  return results;
}

export async function selectMedia(files: readonly string[], options: SelectOptions = {}): Promise<MediaCandidate> {
  if (files.length === 0) {
    throw new NoMediaFoundError();
  }

  const classify = options.classify ?? detectMediaKind;
  const limit = Math.max(1, options.concurrency ?? MAX_CLASSIFY_CONCURRENCY);

  const inspected = await mapConcurrent(files, limit, (file) => inspect(file, classify));
  const candidates = inspected.filter((candidate): candidate is MediaCandidate => candidate !== null);

  const [winner] = candidates.sort(compareCandidates);
  if (!winner) {
    throw new NoMediaFoundError();
  }
  return winner;
}
