/**
 * Result selector tests
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { NoMediaFoundError } from '../../app/helpers/media/errors';
import { kindFromExtension } from '../../app/helpers/media/media-kind';
import { compareCandidates, selectMedia } from '../../app/helpers/media/selector';
import type { MediaKind } from '../../app/helpers/media/types';

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) return [[...items]];
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest]),
  );
}

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('selectMedia()', () => {
  let dir: string;

  const file = async (name: string, content = 'data'): Promise<string> => {
    const filePath = path.join(dir, name);
    await writeFile(filePath, content);
    return filePath;
  };

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'selector-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('should prefer video over image', async () => {
    const image = await file('a.jpg');
    const video = await file('b.mp4');

    expect(await selectMedia([image, video])).toEqual({ path: video, kind: 'video' });
  });

  test('should break ties by path', async () => {
    const second = await file('b.mp4');
    const first = await file('a.webm');

    expect(await selectMedia([second, first])).toEqual({ path: first, kind: 'video' });
  });

  test('should pick the same file whatever the concurrency', async () => {
    const files = await Promise.all(['c.png', 'b.mp4', 'a.jpg', 'd.mov'].map((name) => file(name)));

    const serial = await selectMedia(files, { concurrency: 1 });
    const parallel = await selectMedia(files, { concurrency: 8 });

    expect(serial).toEqual({ path: path.join(dir, 'b.mp4'), kind: 'video' });
    expect(parallel).toEqual(serial);
  });

  test('should pick the same file whatever order the classifications finish in', async () => {
    const files = await Promise.all(['a.jpg', 'b.mp4', 'c.png', 'd.webm'].map((name) => file(name)));
    const orders = permutations(files);
    expect(orders).toHaveLength(24);

    for (const order of orders) {
      // Files listed later finish first
      const classify = async (filePath: string): Promise<MediaKind> => {
        await sleep((order.length - order.indexOf(filePath)) * 2);
        return kindFromExtension(filePath);
      };

      expect(await selectMedia(order, { classify })).toEqual({ path: path.join(dir, 'b.mp4'), kind: 'video' });
    }
  });

  test('should skip empty and missing files', async () => {
    const empty = await file('a.mp4', '');
    const missing = path.join(dir, 'b.mp4');
    const image = await file('c.png');

    expect(await selectMedia([empty, missing, image])).toEqual({ path: image, kind: 'image' });
  });

  test('should use the classifier it is given', async () => {
    const blob = await file('download.bin');
    const classify = vi.fn(async (): Promise<MediaKind> => 'video');

    expect(await selectMedia([blob], { classify })).toEqual({ path: blob, kind: 'video' });
    expect(classify).toHaveBeenCalledWith(blob);
  });

  test('should fail when nothing is usable', async () => {
    const unknown = await file('notes.bin', 'plain text');

    await expect(selectMedia([])).rejects.toBeInstanceOf(NoMediaFoundError);
    await expect(selectMedia([unknown])).rejects.toBeInstanceOf(NoMediaFoundError);
  });
});

describe('compareCandidates()', () => {
  test('should order by kind, then path', () => {
    const sorted = [
      { path: '/w/b.jpg', kind: 'image' as const },
      { path: '/w/z.mp4', kind: 'video' as const },
      { path: '/w/a.jpg', kind: 'image' as const },
    ].sort(compareCandidates);

    expect(sorted.map((c) => c.path)).toEqual(['/w/z.mp4', '/w/a.jpg', '/w/b.jpg']);
  });
});
