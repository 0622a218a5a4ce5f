/**
 * Media Classifier
 *
 * Extension lookup first, content sniffing of the leading bytes second.
 * Classification never throws: anything unreadable or unrecognised is 'unknown'.
 */

import { closeSync, openSync, readSync } from 'node:fs';
import { open } from 'node:fs/promises';
import path from 'node:path';
import { filetypeinfo } from 'magic-bytes.js';
import type { MediaKind } from './types';

export const VIDEO_EXTENSIONS: ReadonlySet<string> = new Set(['mp4', 'webm', 'mov', 'mkv', 'avi']);
export const IMAGE_EXTENSIONS: ReadonlySet<string> = new Set(['jpg', 'jpeg', 'png', 'webp']);

/** Sidecar files some fetch tools write next to the media */
export const FORBIDDEN_EXTENSIONS: ReadonlySet<string> = new Set(['json', 'txt', 'log']);

/** How much of a file the content probe looks at */
export const SNIFF_BYTES = 8 * 1024;

/**
 * Lower-cased extension without the dot ('' when there is none)
 */
export function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function kindFromExtension(filePath: string): MediaKind {
  const ext = extensionOf(filePath);
  if (VIDEO_EXTENSIONS.has(ext)) return 'video';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  return 'unknown';
}

/**
 * Map a MIME type's top-level token to a kind
 */
export function kindFromMime(mime: string | undefined): MediaKind {
  if (!mime) return 'unknown';
  const top = mime.split('/')[0]?.toLowerCase();
  if (top === 'video') return 'video';
  if (top === 'image') return 'image';
  return 'unknown';
}

/**
 * Run the signature probe over a file prefix
 */
export function kindFromBytes(bytes: Uint8Array): MediaKind {
  if (bytes.length === 0) return 'unknown';

  for (const guess of filetypeinfo(bytes)) {
    const kind = kindFromMime(guess.mime);
    if (kind !== 'unknown') return kind;
  }
  return 'unknown';
}

/**
 * Would this file name survive the workspace scan?
 */
export function isPotentialMediaFile(fileName: string): boolean {
  if (fileName.startsWith('.')) return false;
  if (fileName.toLowerCase().includes('metadata')) return false;

  const ext = extensionOf(fileName);
  if (FORBIDDEN_EXTENSIONS.has(ext)) return false;
  return VIDEO_EXTENSIONS.has(ext) || IMAGE_EXTENSIONS.has(ext);
}

async function readPrefix(filePath: string): Promise<Uint8Array> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

function readPrefixSync(filePath: string): Uint8Array {
  const fd = openSync(filePath, 'r');
  try {
    const buffer = Buffer.alloc(SNIFF_BYTES);
    const bytesRead = readSync(fd, buffer, 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    closeSync(fd);
  }
}

/**
 * Classify a file without blocking the event loop
 */
export async function detectMediaKind(filePath: string): Promise<MediaKind> {
  const byExtension = kindFromExtension(filePath);
  if (byExtension !== 'unknown') return byExtension;

  try {
    return kindFromBytes(await readPrefix(filePath));
  } catch {
    // Unreadable counts as unrecognised
    return 'unknown';
  }
}

/**
 * Blocking variant of {@link detectMediaKind}
 */
export function detectMediaKindSync(filePath: string): MediaKind {
  const byExtension = kindFromExtension(filePath);
  if (byExtension !== 'unknown') return byExtension;

  try {
    return kindFromBytes(readPrefixSync(filePath));
  } catch {
    return 'unknown';
  }
}
