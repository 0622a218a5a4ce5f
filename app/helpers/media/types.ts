/**
 * Shared types for the media acquisition pipeline
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * What a downloaded file is, judged by extension or content
 */
export type MediaKind = 'video' | 'image' | 'unknown';

export type PlatformName = 'instagram' | 'youtube' | 'twitter' | 'tiktok';

/**
 * A private temporary directory owned by one request.
 *
 * Whoever holds the workspace last must call `release()`; calling it
 * again is a no-op.
 */
export class Workspace {
  private released = false;

  private constructor(readonly path: string) {}

  static async create(prefix: string, tempRoot: string = tmpdir()): Promise<Workspace> {
    const dir = await mkdtemp(path.join(tempRoot, prefix));
    return new Workspace(dir);
  }

  get isReleased(): boolean {
    return this.released;
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;
    await rm(this.path, { recursive: true, force: true });
  }
}

/**
 * Files a fetch left behind. Every path lies inside `workspace.path`.
 */
export interface DownloadResult {
  workspace: Workspace;
  /** Absolute paths, sorted */
  files: string[];
}

export interface MediaCandidate {
  path: string;
  kind: MediaKind;
}

/**
 * One platform binding: which links it recognises and how it fetches them
 */
export interface Handler {
  readonly name: PlatformName;
  readonly pattern: RegExp;
  /** 0 for the whole match, n for the n-th capture group */
  readonly captureGroup: number;
  fetch(target: string): Promise<DownloadResult>;
}

export interface DispatchMatch {
  handler: Handler;
  /** Text handed to the fetch tool */
  target: string;
}

/**
 * Sends a selected file wherever the request came from
 */
export interface MediaDelivery {
  deliver(kind: MediaKind, filePath: string): Promise<void>;
}

/**
 * Runs a fetch executable inside a fresh workspace
 */
export interface ProcessRunner {
  run(executable: string, args: readonly string[]): Promise<DownloadResult>;
}
