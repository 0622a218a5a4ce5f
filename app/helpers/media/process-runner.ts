/**
 * Process Runner
 *
 * Runs a fetch executable inside a fresh workspace and reports which
 * potential media files it left behind. The workspace is removed on every
 * failure; on success it belongs to the caller.
 */

import { type ChildProcess, spawn } from 'node:child_process';
import type { Dirent } from 'node:fs';
import { readdir } from 'node:fs/promises';
import path from 'node:path';
import type { Logger } from '@core';
import { FetchTimeoutError, FetchToolError, IoError, NoMediaFoundError } from './errors';
import { isPotentialMediaFile } from './media-kind';
import { type DownloadResult, type ProcessRunner, Workspace } from './types';

export const WORKSPACE_PREFIX = 'media-relay-';

/** Most stderr kept for error reports; older output is dropped */
export const STDERR_LIMIT = 64 * 1024;

export interface WorkspaceProcessRunnerOptions {
  /** Kill the tool after this long */
  timeoutMs: number;
  /** Parent directory for workspaces (OS temp dir when unset) */
  tempRoot?: string;
  logger: Logger;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keeps the last `limit` bytes written to a stream
 */
export class StderrTail {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;

    if (this.size > this.limit * 2) {
      this.compact();
    }
  }

  text(): string {
    this.compact();
    return Buffer.concat(this.chunks).toString('utf8');
  }

  private compact(): void {
    if (this.size <= this.limit) return;
    const tail = Buffer.concat(this.chunks).subarray(-this.limit);
    this.chunks = [tail];
    this.size = tail.length;
  }
}

export class WorkspaceProcessRunner implements ProcessRunner {
  private readonly timeoutMs: number;
  private readonly tempRoot?: string;
  private readonly logger: Logger;

  constructor(options: WorkspaceProcessRunnerOptions) {
    this.timeoutMs = options.timeoutMs;
    this.tempRoot = options.tempRoot;
    this.logger = options.logger;
  }

  async run(executable: string, args: readonly string[]): Promise<DownloadResult> {
    let workspace: Workspace;
    try {
      workspace = await Workspace.create(WORKSPACE_PREFIX, this.tempRoot);
    } catch (error) {
      throw new IoError(`failed to create workspace: ${describe(error)}`, { cause: error });
    }

    try {
      await this.execute(executable, args, workspace.path);
      const files = await this.scan(workspace.path);
      return { workspace, files };
    } catch (error) {
      await workspace.release().catch((releaseError: unknown) => {
        this.logger.warn('Failed to remove workspace', { workspace: workspace.path, error: describe(releaseError) });
      });
      throw error;
    }
  }

  private execute(executable: string, args: readonly string[], cwd: string): Promise<void> {
    const tool = path.basename(executable);

    this.logger.debug(`Running ${tool}`, { args, cwd });

    return new Promise<void>((resolve, reject) => {
      let child: ChildProcess;
      try {
        // Own process group, so a timeout also takes down helpers the tool started
        child = spawn(executable, args, { cwd, detached: true, stdio: ['ignore', 'ignore', 'pipe'] });
      } catch (error) {
        reject(new IoError(`failed to start ${tool}: ${describe(error)}`, { cause: error }));
        return;
      }

      const stderr = new StderrTail(STDERR_LIMIT);
      let settled = false;

      const finish = (error?: Error): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      // Settles without waiting for 'close': helpers holding stderr open would delay it
      const timer = setTimeout(() => {
        this.killGroup(child, tool);
        finish(new FetchTimeoutError(tool, this.timeoutMs));
      }, this.timeoutMs);

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      child.on('error', (error) => {
        finish(new IoError(`failed to start ${tool}: ${error.message}`, { cause: error }));
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          finish();
          return;
        }

        this.logger.debug(`${tool} exited unsuccessfully`, { code, signal });
        finish(new FetchToolError(tool, stderr.text().trim()));
      });
    });
  }

  private killGroup(child: ChildProcess, tool: string): void {
    if (child.pid === undefined) return;

    try {
      process.kill(-child.pid, 'SIGKILL');
    } catch (error) {
      // Group already gone; fall back to the direct child
      this.logger.debug(`Could not kill ${tool} process group`, { pid: child.pid, error: describe(error) });
      child.kill('SIGKILL');
    }
  }

  private async scan(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new IoError(`failed to read workspace: ${describe(error)}`, { cause: error });
    }

    const files = entries
      .filter((entry) => entry.isFile() && isPotentialMediaFile(entry.name))
      .map((entry) => path.join(dir, entry.name))
      .sort();

    if (files.length === 0) {
      this.logger.warn('Fetch produced no media files', {
        workspace: dir,
        listing: entries.map((entry) => entry.name),
      });
      throw new NoMediaFoundError();
    }

    return files;
  }
}
