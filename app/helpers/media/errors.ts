/**
 * Media pipeline errors
 *
 * Every failure that leaves the pipeline is a MediaError; `code` tells
 * them apart without instanceof chains.
 */

export type MediaErrorCode =
  | 'io'
  | 'fetch_tool'
  | 'fetch_timeout'
  | 'no_media'
  | 'unknown_kind'
  | 'transport'
  | 'unexpected';

export abstract class MediaError extends Error {
  abstract readonly code: MediaErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Filesystem or process-spawn failure */
export class IoError extends MediaError {
  readonly code = 'io';
}

/** The fetch executable exited unsuccessfully */
export class FetchToolError extends MediaError {
  readonly code = 'fetch_tool';

  constructor(
    readonly tool: string,
    readonly stderr: string,
  ) {
    super(stderr ? `${tool} failed: ${stderr}` : `${tool} failed`);
  }
}

export class FetchTimeoutError extends MediaError {
  readonly code = 'fetch_timeout';

  constructor(
    readonly tool: string,
    readonly timeoutMs: number,
  ) {
    super(`${tool} timed out after ${timeoutMs}ms`);
  }
}

export class NoMediaFoundError extends MediaError {
  readonly code = 'no_media';

  constructor() {
    super('no media found');
  }
}

export class UnknownMediaKindError extends MediaError {
  readonly code = 'unknown_kind';

  constructor(readonly filePath: string) {
    super(`refusing to send file of unknown kind: ${filePath}`);
  }
}

export class TransportError extends MediaError {
  readonly code = 'transport';
}

export class UnexpectedError extends MediaError {
  readonly code = 'unexpected';
}

/**
 * Bring any thrown value into the taxonomy
 */
export function toMediaError(error: unknown): MediaError {
  if (error instanceof MediaError) return error;
  if (error instanceof Error) return new UnexpectedError(error.message, { cause: error });
  return new UnexpectedError(String(error));
}

const USER_MESSAGES: Record<MediaErrorCode, string> = {
  io: 'Something went wrong on my side while fetching that.',
  fetch_tool: "Couldn't fetch that link. It may be private, deleted or region-locked.",
  fetch_timeout: 'That took too long to fetch, so I gave up.',
  no_media: 'No video or image found at that link.',
  unknown_kind: "Got a file but couldn't tell what it is.",
  transport: "Fetched it, but couldn't upload it here. It may be too large.",
  unexpected: 'Something unexpected went wrong with that link.',
};

/**
 * Short chat-facing text for an error
 */
export function userMessageFor(error: MediaError): string {
  return USER_MESSAGES[error.code];
}
