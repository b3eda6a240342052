export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly attempts: number;

  constructor(url: string, message: string, options: { status?: number; attempts: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.url = url;
    this.status = options.status;
    this.attempts = options.attempts;
  }
}

export type DecodeKind = 'json' | 'html';

export class DecodeError extends Error {
  readonly url: string;
  readonly kind: DecodeKind;

  constructor(url: string, kind: DecodeKind, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'DecodeError';
    this.url = url;
    this.kind = kind;
  }
}

export class InvalidBoardUrlError extends Error {
  readonly source: string;
  readonly boardUrl: string;

  constructor(source: string, boardUrl: string, expected: string) {
    super(`Invalid ${source} board URL "${boardUrl}", expected ${expected}`);
    this.name = 'InvalidBoardUrlError';
    this.source = source;
    this.boardUrl = boardUrl;
  }
}

export interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
