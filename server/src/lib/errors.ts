export type StreamErrorCode =
  | 'SESSION_EXISTS'
  | 'SESSION_FULL'
  | 'SESSION_CLOSED'
  | 'TRANSPORT_CLOSED'
  | 'INVALID_FRAME';

export class StreamError extends Error {
  readonly code: StreamErrorCode;

  constructor(code: StreamErrorCode, message: string = code) {
    super(message);
    this.name = 'StreamError';
    this.code = code;
  }
}

/** Raised once at startup when the capture device cannot be opened. */
export class CaptureOpenError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CaptureOpenError';
  }
}

export class PublisherFailureError extends Error {
  readonly consecutiveFailures: number;

  constructor(consecutiveFailures: number, options?: { cause?: unknown }) {
    super(`Publisher gave up after ${consecutiveFailures} consecutive failed cycles`, options);
    this.name = 'PublisherFailureError';
    this.consecutiveFailures = consecutiveFailures;
  }
}

export function isStreamError(error: unknown, code?: StreamErrorCode): error is StreamError {
  return error instanceof StreamError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
