export type PhotoFrameErrorCode =
  | 'NETWORK_ERROR'
  | 'PROTOCOL_ERROR'
  | 'DECODE_ERROR'
  | 'DISPLAY_ERROR';

/**
 * Base error for everything the frame raises on purpose
 */
export class PhotoFrameError extends Error {
  readonly code: PhotoFrameErrorCode;

  constructor(code: PhotoFrameErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Remote source unreachable, DNS failure or timeout. */
export class NetworkError extends PhotoFrameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('NETWORK_ERROR', message, options);
  }
}

/** Bad HTTP status or malformed payload. */
export class ProtocolError extends PhotoFrameError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super('PROTOCOL_ERROR', message, options);
    this.status = options?.status;
  }
}

/** Image bytes that are not a decodable image. */
export class DecodeError extends PhotoFrameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
  }
}

/** Render surface missing or failing. Fatal at startup. */
export class DisplayError extends PhotoFrameError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DISPLAY_ERROR', message, options);
  }
}

export type FetchError = NetworkError | ProtocolError | DecodeError;

export function isFetchError(error: unknown): error is FetchError {
  return (
    error instanceof NetworkError ||
    error instanceof ProtocolError ||
    error instanceof DecodeError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
