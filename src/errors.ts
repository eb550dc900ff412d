/**
 * Error taxonomy for the link.
 *
 * Transport and frame errors are recovered by the session's reconnect loop.
 * Crypto and handshake errors are surfaced to the application.
 * Transfer errors only cost the affected transfer.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export class LinkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LinkError';
  }
}

export type TransportErrorCode = 'Closed' | 'IOFault';

export class TransportError extends LinkError {
  constructor(
    public readonly code: TransportErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export type FrameErrorKind =
  | 'BadDigest'
  | 'LengthMismatch'
  | 'UnknownType'
  | 'Oversize'
  | 'BadMagic'
  | 'UnsupportedVersion'
  | 'SequenceGap'
  | 'UnexpectedFrame';

export class FrameError extends LinkError {
  constructor(
    public readonly kind: FrameErrorKind,
    message: string
  ) {
    super(message);
    this.name = 'FrameError';
  }
}

export class CryptoError extends LinkError {
  public readonly kind = 'AuthFailure' as const;

  constructor(message: string) {
    super(message);
    this.name = 'CryptoError';
  }
}

export type HandshakeFailure =
  | 'Timeout'
  | 'VersionMismatch'
  | 'Malformed'
  | 'KeyMismatch'
  | 'ResumeMismatch'
  | 'Unexpected';

export class HandshakeError extends LinkError {
  constructor(
    public readonly reason: HandshakeFailure,
    message: string
  ) {
    super(message);
    this.name = 'HandshakeError';
  }
}

export type TransferFailure = 'Timeout' | 'Malformed' | 'TooLarge' | 'Cancelled';

export class TransferError extends LinkError {
  constructor(
    public readonly reason: TransferFailure,
    message: string,
    public readonly transferId?: string
  ) {
    super(message);
    this.name = 'TransferError';
  }
}

/**
 * Raised by payload decoders when a frame body is shorter than its layout or
 * internally inconsistent. Callers translate it into the error class of the
 * layer that owns the payload.
 */
export class MalformedPayloadError extends LinkError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
