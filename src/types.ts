import type { LinkConfigOverrides } from './config.js';
import type { KeyAgreement } from './crypto/keys.js';
import type { LinkError } from './errors.js';
import type { Role, SessionState } from './link/state.js';
import type { Logger } from './logger.js';
import type { KeyStore } from './storage/adapter.js';
import type { StreamFactory } from './transport/stream.js';

/**
 * Configuration for LinkSession
 */
export interface LinkSessionOptions {
  role: Role;
  /** Builds a fresh byte stream for every connection attempt */
  streams: StreamFactory;
  /** Per-peer key persistence (defaults to in-memory SQLite) */
  keyStore?: KeyStore;
  /** Key establishment for fresh keys (defaults to X25519) */
  agreement?: KeyAgreement;
  config?: LinkConfigOverrides;
  logger?: Logger;
}

export type LinkErrorKind =
  | 'TransportError'
  | 'FrameError'
  | 'CryptoError'
  | 'HandshakeError'
  | 'TransferError'
  | 'LinkError';

/**
 * Everything the application hears from a session
 */
export type LinkEvent =
  | { type: 'message'; text: string }
  | { type: 'media'; bytes: Uint8Array; mimeHint: string; transferId: string }
  | { type: 'state'; from: SessionState; to: SessionState }
  | {
      type: 'error';
      kind: LinkErrorKind;
      detail: string;
      error: LinkError;
      /** The session stopped because of this error */
      fatal: boolean;
    };

export type LinkEventHandler = (event: LinkEvent) => void;

export interface SequenceState {
  /** Next sequence we will send */
  sendSeq: number;
  /** Next sequence we expect from the peer */
  recvSeq: number;
  /** Oldest sequence we can still replay */
  journalStart: number;
  /** Frames held for replay */
  journaled: number;
}
