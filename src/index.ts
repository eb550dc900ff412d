/**
 * rfcomm-link
 *
 * Authenticated, resumable message framing between two peers over an
 * unreliable byte stream such as a Bluetooth RFCOMM channel.
 */

// Main session
export { LinkSession } from './session.js';

// Types
export type {
  LinkSessionOptions,
  LinkEvent,
  LinkEventHandler,
  LinkErrorKind,
  SequenceState,
} from './types.js';

export { Role, SessionState, isTransitionAllowed, isOpenState } from './link/state.js';
export { computeBackoff } from './link/backoff.js';
export { ReplayJournal, type JournalEntry } from './link/journal.js';

// Configuration and logging
export {
  DEFAULT_CONFIG,
  resolveConfig,
  validateConfig,
  loadConfig,
  type LinkConfig,
  type LinkConfigOverrides,
  type BackoffConfig,
  type ReconnectConfig,
} from './config.js';
export { Logger, createLogger, levelFromEnv, isLogLevel, type LogLevel } from './logger.js';

// Errors
export {
  LinkError,
  TransportError,
  FrameError,
  CryptoError,
  HandshakeError,
  TransferError,
  MalformedPayloadError,
  ok,
  err,
  type Result,
  type TransportErrorCode,
  type FrameErrorKind,
  type HandshakeFailure,
  type TransferFailure,
} from './errors.js';

// Submodules
export * from './codec/index.js';
export * from './crypto/index.js';
export * from './storage/index.js';
export * from './transport/index.js';
export * from './transfer/index.js';
