import type { TransferFailure } from '../errors.js';

/**
 * Protocol version
 */
export const PROTOCOL_VERSION = 0x01;

/**
 * Frame magic ("RL"), marks a plausible frame boundary when scanning
 */
export const FRAME_MAGIC = new Uint8Array([0x52, 0x4c]);

/**
 * Frame types
 */
export enum FrameType {
  HELLO = 0x01,       // Host opens the handshake (unsealed)
  HELLO_ACK = 0x02,   // Client answers the handshake (unsealed)
  DATA_TEXT = 0x10,   // Single-frame UTF-8 text
  DATA_CHUNK = 0x11,  // One chunk of a transfer
  CHUNK_ACK = 0x12,   // Receipt of one chunk
  TRANSFER_ABORT = 0x13, // One side gave up on a transfer
  PING = 0x20,        // Heartbeat, carries the sender's next expected sequence
  PONG = 0x21,        // Heartbeat answer
  BYE = 0x30,         // Orderly close
}

const FRAME_TYPES = new Set<number>(
  Object.values(FrameType).filter((v): v is number => typeof v === 'number')
);

export function isFrameType(value: number): value is FrameType {
  return FRAME_TYPES.has(value);
}

/**
 * Header: magic(2) + version(1) + type(1) + sequence(8) + length(4) = 16 bytes
 */
export const HEADER_SIZE = 16;

/**
 * SHA-256 digest trailing every frame
 */
export const DIGEST_SIZE = 32;

/**
 * Largest chunk of application data carried by one DATA_CHUNK frame
 */
export const MAX_CHUNK_SIZE = 64 * 1024;

/**
 * Cap on the (sealed) payload of any frame: a full chunk plus room for
 * chunk metadata and the crypto envelope
 */
export const MAX_FRAME_PAYLOAD = MAX_CHUNK_SIZE + 1024;

/**
 * Largest frame on the wire
 */
export const MAX_FRAME_SIZE = HEADER_SIZE + MAX_FRAME_PAYLOAD + DIGEST_SIZE;

/**
 * Fixed frame header
 */
export interface FrameHeader {
  version: number;
  type: number;       // Raw byte; validated to FrameType by decodeFrame
  sequence: number;
  length: number;     // Declared payload length
}

/**
 * Decoded, digest-verified frame
 */
export interface Frame {
  type: FrameType;
  sequence: number;
  payload: Uint8Array;
}

/**
 * Handshake flags
 */
export const HELLO_FLAG_RESUME = 0b0000_0001;
export const HELLO_FLAG_WARM = 0b0000_0010;
export const HELLO_FLAG_ROTATE = 0b0000_0100;

export const HANDSHAKE_NONCE_SIZE = 16;
export const KEY_ID_SIZE = 8;
export const CONFIRM_TAG_SIZE = 32;

/**
 * HELLO payload (host -> client)
 */
export interface HelloPayload {
  version: number;
  flags: number;
  keyId: Uint8Array;        // 8 bytes, zeros when the host holds no key
  nonce: Uint8Array;        // 16 bytes
  nextExpected: number;     // Host's recvSeq
  keyExchange: Uint8Array;  // Host's key-agreement contribution
}

/**
 * HELLO_ACK payload (client -> host)
 */
export interface HelloAckPayload extends HelloPayload {
  confirm: Uint8Array;      // HMAC over the handshake under the agreed key
}

export enum TransferKind {
  MEDIA = 0x00,
  TEXT = 0x01,
}

export const TRANSFER_ID_SIZE = 8;
export const MAX_MIME_LENGTH = 255;

/**
 * DATA_CHUNK payload
 */
export interface ChunkPayload {
  transferId: Uint8Array;   // 8 bytes
  index: number;
  total: number;
  kind: TransferKind;
  mimeHint: string;
  data: Uint8Array;
}

/**
 * CHUNK_ACK payload
 */
export interface ChunkAckPayload {
  transferId: Uint8Array;
  index: number;
}

/**
 * TRANSFER_ABORT payload
 */
export interface TransferAbortPayload {
  transferId: Uint8Array;
  reason: TransferFailure;
}
