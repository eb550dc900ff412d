import { sha256 } from '@noble/hashes/sha256';
import {
  PROTOCOL_VERSION,
  FRAME_MAGIC,
  HEADER_SIZE,
  DIGEST_SIZE,
  MAX_FRAME_PAYLOAD,
  isFrameType,
  type FrameType,
  type Frame,
  type FrameHeader,
} from './types.js';
import { FrameError, ok, err, type Result } from '../errors.js';
import { constantTimeEqual } from '../crypto/utils.js';

/**
 * Encode a frame to its wire form
 *
 * Binary layout (48 + payload bytes):
 * [0-1]    magic       (2 bytes, "RL")
 * [2]      version     (1 byte)
 * [3]      type        (1 byte)
 * [4-11]   sequence    (8 bytes, big-endian)
 * [12-15]  length      (4 bytes, big-endian)
 * [16..]   payload     (length bytes)
 * [..+32]  digest      (SHA-256 over all preceding bytes)
 */
export function encodeFrame(
  type: FrameType,
  sequence: number,
  payload: Uint8Array,
  maxPayload: number = MAX_FRAME_PAYLOAD
): Uint8Array {
  if (payload.length > maxPayload) {
    throw new FrameError('Oversize', `Payload too large: ${payload.length} > ${maxPayload}`);
  }
  if (!Number.isSafeInteger(sequence) || sequence < 0) {
    throw new RangeError(`Invalid sequence: ${sequence}`);
  }

  const bodyLength = HEADER_SIZE + payload.length;
  const buffer = new Uint8Array(bodyLength + DIGEST_SIZE);
  const view = new DataView(buffer.buffer);

  buffer.set(FRAME_MAGIC, 0);
  view.setUint8(2, PROTOCOL_VERSION);
  view.setUint8(3, type);
  view.setBigUint64(4, BigInt(sequence));
  view.setUint32(12, payload.length);
  buffer.set(payload, HEADER_SIZE);
  buffer.set(sha256(buffer.subarray(0, bodyLength)), bodyLength);

  return buffer;
}

/**
 * Read the fixed header without touching the payload.
 * Returns null when fewer than HEADER_SIZE bytes are available.
 */
export function readFrameHeader(bytes: Uint8Array): FrameHeader | null {
  if (bytes.length < HEADER_SIZE) {
    return null;
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, HEADER_SIZE);
  const sequence = view.getBigUint64(4);
  return {
    version: view.getUint8(2),
    type: view.getUint8(3),
    // Sequences beyond the safe range are never produced; clamp so they fail the sequence check
    sequence: sequence > BigInt(Number.MAX_SAFE_INTEGER) ? Number.MAX_SAFE_INTEGER : Number(sequence),
    length: view.getUint32(12),
  };
}

export function hasFrameMagic(bytes: Uint8Array, offset = 0): boolean {
  return (
    bytes.length >= offset + FRAME_MAGIC.length &&
    bytes[offset] === FRAME_MAGIC[0] &&
    bytes[offset + 1] === FRAME_MAGIC[1]
  );
}

/**
 * Offset of the next frame magic at or after `from`, or -1
 */
export function findFrameMagic(bytes: Uint8Array, from = 0): number {
  for (let i = from; i + FRAME_MAGIC.length <= bytes.length; i++) {
    if (hasFrameMagic(bytes, i)) {
      return i;
    }
  }
  return -1;
}

/**
 * Total wire size of a frame with the given payload length
 */
export function frameSize(payloadLength: number): number {
  return HEADER_SIZE + payloadLength + DIGEST_SIZE;
}

/**
 * Decode and verify one complete frame. Pure: never throws, never retains input.
 */
export function decodeFrame(
  bytes: Uint8Array,
  maxPayload: number = MAX_FRAME_PAYLOAD
): Result<Frame, FrameError> {
  const header = readFrameHeader(bytes);
  if (!header || bytes.length < HEADER_SIZE + DIGEST_SIZE) {
    return err(new FrameError('LengthMismatch', `Frame too short: ${bytes.length} bytes`));
  }

  if (header.length > maxPayload) {
    return err(new FrameError('Oversize', `Declared payload too large: ${header.length} > ${maxPayload}`));
  }

  const bodyLength = bytes.length - DIGEST_SIZE;
  const expected = sha256(bytes.subarray(0, bodyLength));
  if (!constantTimeEqual(expected, bytes.subarray(bodyLength))) {
    return err(new FrameError('BadDigest', 'Frame digest mismatch'));
  }

  if (!hasFrameMagic(bytes)) {
    return err(new FrameError('BadMagic', 'Frame magic mismatch'));
  }

  if (header.version !== PROTOCOL_VERSION) {
    return err(new FrameError('UnsupportedVersion', `Unsupported protocol version: ${header.version}`));
  }

  if (!isFrameType(header.type)) {
    return err(new FrameError('UnknownType', `Unknown frame type: 0x${header.type.toString(16)}`));
  }

  if (header.length !== bodyLength - HEADER_SIZE) {
    return err(
      new FrameError(
        'LengthMismatch',
        `Declared length ${header.length} != actual ${bodyLength - HEADER_SIZE}`
      )
    );
  }

  return ok({
    type: header.type,
    sequence: header.sequence,
    payload: bytes.slice(HEADER_SIZE, bodyLength),
  });
}
