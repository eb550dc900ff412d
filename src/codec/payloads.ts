import { BinaryReader, BinaryWriter } from './binary.js';
import {
  HANDSHAKE_NONCE_SIZE,
  KEY_ID_SIZE,
  CONFIRM_TAG_SIZE,
  TRANSFER_ID_SIZE,
  MAX_MIME_LENGTH,
  TransferKind,
  type HelloPayload,
  type HelloAckPayload,
  type ChunkPayload,
  type ChunkAckPayload,
  type TransferAbortPayload,
} from './types.js';
import { MalformedPayloadError, type TransferFailure } from '../errors.js';

/** Wire codes for abort reasons, starting at 1 */
const ABORT_REASONS: readonly TransferFailure[] = ['Timeout', 'Malformed', 'TooLarge', 'Cancelled'];

function writeHelloFields(writer: BinaryWriter, hello: HelloPayload): BinaryWriter {
  if (hello.keyId.length !== KEY_ID_SIZE) {
    throw new Error(`Invalid keyId length: ${hello.keyId.length} != ${KEY_ID_SIZE}`);
  }
  if (hello.nonce.length !== HANDSHAKE_NONCE_SIZE) {
    throw new Error(`Invalid nonce length: ${hello.nonce.length} != ${HANDSHAKE_NONCE_SIZE}`);
  }
  return writer
    .u8(hello.version)
    .u8(hello.flags)
    .bytes(hello.keyId)
    .bytes(hello.nonce)
    .u64(hello.nextExpected)
    .u16(hello.keyExchange.length)
    .bytes(hello.keyExchange);
}

function readHelloFields(reader: BinaryReader): HelloPayload {
  const version = reader.u8();
  const flags = reader.u8();
  const keyId = reader.bytes(KEY_ID_SIZE);
  const nonce = reader.bytes(HANDSHAKE_NONCE_SIZE);
  const nextExpected = reader.u64();
  const keyExchange = reader.bytes(reader.u16());
  return { version, flags, keyId, nonce, nextExpected, keyExchange };
}

/**
 * HELLO: version(1) flags(1) keyId(8) nonce(16) nextExpected(8) kexLen(2) kex
 */
export function encodeHello(hello: HelloPayload): Uint8Array {
  return writeHelloFields(new BinaryWriter(), hello).finish();
}

export function decodeHello(data: Uint8Array): HelloPayload {
  const reader = new BinaryReader(data);
  const hello = readHelloFields(reader);
  reader.end();
  return hello;
}

/**
 * HELLO_ACK: HELLO fields followed by confirm(32)
 */
export function encodeHelloAck(ack: HelloAckPayload): Uint8Array {
  if (ack.confirm.length !== CONFIRM_TAG_SIZE) {
    throw new Error(`Invalid confirm tag length: ${ack.confirm.length}`);
  }
  return writeHelloFields(new BinaryWriter(), ack).bytes(ack.confirm).finish();
}

export function decodeHelloAck(data: Uint8Array): HelloAckPayload {
  const reader = new BinaryReader(data);
  const hello = readHelloFields(reader);
  const confirm = reader.bytes(CONFIRM_TAG_SIZE);
  reader.end();
  return { ...hello, confirm };
}

function toTransferKind(value: number): TransferKind {
  switch (value) {
    case TransferKind.MEDIA:
      return TransferKind.MEDIA;
    case TransferKind.TEXT:
      return TransferKind.TEXT;
    default:
      throw new MalformedPayloadError(`Unknown transfer kind: ${value}`);
  }
}

/**
 * DATA_CHUNK: transferId(8) index(4) total(4) kind(1) mimeLen(1) mime data
 */
export function encodeChunk(chunk: ChunkPayload): Uint8Array {
  if (chunk.transferId.length !== TRANSFER_ID_SIZE) {
    throw new Error(`Invalid transferId length: ${chunk.transferId.length}`);
  }
  if (chunk.mimeHint.length > MAX_MIME_LENGTH || !/^[\x20-\x7e]*$/.test(chunk.mimeHint)) {
    throw new Error(`Invalid MIME hint: ${chunk.mimeHint}`);
  }
  const mime = new Uint8Array(chunk.mimeHint.length);
  for (let i = 0; i < chunk.mimeHint.length; i++) {
    mime[i] = chunk.mimeHint.charCodeAt(i);
  }
  return new BinaryWriter()
    .bytes(chunk.transferId)
    .u32(chunk.index)
    .u32(chunk.total)
    .u8(chunk.kind)
    .u8(mime.length)
    .bytes(mime)
    .bytes(chunk.data)
    .finish();
}

export function decodeChunk(data: Uint8Array): ChunkPayload {
  const reader = new BinaryReader(data);
  const transferId = reader.bytes(TRANSFER_ID_SIZE);
  const index = reader.u32();
  const total = reader.u32();
  const kind = toTransferKind(reader.u8());
  const mimeHint = String.fromCharCode(...reader.bytes(reader.u8()));
  return { transferId, index, total, kind, mimeHint, data: reader.rest() };
}

/**
 * CHUNK_ACK: transferId(8) index(4)
 */
export function encodeChunkAck(ack: ChunkAckPayload): Uint8Array {
  return new BinaryWriter().bytes(ack.transferId).u32(ack.index).finish();
}

export function decodeChunkAck(data: Uint8Array): ChunkAckPayload {
  const reader = new BinaryReader(data);
  const transferId = reader.bytes(TRANSFER_ID_SIZE);
  const index = reader.u32();
  reader.end();
  return { transferId, index };
}

/**
 * TRANSFER_ABORT: transferId(8) reason(1)
 */
export function encodeTransferAbort(abort: TransferAbortPayload): Uint8Array {
  return new BinaryWriter()
    .bytes(abort.transferId)
    .u8(ABORT_REASONS.indexOf(abort.reason) + 1)
    .finish();
}

export function decodeTransferAbort(data: Uint8Array): TransferAbortPayload {
  const reader = new BinaryReader(data);
  const transferId = reader.bytes(TRANSFER_ID_SIZE);
  const code = reader.u8();
  reader.end();
  const reason = ABORT_REASONS[code - 1];
  if (reason === undefined) {
    throw new MalformedPayloadError(`Unknown abort reason: ${code}`);
  }
  return { transferId, reason };
}

/**
 * PING / PONG: the sender's next expected sequence, acknowledging everything before it
 */
export function encodeHeartbeat(nextExpected: number): Uint8Array {
  return new BinaryWriter().u64(nextExpected).finish();
}

export function decodeHeartbeat(data: Uint8Array): number {
  const reader = new BinaryReader(data);
  const nextExpected = reader.u64();
  reader.end();
  return nextExpected;
}
