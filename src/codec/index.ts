export {
  PROTOCOL_VERSION,
  FRAME_MAGIC,
  FrameType,
  isFrameType,
  HEADER_SIZE,
  DIGEST_SIZE,
  MAX_CHUNK_SIZE,
  MAX_FRAME_PAYLOAD,
  MAX_FRAME_SIZE,
  HELLO_FLAG_RESUME,
  HELLO_FLAG_WARM,
  HELLO_FLAG_ROTATE,
  HANDSHAKE_NONCE_SIZE,
  KEY_ID_SIZE,
  CONFIRM_TAG_SIZE,
  TransferKind,
  TRANSFER_ID_SIZE,
  MAX_MIME_LENGTH,
  type Frame,
  type FrameHeader,
  type HelloPayload,
  type HelloAckPayload,
  type ChunkPayload,
  type ChunkAckPayload,
  type TransferAbortPayload,
} from './types.js';

export {
  encodeFrame,
  decodeFrame,
  readFrameHeader,
  hasFrameMagic,
  findFrameMagic,
  frameSize,
} from './frame.js';

export {
  encodeHello,
  decodeHello,
  encodeHelloAck,
  decodeHelloAck,
  encodeChunk,
  decodeChunk,
  encodeChunkAck,
  decodeChunkAck,
  encodeTransferAbort,
  decodeTransferAbort,
  encodeHeartbeat,
  decodeHeartbeat,
} from './payloads.js';

export { BinaryReader, BinaryWriter } from './binary.js';

export { StreamReassembler, type ReassemblyStep } from './reassembler.js';
