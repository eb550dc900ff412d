import { describe, it, expect } from 'vitest';
import {
  TransferKind,
  HELLO_FLAG_RESUME,
  HELLO_FLAG_WARM,
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
  BinaryReader,
  BinaryWriter,
  type HelloPayload,
} from '../src/codec/index.js';
import { MalformedPayloadError } from '../src/errors.js';
import { bytesToHex, hexToBytes } from '../src/crypto/index.js';

function sampleHello(): HelloPayload {
  return {
    version: 1,
    flags: HELLO_FLAG_RESUME | HELLO_FLAG_WARM,
    keyId: new Uint8Array(8).fill(0x11),
    nonce: new Uint8Array(16).fill(0x22),
    nextExpected: 7,
    keyExchange: new Uint8Array([1, 2, 3]),
  };
}

describe('Payload Codecs', () => {
  describe('HELLO', () => {
    it('should lay out fields in order', () => {
      const encoded = encodeHello(sampleHello());

      // version, flags, keyId(8), nonce(16), nextExpected(8), kexLen(2), kex(3)
      expect(encoded.length).toBe(1 + 1 + 8 + 16 + 8 + 2 + 3);
      expect(encoded[0]).toBe(1);
      expect(encoded[1]).toBe(0b11);
      expect(bytesToHex(encoded.subarray(26, 34))).toBe('0000000000000007');
      expect(bytesToHex(encoded.subarray(34))).toBe('0003010203');
    });

    it('should decode what it encodes', () => {
      const decoded = decodeHello(encodeHello(sampleHello()));
      expect(decoded.flags).toBe(HELLO_FLAG_RESUME | HELLO_FLAG_WARM);
      expect(decoded.nextExpected).toBe(7);
      expect(bytesToHex(decoded.keyId)).toBe('1111111111111111');
      expect(Array.from(decoded.keyExchange)).toEqual([1, 2, 3]);
    });

    it('should reject trailing bytes', () => {
      const encoded = encodeHello(sampleHello());
      const padded = new Uint8Array(encoded.length + 1);
      padded.set(encoded);
      expect(() => decodeHello(padded)).toThrow('Unexpected trailing bytes: 1');
    });

    it('should reject a truncated payload', () => {
      const encoded = encodeHello(sampleHello());
      expect(() => decodeHello(encoded.subarray(0, 20))).toThrow(MalformedPayloadError);
    });

    it('should refuse a key id of the wrong size', () => {
      expect(() => encodeHello({ ...sampleHello(), keyId: new Uint8Array(4) })).toThrow(
        'Invalid keyId length: 4 != 8'
      );
    });
  });

  describe('HELLO_ACK', () => {
    it('should carry the confirm tag after the hello fields', () => {
      const confirm = new Uint8Array(32).fill(0xee);
      const encoded = encodeHelloAck({ ...sampleHello(), confirm });
      const decoded = decodeHelloAck(encoded);

      expect(bytesToHex(decoded.confirm)).toBe('ee'.repeat(32));
      expect(decoded.nextExpected).toBe(7);
      expect(() => decodeHello(encoded)).toThrow(MalformedPayloadError);
    });

    it('should refuse a short confirm tag', () => {
      expect(() => encodeHelloAck({ ...sampleHello(), confirm: new Uint8Array(31) })).toThrow(
        'Invalid confirm tag length: 31'
      );
    });
  });

  describe('DATA_CHUNK', () => {
    const transferId = hexToBytes('0102030405060708');

    it('should encode metadata ahead of the data', () => {
      const encoded = encodeChunk({
        transferId,
        index: 2,
        total: 8,
        kind: TransferKind.MEDIA,
        mimeHint: 'image/png',
        data: new Uint8Array([0xaa, 0xbb]),
      });

      expect(bytesToHex(encoded.subarray(0, 8))).toBe('0102030405060708');
      expect(bytesToHex(encoded.subarray(8, 16))).toBe('0000000200000008');
      expect(encoded[16]).toBe(TransferKind.MEDIA);
      expect(encoded[17]).toBe(9);

      const decoded = decodeChunk(encoded);
      expect(decoded.index).toBe(2);
      expect(decoded.total).toBe(8);
      expect(decoded.kind).toBe(TransferKind.MEDIA);
      expect(decoded.mimeHint).toBe('image/png');
      expect(Array.from(decoded.data)).toEqual([0xaa, 0xbb]);
    });

    it('should allow an empty data section', () => {
      const decoded = decodeChunk(
        encodeChunk({ transferId, index: 0, total: 1, kind: TransferKind.TEXT, mimeHint: '', data: new Uint8Array(0) })
      );
      expect(decoded.kind).toBe(TransferKind.TEXT);
      expect(decoded.data.length).toBe(0);
    });

    it('should reject an unknown transfer kind', () => {
      const encoded = encodeChunk({
        transferId,
        index: 0,
        total: 1,
        kind: TransferKind.MEDIA,
        mimeHint: '',
        data: new Uint8Array(0),
      });
      encoded[16] = 0x09;
      expect(() => decodeChunk(encoded)).toThrow('Unknown transfer kind: 9');
    });

    it('should refuse a MIME hint outside printable ASCII', () => {
      expect(() =>
        encodeChunk({ transferId, index: 0, total: 1, kind: TransferKind.MEDIA, mimeHint: 'image/pég', data: new Uint8Array(0) })
      ).toThrow('Invalid MIME hint');
    });
  });

  describe('CHUNK_ACK and heartbeat', () => {
    it('should round-trip a chunk acknowledgement', () => {
      const transferId = hexToBytes('a1a2a3a4a5a6a7a8');
      const decoded = decodeChunkAck(encodeChunkAck({ transferId, index: 5 }));
      expect(bytesToHex(decoded.transferId)).toBe('a1a2a3a4a5a6a7a8');
      expect(decoded.index).toBe(5);
    });

    it('should carry the next expected sequence as a u64', () => {
      const encoded = encodeHeartbeat(300);
      expect(bytesToHex(encoded)).toBe('000000000000012c');
      expect(decodeHeartbeat(encoded)).toBe(300);
      expect(() => decodeHeartbeat(encoded.subarray(0, 4))).toThrow(MalformedPayloadError);
    });
  });

  describe('TRANSFER_ABORT', () => {
    it('should follow the transfer id with a reason code', () => {
      const encoded = encodeTransferAbort({ transferId: hexToBytes('a1a2a3a4a5a6a7a8'), reason: 'TooLarge' });
      expect(bytesToHex(encoded)).toBe('a1a2a3a4a5a6a7a803');

      const decoded = decodeTransferAbort(hexToBytes('a1a2a3a4a5a6a7a801'));
      expect(bytesToHex(decoded.transferId)).toBe('a1a2a3a4a5a6a7a8');
      expect(decoded.reason).toBe('Timeout');
    });

    it('should reject an unknown reason code', () => {
      expect(() => decodeTransferAbort(hexToBytes('a1a2a3a4a5a6a7a800'))).toThrow('Unknown abort reason: 0');
      expect(() => decodeTransferAbort(hexToBytes('a1a2a3a4a5a6a7a805'))).toThrow('Unknown abort reason: 5');
    });
  });

  describe('BinaryReader / BinaryWriter', () => {
    it('should refuse values outside the safe integer range', () => {
      expect(() => new BinaryWriter().u64(-1)).toThrow('Value out of u64 range: -1');
      const reader = new BinaryReader(hexToBytes('ffffffffffffffff'));
      expect(() => reader.u64()).toThrow(MalformedPayloadError);
    });

    it('should track remaining bytes', () => {
      const reader = new BinaryReader(new BinaryWriter().u16(0x0102).u32(3).finish());
      expect(reader.u16()).toBe(0x0102);
      expect(reader.remaining).toBe(4);
      expect(reader.u32()).toBe(3);
      expect(() => reader.end()).not.toThrow();
    });
  });
});
