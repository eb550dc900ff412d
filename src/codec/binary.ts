import { MalformedPayloadError } from '../errors.js';

/**
 * Sequential big-endian writer over a growable byte list
 */
export class BinaryWriter {
  private parts: Uint8Array[] = [];
  private size = 0;

  u8(value: number): this {
    return this.push(new Uint8Array([value & 0xff]));
  }

  u16(value: number): this {
    const buf = new Uint8Array(2);
    new DataView(buf.buffer).setUint16(0, value);
    return this.push(buf);
  }

  u32(value: number): this {
    const buf = new Uint8Array(4);
    new DataView(buf.buffer).setUint32(0, value);
    return this.push(buf);
  }

  /**
   * 64-bit unsigned; values are limited to the safe integer range
   */
  u64(value: number): this {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`Value out of u64 range: ${value}`);
    }
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setBigUint64(0, BigInt(value));
    return this.push(buf);
  }

  bytes(value: Uint8Array): this {
    return this.push(value);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const part of this.parts) {
      out.set(part, offset);
      offset += part.length;
    }
    return out;
  }

  private push(part: Uint8Array): this {
    this.parts.push(part);
    this.size += part.length;
    return this;
  }
}

/**
 * Sequential big-endian reader. Every read is bounds-checked and throws
 * MalformedPayloadError instead of reading past the end.
 */
export class BinaryReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  u8(): number {
    this.require(1);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(): number {
    this.require(2);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(): number {
    this.require(4);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  u64(): number {
    this.require(8);
    const value = this.view.getBigUint64(this.offset);
    this.offset += 8;
    if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new MalformedPayloadError(`u64 value exceeds safe integer range: ${value}`);
    }
    return Number(value);
  }

  bytes(length: number): Uint8Array {
    this.require(length);
    const value = this.data.slice(this.offset, this.offset + length);
    this.offset += length;
    return value;
  }

  rest(): Uint8Array {
    return this.bytes(this.remaining);
  }

  /**
   * Assert the payload has been fully consumed
   */
  end(): void {
    if (this.remaining !== 0) {
      throw new MalformedPayloadError(`Unexpected trailing bytes: ${this.remaining}`);
    }
  }

  private require(length: number): void {
    if (this.offset + length > this.data.length) {
      throw new MalformedPayloadError(
        `Payload too short: need ${length} bytes at offset ${this.offset}, have ${this.remaining}`
      );
    }
  }
}
