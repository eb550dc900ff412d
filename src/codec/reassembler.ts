import {
  decodeFrame,
  readFrameHeader,
  hasFrameMagic,
  findFrameMagic,
  frameSize,
} from './frame.js';
import { FRAME_MAGIC, MAX_FRAME_PAYLOAD, type Frame } from './types.js';
import { FrameError, ok, err, type Result } from '../errors.js';

const INITIAL_CAPACITY = 4096;

export type ReassemblyStep =
  | { status: 'need-more' }
  | { status: 'frame'; frame: Frame }
  | { status: 'error'; error: FrameError };

/**
 * Incremental frame parser over a byte stream.
 *
 * Buffers partial input and emits frames independently of how the bytes were
 * split into reads. A header declaring more than `maxPayload` is rejected as
 * soon as it is readable, so the buffer never grows past one maximal frame
 * plus the last read.
 *
 * Held bytes live in `storage[start..end)`. Consuming a frame only moves
 * `start`; the storage doubles when a push does not fit after compaction.
 */
export class StreamReassembler {
  private storage: Uint8Array = new Uint8Array(0);
  private start = 0;
  private end = 0;

  constructor(private readonly maxPayload: number = MAX_FRAME_PAYLOAD) {}

  /**
   * Bytes currently held
   */
  get buffered(): number {
    return this.end - this.start;
  }

  private get buffer(): Uint8Array {
    return this.storage.subarray(this.start, this.end);
  }

  push(chunk: Uint8Array): void {
    if (chunk.length === 0) return;
    const held = this.end - this.start;
    if (this.end + chunk.length > this.storage.length) {
      if (held + chunk.length <= this.storage.length) {
        this.storage.copyWithin(0, this.start, this.end);
      } else {
        let capacity = Math.max(this.storage.length, INITIAL_CAPACITY);
        while (capacity < held + chunk.length) capacity *= 2;
        const grown = new Uint8Array(capacity);
        grown.set(this.storage.subarray(this.start, this.end));
        this.storage = grown;
      }
      this.start = 0;
      this.end = held;
    }
    this.storage.set(chunk, this.end);
    this.end += chunk.length;
  }

  private consume(count: number): void {
    this.start += count;
    if (this.start === this.end) {
      this.start = 0;
      this.end = 0;
    }
  }

  /**
   * Try to take one frame from the front of the buffer.
   * Nothing is consumed unless a verified frame is returned.
   */
  next(): ReassemblyStep {
    if (this.buffer.length >= FRAME_MAGIC.length && !hasFrameMagic(this.buffer)) {
      return { status: 'error', error: new FrameError('BadMagic', 'Stream desynchronized: no frame magic at boundary') };
    }

    const header = readFrameHeader(this.buffer);
    if (!header) {
      return { status: 'need-more' };
    }

    if (header.length > this.maxPayload) {
      return {
        status: 'error',
        error: new FrameError('Oversize', `Declared payload too large: ${header.length} > ${this.maxPayload}`),
      };
    }

    const total = frameSize(header.length);
    if (this.buffer.length < total) {
      return { status: 'need-more' };
    }

    const result = decodeFrame(this.buffer.subarray(0, total), this.maxPayload);
    if (!result.ok) {
      return { status: 'error', error: result.error };
    }

    this.consume(total);
    return { status: 'frame', frame: result.value };
  }

  /**
   * Discard bytes up to the next plausible frame boundary after the current one.
   * Returns the number of bytes dropped.
   */
  resync(): number {
    const buffer = this.buffer;
    const next = findFrameMagic(buffer, 1);
    let dropped = next >= 0 ? next : buffer.length;
    // A trailing first magic byte may be the start of a frame still arriving
    if (next < 0 && buffer.length > 1 && buffer[buffer.length - 1] === FRAME_MAGIC[0]) {
      dropped = buffer.length - 1;
    }
    this.consume(dropped);
    return dropped;
  }

  reset(): void {
    this.start = 0;
    this.end = 0;
  }

  /**
   * Yield every complete result currently buffered, stopping at the first error
   */
  *drain(): Generator<Result<Frame, FrameError>> {
    for (;;) {
      const step = this.next();
      if (step.status === 'need-more') return;
      if (step.status === 'error') {
        yield err(step.error);
        return;
      }
      yield ok(step.frame);
    }
  }

  /**
   * Lazily turn a chunk source into frame results for as long as it is open.
   * A consumer that keeps iterating after an error gets scan-resync behavior;
   * one that stops tears the source down with it.
   */
  async *frames(source: AsyncIterable<Uint8Array>): AsyncGenerator<Result<Frame, FrameError>> {
    for await (const chunk of source) {
      this.push(chunk);
      for (;;) {
        const step = this.next();
        if (step.status === 'need-more') break;
        if (step.status === 'frame') {
          yield ok(step.frame);
          continue;
        }
        yield err(step.error);
        this.resync();
      }
    }
  }
}
