import { TransportError, describeError } from '../errors.js';
import type { Role } from '../link/state.js';

/**
 * Platform byte stream handed to the link: an RFCOMM socket, a serial
 * device, a TCP bridge. One instance per connection attempt.
 */
export interface ByteStream {
  /** Stable identity of the remote end, used as the key-store key */
  readonly peerAddress: string;
  /** HOST: wait for the peer to connect. CLIENT: dial the peer. */
  open(): Promise<void>;
  /** At least one byte, or null once the stream has ended */
  read(): Promise<Uint8Array | null>;
  /** Resolves once the bytes have been handed to the stream */
  write(bytes: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

export interface StreamRequest {
  role: Role;
  /** Set for CLIENT; a HOST learns it from the accepted stream */
  peerAddress?: string;
}

/**
 * Builds a fresh, unopened stream for every connection attempt
 */
export type StreamFactory = (request: StreamRequest) => ByteStream;

function toTransportError(error: unknown, fallback: string): TransportError {
  if (error instanceof TransportError) {
    return error;
  }
  return new TransportError('IOFault', `${fallback}: ${describeError(error)}`);
}

/**
 * Protocol-agnostic wrapper over one ByteStream.
 *
 * Normalizes every failure to TransportError and never retries. Once
 * closed it stays closed; reconnecting means building a new adapter.
 */
export class ByteStreamAdapter {
  private closed = false;
  private bytesRead = 0;
  private bytesWritten = 0;

  constructor(private readonly stream: ByteStream) {}

  get peerAddress(): string {
    return this.stream.peerAddress;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async open(): Promise<void> {
    if (this.closed) {
      throw new TransportError('Closed', 'Adapter already closed');
    }
    try {
      await this.stream.open();
    } catch (error) {
      throw toTransportError(error, 'Failed to open stream');
    }
  }

  /**
   * Lazy sequence of read chunks. Ends when the peer ends the stream or
   * the adapter is closed locally; throws TransportError on I/O faults.
   */
  async *chunks(): AsyncGenerator<Uint8Array> {
    while (!this.closed) {
      let chunk: Uint8Array | null;
      try {
        chunk = await this.stream.read();
      } catch (error) {
        if (this.closed) return;
        throw toTransportError(error, 'Read failed');
      }
      if (chunk === null) {
        return;
      }
      if (chunk.length === 0) {
        continue;
      }
      this.bytesRead += chunk.length;
      yield chunk;
    }
  }

  /**
   * Write all bytes or fail
   */
  async write(bytes: Uint8Array): Promise<void> {
    if (this.closed) {
      throw new TransportError('Closed', 'Write on closed adapter');
    }
    try {
      await this.stream.write(bytes);
    } catch (error) {
      throw toTransportError(error, 'Write failed');
    }
    this.bytesWritten += bytes.length;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.stream.close();
    } catch (error) {
      throw toTransportError(error, 'Close failed');
    }
  }

  getStats(): { bytesRead: number; bytesWritten: number; closed: boolean } {
    return { bytesRead: this.bytesRead, bytesWritten: this.bytesWritten, closed: this.closed };
  }
}
