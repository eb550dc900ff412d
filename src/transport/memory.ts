import { TransportError } from '../errors.js';
import { Role } from '../link/state.js';
import type { ByteStream, StreamFactory, StreamRequest } from './stream.js';

export type LinkDirection = 'host-to-client' | 'client-to-host';

export interface MemoryLinkOptions {
  /** Split every write into reads of at most this many bytes */
  fragmentSize?: number;
  /** Address the host sees for the client */
  clientAddress?: string;
  /** Address the client dials when the request names none */
  hostAddress?: string;
}

/**
 * One direction of an in-memory connection
 */
class Pipe {
  private readonly queue: Uint8Array[] = [];
  private waiter: (() => void) | null = null;
  private ended = false;
  private failure: TransportError | null = null;

  get open(): boolean {
    return !this.ended && !this.failure;
  }

  push(bytes: Uint8Array): void {
    this.queue.push(bytes);
    this.wake();
  }

  end(): void {
    this.ended = true;
    this.wake();
  }

  fail(error: TransportError): void {
    this.failure = error;
    this.wake();
  }

  async read(): Promise<Uint8Array | null> {
    for (;;) {
      if (this.failure) throw this.failure;
      const next = this.queue.shift();
      if (next) return next;
      if (this.ended) return null;
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

interface PendingOpen {
  stream: MemoryStream;
  resolve: () => void;
  reject: (error: TransportError) => void;
}

class MemoryStream implements ByteStream {
  inbound: Pipe | null = null;
  outbound: Pipe | null = null;
  closed = false;

  constructor(
    private readonly link: MemoryLink,
    readonly role: Role,
    readonly peerAddress: string
  ) {}

  open(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError('Closed', 'Stream closed'));
    }
    return this.link.rendezvous(this);
  }

  async read(): Promise<Uint8Array | null> {
    if (!this.inbound) {
      throw new TransportError('Closed', 'Stream not open');
    }
    return this.inbound.read();
  }

  async write(bytes: Uint8Array): Promise<void> {
    const outbound = this.outbound;
    if (this.closed || !outbound || !outbound.open) {
      throw new TransportError('Closed', 'Stream is not writable');
    }
    this.link.deliver(this.role === Role.HOST ? 'host-to-client' : 'client-to-host', bytes, outbound);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.link.cancelPending(this);
    this.inbound?.end();
    this.outbound?.end();
  }
}

/**
 * In-process stand-in for a Bluetooth RFCOMM channel between one host and
 * one client. Opens rendezvous: a host open waits for a client open and the
 * other way around. Tests can drop the live connection, corrupt frames in
 * flight, fragment writes, and make the host unreachable.
 */
export class MemoryLink {
  private pendingHost: PendingOpen | null = null;
  private pendingClient: PendingOpen | null = null;
  private active: { host: MemoryStream; client: MemoryStream } | null = null;
  private readonly corruptions: Record<LinkDirection, number> = {
    'host-to-client': 0,
    'client-to-host': 0,
  };
  private reachable = true;
  private connectionCount = 0;
  private readonly fragmentSize: number;
  private readonly clientAddress: string;
  private readonly hostAddress: string;

  constructor(options: MemoryLinkOptions = {}) {
    this.fragmentSize = options.fragmentSize ?? Number.POSITIVE_INFINITY;
    if (this.fragmentSize < 1) {
      throw new Error('fragmentSize must be at least 1');
    }
    this.clientAddress = options.clientAddress ?? 'memory-client';
    this.hostAddress = options.hostAddress ?? 'memory-host';
  }

  /**
   * Factory to hand to a session; the role comes from the session's request
   */
  readonly streams: StreamFactory = (request: StreamRequest): ByteStream =>
    request.role === Role.HOST
      ? new MemoryStream(this, Role.HOST, this.clientAddress)
      : new MemoryStream(this, Role.CLIENT, request.peerAddress ?? this.hostAddress);

  /** Connections established so far */
  get connections(): number {
    return this.connectionCount;
  }

  get connected(): boolean {
    return this.active !== null;
  }

  /**
   * Cut the live connection. Both ends see an I/O fault on their next read.
   */
  drop(): void {
    const active = this.active;
    if (!active) return;
    this.active = null;
    const error = new TransportError('IOFault', 'Link dropped');
    active.host.inbound?.fail(error);
    active.client.inbound?.fail(error);
    active.host.outbound?.end();
    active.client.outbound?.end();
  }

  /**
   * Flip one bit in the last byte of the next `count` writes in `direction`
   */
  corruptNext(direction: LinkDirection, count = 1): void {
    this.corruptions[direction] += count;
  }

  /**
   * While unreachable, client opens fail immediately
   */
  setReachable(reachable: boolean): void {
    this.reachable = reachable;
  }

  rendezvous(stream: MemoryStream): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const pending: PendingOpen = { stream, resolve, reject };
      if (stream.role === Role.CLIENT) {
        if (!this.reachable) {
          reject(new TransportError('IOFault', `Peer ${stream.peerAddress} unreachable`));
          return;
        }
        if (this.pendingHost) {
          this.pair(this.pendingHost, pending);
        } else {
          this.pendingClient?.reject(new TransportError('IOFault', 'Superseded by a newer dial'));
          this.pendingClient = pending;
        }
        return;
      }
      if (this.pendingClient) {
        this.pair(pending, this.pendingClient);
      } else {
        this.pendingHost?.reject(new TransportError('IOFault', 'Superseded by a newer listen'));
        this.pendingHost = pending;
      }
    });
  }

  cancelPending(stream: MemoryStream): void {
    const error = new TransportError('Closed', 'Stream closed while opening');
    if (this.pendingHost?.stream === stream) {
      this.pendingHost.reject(error);
      this.pendingHost = null;
    }
    if (this.pendingClient?.stream === stream) {
      this.pendingClient.reject(error);
      this.pendingClient = null;
    }
    if (this.active && (this.active.host === stream || this.active.client === stream)) {
      this.active = null;
    }
  }

  deliver(direction: LinkDirection, bytes: Uint8Array, pipe: Pipe): void {
    const copy = bytes.slice();
    if (this.corruptions[direction] > 0 && copy.length > 0) {
      this.corruptions[direction] -= 1;
      copy[copy.length - 1] ^= 0x01;
    }
    for (let offset = 0; offset < copy.length; offset += this.fragmentSize) {
      pipe.push(copy.subarray(offset, Math.min(copy.length, offset + this.fragmentSize)));
    }
  }

  private pair(host: PendingOpen, client: PendingOpen): void {
    this.pendingHost = null;
    this.pendingClient = null;
    this.drop();

    const hostToClient = new Pipe();
    const clientToHost = new Pipe();
    host.stream.outbound = hostToClient;
    host.stream.inbound = clientToHost;
    client.stream.outbound = clientToHost;
    client.stream.inbound = hostToClient;
    this.active = { host: host.stream, client: client.stream };
    this.connectionCount += 1;

    host.resolve();
    client.resolve();
  }
}
