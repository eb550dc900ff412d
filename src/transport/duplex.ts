import net from 'node:net';
import type { Duplex } from 'node:stream';
import { TransportError } from '../errors.js';
import { Role } from '../link/state.js';
import type { ByteStream, StreamFactory } from './stream.js';

/** Buffered reads after which the underlying stream is paused */
const HIGH_WATER_CHUNKS = 64;

export interface DuplexConnection {
  duplex: Duplex;
  peerAddress: string;
}

/**
 * Produces a connected duplex: dials for a client, accepts for a host.
 * Must reject once `signal` aborts.
 */
export type DuplexConnector = (signal: AbortSignal) => Promise<DuplexConnection>;

/**
 * ByteStream over any Node.js Duplex (net.Socket, a serial port, a pipe).
 * Reads are queued from 'data' events and handed out one chunk per read().
 */
export class DuplexByteStream implements ByteStream {
  private duplex: Duplex | null = null;
  private address: string;
  private readonly queue: Uint8Array[] = [];
  private waiter: (() => void) | null = null;
  private ended = false;
  private failure: Error | null = null;
  private closing = false;
  private readonly abort = new AbortController();

  constructor(
    private readonly connector: DuplexConnector,
    initialAddress = ''
  ) {
    this.address = initialAddress;
  }

  get peerAddress(): string {
    return this.address;
  }

  async open(): Promise<void> {
    if (this.duplex) {
      throw new TransportError('IOFault', 'Stream already open');
    }
    const { duplex, peerAddress } = await this.connector(this.abort.signal);
    if (this.closing) {
      duplex.destroy();
      throw new TransportError('Closed', 'Stream closed while opening');
    }
    this.duplex = duplex;
    this.address = peerAddress;

    duplex.on('data', (data: Buffer | string) => {
      this.queue.push(typeof data === 'string' ? Buffer.from(data) : new Uint8Array(data));
      if (this.queue.length >= HIGH_WATER_CHUNKS) {
        duplex.pause();
      }
      this.wake();
    });
    duplex.on('end', () => {
      this.ended = true;
      this.wake();
    });
    duplex.on('close', () => {
      this.ended = true;
      this.wake();
    });
    duplex.on('error', (error: Error) => {
      this.failure = error;
      this.wake();
    });
  }

  async read(): Promise<Uint8Array | null> {
    for (;;) {
      const next = this.queue.shift();
      if (next) {
        if (this.queue.length < HIGH_WATER_CHUNKS / 2) {
          this.duplex?.resume();
        }
        return next;
      }
      if (this.failure) {
        throw new TransportError('IOFault', this.failure.message);
      }
      if (this.ended || this.closing) {
        return null;
      }
      if (!this.duplex) {
        throw new TransportError('Closed', 'Stream not open');
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  async write(bytes: Uint8Array): Promise<void> {
    const duplex = this.duplex;
    if (!duplex || this.closing || duplex.destroyed || !duplex.writable) {
      throw new TransportError('Closed', 'Stream is not writable');
    }
    await new Promise<void>((resolve, reject) => {
      duplex.write(bytes, (error?: Error | null) => {
        if (error) {
          reject(new TransportError('IOFault', error.message));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    this.closing = true;
    this.abort.abort();
    this.duplex?.destroy();
    this.wake();
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}

function parseAddress(address: string): { host: string; port: number } {
  const separator = address.lastIndexOf(':');
  const port = Number(address.slice(separator + 1));
  if (separator <= 0 || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid address "${address}": expected host:port`);
  }
  return { host: address.slice(0, separator), port };
}

/**
 * Client stream dialing "host:port" over TCP
 */
export function tcpClientStream(address: string): DuplexByteStream {
  const { host, port } = parseAddress(address);
  return new DuplexByteStream(
    (signal) =>
      new Promise<DuplexConnection>((resolve, reject) => {
        const socket = net.createConnection({ host, port });
        const onAbort = (): void => {
          socket.destroy();
          reject(new TransportError('Closed', `Connect to ${address} aborted`));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        socket.setNoDelay(true);
        socket.once('connect', () => {
          signal.removeEventListener('abort', onAbort);
          resolve({ duplex: socket, peerAddress: address });
        });
        socket.once('error', (error) => {
          socket.destroy();
          reject(new TransportError('IOFault', `Connect to ${address} failed: ${error.message}`));
        });
      }),
    address
  );
}

/**
 * Host stream accepting a single TCP connection on `port`. The peer is
 * identified by its remote IP so that resumption survives a new source port.
 */
export function tcpHostStream(port: number, host = '0.0.0.0'): DuplexByteStream {
  return new DuplexByteStream(
    (signal) =>
      new Promise<DuplexConnection>((resolve, reject) => {
        const server = net.createServer();
        const onAbort = (): void => {
          server.close();
          reject(new TransportError('Closed', `Listen on ${host}:${port} aborted`));
        };
        signal.addEventListener('abort', onAbort, { once: true });
        server.once('error', (error) => {
          server.close();
          reject(new TransportError('IOFault', `Listen on ${host}:${port} failed: ${error.message}`));
        });
        server.once('connection', (socket) => {
          signal.removeEventListener('abort', onAbort);
          server.close();
          socket.setNoDelay(true);
          resolve({ duplex: socket, peerAddress: socket.remoteAddress ?? 'unknown' });
        });
        server.listen(port, host);
      })
  );
}

/**
 * Stream factory for TCP: the host listens on `port`, the client dials the
 * requested peer address or `host:port`
 */
export function tcpStreamFactory(options: { port: number; host?: string }): StreamFactory {
  const host = options.host ?? '127.0.0.1';
  return (request) =>
    request.role === Role.HOST
      ? tcpHostStream(options.port, options.host)
      : tcpClientStream(request.peerAddress ?? `${host}:${options.port}`);
}
