import { describe, it, expect, beforeEach } from 'vitest';
import { PassThrough } from 'node:stream';
import {
  ByteStreamAdapter,
  DuplexByteStream,
  MemoryLink,
  tcpClientStream,
  tcpStreamFactory,
  type ByteStream,
  type DuplexConnection,
} from '../src/transport/index.js';
import { Role } from '../src/link/state.js';
import { TransportError } from '../src/errors.js';

async function openPair(link: MemoryLink): Promise<{ host: ByteStream; client: ByteStream }> {
  const host = link.streams({ role: Role.HOST });
  const client = link.streams({ role: Role.CLIENT });
  await Promise.all([host.open(), client.open()]);
  return { host, client };
}

async function readAll(adapter: ByteStreamAdapter): Promise<number[]> {
  const bytes: number[] = [];
  for await (const chunk of adapter.chunks()) {
    bytes.push(...chunk);
  }
  return bytes;
}

/** ByteStream whose every operation fails */
function brokenStream(message: string): ByteStream {
  return {
    peerAddress: 'broken',
    open: () => Promise.reject(new Error(message)),
    read: () => Promise.reject(new Error(message)),
    write: () => Promise.reject(new Error(message)),
    close: () => Promise.resolve(),
  };
}

describe('MemoryLink', () => {
  let link: MemoryLink;

  beforeEach(() => {
    link = new MemoryLink();
  });

  it('should pair a host and a client open', async () => {
    const { host, client } = await openPair(link);

    expect(host.peerAddress).toBe('memory-client');
    expect(client.peerAddress).toBe('memory-host');
    expect(link.connections).toBe(1);
    expect(link.connected).toBe(true);

    await client.write(new Uint8Array([1, 2, 3]));
    expect(Array.from((await host.read()) ?? [])).toEqual([1, 2, 3]);

    await host.write(new Uint8Array([4]));
    expect(Array.from((await client.read()) ?? [])).toEqual([4]);
  });

  it('should use the address the client asks for', () => {
    expect(link.streams({ role: Role.CLIENT, peerAddress: 'AA:BB:CC:DD:EE:FF' }).peerAddress).toBe(
      'AA:BB:CC:DD:EE:FF'
    );
  });

  it('should split writes into fragments', async () => {
    const fragmented = new MemoryLink({ fragmentSize: 3 });
    const { host, client } = await openPair(fragmented);

    await client.write(new Uint8Array([1, 2, 3, 4, 5, 6, 7]));
    expect((await host.read())?.length).toBe(3);
    expect((await host.read())?.length).toBe(3);
    expect(Array.from((await host.read()) ?? [])).toEqual([7]);
  });

  it('should flip the low bit of the last byte of the next write', async () => {
    const { host, client } = await openPair(link);
    link.corruptNext('client-to-host');

    await client.write(new Uint8Array([0x10, 0x20]));
    await client.write(new Uint8Array([0x10, 0x20]));
    expect(Array.from((await host.read()) ?? [])).toEqual([0x10, 0x21]);
    expect(Array.from((await host.read()) ?? [])).toEqual([0x10, 0x20]);
  });

  it('should fail reads and writes after a drop', async () => {
    const { host, client } = await openPair(link);
    link.drop();

    expect(link.connected).toBe(false);
    await expect(host.read()).rejects.toThrow('Link dropped');
    await expect(client.write(new Uint8Array([1]))).rejects.toThrow('Stream is not writable');
  });

  it('should refuse client opens while unreachable', async () => {
    link.setReachable(false);
    await expect(link.streams({ role: Role.CLIENT }).open()).rejects.toThrow('Peer memory-host unreachable');

    link.setReachable(true);
    const { client } = await openPair(link);
    expect(client.peerAddress).toBe('memory-host');
  });

  it('should reject a pending open when its stream closes', async () => {
    const host = link.streams({ role: Role.HOST });
    const opening = host.open();
    await host.close();
    await expect(opening).rejects.toThrow('Stream closed while opening');
  });

  it('should supersede an older pending listen', async () => {
    const first = link.streams({ role: Role.HOST }).open();
    const second = link.streams({ role: Role.HOST });
    const opening = second.open();

    await expect(first).rejects.toThrow('Superseded by a newer listen');
    await link.streams({ role: Role.CLIENT }).open();
    await expect(opening).resolves.toBeUndefined();
  });

  it('should end the peer stream on close', async () => {
    const { host, client } = await openPair(link);
    await client.close();
    expect(await host.read()).toBeNull();
    await expect(client.open()).rejects.toThrow('Stream closed');
  });
});

describe('ByteStreamAdapter', () => {
  it('should yield chunks until the stream ends', async () => {
    const link = new MemoryLink();
    const { host, client } = await openPair(link);
    const adapter = new ByteStreamAdapter(host);

    const reading = readAll(adapter);
    const writer = new ByteStreamAdapter(client);
    await writer.write(new Uint8Array([1, 2]));
    await writer.write(new Uint8Array([3]));
    await writer.close();

    expect(await reading).toEqual([1, 2, 3]);
    expect(adapter.getStats()).toEqual({ bytesRead: 3, bytesWritten: 0, closed: false });
    expect(writer.getStats()).toEqual({ bytesRead: 0, bytesWritten: 3, closed: true });
  });

  it('should raise transport errors from the stream', async () => {
    const link = new MemoryLink();
    const { host } = await openPair(link);
    const adapter = new ByteStreamAdapter(host);

    const reading = readAll(adapter);
    link.drop();

    const failure = await reading.catch((error: unknown) => error);
    expect(failure).toBeInstanceOf(TransportError);
    if (failure instanceof TransportError) {
      expect(failure.code).toBe('IOFault');
      expect(failure.message).toBe('Link dropped');
    }
  });

  it('should wrap foreign errors', async () => {
    const adapter = new ByteStreamAdapter(brokenStream('no route'));

    await expect(adapter.open()).rejects.toThrow('Failed to open stream: no route');
    await expect(adapter.write(new Uint8Array([1]))).rejects.toThrow('Write failed: no route');
    await expect(readAll(adapter)).rejects.toThrow('Read failed: no route');
  });

  it('should stay closed', async () => {
    const adapter = new ByteStreamAdapter(brokenStream('unused'));
    await adapter.close();
    await adapter.close();

    expect(adapter.isClosed()).toBe(true);
    await expect(adapter.open()).rejects.toThrow('Adapter already closed');
    await expect(adapter.write(new Uint8Array([1]))).rejects.toThrow('Write on closed adapter');
    expect(await readAll(adapter)).toEqual([]);
  });
});

describe('DuplexByteStream', () => {
  function loopback(): { stream: DuplexByteStream; pass: PassThrough } {
    const pass = new PassThrough();
    const stream = new DuplexByteStream(async () => ({ duplex: pass, peerAddress: 'loopback' }), 'pending');
    return { stream, pass };
  }

  it('should take the peer address from the connection', async () => {
    const { stream } = loopback();
    expect(stream.peerAddress).toBe('pending');
    await stream.open();
    expect(stream.peerAddress).toBe('loopback');
    await stream.close();
  });

  it('should read back what it writes over a loopback', async () => {
    const { stream } = loopback();
    await stream.open();

    await stream.write(new Uint8Array([9, 8, 7]));
    expect(Array.from((await stream.read()) ?? [])).toEqual([9, 8, 7]);
    await stream.close();
  });

  it('should report the end of the stream', async () => {
    const { stream, pass } = loopback();
    await stream.open();
    pass.end();
    expect(await stream.read()).toBeNull();
  });

  it('should surface stream errors as transport faults', async () => {
    const { stream, pass } = loopback();
    await stream.open();
    pass.destroy(new Error('carrier lost'));

    await expect(stream.read()).rejects.toThrow('carrier lost');
  });

  it('should refuse writes once closed', async () => {
    const { stream } = loopback();
    await stream.open();
    await stream.close();

    expect(await stream.read()).toBeNull();
    await expect(stream.write(new Uint8Array([1]))).rejects.toThrow('Stream is not writable');
  });

  it('should abort a pending open on close', async () => {
    const stream = new DuplexByteStream(
      (signal) =>
        new Promise<DuplexConnection>((_, reject) => {
          signal.addEventListener('abort', () => reject(new TransportError('Closed', 'Dial aborted')));
        })
    );
    const opening = stream.open();
    await stream.close();
    await expect(opening).rejects.toThrow('Dial aborted');
  });

  describe('TCP', () => {
    it('should not connect before open', () => {
      expect(tcpClientStream('127.0.0.1:9').peerAddress).toBe('127.0.0.1:9');
    });

    it('should reject malformed addresses', () => {
      expect(() => tcpClientStream('localhost')).toThrow('Invalid address "localhost": expected host:port');
    });

    it('should dial the configured port by default', () => {
      const factory = tcpStreamFactory({ port: 7000 });
      expect(factory({ role: Role.CLIENT }).peerAddress).toBe('127.0.0.1:7000');
      expect(factory({ role: Role.CLIENT, peerAddress: '10.0.0.2:7001' }).peerAddress).toBe('10.0.0.2:7001');
    });
  });
});
