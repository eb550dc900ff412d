import { resolveConfig, type LinkConfig } from './config.js';
import {
  FrameType,
  TransferKind,
  encodeFrame,
  encodeHello,
  decodeHello,
  encodeHelloAck,
  decodeHelloAck,
  decodeChunk,
  decodeChunkAck,
  encodeHeartbeat,
  decodeHeartbeat,
  decodeTransferAbort,
  StreamReassembler,
  type ChunkPayload,
  type Frame,
} from './codec/index.js';
import { CryptoEnvelope, frameAad } from './crypto/encryption.js';
import { X25519Agreement, type KeyAgreement } from './crypto/keys.js';
import { utf8Decode, utf8Encode } from './crypto/utils.js';
import {
  CryptoError,
  FrameError,
  HandshakeError,
  LinkError,
  TransferError,
  TransportError,
  describeError,
  type Result,
} from './errors.js';
import { computeBackoff } from './link/backoff.js';
import { Gate, SerialQueue, withTimeout } from './link/gate.js';
import { HostHandshake, answerHello, type HandshakeResult } from './link/handshake.js';
import { ReplayJournal } from './link/journal.js';
import { Role, SessionState, isOpenState, isTransitionAllowed } from './link/state.js';
import { createLogger, type Logger } from './logger.js';
import type { KeyStore } from './storage/adapter.js';
import { SQLiteKeyStore } from './storage/sqlite.js';
import { TransferManager, type TransferEvent } from './transfer/manager.js';
import { sniffMime } from './transfer/mime.js';
import { ByteStreamAdapter, type StreamFactory } from './transport/stream.js';
import type {
  LinkErrorKind,
  LinkEvent,
  LinkEventHandler,
  LinkSessionOptions,
  SequenceState,
} from './types.js';

type FrameSource = AsyncGenerator<Result<Frame, FrameError>>;

const TEXT_MIME = 'text/plain; charset=utf-8';
const EMPTY = new Uint8Array(0);

function errorKind(error: LinkError): LinkErrorKind {
  if (error instanceof TransportError) return 'TransportError';
  if (error instanceof FrameError) return 'FrameError';
  if (error instanceof CryptoError) return 'CryptoError';
  if (error instanceof HandshakeError) return 'HandshakeError';
  if (error instanceof TransferError) return 'TransferError';
  return 'LinkError';
}

function toLinkError(error: unknown): LinkError {
  return error instanceof LinkError ? error : new LinkError(describeError(error));
}

/**
 * Errors that stop the session instead of reconnecting. A resume mismatch
 * is not one: the session falls back to a cold handshake.
 */
function isFatal(error: unknown): error is CryptoError | HandshakeError {
  if (error instanceof HandshakeError) return error.reason !== 'ResumeMismatch';
  return error instanceof CryptoError;
}

function isDataFrame(type: FrameType): boolean {
  return type === FrameType.DATA_TEXT || type === FrameType.DATA_CHUNK;
}

function describeLoss(error: unknown): Record<string, string> {
  if (error instanceof FrameError) return { error: `FrameError{${error.kind}}`, detail: error.message };
  if (error instanceof TransportError) return { error: `TransportError{${error.code}}`, detail: error.message };
  return { error: describeError(error) };
}

/**
 * One logical conversation between a HOST and a CLIENT, surviving any
 * number of transport drops.
 *
 * Every sequenced frame goes through a single serial writer: sequence
 * assignment, journaling, sealing and the adapter write happen in one
 * queue slot. Data frames first pass an admission queue that holds them
 * while the replay journal is full. Each connection gets one reader loop. Transport and frame
 * errors trigger a reconnect with backoff; crypto and handshake errors
 * stop the session and are reported to the application.
 */
export class LinkSession {
  readonly role: Role;
  private readonly config: LinkConfig;
  private readonly logger: Logger;
  private readonly streams: StreamFactory;
  private readonly keyStore: KeyStore;
  private readonly ownsKeyStore: boolean;
  private readonly agreement: KeyAgreement;

  private state: SessionState = SessionState.DISCONNECTED;
  private handlers: Set<LinkEventHandler> = new Set();
  private peerAddress: string | null = null;

  // Connection-scoped; replaced on every connect
  private adapter: ByteStreamAdapter | null = null;
  private sendEnvelope: CryptoEnvelope | null = null;
  private recvEnvelope: CryptoEnvelope | null = null;
  private generation = 0;

  // Session-scoped; survives reconnects
  private live = false;
  private sendSeq = 0;
  private recvSeq = 0;
  private readonly journal: ReplayJournal;
  private readonly gate = new Gate();
  private readonly writer = new SerialQueue();
  private readonly admission = new SerialQueue();
  private readonly transfers: TransferManager;
  private rotateRequested = false;
  private ackRequested = false;

  private lastSeen = 0;
  private attempts = 0;
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;
  private watchdogTimer: ReturnType<typeof setInterval> | null = null;
  private cancelSleep: (() => void) | null = null;
  private pongWaiters: (() => void)[] = [];

  constructor(options: LinkSessionOptions) {
    this.role = options.role;
    this.config = resolveConfig(options.config);
    this.logger = options.logger ?? createLogger(`link:${this.role.toLowerCase()}`, this.config.logLevel);
    this.streams = options.streams;
    this.keyStore = options.keyStore ?? new SQLiteKeyStore(':memory:');
    this.ownsKeyStore = options.keyStore === undefined;
    this.agreement = options.agreement ?? new X25519Agreement();
    this.journal = new ReplayJournal(this.config.journalMaxBytes);
    this.transfers = new TransferManager(
      this.config,
      {
        sendChunk: async (payload) => {
          await this.sendSequenced(FrameType.DATA_CHUNK, payload);
        },
        sendAck: async (payload) => {
          await this.sendSequenced(FrameType.CHUNK_ACK, payload);
        },
        sendAbort: async (payload) => {
          await this.sendSequenced(FrameType.TRANSFER_ABORT, payload);
        },
      },
      (event) => this.onTransferEvent(event),
      this.logger.child('transfer')
    );
    // Transfer idle timers run only while a connection is up
    this.transfers.suspend();
  }

  getState(): SessionState {
    return this.state;
  }

  getPeerAddress(): string | null {
    return this.peerAddress;
  }

  getSequenceState(): SequenceState {
    return {
      sendSeq: this.sendSeq,
      recvSeq: this.recvSeq,
      journalStart: this.journal.start,
      journaled: this.journal.size,
    };
  }

  /**
   * Subscribe to session events. Returns an unsubscribe function.
   */
  onEvent(handler: LinkEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * HOST: wait for the client and complete the handshake.
   * Resolves once ESTABLISHED.
   */
  async listen(): Promise<void> {
    if (this.role !== Role.HOST) {
      throw new LinkError('listen() is only available to a HOST session');
    }
    await this.start();
  }

  /**
   * CLIENT: dial `peerAddress` and complete the handshake.
   * Resolves once ESTABLISHED.
   */
  async connect(peerAddress: string): Promise<void> {
    if (this.role !== Role.CLIENT) {
      throw new LinkError('connect() is only available to a CLIENT session');
    }
    this.peerAddress = peerAddress;
    await this.start();
  }

  /**
   * Send text. Short text travels as one DATA_TEXT frame and resolves with
   * its frame id; longer text becomes a transfer and resolves with the
   * transfer id once acknowledged.
   */
  async sendText(text: string): Promise<string> {
    this.requireNotClosed();
    const bytes = utf8Encode(text);
    if (bytes.length > this.config.chunkSize) {
      return this.transfers.send(bytes, TransferKind.TEXT, TEXT_MIME);
    }
    const sequence = await this.sendSequenced(FrameType.DATA_TEXT, bytes);
    return `frame-${sequence}`;
  }

  /**
   * Send binary media as a chunked transfer. Resolves with the transfer id
   * once every chunk has been acknowledged.
   */
  async sendMedia(bytes: Uint8Array, mimeHint?: string): Promise<string> {
    this.requireNotClosed();
    return this.transfers.send(bytes, TransferKind.MEDIA, mimeHint ?? sniffMime(bytes));
  }

  /**
   * Best-effort BYE, then release everything. The session is CLOSED after.
   */
  async disconnect(): Promise<void> {
    if (this.state === SessionState.CLOSED) return;

    if (isOpenState(this.state) && this.gate.opened) {
      try {
        await withTimeout(this.sendSequenced(FrameType.BYE, EMPTY), this.config.closeTimeoutMs);
      } catch (error) {
        this.logger.debug('BYE not delivered', { error: describeError(error) });
      }
    }
    await this.shutdown();
  }

  /**
   * Replace the long-term key: wait for outbound transfers, drain the
   * journal, forget the stored key and re-handshake with a fresh one.
   */
  async rotateKey(): Promise<void> {
    if (!isOpenState(this.state)) {
      throw new LinkError(`Cannot rotate key in state ${this.state}`);
    }
    this.logger.info('Rotating key');
    await this.transfers.whenIdle();

    // Hold new writes at the gate; everything queued before this slot is on the wire
    await this.writer.run(async () => {
      this.gate.close();
    });
    const pong = new Promise<void>((resolve) => this.pongWaiters.push(resolve));
    await this.writeSequenced(FrameType.PING, encodeHeartbeat(this.recvSeq));
    await withTimeout(
      pong,
      this.config.handshakeTimeoutMs,
      () => new LinkError('Peer did not acknowledge before key rotation')
    );

    this.rotateRequested = true;
    if (this.role === Role.CLIENT && this.peerAddress) {
      await this.keyStore.deleteKey(this.peerAddress);
    }
    this.dropConnection();
    this.transition(SessionState.RECONNECTING);
    await this.reconnectLoop();
  }

  // --- connection lifecycle ---

  private async start(): Promise<void> {
    if (this.state !== SessionState.DISCONNECTED) {
      throw new LinkError(`Cannot start from state ${this.state}`);
    }
    this.transition(SessionState.CONNECTING);
    try {
      await this.attemptConnection(this.role === Role.HOST ? undefined : this.config.connectTimeoutMs);
      return;
    } catch (error) {
      if (this.getState() === SessionState.CLOSED || this.getState() === SessionState.DISCONNECTED) {
        throw error;
      }
      if (isFatal(error)) {
        this.fail(error);
        throw error;
      }
      this.logger.warn('Connection attempt failed', describeLoss(error));
    }
    this.transition(SessionState.RECONNECTING);
    await this.reconnectLoop();
  }

  private async reconnectLoop(): Promise<void> {
    const { maxAttempts, backoff } = this.config.reconnect;
    let lastError: unknown = new TransportError('Closed', 'No reconnect attempts allowed');

    while (this.attempts < maxAttempts) {
      this.attempts += 1;
      const delay = computeBackoff(this.attempts, backoff);
      this.logger.info('Reconnecting', { attempt: this.attempts, of: maxAttempts, delayMs: delay });
      await this.sleep(delay);
      if (this.state !== SessionState.RECONNECTING) {
        throw new TransportError('Closed', `Reconnect abandoned in state ${this.state}`);
      }

      this.transition(SessionState.CONNECTING);
      try {
        await this.attemptConnection(this.config.connectTimeoutMs);
        return;
      } catch (error) {
        if (this.getState() === SessionState.CLOSED || this.getState() === SessionState.DISCONNECTED) {
          throw error;
        }
        if (isFatal(error)) {
          this.fail(error);
          throw error;
        }
        lastError = error;
        this.logger.warn('Reconnect attempt failed', { attempt: this.attempts, ...describeLoss(error) });
        this.transition(SessionState.RECONNECTING);
      }
    }

    const fatal = new TransportError(
      'IOFault',
      `Reconnection failed after ${this.attempts} attempts: ${describeError(lastError)}`
    );
    this.logger.error('Giving up', { attempts: this.attempts });
    await this.shutdown(fatal);
    throw fatal;
  }

  /**
   * Open a stream, handshake, and go ESTABLISHED. Throws on any failure,
   * leaving the state where the failure happened.
   */
  private async attemptConnection(openTimeoutMs: number | undefined): Promise<void> {
    const generation = ++this.generation;
    const adapter = new ByteStreamAdapter(
      this.streams({ role: this.role, peerAddress: this.peerAddress ?? undefined })
    );
    this.adapter = adapter;

    try {
      const opening = adapter.open();
      await (openTimeoutMs === undefined
        ? opening
        : withTimeout(
            opening,
            openTimeoutMs,
            () => new TransportError('IOFault', `Open timed out after ${openTimeoutMs}ms`)
          ));
      this.requireGeneration(generation);
      if (this.role === Role.HOST) {
        this.peerAddress = adapter.peerAddress;
      }
      this.transition(SessionState.HANDSHAKING);

      const frames = new StreamReassembler().frames(adapter.chunks());
      const result = await withTimeout(
        this.handshake(adapter, frames),
        this.config.handshakeTimeoutMs,
        () => new HandshakeError('Timeout', `No handshake within ${this.config.handshakeTimeoutMs}ms`)
      );
      this.requireGeneration(generation);
      await this.applyHandshake(adapter, result);
      this.requireGeneration(generation);

      this.lastSeen = Date.now();
      this.attempts = 0;
      this.transition(SessionState.ESTABLISHED);
      this.gate.open();
      this.transfers.resume();
      this.startTimers(generation);
      this.logger.info('Link established', {
        peer: this.peerAddress,
        fresh: result.fresh,
        warm: result.warm,
        sendSeq: this.sendSeq,
        recvSeq: this.recvSeq,
      });

      this.readLoop(generation, frames).catch((error) => {
        this.logger.error('Reader stopped unexpectedly', { error: describeError(error) });
      });
    } catch (error) {
      if (this.adapter === adapter) {
        this.adapter = null;
      }
      await this.closeAdapter(adapter);
      throw error;
    }
  }

  private async handshake(adapter: ByteStreamAdapter, frames: FrameSource): Promise<HandshakeResult> {
    const storedKey = await this.loadKey();
    const params = {
      agreement: this.agreement,
      storedKey,
      live: this.live,
      nextExpected: this.recvSeq,
    };

    if (this.role === Role.HOST) {
      const host = new HostHandshake(params, this.rotateRequested);
      await adapter.write(encodeFrame(FrameType.HELLO, 0, encodeHello(host.hello)));
      const frame = await this.nextHandshakeFrame(frames, FrameType.HELLO_ACK);
      return host.complete(decodeHandshakePayload(() => decodeHelloAck(frame.payload)));
    }

    const frame = await this.nextHandshakeFrame(frames, FrameType.HELLO);
    const hello = decodeHandshakePayload(() => decodeHello(frame.payload));
    const { ack, result } = answerHello(hello, params);
    await adapter.write(encodeFrame(FrameType.HELLO_ACK, 0, encodeHelloAck(ack)));
    return result;
  }

  private async nextHandshakeFrame(frames: FrameSource, expected: FrameType): Promise<Frame> {
    const next = await frames.next();
    if (next.done) {
      throw new TransportError('Closed', 'Stream ended during handshake');
    }
    if (!next.value.ok) {
      throw next.value.error;
    }
    const frame = next.value.value;
    if (frame.type !== expected) {
      throw new HandshakeError('Unexpected', `Expected ${FrameType[expected]}, got ${FrameType[frame.type]}`);
    }
    return frame;
  }

  /**
   * Install the new connection's keys, reconcile counters with the peer,
   * and replay whatever the peer has not seen.
   */
  private async applyHandshake(adapter: ByteStreamAdapter, result: HandshakeResult): Promise<void> {
    if (result.fresh && this.peerAddress) {
      await this.keyStore.saveKey(this.peerAddress, result.sessionKey);
    }

    if (result.warm) {
      const nextExpected = result.peerNextExpected;
      if (nextExpected < this.journal.start || nextExpected > this.sendSeq) {
        const mismatch = new HandshakeError(
          'ResumeMismatch',
          `Peer expects ${nextExpected}, replayable range is ${this.journal.start}..${this.sendSeq}`
        );
        this.resetSequenceState('Session state was reset after a failed resume');
        this.report(mismatch, false);
        throw mismatch;
      }
      this.journal.ackUpTo(nextExpected);
    } else {
      if (this.live) {
        this.logger.info('Sequence state reset', { fresh: result.fresh });
        this.transfers.cancelAll('Session state was reset');
      }
      this.sendSeq = 0;
      this.recvSeq = 0;
      this.journal.reset(0);
    }

    this.sendEnvelope = new CryptoEnvelope(result.sendKey);
    this.recvEnvelope = new CryptoEnvelope(result.recvKey);
    this.live = true;
    this.rotateRequested = false;
    this.ackRequested = false;

    const replay = result.warm ? this.journal.entriesFrom(result.peerNextExpected) : [];
    if (replay.length > 0) {
      this.logger.info('Replaying unacknowledged frames', {
        from: replay[0].sequence,
        count: replay.length,
      });
    }
    for (const entry of replay) {
      await adapter.write(this.sealFrame(entry.type, entry.sequence, entry.plaintext));
    }
  }

  private async readLoop(generation: number, frames: FrameSource): Promise<void> {
    try {
      for (;;) {
        const next = await frames.next();
        if (generation !== this.generation) return;
        if (next.done) {
          throw new TransportError('Closed', 'Peer closed the stream');
        }
        if (!next.value.ok) {
          throw next.value.error;
        }
        this.handleFrame(next.value.value);
        if (this.state === SessionState.CLOSED) return;
      }
    } catch (error) {
      if (generation === this.generation) {
        this.onConnectionLost(generation, error);
      }
    }
  }

  private handleFrame(frame: Frame): void {
    if (frame.type === FrameType.HELLO || frame.type === FrameType.HELLO_ACK) {
      throw new FrameError('UnexpectedFrame', `${FrameType[frame.type]} on an established link`);
    }
    if (frame.sequence !== this.recvSeq) {
      throw new FrameError('SequenceGap', `Expected sequence ${this.recvSeq}, got ${frame.sequence}`);
    }
    if (!this.recvEnvelope) {
      throw new TransportError('Closed', 'No receive key installed');
    }
    const opened = this.recvEnvelope.open(frame.payload, frame.sequence, frameAad(frame.type, frame.sequence));
    if (!opened.ok) {
      throw opened.error;
    }

    this.recvSeq += 1;
    this.lastSeen = Date.now();
    if (this.state === SessionState.DEGRADED) {
      this.transition(SessionState.ESTABLISHED);
    }

    const plaintext = opened.value;
    switch (frame.type) {
      case FrameType.DATA_TEXT:
        this.deliverText(plaintext);
        break;
      case FrameType.DATA_CHUNK: {
        let chunk: ChunkPayload;
        try {
          chunk = decodeChunk(plaintext);
        } catch (error) {
          this.report(new TransferError('Malformed', `Bad chunk metadata: ${describeError(error)}`), false);
          break;
        }
        this.transfers.handleChunk(chunk);
        break;
      }
      case FrameType.CHUNK_ACK:
        this.transfers.handleAck(decodeControl(() => decodeChunkAck(plaintext)));
        break;
      case FrameType.TRANSFER_ABORT:
        this.transfers.handleAbort(decodeControl(() => decodeTransferAbort(plaintext)));
        break;
      case FrameType.PING:
        this.journal.ackUpTo(decodeControl(() => decodeHeartbeat(plaintext)));
        this.sendSequenced(FrameType.PONG, encodeHeartbeat(this.recvSeq)).catch((error) => {
          this.logger.debug('PONG not sent', { error: describeError(error) });
        });
        break;
      case FrameType.PONG: {
        this.ackRequested = false;
        this.journal.ackUpTo(decodeControl(() => decodeHeartbeat(plaintext)));
        const waiters = this.pongWaiters;
        this.pongWaiters = [];
        for (const waiter of waiters) waiter();
        break;
      }
      case FrameType.BYE:
        this.logger.info('Peer said goodbye');
        this.shutdown().catch((error) => {
          this.logger.error('Shutdown failed', { error: describeError(error) });
        });
        break;
    }
  }

  private deliverText(bytes: Uint8Array): void {
    let text: string;
    try {
      text = utf8Decode(bytes);
    } catch {
      this.report(new TransferError('Malformed', 'Text message is not valid UTF-8'), false);
      return;
    }
    this.emit({ type: 'message', text });
  }

  private onTransferEvent(event: TransferEvent): void {
    if (event.type === 'error') {
      this.report(event.error, false);
      return;
    }
    const { transfer } = event;
    if (transfer.kind === TransferKind.TEXT) {
      this.deliverText(transfer.bytes);
      return;
    }
    this.emit({
      type: 'media',
      bytes: transfer.bytes,
      mimeHint: transfer.mimeHint,
      transferId: transfer.transferId,
    });
  }

  /**
   * Recoverable loss of the current connection: reconnect in the background.
   * Crypto failures stop the session instead.
   */
  private onConnectionLost(generation: number, error: unknown): void {
    if (generation !== this.generation || !isOpenState(this.state)) {
      return;
    }
    if (isFatal(error)) {
      this.logger.error('Security failure, dropping link', { error: describeError(error) });
      this.fail(error);
      return;
    }

    this.logger.warn('Connection lost', describeLoss(error));
    this.dropConnection();
    this.transition(SessionState.RECONNECTING);
    this.reconnectLoop().catch((failure) => {
      this.logger.debug('Reconnect loop ended', { error: describeError(failure) });
    });
  }

  /**
   * Invalidate the current connection without touching session state
   */
  private dropConnection(): void {
    this.generation += 1;
    this.gate.close();
    this.stopTimers();
    this.transfers.suspend();
    this.sendEnvelope = null;
    this.recvEnvelope = null;
    const adapter = this.adapter;
    this.adapter = null;
    if (adapter) {
      this.closeAdapter(adapter).catch((error) => {
        this.logger.debug('Adapter close failed', { error: describeError(error) });
      });
    }
  }

  /**
   * Stop on a security or handshake failure: DISCONNECTED, surfaced, no retry
   */
  private fail(error: CryptoError | HandshakeError): void {
    this.dropConnection();
    this.gate.fail(error);
    this.resetSequenceState(`Session failed: ${error.message}`);
    this.transition(SessionState.DISCONNECTED);
    this.report(error, true);
  }

  /**
   * Forget counters, journal and transfers; the next handshake is cold
   */
  private resetSequenceState(reason: string): void {
    this.transfers.cancelAll(reason);
    this.live = false;
    this.sendSeq = 0;
    this.recvSeq = 0;
    this.ackRequested = false;
    this.journal.reset(0);
  }

  private async shutdown(fatal?: LinkError): Promise<void> {
    if (this.state === SessionState.CLOSED) return;
    const adapter = this.adapter;
    this.adapter = null;
    this.dropConnection();
    this.cancelSleep?.();
    this.gate.fail(new TransportError('Closed', 'Session closed'));
    this.transfers.cancelAll('Session closed');
    this.journal.reset(this.sendSeq);
    this.transition(SessionState.CLOSED);
    if (fatal) {
      this.report(fatal, true);
    }

    if (adapter) {
      await this.closeAdapter(adapter);
    }
    if (this.ownsKeyStore) {
      await this.keyStore.close();
    }
  }

  // --- writer ---

  /**
   * Queue one sequenced frame. Resolves with its sequence once written,
   * or once journaled if the connection fails mid-write. Data frames wait
   * while the journal has no room for them.
   */
  private sendSequenced(type: FrameType, plaintext: Uint8Array): Promise<number> {
    if (!isDataFrame(type)) {
      return this.enqueue(type, plaintext);
    }
    return this.admission.run(async () => {
      while (!this.journal.hasRoomFor(plaintext.length)) {
        this.requireNotClosed();
        const changed = this.journal.whenChanged();
        this.requestAck();
        await changed;
      }
      return this.enqueue(type, plaintext);
    });
  }

  private enqueue(type: FrameType, plaintext: Uint8Array): Promise<number> {
    return this.writer.run(async () => {
      await this.gate.wait();
      return this.writeSequenced(type, plaintext);
    });
  }

  /**
   * Ask the peer for its receive position with a PING; the answering PONG
   * acknowledges the journal. At most one request is outstanding.
   */
  private requestAck(): void {
    if (this.ackRequested) return;
    this.ackRequested = true;
    this.writer
      .run(async () => {
        await this.gate.wait();
        return this.writeSequenced(FrameType.PING, encodeHeartbeat(this.recvSeq));
      })
      .catch((error) => {
        this.logger.debug('Acknowledgement request not sent', { error: describeError(error) });
      });
  }

  /**
   * Assign, journal, seal and write. Callers must hold the writer.
   */
  private async writeSequenced(type: FrameType, plaintext: Uint8Array): Promise<number> {
    const adapter = this.adapter;
    if (!adapter || !this.sendEnvelope) {
      throw new TransportError('Closed', 'No active connection');
    }
    const generation = this.generation;
    const sequence = this.sendSeq++;
    this.journal.record({ type, sequence, plaintext });

    try {
      await adapter.write(this.sealFrame(type, sequence, plaintext));
    } catch (error) {
      // Stays journaled; replayed after resume
      this.onConnectionLost(generation, error);
      return sequence;
    }
    if (isDataFrame(type) && this.journal.dataBytes * 2 >= this.journal.capacity) {
      this.requestAck();
    }
    return sequence;
  }

  private sealFrame(type: FrameType, sequence: number, plaintext: Uint8Array): Uint8Array {
    if (!this.sendEnvelope) {
      throw new TransportError('Closed', 'No send key installed');
    }
    return encodeFrame(type, sequence, this.sendEnvelope.seal(plaintext, sequence, frameAad(type, sequence)));
  }

  // --- liveness ---

  private startTimers(generation: number): void {
    this.stopTimers();
    this.heartbeatTimer = setInterval(() => {
      this.sendSequenced(FrameType.PING, encodeHeartbeat(this.recvSeq)).catch((error) => {
        this.logger.debug('PING not sent', { error: describeError(error) });
      });
    }, this.config.heartbeatIntervalMs);

    const tick = Math.max(1, Math.floor(Math.min(this.config.heartbeatIntervalMs, this.config.degradedAfterMs) / 2));
    this.watchdogTimer = setInterval(() => this.checkLiveness(generation), tick);
  }

  private stopTimers(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.watchdogTimer) {
      clearInterval(this.watchdogTimer);
      this.watchdogTimer = null;
    }
  }

  private checkLiveness(generation: number): void {
    const silence = Date.now() - this.lastSeen;
    if (silence >= this.config.hardTimeoutMs) {
      this.onConnectionLost(generation, new TransportError('IOFault', `No frames for ${silence}ms`));
    } else if (silence >= this.config.degradedAfterMs && this.state === SessionState.ESTABLISHED) {
      this.logger.warn('Link degraded', { silenceMs: silence });
      this.transition(SessionState.DEGRADED);
    }
  }

  // --- helpers ---

  private async loadKey(): Promise<Uint8Array | null> {
    if (!this.peerAddress) return null;
    const record = await this.keyStore.getKey(this.peerAddress);
    return record ? record.key : null;
  }

  private async closeAdapter(adapter: ByteStreamAdapter): Promise<void> {
    try {
      await adapter.close();
    } catch (error) {
      this.logger.debug('Adapter close failed', { error: describeError(error) });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.cancelSleep = null;
        resolve();
      }, ms);
      this.cancelSleep = () => {
        clearTimeout(timer);
        this.cancelSleep = null;
        resolve();
      };
    });
  }

  private requireGeneration(generation: number): void {
    if (generation !== this.generation) {
      throw new TransportError('Closed', 'Connection superseded');
    }
  }

  private requireNotClosed(): void {
    if (this.state === SessionState.CLOSED) {
      throw new TransportError('Closed', 'Session is closed');
    }
  }

  private transition(to: SessionState): void {
    const from = this.state;
    if (from === to) return;
    if (!isTransitionAllowed(from, to)) {
      throw new LinkError(`Illegal state transition ${from} -> ${to}`);
    }
    this.state = to;
    this.logger.transition(from, to);
    this.emit({ type: 'state', from, to });
  }

  private report(error: unknown, fatal: boolean): void {
    const linkError = toLinkError(error);
    this.emit({
      type: 'error',
      kind: errorKind(linkError),
      detail: linkError.message,
      error: linkError,
      fatal,
    });
  }

  private emit(event: LinkEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (error) {
        this.logger.error('Error in event handler', { error: describeError(error) });
      }
    }
  }
}

function decodeHandshakePayload<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw new HandshakeError('Malformed', `Bad handshake payload: ${describeError(error)}`);
  }
}

function decodeControl<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw new FrameError('LengthMismatch', `Bad control payload: ${describeError(error)}`);
  }
}
