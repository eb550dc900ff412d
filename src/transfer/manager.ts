import { encodeChunk, encodeChunkAck, encodeTransferAbort } from '../codec/payloads.js';
import {
  TransferKind,
  type ChunkPayload,
  type ChunkAckPayload,
  type TransferAbortPayload,
} from '../codec/types.js';
import { concatBytes, generateTransferId, stringToTransferId, transferIdToString } from '../crypto/utils.js';
import { TransferError, describeError, type TransferFailure } from '../errors.js';
import type { Logger } from '../logger.js';

export interface TransferOptions {
  chunkSize: number;
  windowSize: number;
  transferTimeoutMs: number;
  maxTransferSize: number;
}

/**
 * Outbound side of the session writer, as seen by transfers
 */
export interface TransferSink {
  /** Send one encoded DATA_CHUNK payload; resolves once written */
  sendChunk(payload: Uint8Array): Promise<void>;
  /** Send one encoded CHUNK_ACK payload */
  sendAck(payload: Uint8Array): Promise<void>;
  /** Send one encoded TRANSFER_ABORT payload */
  sendAbort(payload: Uint8Array): Promise<void>;
}

export interface CompletedTransfer {
  transferId: string;
  kind: TransferKind;
  mimeHint: string;
  bytes: Uint8Array;
}

export type TransferEvent =
  | { type: 'complete'; transfer: CompletedTransfer }
  | { type: 'error'; error: TransferError };

type Timer = ReturnType<typeof setTimeout>;

interface OutboundTransfer {
  id: string;
  total: number;
  sent: number;
  acked: Set<number>;
  wake: (() => void) | null;
  failure: TransferError | null;
  timer: Timer | null;
  resolve: () => void;
  reject: (error: TransferError) => void;
}

/** Finished inbound ids remembered so late chunks are not taken for new transfers */
const FINISHED_MEMORY = 256;

interface InboundTransfer {
  id: string;
  total: number;
  kind: TransferKind;
  mimeHint: string;
  chunks: Map<number, Uint8Array>;
  bytes: number;
  timer: Timer | null;
}

/**
 * Split a payload into chunks of at most `chunkSize` bytes.
 * An empty payload is one empty chunk.
 */
export function planChunks(data: Uint8Array, chunkSize: number): Uint8Array[] {
  if (!Number.isInteger(chunkSize) || chunkSize < 1) {
    throw new RangeError(`Invalid chunk size: ${chunkSize}`);
  }
  const chunks: Uint8Array[] = [];
  for (let i = 0; i < data.length; i += chunkSize) {
    chunks.push(data.slice(i, Math.min(i + chunkSize, data.length)));
  }
  if (chunks.length === 0) {
    chunks.push(new Uint8Array(0));
  }
  return chunks;
}

/**
 * Chunked transfers in both directions.
 *
 * Outbound transfers keep at most `windowSize` chunks unacknowledged and
 * resolve once every chunk is acknowledged. Inbound transfers are keyed by
 * transfer id and reordered by chunk index.
 *
 * Both directions give up after `transferTimeoutMs` without progress, and
 * whichever side gives up tells the other with a TRANSFER_ABORT. Idle
 * timers only run while the link is up; see `suspend` and `resume`.
 */
export class TransferManager {
  private readonly outbound = new Map<string, OutboundTransfer>();
  private readonly inbound = new Map<string, InboundTransfer>();
  private readonly finished = new Map<string, 'complete' | TransferFailure>();
  private idleWaiters: (() => void)[] = [];
  private suspended = false;

  constructor(
    private readonly options: TransferOptions,
    private readonly sink: TransferSink,
    private readonly listener: (event: TransferEvent) => void,
    private readonly logger: Logger
  ) {}

  get outboundCount(): number {
    return this.outbound.size;
  }

  get inboundCount(): number {
    return this.inbound.size;
  }

  /**
   * Send `data` as one transfer. Resolves with the transfer id (hex) once
   * the peer has acknowledged every chunk.
   */
  async send(data: Uint8Array, kind: TransferKind, mimeHint: string): Promise<string> {
    if (data.length > this.options.maxTransferSize) {
      throw new TransferError(
        'TooLarge',
        `Payload of ${data.length} bytes exceeds limit of ${this.options.maxTransferSize}`
      );
    }

    const chunks = planChunks(data, this.options.chunkSize);
    const transferId = generateTransferId();
    const id = transferIdToString(transferId);

    let resolve: () => void = () => undefined;
    let reject: (error: TransferError) => void = () => undefined;
    const done = new Promise<void>((res, rej) => {
      resolve = res;
      reject = rej;
    });

    const transfer: OutboundTransfer = {
      id,
      total: chunks.length,
      sent: 0,
      acked: new Set(),
      wake: null,
      failure: null,
      timer: null,
      resolve,
      reject,
    };
    this.outbound.set(id, transfer);
    this.restartOutboundTimer(transfer);
    this.logger.debug('Sending transfer', { id, chunks: chunks.length, bytes: data.length, kind });

    this.pump(transfer, transferId, chunks, kind, mimeHint).catch((error: unknown) => {
      this.failOutbound(
        transfer,
        error instanceof TransferError
          ? error
          : new TransferError('Cancelled', `Transfer ${id} failed: ${describeError(error)}`, id)
      );
    });

    await done;
    return id;
  }

  handleAck(ack: ChunkAckPayload): void {
    const id = transferIdToString(ack.transferId);
    const transfer = this.outbound.get(id);
    if (!transfer || ack.index >= transfer.total) {
      this.logger.debug('Ignoring acknowledgement', { id, index: ack.index });
      return;
    }
    transfer.acked.add(ack.index);
    this.wakeSender(transfer);
    if (transfer.acked.size === transfer.total) {
      this.finishOutbound(transfer);
      transfer.resolve();
      return;
    }
    this.restartOutboundTimer(transfer);
  }

  /**
   * The peer gave up on a transfer, in either direction
   */
  handleAbort(abort: TransferAbortPayload): void {
    const id = transferIdToString(abort.transferId);
    const outgoing = this.outbound.get(id);
    if (outgoing) {
      this.failOutbound(
        outgoing,
        new TransferError(abort.reason, `Peer aborted transfer ${id}: ${abort.reason}`, id)
      );
      return;
    }
    if (this.inbound.has(id)) {
      this.discardInbound(id, new TransferError('Cancelled', `Peer aborted transfer ${id}`, id), false);
      return;
    }
    this.logger.debug('Ignoring abort for unknown transfer', { id, reason: abort.reason });
  }

  handleChunk(chunk: ChunkPayload): void {
    const id = transferIdToString(chunk.transferId);

    const outcome = this.finished.get(id);
    if (outcome) {
      this.logger.debug('Chunk for finished transfer', { id, index: chunk.index, outcome });
      if (outcome === 'complete') {
        this.acknowledge(chunk);
      } else {
        this.sendAbort(id, outcome);
      }
      return;
    }

    if (chunk.total === 0 || chunk.index >= chunk.total) {
      this.discardInbound(
        id,
        new TransferError('Malformed', `Chunk ${chunk.index} of ${chunk.total} is out of range`, id)
      );
      return;
    }

    let transfer = this.inbound.get(id);
    if (!transfer) {
      transfer = {
        id,
        total: chunk.total,
        kind: chunk.kind,
        mimeHint: chunk.mimeHint,
        chunks: new Map(),
        bytes: 0,
        timer: null,
      };
      this.inbound.set(id, transfer);
    } else if (
      transfer.total !== chunk.total ||
      transfer.kind !== chunk.kind ||
      transfer.mimeHint !== chunk.mimeHint
    ) {
      this.discardInbound(id, new TransferError('Malformed', 'Chunk metadata changed mid-transfer', id));
      return;
    }

    if (transfer.chunks.has(chunk.index)) {
      this.logger.debug('Duplicate chunk', { id, index: chunk.index });
      this.acknowledge(chunk);
      return;
    }

    if (transfer.bytes + chunk.data.length > this.options.maxTransferSize) {
      this.discardInbound(
        id,
        new TransferError('TooLarge', `Inbound transfer exceeds ${this.options.maxTransferSize} bytes`, id)
      );
      return;
    }

    transfer.chunks.set(chunk.index, chunk.data);
    transfer.bytes += chunk.data.length;
    this.restartInboundTimer(transfer);

    if (transfer.chunks.size === transfer.total) {
      this.completeInbound(transfer);
    }
    this.acknowledge(chunk);
  }

  /**
   * Resolves once no outbound transfer is pending
   */
  whenIdle(): Promise<void> {
    if (this.outbound.size === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop every idle timer while the link is down
   */
  suspend(): void {
    this.suspended = true;
    for (const transfer of [...this.outbound.values(), ...this.inbound.values()]) {
      if (transfer.timer) {
        clearTimeout(transfer.timer);
        transfer.timer = null;
      }
    }
  }

  /**
   * Restart idle timers from zero once the link is back
   */
  resume(): void {
    this.suspended = false;
    for (const transfer of this.outbound.values()) this.restartOutboundTimer(transfer);
    for (const transfer of this.inbound.values()) this.restartInboundTimer(transfer);
  }

  /**
   * Fail every outbound transfer and free every partial inbound one
   */
  cancelAll(reason: string): void {
    for (const transfer of [...this.outbound.values()]) {
      this.failOutbound(transfer, new TransferError('Cancelled', reason, transfer.id));
    }
    for (const transfer of this.inbound.values()) {
      if (transfer.timer) clearTimeout(transfer.timer);
    }
    this.inbound.clear();
    this.finished.clear();
  }

  private async pump(
    transfer: OutboundTransfer,
    transferId: Uint8Array,
    chunks: Uint8Array[],
    kind: TransferKind,
    mimeHint: string
  ): Promise<void> {
    for (let index = 0; index < chunks.length; index++) {
      await this.waitForWindow(transfer);
      transfer.sent += 1;
      await this.sink.sendChunk(
        encodeChunk({ transferId, index, total: chunks.length, kind, mimeHint, data: chunks[index] })
      );
    }
  }

  private async waitForWindow(transfer: OutboundTransfer): Promise<void> {
    for (;;) {
      if (transfer.failure) throw transfer.failure;
      if (transfer.sent - transfer.acked.size < this.options.windowSize) return;
      await new Promise<void>((resolve) => {
        transfer.wake = resolve;
      });
    }
  }

  private wakeSender(transfer: OutboundTransfer): void {
    const wake = transfer.wake;
    transfer.wake = null;
    wake?.();
  }

  private failOutbound(transfer: OutboundTransfer, error: TransferError): void {
    if (!this.outbound.has(transfer.id)) return;
    transfer.failure = error;
    this.finishOutbound(transfer);
    this.wakeSender(transfer);
    transfer.reject(error);
  }

  private finishOutbound(transfer: OutboundTransfer): void {
    if (transfer.timer) {
      clearTimeout(transfer.timer);
      transfer.timer = null;
    }
    if (!this.outbound.delete(transfer.id)) return;
    if (this.outbound.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const waiter of waiters) waiter();
    }
  }

  private restartOutboundTimer(transfer: OutboundTransfer): void {
    if (transfer.timer) clearTimeout(transfer.timer);
    transfer.timer = null;
    if (this.suspended) return;
    transfer.timer = setTimeout(() => {
      const error = new TransferError(
        'Timeout',
        `Transfer ${transfer.id} unacknowledged for ${this.options.transferTimeoutMs}ms`,
        transfer.id
      );
      this.logger.warn('Abandoning transfer', { id: transfer.id, reason: error.reason });
      this.sendAbort(transfer.id, 'Timeout');
      this.failOutbound(transfer, error);
    }, this.options.transferTimeoutMs);
  }

  private restartInboundTimer(transfer: InboundTransfer): void {
    if (transfer.timer) clearTimeout(transfer.timer);
    transfer.timer = null;
    if (this.suspended) return;
    transfer.timer = setTimeout(() => {
      this.discardInbound(
        transfer.id,
        new TransferError('Timeout', `Transfer ${transfer.id} idle for ${this.options.transferTimeoutMs}ms`, transfer.id)
      );
    }, this.options.transferTimeoutMs);
  }

  private acknowledge(chunk: ChunkPayload): void {
    this.sink
      .sendAck(encodeChunkAck({ transferId: chunk.transferId, index: chunk.index }))
      .catch((error) => {
        this.logger.warn('Failed to acknowledge chunk', {
          id: transferIdToString(chunk.transferId),
          index: chunk.index,
          error: describeError(error),
        });
      });
  }

  private sendAbort(id: string, reason: TransferFailure): void {
    this.sink.sendAbort(encodeTransferAbort({ transferId: stringToTransferId(id), reason })).catch((error) => {
      this.logger.warn('Failed to abort transfer', { id, reason, error: describeError(error) });
    });
  }

  private discardInbound(id: string, error: TransferError, notifyPeer = true): void {
    const transfer = this.inbound.get(id);
    if (transfer) {
      if (transfer.timer) clearTimeout(transfer.timer);
      this.inbound.delete(id);
    }
    this.remember(id, error.reason);
    this.logger.warn('Discarding transfer', { id, reason: error.reason, message: error.message });
    if (notifyPeer) {
      this.sendAbort(id, error.reason);
    }
    this.listener({ type: 'error', error });
  }

  private remember(id: string, outcome: 'complete' | TransferFailure): void {
    this.finished.set(id, outcome);
    if (this.finished.size > FINISHED_MEMORY) {
      const oldest = this.finished.keys().next();
      if (!oldest.done) this.finished.delete(oldest.value);
    }
  }

  private completeInbound(transfer: InboundTransfer): void {
    if (transfer.timer) clearTimeout(transfer.timer);
    this.inbound.delete(transfer.id);
    this.remember(transfer.id, 'complete');

    const ordered: Uint8Array[] = [];
    for (let index = 0; index < transfer.total; index++) {
      const part = transfer.chunks.get(index);
      if (!part) {
        this.discardInbound(transfer.id, new TransferError('Malformed', `Missing chunk ${index}`, transfer.id));
        return;
      }
      ordered.push(part);
    }

    this.logger.debug('Transfer complete', { id: transfer.id, bytes: transfer.bytes });
    this.listener({
      type: 'complete',
      transfer: {
        transferId: transfer.id,
        kind: transfer.kind,
        mimeHint: transfer.mimeHint,
        bytes: concatBytes(...ordered),
      },
    });
  }
}
