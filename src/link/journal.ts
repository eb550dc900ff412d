import { FrameType } from '../codec/types.js';

export interface JournalEntry {
  type: FrameType;
  sequence: number;
  plaintext: Uint8Array;
}

function isPayload(type: FrameType): boolean {
  return type === FrameType.DATA_TEXT || type === FrameType.DATA_CHUNK;
}

/**
 * Sent sequenced frames the peer has not acknowledged yet, kept as
 * plaintext so they can be resealed under the next connection's keys.
 *
 * Entries only leave through `ackUpTo` or `reset`. The byte cap counts
 * DATA_TEXT and DATA_CHUNK plaintext; writers check `hasRoomFor` and wait
 * on `whenChanged` until an acknowledgement frees space.
 */
export class ReplayJournal {
  private entries: JournalEntry[] = [];
  private totalBytes = 0;
  private payloadBytes = 0;
  private startSeq = 0;
  private changeWaiters: (() => void)[] = [];

  constructor(private readonly maxBytes: number) {}

  /** Lowest sequence that can still be replayed */
  get start(): number {
    return this.startSeq;
  }

  get bytes(): number {
    return this.totalBytes;
  }

  /** Journaled DATA_TEXT and DATA_CHUNK bytes, the part held to the cap */
  get dataBytes(): number {
    return this.payloadBytes;
  }

  get size(): number {
    return this.entries.length;
  }

  get capacity(): number {
    return this.maxBytes;
  }

  /**
   * Whether a data frame of `size` bytes fits under the cap. An empty
   * journal takes any single frame.
   */
  hasRoomFor(size: number): boolean {
    return this.payloadBytes === 0 || this.payloadBytes + size <= this.maxBytes;
  }

  record(entry: JournalEntry): void {
    if (this.entries.length === 0) {
      this.startSeq = entry.sequence;
    }
    this.entries.push(entry);
    this.totalBytes += entry.plaintext.length;
    if (isPayload(entry.type)) {
      this.payloadBytes += entry.plaintext.length;
    }
  }

  /**
   * Drop everything below `nextExpected`, the peer's next expected sequence
   */
  ackUpTo(nextExpected: number): void {
    while (this.entries.length > 0 && this.entries[0].sequence < nextExpected) {
      this.dropFirst();
    }
    if (this.entries.length === 0 && nextExpected > this.startSeq) {
      this.startSeq = nextExpected;
    }
    this.notify();
  }

  /**
   * Entries with sequence >= `from`, in order
   */
  entriesFrom(from: number): JournalEntry[] {
    return this.entries.filter((entry) => entry.sequence >= from);
  }

  /**
   * Forget everything; the next recorded entry starts at `start`
   */
  reset(start = 0): void {
    this.entries = [];
    this.totalBytes = 0;
    this.payloadBytes = 0;
    this.startSeq = start;
    this.notify();
  }

  /**
   * Resolves on the next acknowledgement or reset
   */
  whenChanged(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.changeWaiters.push(resolve);
    });
  }

  private notify(): void {
    const waiters = this.changeWaiters;
    this.changeWaiters = [];
    for (const waiter of waiters) waiter();
  }

  private dropFirst(): void {
    const first = this.entries.shift();
    if (!first) return;
    this.totalBytes -= first.plaintext.length;
    if (isPayload(first.type)) {
      this.payloadBytes -= first.plaintext.length;
    }
    this.startSeq = this.entries.length > 0 ? this.entries[0].sequence : first.sequence + 1;
  }
}
