import { TransportError } from '../errors.js';

/**
 * Open/closed latch that writers wait on. Failing the gate rejects every
 * waiter and every later wait until it is reopened.
 */
export class Gate {
  private isOpen = false;
  private failure: Error | null = null;
  private waiters: { resolve: () => void; reject: (error: Error) => void }[] = [];

  get opened(): boolean {
    return this.isOpen;
  }

  open(): void {
    this.isOpen = true;
    this.failure = null;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.resolve();
    }
  }

  close(): void {
    this.isOpen = false;
  }

  fail(error: Error): void {
    this.isOpen = false;
    this.failure = error;
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  wait(): Promise<void> {
    if (this.failure) return Promise.reject(this.failure);
    if (this.isOpen) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }
}

/**
 * Runs async tasks one at a time in submission order. A failed task does
 * not stop the ones queued behind it.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  get length(): number {
    return this.pending;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => {
        this.pending -= 1;
      },
      () => {
        this.pending -= 1;
      }
    );
    return result;
  }

  /**
   * Resolves once everything queued so far has settled
   */
  idle(): Promise<void> {
    return this.tail;
  }
}

/**
 * Race `promise` against a timer. The loser's eventual rejection is
 * observed so it never surfaces as unhandled.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error = () => new TransportError('IOFault', `Timed out after ${ms}ms`)
): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  promise.catch(() => undefined);
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
