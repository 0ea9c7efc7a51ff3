import { OperationAbortedError } from '../common/abort';

interface Waiter {
  grant: () => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Counting semaphore bounding simultaneously running jobs. Waiters are
 * served oldest first.
 */
export class ConcurrencyGate {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    this.capacity = Math.max(1, Math.floor(capacity));
    this.available = this.capacity;
  }

  get inUse(): number {
    return this.capacity - this.available;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new OperationAbortedError(signal.reason));
    }
    if (this.available > 0 && this.waiters.length === 0) {
      this.available--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { grant: resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) {
            this.waiters.splice(index, 1);
          }
          reject(new OperationAbortedError(signal.reason));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Permit passes straight to the waiter
      if (next.onAbort) {
        next.signal?.removeEventListener('abort', next.onAbort);
      }
      next.grant();
      return;
    }
    if (this.available >= this.capacity) {
      throw new Error('ConcurrencyGate released more times than acquired');
    }
    this.available++;
  }
}
