import { OperationAbortedError } from '../common/abort';

/** Deferred unit of work run by the dispatch loop. */
export type WorkItem = (signal: AbortSignal) => Promise<void>;

interface PendingRead<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Unbounded FIFO channel. Writes never block; reads wait for the next item.
 */
export class WorkItemChannel<T = WorkItem> {
  private readonly items: T[] = [];
  private readonly reads: PendingRead<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  write(item: T): void {
    const read = this.reads.shift();
    if (!read) {
      this.items.push(item);
      return;
    }
    if (read.onAbort) {
      read.signal?.removeEventListener('abort', read.onAbort);
    }
    read.resolve(item);
  }

  read(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new OperationAbortedError(signal.reason));
    }
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }

    return new Promise<T>((resolve, reject) => {
      const read: PendingRead<T> = { resolve, reject, signal };
      if (signal) {
        read.onAbort = () => {
          const index = this.reads.indexOf(read);
          if (index >= 0) {
            this.reads.splice(index, 1);
          }
          reject(new OperationAbortedError(signal.reason));
        };
        signal.addEventListener('abort', read.onAbort, { once: true });
      }
      this.reads.push(read);
    });
  }
}
