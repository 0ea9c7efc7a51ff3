export class OperationAbortedError extends Error {
  constructor(readonly reason?: unknown) {
    super(typeof reason === 'string' ? `Aborted: ${reason}` : 'Aborted');
    this.name = 'OperationAbortedError';
  }
}

/** Resolves after `ms`, or rejects with OperationAbortedError on abort. */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAbortedError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationAbortedError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Controller aborted when `parent` aborts; detach to drop the link. */
export function linkedAbortController(parent: AbortSignal): {
  controller: AbortController;
  detach: () => void;
} {
  const controller = new AbortController();
  const onAbort = () => controller.abort(parent.reason);
  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    parent.addEventListener('abort', onAbort, { once: true });
  }
  return {
    controller,
    detach: () => parent.removeEventListener('abort', onAbort),
  };
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : String(error);
}
