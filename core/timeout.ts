export class RequestAbortedError extends Error {
  constructor() {
    super('Request aborted');
    this.name = 'RequestAbortedError';
  }
}

/**
 * Races `task` against a timer and an optional abort signal.
 * The task itself keeps running in the background when it loses; its result is ignored.
 */
export async function withTimeout<T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  signal?: AbortSignal
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let abortListener: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    if (signal?.aborted) {
      reject(new RequestAbortedError());
    } else if (signal) {
      abortListener = () => reject(new RequestAbortedError());
      signal.addEventListener('abort', abortListener, { once: true });
    }
  });

  try {
    return await Promise.race([guards, task]);
  } finally {
    clearTimeout(timer);
    if (signal && abortListener) {
      signal.removeEventListener('abort', abortListener);
    }
  }
}
