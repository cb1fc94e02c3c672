/**
 * Bounded worker pool and per-call time budgets for collaborator tasks.
 */

export function abortError(message = 'Stage cancelled'): DOMException {
  return new DOMException(message, 'AbortError');
}

// Check abort signal and throw if cancelled
export function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw abortError();
  }
}

/**
 * Run tasks with at most `limit` in flight. Results keep task order.
 * Once `signal` aborts, lanes stop picking up new tasks and the call rejects.
 */
export async function withConcurrencyLimit<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
  signal?: AbortSignal,
): Promise<T[]> {
  const results: T[] = new Array<T>(tasks.length);
  let nextIndex = 0;

  async function lane(): Promise<void> {
    while (nextIndex < tasks.length) {
      checkAborted(signal);
      const i = nextIndex++;
      results[i] = await tasks[i]();
    }
  }

  const laneCount = Math.max(1, Math.min(limit, tasks.length));
  await Promise.all(Array.from({ length: laneCount }, () => lane()));
  checkAborted(signal);
  return results;
}

export interface TimeBudget {
  timeoutMs: number;
  /** Stage-level cancellation */
  signal?: AbortSignal;
  /** Builds the error the call rejects with when the budget runs out */
  onTimeout: () => Error;
}

/**
 * Invoke an opaque collaborator call under a time budget.
 *
 * The call receives its own AbortSignal, aborted on timeout or stage
 * cancellation. The returned promise settles as soon as either happens,
 * whether or not the collaborator honours the signal.
 */
export function callWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  budget: TimeBudget,
): Promise<T> {
  const { timeoutMs, signal, onTimeout } = budget;

  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }

    const controller = new AbortController();
    let settled = false;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      settle();
    };

    const onAbort = () => {
      controller.abort();
      finish(() => reject(abortError()));
    };

    const timer = setTimeout(() => {
      const err = onTimeout();
      controller.abort(err);
      finish(() => reject(err));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    void Promise.resolve()
      .then(() => task(controller.signal))
      .then(
        (value) => finish(() => resolve(value)),
        (err: unknown) => finish(() => reject(err)),
      );
  });
}

export function elapsedSince(startMs: number): number {
  return Math.max(0, Date.now() - startMs);
}
