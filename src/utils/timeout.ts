// src/utils/timeout.ts

export class TimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor() {
    super("Operation was cancelled");
    this.name = "AbortedError";
  }
}

/**
 * Runs `task` with its own AbortSignal that fires after `timeoutMs` or when
 * `parent` aborts, whichever comes first. Rejects with TimeoutError or
 * AbortedError without waiting for the task to notice the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new AbortedError();
  }

  const controller = new AbortController();
  let rejectRace: (reason: Error) => void = () => undefined;
  const race = new Promise<never>((_resolve, reject) => {
    rejectRace = reject;
  });

  // The race settles before the task hears the abort, so a task that rejects
  // from its own abort listener cannot replace the timeout or cancel error
  const timer = setTimeout(() => {
    const err = new TimeoutError(timeoutMs);
    rejectRace(err);
    controller.abort(err);
  }, timeoutMs);

  const onParentAbort = () => {
    const err = new AbortedError();
    rejectRace(err);
    controller.abort(err);
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([task(controller.signal), race]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
