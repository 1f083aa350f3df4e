/** Resolves once `signal` aborts. Never rejects. */
export function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}

/**
 * Waits for `done`, giving up quietly if `signal` aborts first.
 * Returns true when `done` resolved.
 */
export async function waitUnlessAborted(done: Promise<void>, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  let completed = false;
  await Promise.race([done.then(() => { completed = true; }), whenAborted(signal)]);
  return completed;
}

/** True for the error `signal.throwIfAborted()` and abortable APIs reject with. */
export function isAbortError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'name' in err && err.name === 'AbortError';
}
