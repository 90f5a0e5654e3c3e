/**
 * Link an internal controller to any number of outer signals.
 * Aborting any outer signal aborts the returned controller; `dispose`
 * detaches the listeners once the operation is over.
 */
export function linkedController(
  ...signals: Array<AbortSignal | undefined>
): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const signal of signals) {
    if (!signal) continue;
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const onAbort = (): void => controller.abort(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => signal.removeEventListener('abort', onAbort));
  }

  return {
    controller,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Run `fn` with a signal that aborts after `ms` or when `outer` aborts.
 * `timedOut()` tells the two apart afterwards.
 */
export async function withDeadline<T>(
  ms: number,
  outer: AbortSignal | undefined,
  fn: (signal: AbortSignal, timedOut: () => boolean) => Promise<T>,
): Promise<T> {
  const { controller, dispose } = linkedController(outer);
  let expired = false;
  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`deadline of ${ms}ms exceeded`));
  }, ms);

  try {
    return await fn(controller.signal, () => expired);
  } finally {
    clearTimeout(timer);
    dispose();
  }
}
