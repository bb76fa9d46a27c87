// AbortSignal helpers shared by the dispatcher, scheduler and providers

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detaches listeners from the parent signals and clears the timer. */
  dispose: () => void;
  /** True when the timer fired (as opposed to a parent aborting). */
  timedOut: () => boolean;
}

/**
 * Returns a signal that aborts when any parent aborts or after `timeoutMs`.
 * Callers must `dispose()` once the guarded operation settles.
 */
export function linkSignals(parents: Array<AbortSignal | undefined>, timeoutMs?: number): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];
  let fired = false;

  for (const parent of parents) {
    if (!parent) continue;
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = () => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (timeoutMs !== undefined && !controller.signal.aborted) {
    const timer = setTimeout(() => {
      fired = true;
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, Math.max(0, timeoutMs));
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
      cleanups.length = 0;
    },
    timedOut: () => fired,
  };
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}
