/** Largest delay a Node timer holds; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface LinkedAbort {
  controller: AbortController;
  signal: AbortSignal;
  /** Detaches listeners and clears the timer. Does not abort. */
  dispose: () => void;
}

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, label = 'Operation') {
    super(`${label} timed out after ${timeoutMs}ms.`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Creates a controller that aborts when any parent signal aborts or, when
 * `timeoutMs` is given, once the timeout elapses (with a `TimeoutError` reason).
 */
export function linkAbort(
  parents: Array<AbortSignal | undefined>,
  timeoutMs?: number,
  label?: string,
): LinkedAbort {
  const controller = new AbortController();
  const detachers: Array<() => void> = [];
  let timer: NodeJS.Timeout | undefined;

  for (const parent of parents) {
    if (!parent) {
      continue;
    }
    if (parent.aborted) {
      controller.abort(parent.reason);
      break;
    }
    const onAbort = (): void => controller.abort(parent.reason);
    parent.addEventListener('abort', onAbort, { once: true });
    detachers.push(() => parent.removeEventListener('abort', onAbort));
  }

  if (!controller.signal.aborted && timeoutMs !== undefined && Number.isFinite(timeoutMs)) {
    const deadline = Date.now() + timeoutMs;
    // Long timeouts are re-armed in pieces below the timer limit.
    const arm = (): void => {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        controller.abort(new TimeoutError(timeoutMs, label));
        return;
      }
      timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_DELAY_MS));
    };
    timer = setTimeout(arm, Math.min(Math.max(timeoutMs, 0), MAX_TIMER_DELAY_MS));
  }

  return {
    controller,
    signal: controller.signal,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
      }
      for (const detach of detachers) {
        detach();
      }
    },
  };
}
