export type PollingFetch<T> = (signal: AbortSignal) => Promise<T>;

export type PollingTaskOptions<T> = {
  intervalMs: number;
  fetch: PollingFetch<T>;
  onResult: (result: T) => void;
  /** Called for failed fetches of a live task. Aborted fetches are never reported. */
  onError?: (error: unknown) => void;
};

export type PollingTask = {
  /** Cancels the timer and the in-flight fetch. Safe to call more than once. */
  stop: () => void;
  /** Drops the in-flight fetch (if any) and fetches now. No-op once stopped. */
  refresh: () => void;
  isActive: () => boolean;
};

/**
 * Fetches immediately, then once per `intervalMs`, until stopped.
 *
 * At most one fetch is in flight: a tick that fires while the previous fetch is
 * still pending is skipped. Each fetch gets its own AbortSignal and a generation
 * number; a result is applied only if the task is still active and no newer
 * fetch has been started since (see `refresh`).
 */
export function startPolling<T>(options: PollingTaskOptions<T>): PollingTask {
  const { intervalMs } = options;
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new RangeError(`intervalMs must be a positive number, got ${intervalMs}`);
  }

  let active = true;
  let generation = 0;
  let inFlight: AbortController | null = null;

  const runOnce = async () => {
    if (!active || inFlight) return;

    const controller = new AbortController();
    inFlight = controller;
    generation += 1;
    const current = generation;

    try {
      const result = await options.fetch(controller.signal);
      if (!active || current !== generation) return;
      options.onResult(result);
    } catch (error) {
      if (!active || controller.signal.aborted || current !== generation) return;
      options.onError?.(error);
    } finally {
      if (inFlight === controller) inFlight = null;
    }
  };

  const tick = () => {
    runOnce().catch((error: unknown) => {
      console.error('[polling] onError handler threw', error);
    });
  };

  const timer: ReturnType<typeof setInterval> = setInterval(tick, intervalMs);
  tick();

  return {
    stop: () => {
      if (!active) return;
      active = false;
      clearInterval(timer);
      inFlight?.abort();
      inFlight = null;
    },
    refresh: () => {
      if (!active) return;
      inFlight?.abort();
      inFlight = null;
      tick();
    },
    isActive: () => active,
  };
}
