/**
 * Time source for the frame scheduler. Tests swap in a virtual clock.
 */

export type SleepResult = 'elapsed' | 'interrupted';

export interface Clock {
  /** Milliseconds, monotonic */
  now(): number;
  /** Resolves 'interrupted' as soon as the signal aborts */
  sleep(ms: number, signal: AbortSignal): Promise<SleepResult>;
}

export const systemClock: Clock = {
  now: () => performance.now(),

  sleep(ms: number, signal: AbortSignal): Promise<SleepResult> {
    if (signal.aborted) return Promise.resolve('interrupted');

    const deadline = performance.now() + Math.max(0, ms);

    return new Promise(resolve => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const onAbort = () => {
        clearTimeout(timer);
        resolve('interrupted');
      };

      // Timers may fire slightly before the deadline; re-arm until it passes
      const arm = () => {
        const remaining = deadline - performance.now();
        if (remaining <= 0) {
          signal.removeEventListener('abort', onAbort);
          resolve('elapsed');
          return;
        }
        timer = setTimeout(arm, Math.ceil(remaining));
      };

      signal.addEventListener('abort', onAbort, { once: true });
      arm();
    });
  },
};
