/**
 * Stop signal - a cancellation token with a timed wait
 *
 * `wait` sleeps for up to `ms` and wakes early the moment the signal is set,
 * resolving `true` if it was woken by the signal and `false` on timeout.
 */
export const createStopSignal = () => {
  let stopped = false;
  const waiters = new Set<() => void>();

  const api = {
    set: () => {
      stopped = true;
      waiters.forEach((wake) => wake());
      waiters.clear();
    },
    isSet: () => stopped,
    wait: (ms: number) =>
      new Promise<boolean>((resolve) => {
        if (stopped) {
          resolve(true);
          return;
        }
        const wake = () => {
          clearTimeout(taskId);
          resolve(true);
        };
        const taskId = setTimeout(() => {
          waiters.delete(wake);
          resolve(false);
        }, ms);
        waiters.add(wake);
      }),
  };

  return api;
};

export type StopSignal = ReturnType<typeof createStopSignal>;
