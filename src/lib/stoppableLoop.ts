import { createStopSignal } from "./stopSignal";

type StoppableLoopHandlers = {
  intervalMs: number;
  onTick: () => void;
};

/**
 * Cooperative background loop
 *
 * Runs `onTick`, then waits `intervalMs` on its stop signal, until stopped.
 * The signal is checked once per interval; `join` sets it and waits for the
 * loop to come back. A tick that throws ends the loop, and `join` rethrows
 * that error.
 */
export const createStoppableLoop = (handlers: StoppableLoopHandlers) => {
  const { intervalMs, onTick } = handlers;
  const signal = createStopSignal();
  let running: Promise<void> | null = null;
  let isRunning = false;
  let failure: { error: unknown } | null = null;

  const run = async () => {
    try {
      while (!signal.isSet()) {
        onTick();
        await signal.wait(intervalMs);
      }
    } finally {
      isRunning = false;
    }
  };

  const start = () => {
    if (running !== null) return;
    isRunning = true;
    running = run().catch((error: unknown) => {
      failure = { error };
      console.error("[stoppableLoop] Tick failed, loop stopped:", error);
    });
  };

  const rethrowFailure = () => {
    if (failure !== null) {
      throw failure.error;
    }
  };

  /**
   * Stop the loop and wait for it to exit. With a timeout, resolves `false`
   * if the loop is still winding down when it elapses.
   */
  const join = async (timeoutMs?: number): Promise<boolean> => {
    signal.set();
    if (running === null) return true;
    if (timeoutMs === undefined) {
      await running;
      rethrowFailure();
      return true;
    }

    let taskId: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<boolean>((resolve) => {
      taskId = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      const exited = await Promise.race([running.then(() => true), timedOut]);
      rethrowFailure();
      return exited;
    } finally {
      clearTimeout(taskId);
    }
  };

  const api = {
    start,
    join,
    isRunning: () => isRunning,
    isStopped: signal.isSet,
  };

  return api;
};

export type StoppableLoop = ReturnType<typeof createStoppableLoop>;
