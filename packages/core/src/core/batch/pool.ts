export interface TaskLimiter {
  run<T>(task: () => Promise<T>): Promise<T>;
  readonly active: number;
  readonly pending: number;
}

/**
 * Fixed-size worker pool: at most `limit` tasks in flight, the rest wait in
 * FIFO order for a free slot.
 */
export const createTaskLimiter = (limit: number): TaskLimiter => {
  const permits = Math.max(1, Math.trunc(limit));
  const waiting: (() => void)[] = [];
  let active = 0;

  const acquire = async (): Promise<void> => {
    if (active < permits) {
      active += 1;
      return;
    }
    await new Promise<void>((resolve) => {
      waiting.push(resolve);
    });
  };

  const release = () => {
    const next = waiting.shift();
    if (next) {
      // Hand the slot straight to the next waiter; `active` stays the same.
      next();
    } else {
      active -= 1;
    }
  };

  return {
    async run<T>(task: () => Promise<T>): Promise<T> {
      await acquire();
      try {
        return await task();
      } finally {
        release();
      }
    },
    get active() {
      return active;
    },
    get pending() {
      return waiting.length;
    },
  };
};
