/** Caps how many async tasks run at once; extra callers wait in FIFO order. */
export function createLimiter(limit: number) {
  let active = 0;
  const waiters: Array<() => void> = [];

  async function acquire() {
    if (active < limit) {
      active++;
      return;
    }
    await new Promise<void>((resolve) => {
      waiters.push(() => {
        active++;
        resolve();
      });
    });
  }

  function release() {
    active = Math.max(0, active - 1);
    const next = waiters.shift();
    if (next) next();
  }

  return async function run<T>(task: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };
}
