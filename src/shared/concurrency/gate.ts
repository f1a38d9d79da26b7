/** Runs a task once one of the gate's slots is free. */
export type Gate = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * At most `size` tasks hold a slot at a time. Waiters are woken in arrival
 * order and a finishing task hands its slot straight to the next waiter.
 */
export const createGate = (size: number): Gate => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Gate size must be a positive integer, got ${size}`);
  }

  let held = 0;
  const waiters: Array<() => void> = [];

  const acquire = async (): Promise<void> => {
    if (held < size) {
      held += 1;
      return;
    }
    await new Promise<void>((resolve) => waiters.push(resolve));
  };

  const release = (): void => {
    const wake = waiters.shift();
    if (wake) wake();
    else held -= 1;
  };

  return async <T>(task: () => Promise<T>): Promise<T> => {
    await acquire();
    try {
      return await task();
    } finally {
      release();
    }
  };
};
