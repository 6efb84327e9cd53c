/**
 * Single-writer arbitration: operations run one at a time in submission order.
 */
export interface WriterLock {
  run<T>(operation: () => Promise<T>): Promise<T>;
  /** Resolves once every operation submitted so far has settled. */
  idle(): Promise<void>;
}

export const createWriterLock = (): WriterLock => {
  let tail: Promise<void> = Promise.resolve();

  return {
    run<T>(operation: () => Promise<T>): Promise<T> {
      const next = tail.then(operation);
      // The caller sees a rejection through `next`; the queue itself keeps moving.
      tail = next.then(
        () => undefined,
        () => undefined,
      );
      return next;
    },
    idle: () => tail,
  };
};
