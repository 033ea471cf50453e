/** Where a diff runs. Implementations must settle with the task's result or error. */
export interface DiffExecutor {
  run<T>(task: () => T): Promise<T>;
}

/** Runs the task synchronously within the current turn. */
export const inlineExecutor: DiffExecutor = {
  run<T>(task: () => T): Promise<T> {
    return new Promise<T>((resolve) => resolve(task()));
  }
};

/**
 * Defers the task to a later turn of the event loop, after pending I/O and timers, so
 * whatever owns the rendering surface gets to run before a large diff starts.
 */
export const deferredExecutor: DiffExecutor = {
  run<T>(task: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        try {
          resolve(task());
        } catch (err) {
          reject(err);
        }
      });
    });
  }
};
