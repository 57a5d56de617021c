/**
 * Execution contexts for command invocations.
 * Background work may overlap freely; foreground work runs one task at a time.
 */

export interface Executor {
  spawn<T>(work: () => Promise<T>): Promise<T>;
}

export interface Executors {
  background: Executor;
  foreground: Executor;
}

/**
 * Starts each task on a later macrotask, so spawning never runs I/O on the caller's turn
 */
export class BackgroundExecutor implements Executor {
  private active = 0;

  spawn<T>(work: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        void this.run(work).then(resolve, reject);
      });
    });
  }

  get pending(): number {
    return this.active;
  }

  private async run<T>(work: () => Promise<T>): Promise<T> {
    this.active++;
    try {
      return await work();
    } finally {
      this.active--;
    }
  }
}

/**
 * Serial queue standing in for a single UI thread
 */
export class ForegroundExecutor implements Executor {
  private tail: Promise<unknown> = Promise.resolve();

  spawn<T>(work: () => Promise<T>): Promise<T> {
    const result = this.tail.then(work);
    // A failed task rejects `result` for its caller; the queue moves on
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

export function createExecutors(): Executors {
  return {
    background: new BackgroundExecutor(),
    foreground: new ForegroundExecutor(),
  };
}
