/**
 * Execution contexts decide where an operation body runs and where
 * change notifications are delivered.
 */
export interface ExecutionContext {
  schedule<T>(work: () => T | Promise<T>): Promise<T>;
}

/**
 * Runs work inline on the caller's continuation
 */
export class CurrentExecutionContext implements ExecutionContext {
  async schedule<T>(work: () => T | Promise<T>): Promise<T> {
    return await work();
  }
}

/**
 * Defers work to the next turn of the event loop
 */
export class ImmediateExecutionContext implements ExecutionContext {
  schedule<T>(work: () => T | Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        Promise.resolve()
          .then(work)
          .then(resolve, reject);
      });
    });
  }
}

export const currentExecutionContext: ExecutionContext = new CurrentExecutionContext();
export const immediateExecutionContext: ExecutionContext = new ImmediateExecutionContext();
