/**
 * Push-to-pull bridge for device sockets and child-process output.
 */

export interface CallbackStream<T> {
  iterable: AsyncIterable<T>;
  push: (item: T) => void;
  done: () => void;
  error: (err: Error) => void;
}

/**
 * Create an async iterable from a callback-based stream.
 * Items pushed before the consumer asks are queued; `onReturn` runs when the
 * consumer stops early (break / return from `for await`).
 */
export function fromCallback<T>(onReturn?: () => void): CallbackStream<T> {
  const queue: T[] = [];
  let pending: {
    resolve: (value: IteratorResult<T>) => void;
    reject: (err: Error) => void;
  } | null = null;
  let finished = false;
  let lastError: Error | null = null;

  const settle = (): typeof pending => {
    const p = pending;
    pending = null;
    return p;
  };

  const iterable: AsyncIterable<T> = {
    [Symbol.asyncIterator](): AsyncIterator<T> {
      return {
        next(): Promise<IteratorResult<T>> {
          if (queue.length > 0) {
            const [item] = queue.splice(0, 1);
            return Promise.resolve({ value: item, done: false });
          }
          if (lastError) {
            return Promise.reject(lastError);
          }
          if (finished) {
            return Promise.resolve({ value: undefined, done: true });
          }
          return new Promise<IteratorResult<T>>((resolve, reject) => {
            pending = { resolve, reject };
          });
        },
        return(): Promise<IteratorResult<T>> {
          finished = true;
          queue.length = 0;
          settle()?.resolve({ value: undefined, done: true });
          onReturn?.();
          return Promise.resolve({ value: undefined, done: true });
        },
      };
    },
  };

  return {
    iterable,
    push(item: T) {
      if (finished || lastError) return;
      const p = settle();
      if (p) {
        p.resolve({ value: item, done: false });
      } else {
        queue.push(item);
      }
    },
    done() {
      finished = true;
      settle()?.resolve({ value: undefined, done: true });
    },
    error(err: Error) {
      if (finished) return;
      lastError = err;
      settle()?.reject(err);
    },
  };
}
