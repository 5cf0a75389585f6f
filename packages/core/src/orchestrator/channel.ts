/**
 * Unbounded single-consumer queue. Producers push without waiting; the
 * consumer iterates in push order until the channel is closed and drained.
 */
export interface Channel<T> extends AsyncIterable<T> {
  push(value: T): boolean;
  close(): void;
  readonly closed: boolean;
  readonly size: number;
}

export const createChannel = <T>(): Channel<T> => {
  const buffer: T[] = [];
  let waiting: ((result: IteratorResult<T>) => void) | null = null;
  let closed = false;

  const push = (value: T) => {
    if (closed) return false;
    if (waiting) {
      const resolve = waiting;
      waiting = null;
      resolve({ value, done: false });
      return true;
    }
    buffer.push(value);
    return true;
  };

  const close = () => {
    if (closed) return;
    closed = true;
    if (waiting) {
      const resolve = waiting;
      waiting = null;
      resolve({ value: undefined, done: true });
    }
  };

  const next = (): Promise<IteratorResult<T>> => {
    if (buffer.length > 0) {
      const [value] = buffer.splice(0, 1);
      return Promise.resolve({ value, done: false });
    }
    if (closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      waiting = resolve;
    });
  };

  return {
    push,
    close,
    get closed() {
      return closed;
    },
    get size() {
      return buffer.length;
    },
    [Symbol.asyncIterator]: () => ({ next }),
  };
};
