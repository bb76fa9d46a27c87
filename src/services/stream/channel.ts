// Bounded single-consumer channel
// Producers await `push` while the buffer is full; nothing is dropped until the consumer cancels

export interface BoundedChannel<T> {
  /** Resolves true once buffered, false if the channel is closed or cancelled. */
  readonly push: (item: T) => Promise<boolean>;
  /** No more items; the consumer drains what is buffered, then finishes. */
  readonly close: () => void;
  /** Consumer went away; pending and future pushes resolve false. */
  readonly cancel: () => void;
  readonly isCancelled: () => boolean;
  readonly size: () => number;
  readonly iterator: () => AsyncIterable<T>;
}

export function createBoundedChannel<T>(capacity: number): BoundedChannel<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new Error(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const buffer: T[] = [];
  const blockedProducers: Array<{ item: T; resolve: (accepted: boolean) => void }> = [];
  let waiter: ((result: IteratorResult<T>) => void) | null = null;
  let closed = false;
  let cancelled = false;

  // Moves one blocked producer into the buffer after the consumer took an item
  const admitProducer = () => {
    const producer = blockedProducers.shift();
    if (producer) {
      buffer.push(producer.item);
      producer.resolve(true);
    }
  };

  const asyncIterator: AsyncIterator<T> = {
    next: async (): Promise<IteratorResult<T>> => {
      if (buffer.length > 0) {
        const [value] = buffer.splice(0, 1);
        admitProducer();
        return { value, done: false };
      }

      if (closed || cancelled) {
        return { done: true, value: undefined };
      }

      return new Promise<IteratorResult<T>>(resolve => {
        waiter = resolve;
      });
    },
    return: async (): Promise<IteratorResult<T>> => {
      cancel();
      return { done: true, value: undefined };
    },
  };

  const cancel = () => {
    if (cancelled) return;
    cancelled = true;
    buffer.length = 0;
    for (const producer of blockedProducers.splice(0)) {
      producer.resolve(false);
    }
    if (waiter) {
      const w = waiter;
      waiter = null;
      w({ done: true, value: undefined });
    }
  };

  return {
    push: (item: T) => {
      if (closed || cancelled) {
        return Promise.resolve(false);
      }

      if (waiter) {
        const w = waiter;
        waiter = null;
        w({ value: item, done: false });
        return Promise.resolve(true);
      }

      if (buffer.length < capacity) {
        buffer.push(item);
        return Promise.resolve(true);
      }

      return new Promise<boolean>(resolve => {
        blockedProducers.push({ item, resolve });
      });
    },

    close: () => {
      if (closed) return;
      closed = true;
      if (waiter && buffer.length === 0 && blockedProducers.length === 0) {
        const w = waiter;
        waiter = null;
        w({ done: true, value: undefined });
      }
    },

    cancel,

    isCancelled: () => cancelled,

    size: () => buffer.length,

    iterator: () => ({
      [Symbol.asyncIterator]: () => asyncIterator,
    }),
  };
}
