// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Unbounded single-consumer channel. Producers `post` letters, a single
 * worker drains them with `for await`.
 */
export interface Mailbox<T> extends AsyncIterable<T> {
  /** Queue a letter. Returns false once the mailbox is closed. */
  post(letter: T): boolean;
  /**
   * Close the mailbox and end the worker's iteration.
   * Letters that were never received are returned to the caller.
   */
  close(): T[];
  isClosed(): boolean;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createMailbox<T>(): Mailbox<T> {
  const buffered: T[] = [];
  let waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  let closed = false;

  function post(letter: T): boolean {
    if (closed) return false;

    if (waiting) {
      const deliver = waiting;
      waiting = null;
      deliver({ value: letter, done: false });
    } else {
      buffered.push(letter);
    }
    return true;
  }

  function close(): T[] {
    if (closed) return [];
    closed = true;

    const undelivered = buffered.splice(0, buffered.length);
    if (waiting) {
      const finish = waiting;
      waiting = null;
      finish({ value: undefined, done: true });
    }
    return undelivered;
  }

  function next(): Promise<IteratorResult<T, undefined>> {
    if (buffered.length > 0) {
      const [letter] = buffered.splice(0, 1);
      return Promise.resolve({ value: letter, done: false });
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      waiting = resolve;
    });
  }

  return {
    post,
    close,
    isClosed: () => closed,
    [Symbol.asyncIterator]: () => ({ next }),
  };
}
