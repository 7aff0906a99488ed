import { errorMessage } from "./strategy.ts";

// =============================================================================
// AsyncChannel<T> — push-to-pull bridge implementing AsyncIterable
// =============================================================================

export class AsyncChannel<T> implements AsyncIterable<T> {
  private buffer: Array<{ value: T }> = [];
  private waiters: Array<(result: IteratorResult<T>) => void> = [];
  private closed = false;

  push(value: T): void {
    if (this.closed) return;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value, done: false });
    } else {
      this.buffer.push({ value });
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters) {
      waiter({ value: undefined, done: true });
    }
    this.waiters = [];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        const buffered = this.buffer.shift();
        if (buffered) {
          return Promise.resolve({ value: buffered.value, done: false });
        }
        if (this.closed) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T>>((resolve) => {
          this.waiters.push(resolve);
        });
      },
    };
  }
}

// =============================================================================
// Task — one background job, one event stream
// =============================================================================

export type TaskEvent<T> =
  | { type: "progress"; message: string }
  | { type: "success"; value: T }
  | { type: "failure"; error: string; cause: unknown };

export type TerminalEvent<T> = Exclude<TaskEvent<T>, { type: "progress" }>;

export interface Task<T> {
  /** Progress events followed by exactly one terminal event, then the stream ends. */
  events: AsyncIterable<TaskEvent<T>>;
  /** Resolves with the terminal event; never rejects. */
  done: Promise<TerminalEvent<T>>;
}

/**
 * Schedules `work` right away. Whatever it returns or throws becomes the single
 * terminal event; progress reported after that is dropped.
 */
export function startTask<T>(work: (progress: (message: string) => void) => Promise<T>): Task<T> {
  const channel = new AsyncChannel<TaskEvent<T>>();
  const progress = (message: string): void => {
    channel.push({ type: "progress", message });
  };

  const finish = (event: TerminalEvent<T>): TerminalEvent<T> => {
    channel.push(event);
    channel.close();
    return event;
  };

  const done = Promise.resolve()
    .then(() => work(progress))
    .then(
      (value) => finish({ type: "success", value }),
      (err: unknown) => finish({ type: "failure", error: errorMessage(err), cause: err }),
    );

  return { events: channel, done };
}
