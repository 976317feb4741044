// Minimal push streams used for the transition step log and its derived views.

export type Listener<T> = (value: T) => void;
export type Unsubscribe = () => void;

export interface Subscribable<T> {
  subscribe(listener: Listener<T>): Unsubscribe;
}

type ErrorSink = (err: unknown) => void;

/**
 * Ordered stream with a replay depth of one. Values emitted while a delivery
 * is in progress (a listener emitting reentrantly) are queued and delivered
 * after the current one, so every listener sees the same order.
 */
export class ReplayStream<T extends object> implements Subscribable<T> {
  private _listeners: Set<Listener<T>> = new Set();
  private _queue: T[] = [];
  private _draining = false;
  private _latest: T;

  constructor(initial: T, private readonly onListenerError: ErrorSink) {
    this._latest = initial;
  }

  get latest(): T {
    return this._latest;
  }

  /** Values passed together are queued together before any listener runs. */
  emit(...values: T[]): void {
    this._queue.push(...values);
    if (!this._draining) this._drain();
  }

  /** Registers a listener and immediately replays the latest value to it. */
  subscribe(listener: Listener<T>): Unsubscribe {
    this._listeners.add(listener);
    const unsubscribe = () => {
      this._listeners.delete(listener);
    };
    if (this._draining) {
      this._call(listener, this._latest);
      return unsubscribe;
    }
    this._draining = true;
    try {
      this._call(listener, this._latest);
    } finally {
      this._draining = false;
    }
    if (this._queue.length > 0) this._drain();
    return unsubscribe;
  }

  private _drain(): void {
    this._draining = true;
    try {
      for (let next = this._queue.shift(); next !== undefined; next = this._queue.shift()) {
        this._latest = next;
        for (const fn of Array.from(this._listeners)) {
          if (this._listeners.has(fn)) this._call(fn, next);
        }
      }
    } finally {
      this._draining = false;
    }
  }

  private _call(fn: Listener<T>, value: T): void {
    try {
      fn(value);
    } catch (err) {
      this.onListenerError(err);
    }
  }
}

export function filterStream<T>(source: Subscribable<T>, predicate: (value: T) => boolean): Subscribable<T> {
  return {
    subscribe: (listener) => source.subscribe((value) => {
      if (predicate(value)) listener(value);
    }),
  };
}

/** Maps values; a mapper returning null drops the value. */
export function mapStream<T, R>(source: Subscribable<T>, mapper: (value: T) => R | null): Subscribable<R> {
  return {
    subscribe: (listener) => source.subscribe((value) => {
      const mapped = mapper(value);
      if (mapped !== null) listener(mapped);
    }),
  };
}

/** Drops values equal (Object.is) to the previous one delivered to the same listener. */
export function distinctStream<T>(source: Subscribable<T>): Subscribable<T> {
  return {
    subscribe: (listener) => {
      let seen = false;
      let last: T | undefined;
      return source.subscribe((value) => {
        if (seen && Object.is(last, value)) return;
        seen = true;
        last = value;
        listener(value);
      });
    },
  };
}
