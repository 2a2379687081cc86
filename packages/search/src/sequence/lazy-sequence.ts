/**
 * Pull-driven sequences.
 *
 * A `LazySequence` wraps an iterable and does no work until a consumer asks
 * for the next element. Operators never pull more from their source than
 * they need to produce the elements requested of them: `take(k)` stops after
 * the k-th element without touching the (k+1)-th.
 *
 * Sequences are single-pass when their source is. Wrapping an iterator that
 * returns itself from `[Symbol.iterator]()` yields a sequence that can be
 * consumed once, across however many operators and terminal calls.
 */
export class LazySequence<T> implements Iterable<T> {
  constructor(private readonly source: Iterable<T>) {}

  [Symbol.iterator](): Iterator<T> {
    return this.source[Symbol.iterator]();
  }

  map<U>(fn: (value: T) => U): LazySequence<U> {
    return new LazySequence(mapIterable(this.source, fn));
  }

  filter<S extends T>(predicate: (value: T) => value is S): LazySequence<S>;
  filter(predicate: (value: T) => boolean): LazySequence<T>;
  filter(predicate: (value: T) => boolean): LazySequence<T> {
    return new LazySequence(filterIterable(this.source, predicate));
  }

  /** At most the first `count` elements */
  take(count: number): LazySequence<T> {
    return new LazySequence(takeIterable(this.source, count));
  }

  /** Elements up to, not including, the first one failing `predicate` */
  takeWhile(predicate: (value: T) => boolean): LazySequence<T> {
    return new LazySequence(takeWhileIterable(this.source, predicate));
  }

  find(predicate: (value: T) => boolean): T | undefined {
    for (const value of this.source) {
      if (predicate(value)) return value;
    }
    return undefined;
  }

  first(): T | undefined {
    const result = this.source[Symbol.iterator]().next();
    return result.done ? undefined : result.value;
  }

  forEach(fn: (value: T) => void): void {
    for (const value of this.source) fn(value);
  }

  toArray(): T[] {
    return Array.from(this.source);
  }
}

/** Wrap any iterable */
export function lazy<T>(source: Iterable<T>): LazySequence<T> {
  return new LazySequence(source);
}

// ---------------------------------------------------------------------------
// Internal iterable factories
// ---------------------------------------------------------------------------

function* mapIterable<T, U>(source: Iterable<T>, fn: (value: T) => U): Generator<U> {
  for (const value of source) yield fn(value);
}

function* filterIterable<T>(
  source: Iterable<T>,
  predicate: (value: T) => boolean,
): Generator<T> {
  for (const value of source) {
    if (predicate(value)) yield value;
  }
}

function* takeIterable<T>(source: Iterable<T>, count: number): Generator<T> {
  if (count <= 0) return;
  let taken = 0;
  for (const value of source) {
    yield value;
    if (++taken >= count) return;
  }
}

function* takeWhileIterable<T>(
  source: Iterable<T>,
  predicate: (value: T) => boolean,
): Generator<T> {
  for (const value of source) {
    if (!predicate(value)) return;
    yield value;
  }
}
