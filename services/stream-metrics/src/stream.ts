import { InvalidConfigError } from "./errors.js";

export type Stream<T> = AsyncIterable<T>;

/** Element of a stream that carries its own end marker. */
export type Item<T> = { readonly present: true; readonly value: T } | { readonly present: false };

export async function* fromIterable<T>(items: Iterable<T>): AsyncGenerator<T> {
  yield* items;
}

export async function* append<T>(first: Stream<T>, ...rest: T[]): AsyncGenerator<T> {
  yield* first;
  yield* rest;
}

export async function* map<A, B>(source: Stream<A>, fn: (a: A) => B): AsyncGenerator<B> {
  for await (const a of source) yield fn(a);
}

/** Stops at the first element failing `predicate`; that element is not forwarded. */
export async function* takeWhile<T>(source: Stream<T>, predicate: (t: T) => boolean): AsyncGenerator<T> {
  for await (const t of source) {
    if (!predicate(t)) return;
    yield t;
  }
}

export async function* unwrap<T>(source: Stream<Item<T>>): AsyncGenerator<T> {
  for await (const item of source) {
    if (item.present) yield item.value;
  }
}

export async function collect<T>(source: Stream<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const t of source) out.push(t);
  return out;
}

/**
 * Passes `source` through untouched and runs `action` on every `interval`-th
 * element (the `interval`-th, `2 * interval`-th, ...), counting the first
 * element as 1, so `interval` elements pass per tick. The action settles
 * before its element is yielded.
 */
export function doAt<T>(
  interval: number,
  action: (a: T) => void | Promise<void>,
  source: Stream<T>
): Stream<T> {
  if (!Number.isInteger(interval) || interval <= 0) {
    throw new InvalidConfigError(`doAt interval must be a positive integer, got ${interval}`);
  }

  return (async function* () {
    let countdown = interval;
    for await (const a of source) {
      countdown -= 1;
      if (countdown === 0) {
        await action(a);
        countdown = interval;
      }
      yield a;
    }
  })();
}
