import { describe, expect, test, vi } from "vitest";
import { InvalidConfigError } from "../../src/errors.js";
import { append, collect, doAt, fromIterable, takeWhile } from "../../src/stream.js";

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

async function* naturals(): AsyncGenerator<number> {
  for (let n = 1; ; n++) yield n;
}

describe("doAt", () => {
  test("fires on every interval-th element and passes everything through", async () => {
    const seen: number[] = [];
    const out = await collect(doAt(3, (n: number) => void seen.push(n), fromIterable(range(1, 10))));

    expect(out).toEqual(range(1, 10));
    expect(seen).toEqual([3, 6, 9]);
  });

  test.each([
    [1, 5, 5],
    [2, 5, 2],
    [5, 5, 1],
    [7, 5, 0],
    [4, 0, 0]
  ])("interval %i over %i elements fires %i times", async (interval, length, expected) => {
    const action = vi.fn();
    const out = await collect(doAt(interval, action, fromIterable(range(1, length))));

    expect(out).toHaveLength(length);
    expect(action).toHaveBeenCalledTimes(expected);
  });

  test.each([0, -2, 1.5, Number.NaN])("rejects interval %s", (interval) => {
    expect(() => doAt(interval, () => {}, fromIterable([1]))).toThrow(InvalidConfigError);
  });

  test("an async action settles before its element is emitted", async () => {
    const events: string[] = [];
    const tapped = doAt(
      2,
      async (n: number) => {
        await Promise.resolve();
        events.push(`tick:${n}`);
      },
      fromIterable([1, 2, 3, 4])
    );

    for await (const n of tapped) events.push(`out:${n}`);

    expect(events).toEqual(["out:1", "tick:2", "out:2", "out:3", "tick:4", "out:4"]);
  });

  test("action failures fail the stream", async () => {
    const tapped = doAt(
      2,
      () => {
        throw new Error("sink down");
      },
      fromIterable([1, 2, 3])
    );

    await expect(collect(tapped)).rejects.toThrow("sink down");
  });

  test("ticks not yet reached never fire once the consumer stops", async () => {
    const action = vi.fn();
    const it = doAt(3, action, naturals())[Symbol.asyncIterator]();

    await it.next();
    await it.next();
    await it.return?.();

    expect(action).not.toHaveBeenCalled();
  });
});

describe("helpers", () => {
  test("takeWhile stops at the first failing element", async () => {
    const out = await collect(takeWhile(fromIterable([1, 2, 3, 1]), (n) => n < 3));
    expect(out).toEqual([1, 2]);
  });

  test("append adds a tail after the source", async () => {
    expect(await collect(append(fromIterable(["a"]), "b", "c"))).toEqual(["a", "b", "c"]);
  });
});
