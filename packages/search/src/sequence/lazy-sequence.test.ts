import { describe, it, expect } from "vitest";
import { lazy } from "./lazy-sequence.js";

/** Natural numbers, recording how many were pulled */
function counting(): { source: Iterable<number>; pulled: () => number } {
  let pulled = 0;
  function* naturals(): Generator<number> {
    for (let n = 0; ; n++) {
      pulled++;
      yield n;
    }
  }
  return { source: naturals(), pulled: () => pulled };
}

describe("LazySequence", () => {
  it("does no work until a terminal call", () => {
    const { source, pulled } = counting();
    lazy(source).map((n) => n * 2).filter((n) => n > 3).take(2);

    expect(pulled()).toBe(0);
  });

  it("take stops at the k-th element without pulling the next", () => {
    const { source, pulled } = counting();
    const result = lazy(source).take(3).toArray();

    expect(result).toEqual([0, 1, 2]);
    expect(pulled()).toBe(3);
  });

  it("take(0) pulls nothing", () => {
    const { source, pulled } = counting();
    expect(lazy(source).take(0).toArray()).toEqual([]);
    expect(pulled()).toBe(0);
  });

  it("takeWhile pulls one element past the last one it keeps", () => {
    const { source, pulled } = counting();
    const result = lazy(source).takeWhile((n) => n < 4).toArray();

    expect(result).toEqual([0, 1, 2, 3]);
    expect(pulled()).toBe(5);
  });

  it("chains map and filter over an infinite source", () => {
    const { source } = counting();
    const result = lazy(source)
      .map((n) => n * n)
      .filter((n) => n % 2 === 1)
      .take(3)
      .toArray();

    expect(result).toEqual([1, 9, 25]);
  });

  it("narrows with a type-guard filter", () => {
    const values: Array<string | number> = ["a", 1, "b", 2];
    const strings: string[] = lazy(values)
      .filter((v): v is string => typeof v === "string")
      .toArray();

    expect(strings).toEqual(["a", "b"]);
  });

  it("find stops at the first match", () => {
    const { source, pulled } = counting();
    expect(lazy(source).find((n) => n > 4)).toBe(5);
    expect(pulled()).toBe(6);
  });

  it("first returns undefined for an empty source", () => {
    expect(lazy([7, 8]).first()).toBe(7);
    expect(lazy<number>([]).first()).toBeUndefined();
  });

  it("forEach visits every element in order", () => {
    const seen: string[] = [];
    lazy(["x", "y", "z"]).forEach((v) => seen.push(v));
    expect(seen).toEqual(["x", "y", "z"]);
  });

  it("is single-pass over a single-pass source", () => {
    const seq = lazy([1, 2, 3, 4].values());

    expect(seq.take(2).toArray()).toEqual([1, 2]);
    expect(seq.toArray()).toEqual([3, 4]);
    expect(seq.toArray()).toEqual([]);
  });
});
