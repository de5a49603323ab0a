import { describe, expect, it } from "vitest";
import { RingBuffer } from "../ring-buffer";

describe("RingBuffer", () => {
  it("rejects capacities that are not positive integers", () => {
    expect(() => RingBuffer.create<number>(0)).toThrow(RangeError);
    expect(() => RingBuffer.create<number>(2.5)).toThrow(RangeError);
  });

  it("never holds more than its capacity", () => {
    let buffer = RingBuffer.create<number>(30);
    for (let i = 0; i < 45; i += 1) {
      buffer = buffer.append(i);
    }

    expect(buffer.size).toBe(30);
    expect(buffer.isFull).toBe(true);
    expect(buffer.toArray()[0]).toBe(15);
    expect(buffer.last(3)).toEqual([42, 43, 44]);
  });

  it("leaves the original untouched when appending", () => {
    const original = RingBuffer.create<number>(2, [1, 2]);
    const next = original.append(3);

    expect(original.toArray()).toEqual([1, 2]);
    expect(next.toArray()).toEqual([2, 3]);
  });

  it("keeps only the newest initial items", () => {
    const buffer = RingBuffer.create<string>(2, ["a", "b", "c"]);

    expect(buffer.toArray()).toEqual(["b", "c"]);
  });

  it("returns an empty slice for non-positive counts", () => {
    const buffer = RingBuffer.create<number>(3, [1, 2, 3]);

    expect(buffer.last(0)).toEqual([]);
    expect(buffer.last(10)).toEqual([1, 2, 3]);
  });
});
