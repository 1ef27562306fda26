import { describe, expect, it } from "vitest";
import { describeValue, isIntegerValue, isPlainRecord, valuesEqual } from "./values";

describe("valuesEqual", () => {
  it("compares integers numerically across number and bigint", () => {
    expect(valuesEqual(1, 1n)).toBe(true);
    expect(valuesEqual(2n, 3)).toBe(false);
  });

  it("compares bytes, dates and nested structures by content", () => {
    expect(valuesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(valuesEqual(new Date(5), new Date(5))).toBe(true);
    expect(valuesEqual({ a: [1, { b: "x" }] }, { a: [1n, { b: "x" }] })).toBe(true);
    expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
    expect(valuesEqual(Number.NaN, Number.NaN)).toBe(true);
  });

  it("defers to an equals method", () => {
    const always = { equals: () => true };
    expect(valuesEqual(always, 42)).toBe(true);
  });
});

describe("value helpers", () => {
  it("classifies values", () => {
    expect(isIntegerValue(3)).toBe(true);
    expect(isIntegerValue(3.5)).toBe(false);
    expect(isPlainRecord({})).toBe(true);
    expect(isPlainRecord(new Date())).toBe(false);
    expect(describeValue(new Uint8Array(3))).toBe("bytes(3)");
    expect(describeValue([1, 2])).toBe("array(2)");
    expect(describeValue(null)).toBe("null");
  });
});
