import { describe, expect, it } from "vitest";
import { MalformedExpressionError } from "@/lib/errors.ts";
import { decodeRunLength, sumRunLength } from "./run-length.ts";

describe("decodeRunLength", () => {
  it("expands repeat counts one value per position", () => {
    expect(decodeRunLength("1(x2),2(x3)")).toEqual([1, 1, 2, 2, 2]);
  });

  it("reads plain values once", () => {
    expect(decodeRunLength("36,12,4(x2)")).toEqual([36, 12, 4, 4]);
  });

  it("allows a bare zero", () => {
    expect(decodeRunLength("0,2")).toEqual([0, 2]);
  });

  it("decodes an empty list to no positions", () => {
    expect(decodeRunLength("")).toEqual([]);
  });

  it.each([
    [",1", "leading comma"],
    ["1,", "trailing comma"],
    ["1,,2", "empty element"],
    ["1(x2", "missing close"],
    ["1(2)", "missing x"],
    ["a", "not a number"],
    ["0(x2)", "zero value with repeat"],
    ["2(x0)", "zero repeat"],
    ["-1", "negative"],
  ])("rejects %s (%s)", (list) => {
    expect(() => decodeRunLength(list)).toThrow(MalformedExpressionError);
  });

  it("refuses more positions than the ceiling", () => {
    expect(() => decodeRunLength("1(x5),1(x6)", 10)).toThrow(/more than 10/);
  });
});

describe("sumRunLength", () => {
  it("totals every position", () => {
    expect(sumRunLength("1(x2),2(x3)")).toBe(8);
    expect(sumRunLength("36(x4)")).toBe(144);
  });

  it("falls back to one slot for absent or unparseable lists", () => {
    expect(sumRunLength(undefined)).toBe(1);
    expect(sumRunLength("")).toBe(1);
    expect(sumRunLength("1(x2")).toBe(1);
    expect(sumRunLength("0")).toBe(1);
  });
});
