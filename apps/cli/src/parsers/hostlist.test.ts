import { describe, expect, it } from "vitest";
import { MalformedExpressionError } from "@/lib/errors.ts";
import { compareHostnames, expandHostlist, expandRangeList } from "./hostlist.ts";

describe("expandHostlist", () => {
  it("expands ranges in order of appearance", () => {
    expect(expandHostlist("n[9-11],d[01-02]")).toEqual([
      "n9",
      "n10",
      "n11",
      "d01",
      "d02",
    ]);
  });

  it("sorts numerically when asked", () => {
    expect(expandHostlist("n[9-11],d[01-02]", { sort: true })).toEqual([
      "d01",
      "d02",
      "n9",
      "n10",
      "n11",
    ]);
  });

  it("forms the cross product of compound names", () => {
    expect(expandHostlist("a[1-3]b[1-2]")).toEqual([
      "a1b1",
      "a1b2",
      "a2b1",
      "a2b2",
      "a3b1",
      "a3b2",
    ]);
  });

  it("keeps the literal suffix after a bracket group", () => {
    expect(expandHostlist("r[1-2]-ib")).toEqual(["r1-ib", "r2-ib"]);
  });

  it("mixes single values and ranges inside one group", () => {
    expect(expandHostlist("r00n[00-01,05,10-11]")).toEqual([
      "r00n00",
      "r00n01",
      "r00n05",
      "r00n10",
      "r00n11",
    ]);
  });

  it("pads to the width of the low bound", () => {
    expect(expandHostlist("c[008-011]")).toEqual(["c008", "c009", "c010", "c011"]);
  });

  it("passes plain names through", () => {
    expect(expandHostlist("login1,login2")).toEqual(["login1", "login2"]);
  });

  it("returns an empty list for an empty expression", () => {
    expect(expandHostlist("")).toEqual([]);
  });

  it("drops duplicates unless they are allowed", () => {
    expect(expandHostlist("n[1-2],n2,n1")).toEqual(["n1", "n2"]);
    expect(expandHostlist("n[1-2],n2,n1", { allowDuplicates: true })).toEqual([
      "n1",
      "n2",
      "n2",
      "n1",
    ]);
  });

  it.each([
    ["n[1-2", "unbalanced"],
    ["n1-2]", "unmatched close"],
    ["n[1[2-3]]", "nested"],
    ["n[5-2]", "inverted range"],
    ["n[]", "empty group"],
    ["n[a-b]", "non-numeric range"],
    ["n[1-2,]", "empty element"],
  ])("rejects %s (%s) with MalformedExpressionError", (expression) => {
    expect(() => expandHostlist(expression)).toThrow(MalformedExpressionError);
  });

  it("refuses oversized expansions before building them", () => {
    expect(() => expandHostlist("n[1-999999999]")).toThrow(
      MalformedExpressionError,
    );
    expect(() => expandHostlist("a[1-10]b[1-10]", { maxSize: 99 })).toThrow(
      /more than 99 names/,
    );
    expect(expandHostlist("a[1-10]b[1-10]", { maxSize: 100 })).toHaveLength(100);
  });

  it("counts the ceiling across comma-separated parts", () => {
    expect(() => expandHostlist("a[1-60],b[1-60]", { maxSize: 100 })).toThrow(
      MalformedExpressionError,
    );
  });
});

describe("expandRangeList", () => {
  it("expands a flat CPU id list", () => {
    expect(expandRangeList("0-3,8,10-11")).toEqual([
      "0",
      "1",
      "2",
      "3",
      "8",
      "10",
      "11",
    ]);
  });

  it("rejects a list over the ceiling", () => {
    expect(() => expandRangeList("0-100", 10)).toThrow(MalformedExpressionError);
  });
});

describe("compareHostnames", () => {
  it("compares numeric runs by value", () => {
    expect(["n10", "n2", "n1"].sort(compareHostnames)).toEqual(["n1", "n2", "n10"]);
  });

  it("orders by every run, not just the first", () => {
    expect(["r1n10", "r1n9", "r0n20"].sort(compareHostnames)).toEqual([
      "r0n20",
      "r1n9",
      "r1n10",
    ]);
  });
});
