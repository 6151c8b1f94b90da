import { describe, expect, it } from "vitest";
import { Diagnostics } from "./diagnostics.ts";
import { UnresolvedHostError } from "./errors.ts";

describe("Diagnostics", () => {
  it("records the error code, or ERROR for foreign errors", () => {
    const diagnostics = new Diagnostics();

    diagnostics.add(new UnresolvedHostError("n1", "42"));
    diagnostics.add(new Error("disk full"));
    diagnostics.add("plain text");

    expect(diagnostics.size).toBe(3);
    expect(diagnostics.list()).toEqual([
      { code: "UNRESOLVED_HOST", message: "No resource mapping for host n1 in job 42" },
      { code: "ERROR", message: "disk full" },
      { code: "ERROR", message: "plain text" },
    ]);
  });
});
