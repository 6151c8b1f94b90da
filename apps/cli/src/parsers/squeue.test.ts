import { describe, expect, it } from "vitest";
import { Diagnostics } from "@/lib/diagnostics.ts";
import { BASE_ROW, squeueLine } from "@/test-utils/squeue.ts";
import { buildSqueueFormat, parseSqueue, splitDelimitedRows } from "./squeue.ts";

describe("parseSqueue", () => {
  it("maps each field to its name", () => {
    const rows = parseSqueue(squeueLine({ jobId: "42", nodeList: "n[1-2]" }));

    expect(rows).toEqual([{ ...BASE_ROW, jobId: "42", nodeList: "n[1-2]" }]);
  });

  it("trims the padding squeue adds to each column", () => {
    const padded = squeueLine({ name: "sim       ", account: "  physics" });
    const [row] = parseSqueue(padded);

    expect(row?.name).toBe("sim");
    expect(row?.account).toBe("physics");
  });

  it("drops rows with the wrong field count and reports them", () => {
    const diagnostics = new Diagnostics();
    const output = [squeueLine(), "1002|short|row|", "", squeueLine({ jobId: "1003" })].join(
      "\n",
    );

    const rows = parseSqueue(output, diagnostics);

    expect(rows.map((r) => r.jobId)).toEqual(["1001", "1003"]);
    expect(diagnostics.list()).toEqual([
      {
        code: "ROW_SHAPE_MISMATCH",
        message: "Dropped row with 4 fields (expected 24): 1002|short|row|",
      },
    ]);
  });
});

describe("splitDelimitedRows", () => {
  it("accepts lines without a trailing delimiter", () => {
    expect(splitDelimitedRows("physics|cpu=8\n", ["account", "tres"])).toEqual([
      { account: "physics", tres: "cpu=8" },
    ]);
  });

  it("keeps an empty last field when the trailing delimiter is present", () => {
    expect(splitDelimitedRows("physics||\n", ["account", "tres"])).toEqual([
      { account: "physics", tres: "" },
    ]);
  });
});

describe("buildSqueueFormat", () => {
  it("gives every field a width and a delimiter suffix", () => {
    expect(
      buildSqueueFormat([
        { key: "jobId", format: "JobID", width: 32 },
        { key: "name", format: "Name", width: 256 },
      ]),
    ).toBe("JobID:32|,Name:256|");
  });
});
