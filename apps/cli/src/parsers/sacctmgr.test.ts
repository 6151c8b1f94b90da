import { describe, expect, it } from "vitest";
import { Diagnostics } from "@/lib/diagnostics.ts";
import { parseAssociations } from "./sacctmgr.ts";

describe("parseAssociations", () => {
  it("reads one GroupLimits per association row", () => {
    const diagnostics = new Diagnostics();
    const output = "physics|cpu=720,mem=4G,gres/gpu=4\nchem|\nbio|cpu=lots\n";

    expect(parseAssociations(output, diagnostics)).toEqual([
      { account: "physics", limits: { cpu: 720, mem: 4096 }, gres: { gpu: 4 } },
      { account: "chem", limits: {}, gres: {} },
    ]);
    expect(diagnostics.list()).toEqual([
      {
        code: "MALFORMED_EXPRESSION",
        message: 'Malformed expression "cpu=lots": invalid limit for cpu: "lots"',
      },
    ]);
  });
});
