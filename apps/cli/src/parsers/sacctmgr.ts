import type { GroupLimits } from "@hpcsum/shared";
import type { Diagnostics } from "@/lib/diagnostics.ts";
import { MalformedExpressionError } from "@/lib/errors.ts";
import { splitDelimitedRows } from "./squeue.ts";
import { parseTresLimits } from "./tres.ts";

export const ASSOC_FIELDS = ["account", "grpTres"] as const;

/**
 * Parse `sacctmgr -nP show assoc account=<a> user= format=Account,GrpTRES`.
 * Expected rows: `account|cpu=720,mem=3840G,gres/gpu=4`.
 *
 * Accounts without a GrpTRES come back with empty limits. Rows whose limit
 * string doesn't parse are skipped and reported.
 */
export function parseAssociations(
  output: string,
  diagnostics?: Diagnostics,
): GroupLimits[] {
  const result: GroupLimits[] = [];

  for (const row of splitDelimitedRows(output, ASSOC_FIELDS, diagnostics)) {
    try {
      result.push(parseTresLimits(row.grpTres, row.account));
    } catch (error) {
      if (!(error instanceof MalformedExpressionError)) throw error;
      diagnostics?.add(error);
    }
  }

  return result;
}
