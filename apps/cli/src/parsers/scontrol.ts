import type { Diagnostics } from "@/lib/diagnostics.ts";
import { MalformedExpressionError } from "@/lib/errors.ts";
import { expandHostlist, expandRangeList } from "./hostlist.ts";

const NODE_CPU_LINE = /Nodes=(\S+)\s+CPU_IDs=(\S+)/;

/**
 * Parse the per-node allocation lines of `scontrol -d show job <id>`:
 *
 *      Nodes=r00n[00-01] CPU_IDs=0-35 Mem=184320 GRES=
 *      Nodes=r00n02 CPU_IDs=0-3,8-11 Mem=20480 GRES=
 *
 * Every host on a line gets the number of CPU ids listed. Other lines are
 * ignored; a line with a malformed expression is skipped and reported.
 */
export function parseNodeCpus(
  output: string,
  diagnostics?: Diagnostics,
): Map<string, number> {
  const cpus = new Map<string, number>();

  for (const line of output.split("\n")) {
    const match = line.match(NODE_CPU_LINE);
    if (!match) continue;

    const [, nodes = "", cpuIds = ""] = match;
    try {
      const count = expandRangeList(cpuIds).length;
      for (const host of expandHostlist(nodes)) {
        cpus.set(host, count);
      }
    } catch (error) {
      if (!(error instanceof MalformedExpressionError)) throw error;
      diagnostics?.add(error);
    }
  }

  return cpus;
}

const JOB_ID = /\bJobId=(\S+)/;
const ARRAY_TASK = /\bArrayJobId=(\S+)\s+ArrayTaskId=(\S+)/;

/**
 * Parse `scontrol -d show job` for every job at once. Jobs are separated by
 * blank lines; each gets its own host → CPU map, keyed by its JobId and, for
 * array tasks, also by `<ArrayJobId>_<ArrayTaskId>`. Jobs without allocation
 * lines are left out.
 */
export function parseJobLayouts(
  output: string,
  diagnostics?: Diagnostics,
): Map<string, Map<string, number>> {
  const layouts = new Map<string, Map<string, number>>();

  for (const block of output.split(/\n\s*\n/)) {
    const jobId = block.match(JOB_ID)?.[1];
    if (!jobId) continue;

    const cpus = parseNodeCpus(block, diagnostics);
    if (cpus.size === 0) continue;

    layouts.set(jobId, cpus);
    const array = block.match(ARRAY_TASK);
    if (array) layouts.set(`${array[1]}_${array[2]}`, cpus);
  }

  return layouts;
}
