import type { JobRecord } from "./job-record.ts";

/** GPUs per node from a tres-per-node string like "gres/gpu:a100:2", "gpu:4" or "gres/gpu=1". */
export function gpusPerNode(gres: string): number {
  const match = gres.match(/gpu(?::[^:,=]+)?[:=](\d+)/);
  return match ? Number(match[1]) : 0;
}

/** Usage keyed by TRES name, summed over running jobs. */
export function usageByTres(records: readonly JobRecord[]): Record<string, number> {
  const usage = { cpu: 0, node: 0, "gres/gpu": 0 };
  for (const record of records) {
    usage.cpu += record.counters.cpuCount;
    usage.node += record.counters.nodeCount;
    usage["gres/gpu"] += gpusPerNode(record.gres) * record.counters.nodeCount;
  }
  return usage;
}
