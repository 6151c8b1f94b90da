import type { CounterKey, GroupLimits, ReportCell, ReportRow } from "@hpcsum/shared";
import type { CounterState, JobRecord } from "@/core/job-record.ts";
import type { SummaryTotal } from "@/core/aggregate.ts";
import { TOTAL_KEY } from "@/core/aggregate.ts";

/**
 * A counter as a report cell. Counters that include an unknown share get a
 * "?" suffix so a partial total never passes for a complete one.
 */
export function countCell(state: CounterState, key: CounterKey): ReportCell {
  const value = state.counters[key];
  return state.unknown.has(key) ? `${value}?` : value;
}

export function formatJobRow(record: JobRecord): ReportRow {
  return {
    JobID: record.displayId,
    Name: record.name,
    User: record.owner,
    State: record.state,
    Account: record.account,
    Partition: record.partition,
    Nodes: countCell(record, "nodeCount"),
    Tasks: countCell(record, "taskCount"),
    CPUs: countCell(record, "cpuCount"),
    Hosts: record.hosts.join(","),
    Start: record.startTime ?? "",
  };
}

export function formatSummaryRow(total: SummaryTotal): ReportRow {
  return {
    Account: total.account === TOTAL_KEY ? "TOTAL" : total.account,
    Partition: total.partition === TOTAL_KEY ? "" : total.partition,
    Jobs: total.jobs,
    Nodes: countCell(total, "nodeCount"),
    Tasks: countCell(total, "taskCount"),
    CPUs: countCell(total, "cpuCount"),
  };
}

/**
 * One row per limited resource: limit, and usage where known.
 * `usage` keys follow the TRES names (cpu, node, mem, gres/gpu).
 */
export function formatLimitRows(
  limits: GroupLimits,
  usage: Readonly<Record<string, number>>,
): ReportRow[] {
  const rows: ReportRow[] = [];
  for (const [resource, limit] of Object.entries(limits.limits)) {
    rows.push({
      Account: limits.account,
      Resource: resource === "mem" ? "mem (MiB)" : resource,
      Limit: limit,
      InUse: usage[resource] ?? null,
    });
  }
  for (const [name, limit] of Object.entries(limits.gres)) {
    rows.push({
      Account: limits.account,
      Resource: `gres/${name}`,
      Limit: limit,
      InUse: usage[`gres/${name}`] ?? null,
    });
  }
  return rows;
}
