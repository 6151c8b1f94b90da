import type { CounterKey, JobCounters } from "@hpcsum/shared";
import {
  type CounterState,
  type JobRecord,
  emptyCounters,
  foldCounters,
} from "./job-record.ts";

export const TOTAL_KEY = "*";

export class SummaryTotal implements CounterState {
  readonly counters: JobCounters = emptyCounters();
  readonly unknown = new Set<CounterKey>();
  jobs = 0;

  constructor(
    readonly account: string,
    readonly partition: string,
  ) {}

  add(record: CounterState): void {
    foldCounters(this, record);
    this.jobs++;
  }
}

export interface GroupedSummary {
  groups: SummaryTotal[];
  total: SummaryTotal;
}

function compareKeys(a: JobRecord, b: JobRecord): number {
  if (a.account !== b.account) return a.account < b.account ? -1 : 1;
  if (a.partition !== b.partition) return a.partition < b.partition ? -1 : 1;
  return 0;
}

/**
 * Group records by (account, partition) in key order, with a grand total over
 * everything. One sort, then a single pass that closes a group whenever the
 * key changes.
 */
export function groupByAccountPartition(
  records: readonly JobRecord[],
): GroupedSummary {
  const sorted = [...records].sort(compareKeys);
  const groups: SummaryTotal[] = [];
  const total = new SummaryTotal(TOTAL_KEY, TOTAL_KEY);
  let current: SummaryTotal | undefined;

  for (const record of sorted) {
    if (
      !current ||
      current.account !== record.account ||
      current.partition !== record.partition
    ) {
      if (current) groups.push(current);
      current = new SummaryTotal(record.account, record.partition);
    }
    current.add(record);
    total.add(record);
  }
  if (current) groups.push(current);

  return { groups, total };
}
