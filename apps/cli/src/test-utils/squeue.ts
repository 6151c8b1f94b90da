import type { SqueueRow } from "@hpcsum/shared";
import { SQUEUE_FIELDS } from "@hpcsum/shared";

export const BASE_ROW: SqueueRow = {
  jobId: "1001",
  arrayTaskId: "N/A",
  batchHost: "r00n00",
  batchFlag: "1",
  nodeList: "r00n00",
  priority: "2000",
  name: "sim",
  user: "alice",
  state: "R",
  startTime: "2026-10-01T08:00:00",
  partition: "standard",
  account: "physics",
  minMemory: "1G",
  gres: "N/A",
  cpusPerTask: "1",
  numTasks: "4",
  numNodes: "1",
  numCpus: "4",
  sockets: "*",
  cores: "*",
  threads: "*",
  tasksPerCore: "N/A",
  tasksPerNode: "0",
  tasksPerSocket: "N/A",
};

export function squeueRow(overrides: Partial<SqueueRow> = {}): SqueueRow {
  return { ...BASE_ROW, ...overrides };
}

/** One line of squeue --Format output, with squeue's trailing delimiter. */
export function squeueLine(overrides: Partial<SqueueRow> = {}): string {
  const row = squeueRow(overrides);
  return SQUEUE_FIELDS.map((f) => `${row[f.key]}|`).join("");
}
