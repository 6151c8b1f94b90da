// --- Job record data types ---

/**
 * Integer counters carried by a job record. Whole-job records hold job-wide
 * values; per-host records hold that host's share.
 */
export type CounterKey =
  | "cpusPerTask"
  | "taskCount"
  | "nodeCount"
  | "cpuCount"
  | "socketCount"
  | "coreCount"
  | "threadCount"
  | "tasksPerCore"
  | "tasksPerNode"
  | "tasksPerSocket";

export type JobCounters = Record<CounterKey, number>;

/** Names of the fields requested from squeue, in wire order. */
export type SqueueFieldName =
  | "jobId"
  | "arrayTaskId"
  | "batchHost"
  | "batchFlag"
  | "nodeList"
  | "priority"
  | "name"
  | "user"
  | "state"
  | "startTime"
  | "partition"
  | "account"
  | "minMemory"
  | "gres"
  | "cpusPerTask"
  | "numTasks"
  | "numNodes"
  | "numCpus"
  | "sockets"
  | "cores"
  | "threads"
  | "tasksPerCore"
  | "tasksPerNode"
  | "tasksPerSocket";

export interface SqueueField {
  key: SqueueFieldName;
  /** squeue --Format type name */
  format: string;
  /** Column width requested from squeue (output is trimmed) */
  width: number;
}

export type SqueueRow = Record<SqueueFieldName, string>;

export interface JobFilters {
  user?: string;
  account?: string;
  partition?: string;
  state?: string;
}

// --- Workgroup limits ---

export interface GroupLimits {
  account: string;
  /** Resource name → limit; `mem` in MiB */
  limits: Readonly<Record<string, number>>;
  /** Generic resource name (e.g. "gpu", "gpu:a100") → count */
  gres: Readonly<Record<string, number>>;
}

// --- Output ---

export type OutputFormat = "table" | "csv" | "json" | "yaml";

export type ReportCell = string | number | boolean | null;

export type ReportRow = Record<string, ReportCell>;

// --- Configuration ---

export interface HpcConfig {
  scheduler: {
    timeout_ms: number;
    ssh_host?: string;
    squeue: string;
    scontrol: string;
    sacctmgr: string;
  };
  hostlist: {
    max_size: number;
  };
  output: {
    format: OutputFormat;
  };
}
