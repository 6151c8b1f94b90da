import type { CounterKey, HpcConfig, SqueueField } from "./types.ts";

/**
 * Fields requested from `squeue --Format`, in the order they appear on each
 * `|`-delimited output row. The parser and the command line are both built
 * from this list, so the two can't drift apart.
 */
export const SQUEUE_FIELDS: readonly SqueueField[] = [
  { key: "jobId", format: "JobID", width: 32 },
  { key: "arrayTaskId", format: "ArrayTaskID", width: 32 },
  { key: "batchHost", format: "BatchHost", width: 64 },
  { key: "batchFlag", format: "BatchFlag", width: 8 },
  { key: "nodeList", format: "NodeList", width: 1024 },
  { key: "priority", format: "Priority", width: 24 },
  { key: "name", format: "Name", width: 256 },
  { key: "user", format: "UserName", width: 64 },
  { key: "state", format: "StateCompact", width: 8 },
  { key: "startTime", format: "StartTime", width: 24 },
  { key: "partition", format: "Partition", width: 64 },
  { key: "account", format: "Account", width: 64 },
  { key: "minMemory", format: "MinMemory", width: 16 },
  { key: "gres", format: "tres-per-node", width: 256 },
  { key: "cpusPerTask", format: "cpus-per-task", width: 8 },
  { key: "numTasks", format: "NumTasks", width: 12 },
  { key: "numNodes", format: "NumNodes", width: 12 },
  { key: "numCpus", format: "NumCPUs", width: 12 },
  { key: "sockets", format: "Sockets", width: 8 },
  { key: "cores", format: "Cores", width: 8 },
  { key: "threads", format: "Threads", width: 8 },
  { key: "tasksPerCore", format: "NTPerCore", width: 8 },
  { key: "tasksPerNode", format: "NTPerNode", width: 8 },
  { key: "tasksPerSocket", format: "NTPerSocket", width: 8 },
] as const;

export const SQUEUE_DELIMITER = "|";

/** Counters summed by aggregate/fold; per-task and per-node ratios are not additive. */
export const ADDITIVE_COUNTERS: readonly CounterKey[] = [
  "nodeCount",
  "taskCount",
  "cpuCount",
  "socketCount",
  "coreCount",
  "threadCount",
] as const;

/** Upper bound on the number of names a single hostlist expression may expand to. */
export const HOSTLIST_MAX_SIZE = 65_536;

/** Node list placeholders squeue prints for jobs without an allocation. */
export const EMPTY_NODELISTS = new Set(["", "(null)", "(None)", "None assigned"]);

/**
 * GridEngine variables copied straight from a Slurm variable when the Slurm
 * one is set and non-empty. JOB_ID, the array task variables, NHOSTS and
 * NSLOTS need logic of their own.
 */
export const SGE_DIRECT_ENV: readonly (readonly [sge: string, slurm: string])[] = [
  ["SGE_CLUSTER_NAME", "SLURM_CLUSTER_NAME"],
  ["SGE_O_WORKDIR", "SLURM_SUBMIT_DIR"],
  ["SGE_O_HOST", "SLURM_SUBMIT_HOST"],
  ["JOB_NAME", "SLURM_JOB_NAME"],
  ["QUEUE", "SLURM_JOB_PARTITION"],
] as const;

export const SGE_ARRAY_ENV: readonly (readonly [sge: string, slurm: string])[] = [
  ["SGE_TASK_ID", "SLURM_ARRAY_TASK_ID"],
  ["SGE_TASK_FIRST", "SLURM_ARRAY_TASK_MIN"],
  ["SGE_TASK_LAST", "SLURM_ARRAY_TASK_MAX"],
  ["SGE_TASK_STEPSIZE", "SLURM_ARRAY_TASK_STEP"],
] as const;

export const DEFAULT_CONFIG: HpcConfig = {
  scheduler: {
    timeout_ms: 30_000,
    squeue: "squeue",
    scontrol: "scontrol",
    sacctmgr: "sacctmgr",
  },
  hostlist: {
    max_size: HOSTLIST_MAX_SIZE,
  },
  output: {
    format: "table",
  },
};
