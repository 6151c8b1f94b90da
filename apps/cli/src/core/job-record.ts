import type { CounterKey, JobCounters, SqueueRow } from "@hpcsum/shared";
import { ADDITIVE_COUNTERS, EMPTY_NODELISTS } from "@hpcsum/shared";
import { UnresolvedHostError } from "@/lib/errors.ts";
import { expandHostlist } from "@/parsers/hostlist.ts";
import { NodeResourceIndex } from "./node-resources.ts";

/** Counters plus the subset of them whose true value is unknown. */
export interface CounterState {
  readonly counters: JobCounters;
  readonly unknown: Set<CounterKey>;
}

export function emptyCounters(): JobCounters {
  return {
    cpusPerTask: 0,
    taskCount: 0,
    nodeCount: 0,
    cpuCount: 0,
    socketCount: 0,
    coreCount: 0,
    threadCount: 0,
    tasksPerCore: 0,
    tasksPerNode: 0,
    tasksPerSocket: 0,
  };
}

/**
 * Add the additive counters of `source` into `target`. An unknown counter
 * stays unknown in the result.
 */
export function foldCounters(target: CounterState, source: CounterState): void {
  for (const key of ADDITIVE_COUNTERS) {
    target.counters[key] += source.counters[key];
    if (source.unknown.has(key)) target.unknown.add(key);
  }
}

/**
 * Parse a scheduler integer. Anything that isn't a plain non-negative integer
 * ("N/A", "*", "", "0.5") counts as 0: squeue output varies between versions
 * and a report must not fail on one odd column.
 */
export function parseCount(value: string | undefined): number {
  const trimmed = value?.trim() ?? "";
  return /^\d+$/.test(trimmed) ? Number(trimmed) : 0;
}

/** Host `i`'s part of `total` split over `n` hosts; the parts sum to `total`. */
function shareOf(total: number, n: number, i: number): number {
  return Math.floor(total / n) + (i < total % n ? 1 : 0);
}

function optionalField(value: string): string | undefined {
  return value === "" || value === "N/A" || value === "(null)" ? undefined : value;
}

export interface JobRecordFields {
  jobId: string;
  taskId?: string;
  batchHost: string;
  batchFlag: boolean;
  hosts: readonly string[];
  priority: number;
  name: string;
  owner: string;
  state: string;
  startTime?: string;
  partition: string;
  account: string;
  minMemory: string;
  gres: string;
  counters: JobCounters;
  unknown?: Iterable<CounterKey>;
}

/**
 * One job's resource footprint, or one host's share of it.
 */
export class JobRecord implements CounterState {
  readonly jobId: string;
  readonly taskId: string | undefined;
  readonly batchHost: string;
  readonly batchFlag: boolean;
  readonly hosts: readonly string[];
  readonly priority: number;
  readonly name: string;
  readonly owner: string;
  readonly state: string;
  readonly startTime: string | undefined;
  readonly partition: string;
  readonly account: string;
  readonly minMemory: string;
  readonly gres: string;
  readonly counters: JobCounters;
  readonly unknown: Set<CounterKey>;

  /** Filled by the first splitPerHost() call. */
  private perHost: readonly JobRecord[] | undefined;

  constructor(fields: JobRecordFields) {
    this.jobId = fields.jobId;
    this.taskId = fields.taskId;
    this.batchHost = fields.batchHost;
    this.batchFlag = fields.batchFlag;
    this.hosts = fields.hosts;
    this.priority = fields.priority;
    this.name = fields.name;
    this.owner = fields.owner;
    this.state = fields.state;
    this.startTime = fields.startTime;
    this.partition = fields.partition;
    this.account = fields.account;
    this.minMemory = fields.minMemory;
    this.gres = fields.gres;
    this.counters = { ...fields.counters };
    this.unknown = new Set(fields.unknown);
  }

  /**
   * Build a record from one squeue row. Throws MalformedExpressionError when
   * the node list doesn't decode.
   */
  static fromRow(row: SqueueRow, maxHosts?: number): JobRecord {
    const nodeList = row.nodeList.trim();
    const hosts = EMPTY_NODELISTS.has(nodeList)
      ? []
      : expandHostlist(nodeList, { maxSize: maxHosts });
    const nodeCount = parseCount(row.numNodes);
    // squeue reports sockets, cores and threads per node
    const nodes = Math.max(nodeCount, 1);

    return new JobRecord({
      jobId: row.jobId,
      taskId: optionalField(row.arrayTaskId),
      batchHost: row.batchHost,
      batchFlag: row.batchFlag === "1",
      hosts,
      priority: parseCount(row.priority),
      name: row.name,
      owner: row.user,
      state: row.state,
      startTime: optionalField(row.startTime),
      partition: row.partition,
      account: row.account,
      minMemory: row.minMemory,
      gres: optionalField(row.gres) ?? "",
      counters: {
        cpusPerTask: parseCount(row.cpusPerTask),
        taskCount: parseCount(row.numTasks),
        nodeCount,
        cpuCount: parseCount(row.numCpus),
        socketCount: parseCount(row.sockets) * nodes,
        coreCount: parseCount(row.cores) * nodes,
        threadCount: parseCount(row.threads) * nodes,
        tasksPerCore: parseCount(row.tasksPerCore),
        tasksPerNode: parseCount(row.tasksPerNode),
        tasksPerSocket: parseCount(row.tasksPerSocket),
      },
    });
  }

  /** "1234" or "1234_7" for array tasks. */
  get displayId(): string {
    return this.taskId ? `${this.jobId}_${this.taskId}` : this.jobId;
  }

  /**
   * One record per host. A job on a single host (or none yet) returns itself.
   *
   * Host shares come from the job's tasks-per-node when it has one, otherwise
   * from `hostCpus`. Hosts missing from both keep their task and CPU counts
   * marked unknown. Socket, core and thread totals are divided evenly. The
   * result is computed once and reused.
   */
  splitPerHost(hostCpus?: ReadonlyMap<string, number>): readonly JobRecord[] {
    if (this.perHost) return this.perHost;

    if (this.hosts.length <= 1) {
      this.perHost = [this];
      return this.perHost;
    }

    const index = NodeResourceIndex.build(this.hosts, {
      tasksPerNode: this.counters.tasksPerNode,
      hostCpus,
    });
    const cpusPerTask = Math.max(this.counters.cpusPerTask, 1);

    this.perHost = this.hosts.map((host, i) => {
      const counters: JobCounters = {
        ...this.counters,
        nodeCount: 1,
        socketCount: shareOf(this.counters.socketCount, this.hosts.length, i),
        coreCount: shareOf(this.counters.coreCount, this.hosts.length, i),
        threadCount: shareOf(this.counters.threadCount, this.hosts.length, i),
      };
      const unknown = new Set(this.unknown);

      try {
        const value = index.get(host);
        if (index.basis === "tasks") {
          counters.taskCount = value;
          counters.cpuCount = value * cpusPerTask;
        } else {
          counters.cpuCount = value;
          counters.taskCount = Math.floor(value / cpusPerTask);
        }
      } catch (error) {
        if (!(error instanceof UnresolvedHostError)) throw error;
        counters.taskCount = 0;
        counters.cpuCount = 0;
        unknown.add("taskCount");
        unknown.add("cpuCount");
      }

      return new JobRecord({ ...this, hosts: [host], counters, unknown });
    });

    return this.perHost;
  }

  /** Fold another record's counters into this one. Identity fields are untouched. */
  aggregate(other: CounterState): this {
    foldCounters(this, other);
    return this;
  }
}
