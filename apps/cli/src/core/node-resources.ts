import { MalformedExpressionError, UnresolvedHostError } from "@/lib/errors.ts";
import { decodeRunLength } from "@/parsers/run-length.ts";

/** What the mapped value counts: tasks (uniform per-node count) or CPUs. */
export type ResourceBasis = "tasks" | "cpus";

export interface NodeResourceSources {
  /** Uniform tasks per node; wins over any per-host source when positive. */
  tasksPerNode?: number;
  /** Per-host CPU counts, e.g. from parseNodeCpus. */
  hostCpus?: ReadonlyMap<string, number>;
}

/**
 * Hostname → allocation for one job's hosts.
 */
export class NodeResourceIndex {
  private constructor(
    readonly basis: ResourceBasis,
    private readonly values: ReadonlyMap<string, number>,
  ) {}

  static build(
    hosts: readonly string[],
    sources: NodeResourceSources,
  ): NodeResourceIndex {
    const perNode = sources.tasksPerNode ?? 0;
    if (perNode > 0) {
      return new NodeResourceIndex(
        "tasks",
        new Map(hosts.map((host) => [host, perNode])),
      );
    }

    const values = new Map<string, number>();
    for (const host of hosts) {
      const cpus = sources.hostCpus?.get(host);
      if (cpus !== undefined) values.set(host, cpus);
    }
    return new NodeResourceIndex("cpus", values);
  }

  /**
   * Pair hosts with a per-node count list position by position, as Slurm
   * does with SLURM_JOB_NODELIST and SLURM_JOB_CPUS_PER_NODE.
   */
  static fromCounts(hosts: readonly string[], countList: string): NodeResourceIndex {
    const counts = decodeRunLength(countList);
    if (counts.length !== hosts.length) {
      throw new MalformedExpressionError(
        countList,
        `describes ${counts.length} nodes but the node list has ${hosts.length}`,
      );
    }
    return new NodeResourceIndex(
      "cpus",
      new Map(hosts.map((host, i) => [host, counts[i] ?? 0])),
    );
  }

  get(host: string): number {
    const value = this.values.get(host);
    if (value === undefined) throw new UnresolvedHostError(host);
    return value;
  }

  entries(): IterableIterator<[string, number]> {
    return this.values.entries();
  }
}
