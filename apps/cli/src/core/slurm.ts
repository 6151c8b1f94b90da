import type { GroupLimits, HpcConfig, JobFilters } from "@hpcsum/shared";
import { Diagnostics } from "@/lib/diagnostics.ts";
import {
  MalformedExpressionError,
  SchedulerCommandError,
  SchedulerTimeoutError,
  UnresolvedHostError,
} from "@/lib/errors.ts";
import { buildSqueueFormat, parseSqueue } from "@/parsers/squeue.ts";
import { parseJobLayouts } from "@/parsers/scontrol.ts";
import { parseAssociations } from "@/parsers/sacctmgr.ts";
import type { SchedulerRunner } from "./runner.ts";
import { JobRecord } from "./job-record.ts";

/**
 * Scheduler queries. A command that fails, times out or can't be spawned is
 * recorded in `diagnostics` and treated as empty output, so reports still
 * render whatever else they could collect.
 */
export class SlurmClient {
  private runner: SchedulerRunner;
  private config: HpcConfig;
  readonly diagnostics: Diagnostics;

  constructor(
    runner: SchedulerRunner,
    config: HpcConfig,
    diagnostics: Diagnostics = new Diagnostics(),
  ) {
    this.runner = runner;
    this.config = config;
    this.diagnostics = diagnostics;
  }

  private async query(command: string, args: string[]): Promise<string> {
    try {
      return await this.runner.exec(command, args, {
        timeoutMs: this.config.scheduler.timeout_ms,
      });
    } catch (error) {
      if (
        error instanceof SchedulerCommandError ||
        error instanceof SchedulerTimeoutError
      ) {
        this.diagnostics.add(error);
        return "";
      }
      throw error;
    }
  }

  // --- Query methods ---

  async getJobRecords(filters: JobFilters = {}): Promise<JobRecord[]> {
    const args = ["--noheader", `--Format=${buildSqueueFormat()}`];
    if (filters.user) args.push(`--user=${filters.user}`);
    if (filters.account) args.push(`--account=${filters.account}`);
    if (filters.partition) args.push(`--partition=${filters.partition}`);
    if (filters.state) args.push(`--states=${filters.state}`);

    const output = await this.query(this.config.scheduler.squeue, args);
    const records: JobRecord[] = [];

    for (const row of parseSqueue(output, this.diagnostics)) {
      try {
        records.push(JobRecord.fromRow(row, this.config.hostlist.max_size));
      } catch (error) {
        if (!(error instanceof MalformedExpressionError)) throw error;
        this.diagnostics.add(error);
      }
    }

    return records;
  }

  /**
   * Per-host CPU counts of every job's allocation from a single
   * `scontrol -d show job`, keyed by job id (and array task id).
   */
  async getJobLayouts(): Promise<Map<string, Map<string, number>>> {
    const output = await this.query(this.config.scheduler.scontrol, [
      "-d",
      "show",
      "job",
    ]);
    return parseJobLayouts(output, this.diagnostics);
  }

  async getGroupLimits(account: string): Promise<GroupLimits[]> {
    const output = await this.query(this.config.scheduler.sacctmgr, [
      "-nP",
      "show",
      "assoc",
      `account=${account}`,
      "user=",
      "format=Account,GrpTRES",
    ]);
    return parseAssociations(output, this.diagnostics);
  }

  /** Primary group of the invoking user; the default workgroup. */
  async getWorkgroup(): Promise<string | undefined> {
    const output = await this.query("id", ["-gn"]);
    return output.trim() || undefined;
  }

  // --- Composite ---

  /**
   * Job records split one per host. Multi-node jobs without a uniform
   * tasks-per-node need their CPU layout from scontrol; one query covers all
   * of them.
   */
  async getPerHostRecords(filters: JobFilters = {}): Promise<JobRecord[]> {
    const jobs = await this.getJobRecords(filters);

    const needsLayout = (job: JobRecord) =>
      job.hosts.length > 1 && job.counters.tasksPerNode <= 0;
    const layouts = jobs.some(needsLayout)
      ? await this.getJobLayouts()
      : new Map<string, Map<string, number>>();

    const split = jobs.map((job) =>
      needsLayout(job)
        ? job.splitPerHost(layouts.get(job.displayId) ?? layouts.get(job.jobId))
        : job.splitPerHost(),
    );

    const records = split.flat();
    for (const record of records) {
      if (record.unknown.has("cpuCount")) {
        this.diagnostics.add(
          new UnresolvedHostError(record.hosts[0] ?? "", record.displayId),
        );
      }
    }
    return records;
  }
}
