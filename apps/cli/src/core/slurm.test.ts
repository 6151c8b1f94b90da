import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG } from "@hpcsum/shared";
import { SchedulerCommandError } from "@/lib/errors.ts";
import { buildSqueueFormat } from "@/parsers/squeue.ts";
import { squeueLine } from "@/test-utils/squeue.ts";
import type { ExecOptions, SchedulerRunner } from "./runner.ts";
import { SlurmClient } from "./slurm.ts";

type Response = string | Error;

class FakeRunner implements SchedulerRunner {
  readonly calls: Array<{ command: string; args: string[]; options?: ExecOptions }> = [];

  constructor(private readonly responses: Record<string, Response>) {}

  async exec(command: string, args: string[], options?: ExecOptions): Promise<string> {
    this.calls.push({ command, args, options });
    const response = this.responses[command] ?? "";
    if (response instanceof Error) throw response;
    return response;
  }
}

const SINGLE = squeueLine({ jobId: "1001" });
const MULTI = squeueLine({
  jobId: "1002",
  nodeList: "r00n[01-02]",
  numNodes: "2",
  numCpus: "12",
  numTasks: "6",
  cpusPerTask: "2",
});
const SHOW_ALL = [
  "JobId=1001 JobName=sim",
  "   Nodes=r00n00 CPU_IDs=0-3 Mem=0 GRES=",
  "",
  "JobId=1002 JobName=sim",
  "   Nodes=r00n01 CPU_IDs=0-7 Mem=0 GRES=",
  "   Nodes=r00n02 CPU_IDs=0-3 Mem=0 GRES=",
  "",
].join("\n");

describe("SlurmClient", () => {
  it("passes filters to squeue", async () => {
    const runner = new FakeRunner({ squeue: SINGLE });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getJobRecords({ user: "alice", state: "R" });

    expect(records.map((r) => r.jobId)).toEqual(["1001"]);
    expect(runner.calls).toEqual([
      {
        command: "squeue",
        args: [
          "--noheader",
          `--Format=${buildSqueueFormat()}`,
          "--user=alice",
          "--states=R",
        ],
        options: { timeoutMs: 30_000 },
      },
    ]);
  });

  it("turns a failed command into empty output and a diagnostic", async () => {
    const runner = new FakeRunner({
      squeue: new SchedulerCommandError("squeue", 1, "slurm_load_jobs error"),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    expect(await client.getJobRecords()).toEqual([]);
    expect(client.diagnostics.list()).toEqual([
      {
        code: "SCHEDULER_COMMAND_FAILED",
        message: "squeue failed (exit 1): slurm_load_jobs error",
      },
    ]);
  });

  it("rethrows errors that are not scheduler failures", async () => {
    const client = new SlurmClient(
      new FakeRunner({ squeue: new TypeError("bad") }),
      DEFAULT_CONFIG,
    );

    await expect(client.getJobRecords()).rejects.toThrow(TypeError);
  });

  it("reports rows whose node list doesn't decode", async () => {
    const runner = new FakeRunner({
      squeue: [SINGLE, squeueLine({ jobId: "1003", nodeList: "n[1-" })].join("\n"),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getJobRecords();

    expect(records.map((r) => r.jobId)).toEqual(["1001"]);
    expect(client.diagnostics.list().map((d) => d.code)).toEqual([
      "MALFORMED_EXPRESSION",
    ]);
  });

  it("drops a job whose node list was cut off and names the expression", async () => {
    const runner = new FakeRunner({
      squeue: squeueLine({ jobId: "1004", nodeList: "r00n[00-03,05-0" }),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    expect(await client.getJobRecords()).toEqual([]);
    expect(client.diagnostics.list()[0]?.message).toMatch(
      /^Malformed expression "r00n\[00-03,05-0"/,
    );
  });

  it("splits multi-host jobs with CPU layouts from scontrol", async () => {
    const runner = new FakeRunner({
      squeue: `${SINGLE}\n${MULTI}\n`,
      scontrol: SHOW_ALL,
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getPerHostRecords();

    expect(
      records.map((r) => [r.jobId, r.hosts[0], r.counters.cpuCount, r.counters.taskCount]),
    ).toEqual([
      ["1001", "r00n00", 4, 4],
      ["1002", "r00n01", 8, 4],
      ["1002", "r00n02", 4, 2],
    ]);
    expect(runner.calls.filter((c) => c.command === "scontrol").map((c) => c.args)).toEqual([
      ["-d", "show", "job"],
    ]);
    expect(client.diagnostics.size).toBe(0);
  });

  it("fetches every job's layout with one scontrol call", async () => {
    const ids = ["2001", "2002", "2003", "2004", "2005"];
    const squeue = ids.map((jobId) =>
      squeueLine({ jobId, nodeList: "n[1-2]", numNodes: "2", numCpus: "4" }),
    );
    const scontrol = ids.map(
      (jobId) => `JobId=${jobId} JobName=sim\n   Nodes=n[1-2] CPU_IDs=0-1 Mem=0 GRES=\n`,
    );
    const runner = new FakeRunner({
      squeue: squeue.join("\n"),
      scontrol: scontrol.join("\n"),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getPerHostRecords();

    expect(runner.calls.filter((c) => c.command === "scontrol")).toHaveLength(1);
    expect(records).toHaveLength(10);
    expect(records.every((r) => r.counters.cpuCount === 2)).toBe(true);
  });

  it("matches array tasks to their layout", async () => {
    const runner = new FakeRunner({
      squeue: squeueLine({
        jobId: "3005",
        arrayTaskId: "4",
        nodeList: "n[1-2]",
        numNodes: "2",
      }),
      scontrol:
        "JobId=3010 ArrayJobId=3005 ArrayTaskId=4 JobName=sweep\n   Nodes=n[1-2] CPU_IDs=0-2 Mem=0\n",
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getPerHostRecords();

    expect(records.map((r) => r.counters.cpuCount)).toEqual([3, 3]);
  });

  it("skips scontrol when tasks per node is known", async () => {
    const runner = new FakeRunner({
      squeue: squeueLine({ nodeList: "n[1-2]", numNodes: "2", tasksPerNode: "2" }),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getPerHostRecords();

    expect(records).toHaveLength(2);
    expect(runner.calls.map((c) => c.command)).toEqual(["squeue"]);
  });

  it("reports hosts left unknown when scontrol fails", async () => {
    const runner = new FakeRunner({
      squeue: MULTI,
      scontrol: new SchedulerCommandError("scontrol", 1, "Invalid job id"),
    });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    const records = await client.getPerHostRecords();

    expect(records.every((r) => r.unknown.has("cpuCount"))).toBe(true);
    expect(client.diagnostics.list().map((d) => d.message)).toEqual([
      "scontrol failed (exit 1): Invalid job id",
      "No resource mapping for host r00n01 in job 1002",
      "No resource mapping for host r00n02 in job 1002",
    ]);
  });

  it("reads group limits from sacctmgr", async () => {
    const runner = new FakeRunner({ sacctmgr: "physics|cpu=720,gres/gpu=4\n" });
    const client = new SlurmClient(runner, DEFAULT_CONFIG);

    expect(await client.getGroupLimits("physics")).toEqual([
      { account: "physics", limits: { cpu: 720 }, gres: { gpu: 4 } },
    ]);
    expect(runner.calls[0]?.args).toEqual([
      "-nP",
      "show",
      "assoc",
      "account=physics",
      "user=",
      "format=Account,GrpTRES",
    ]);
  });

  it("reads the primary group as the workgroup", async () => {
    expect(
      await new SlurmClient(new FakeRunner({ id: "physics\n" }), DEFAULT_CONFIG).getWorkgroup(),
    ).toBe("physics");
    expect(
      await new SlurmClient(new FakeRunner({}), DEFAULT_CONFIG).getWorkgroup(),
    ).toBeUndefined();
  });
});
