import { SGE_ARRAY_ENV, SGE_DIRECT_ENV } from "@hpcsum/shared";
import { ConfigError } from "@/lib/errors.ts";
import { expandHostlist } from "@/parsers/hostlist.ts";
import { sumRunLength } from "@/parsers/run-length.ts";
import { NodeResourceIndex } from "./node-resources.ts";

type Env = Readonly<Record<string, string | undefined>>;

function read(env: Env, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

/**
 * GridEngine equivalents of a Slurm job's environment, for scripts written
 * against SGE (JOB_ID, NSLOTS, NHOSTS, SGE_TASK_ID, ...).
 *
 * NSLOTS sums SLURM_JOB_CPUS_PER_NODE and falls back to 1. No PE_HOSTFILE is
 * produced: tightly integrated MPI stacks would take it as a sign they run
 * under GridEngine.
 */
export function translateSgeEnv(env: Env): Record<string, string> {
  const out: Record<string, string> = {};

  for (const [sge, slurm] of SGE_DIRECT_ENV) {
    const value = read(env, slurm);
    if (value !== undefined) out[sge] = value;
  }

  const arrayJobId = read(env, "SLURM_ARRAY_JOB_ID");
  if (arrayJobId !== undefined) {
    out.JOB_ID = arrayJobId;
    for (const [sge, slurm] of SGE_ARRAY_ENV) {
      const value = read(env, slurm);
      if (value !== undefined) out[sge] = value;
    }
  } else {
    const jobId = read(env, "SLURM_JOB_ID");
    if (jobId !== undefined) out.JOB_ID = jobId;
  }

  out.NQUEUES = "1";
  out.NHOSTS = read(env, "SLURM_JOB_NUM_NODES") ?? "1";
  out.NSLOTS = String(sumRunLength(read(env, "SLURM_JOB_CPUS_PER_NODE")));

  return out;
}

const ENABLE_WORDS: Record<string, boolean> = {
  y: true,
  yes: true,
  t: true,
  true: true,
  n: false,
  no: false,
  f: false,
  false: false,
};

/**
 * Parse an enable switch: an integer (non-zero enables) or one of
 * y/yes/t/true/n/no/f/false in any case.
 */
export function parseEnableFlag(value: string): boolean {
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) !== 0;

  const word = ENABLE_WORDS[trimmed.toLowerCase()];
  if (word === undefined) {
    throw new ConfigError(`Invalid enable value: "${value}"`);
  }
  return word;
}

/**
 * "<host> <slots>" lines pairing a node list with its per-node CPU counts.
 */
export function buildHostfile(nodeList: string, cpusPerNode: string): string[] {
  const hosts = expandHostlist(nodeList);
  const index = NodeResourceIndex.fromCounts(hosts, cpusPerNode);
  return hosts.map((host) => `${host} ${index.get(host)}`);
}
