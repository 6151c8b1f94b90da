import { homedir } from "node:os";
import { join } from "node:path";

// Local config
export const HPCSUM_DIR = join(homedir(), ".hpcsum");
export const CONFIG_FILE = join(HPCSUM_DIR, "config.toml");
export const CONFIG_ENV = "HPCSUM_CONFIG";

export function configFilePath(): string {
  return process.env[CONFIG_ENV] || CONFIG_FILE;
}

// Job environment read by hostfile
export const NODELIST_ENV = "SLURM_JOB_NODELIST";
export const CPUS_PER_NODE_ENV = "SLURM_JOB_CPUS_PER_NODE";

// Column headers shared by jobs and summary reports
export const JOB_COLUMNS = [
  "JobID",
  "Name",
  "User",
  "State",
  "Account",
  "Partition",
  "Nodes",
  "Tasks",
  "CPUs",
  "Hosts",
  "Start",
] as const;

export const SUMMARY_COLUMNS = [
  "Account",
  "Partition",
  "Jobs",
  "Nodes",
  "Tasks",
  "CPUs",
] as const;
