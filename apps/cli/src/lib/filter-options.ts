import type { Command } from "commander";
import type { JobFilters } from "@hpcsum/shared";

export interface FilterOptions extends JobFilters {
  format?: string;
}

/** squeue filters and --format, shared by jobs and summary. */
export function addFilterOptions(command: Command): Command {
  return command
    .option("-u, --user <user>", "only jobs of this user")
    .option("-A, --account <account>", "only jobs charged to this account")
    .option("-p, --partition <partition>", "only jobs in this partition")
    .option("-t, --state <states>", "only jobs in these states (e.g. R,PD)")
    .option("-f, --format <format>", "output format: table, csv, json, yaml");
}

export function toFilters(options: FilterOptions): JobFilters {
  const { user, account, partition, state } = options;
  return { user, account, partition, state };
}
