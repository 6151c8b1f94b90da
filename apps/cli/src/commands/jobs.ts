import type { Command } from "commander";
import ora from "ora";
import { ensureSetup } from "@/lib/setup.ts";
import { printError } from "@/lib/theme.ts";
import { JOB_COLUMNS } from "@/lib/constants.ts";
import { formatReport, resolveFormat } from "@/lib/output.ts";
import { formatJobRow } from "@/lib/format-jobs.ts";
import {
  addFilterOptions,
  toFilters,
  type FilterOptions,
} from "@/lib/filter-options.ts";

interface JobsOptions extends FilterOptions {
  perHost?: boolean;
}

export function registerJobsCommand(program: Command) {
  const command = program
    .command("jobs")
    .description("List queued and running jobs with their resource counts")
    .option("--per-host", "one row per allocated host");

  addFilterOptions(command).action(async (options: JobsOptions) => {
    try {
      await runJobs(options);
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  });
}

async function runJobs(options: JobsOptions) {
  const { config, slurm } = ensureSetup();
  const format = resolveFormat(options.format, config.output.format);
  const filters = toFilters(options);

  const spinner =
    format === "table" && process.stderr.isTTY
      ? ora("Fetching jobs...").start()
      : null;

  const records = options.perHost
    ? await slurm.getPerHostRecords(filters)
    : await slurm.getJobRecords(filters);

  spinner?.stop();

  console.log(
    formatReport(format, {
      columns: JOB_COLUMNS,
      rows: records.map(formatJobRow),
      numeric: ["Nodes", "Tasks", "CPUs"],
    }),
  );

  slurm.diagnostics.report();
}
