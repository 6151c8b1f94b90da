import type { Command } from "commander";
import ora from "ora";
import { ensureSetup } from "@/lib/setup.ts";
import { printError } from "@/lib/theme.ts";
import { SUMMARY_COLUMNS } from "@/lib/constants.ts";
import { formatReport, resolveFormat } from "@/lib/output.ts";
import { formatSummaryRow } from "@/lib/format-jobs.ts";
import {
  addFilterOptions,
  toFilters,
  type FilterOptions,
} from "@/lib/filter-options.ts";
import { groupByAccountPartition } from "@/core/aggregate.ts";

export function registerSummaryCommand(program: Command) {
  const command = program
    .command("summary")
    .description("Totals of nodes, tasks and CPUs per account and partition");

  addFilterOptions(command).action(async (options: FilterOptions) => {
    try {
      await runSummary(options);
    } catch (error) {
      printError(error);
      process.exit(1);
    }
  });
}

async function runSummary(options: FilterOptions) {
  const { config, slurm } = ensureSetup();
  const format = resolveFormat(options.format, config.output.format);

  const spinner =
    format === "table" && process.stderr.isTTY
      ? ora("Fetching jobs...").start()
      : null;

  const records = await slurm.getJobRecords(toFilters(options));
  const { groups, total } = groupByAccountPartition(records);

  spinner?.stop();

  console.log(
    formatReport(format, {
      columns: SUMMARY_COLUMNS,
      rows: groups.map(formatSummaryRow),
      totals: [formatSummaryRow(total)],
      numeric: ["Jobs", "Nodes", "Tasks", "CPUs"],
    }),
  );

  slurm.diagnostics.report();
}
