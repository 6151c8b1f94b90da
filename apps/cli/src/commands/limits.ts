import type { Command } from "commander";
import ora from "ora";
import { ensureSetup } from "@/lib/setup.ts";
import { printError, theme } from "@/lib/theme.ts";
import { formatReport, resolveFormat } from "@/lib/output.ts";
import { formatLimitRows } from "@/lib/format-jobs.ts";
import { usageByTres } from "@/core/usage.ts";

interface LimitsOptions {
  format?: string;
}

export function registerLimitsCommand(program: Command) {
  program
    .command("limits")
    .description("Show a workgroup's resource limits and what its running jobs use")
    .argument("[account]", "workgroup account (default: your primary group)")
    .option("-f, --format <format>", "output format: table, csv, json, yaml")
    .action(async (account: string | undefined, options: LimitsOptions) => {
      try {
        await runLimits(account, options);
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });
}

async function runLimits(account: string | undefined, options: LimitsOptions) {
  const { config, slurm } = ensureSetup();
  const format = resolveFormat(options.format, config.output.format);

  const spinner =
    format === "table" && process.stderr.isTTY
      ? ora("Fetching limits...").start()
      : null;

  const workgroup = account ?? (await slurm.getWorkgroup());
  if (!workgroup) {
    spinner?.stop();
    slurm.diagnostics.report();
    throw new Error("Could not determine your workgroup; pass an account name.");
  }

  const [associations, running] = await Promise.all([
    slurm.getGroupLimits(workgroup),
    slurm.getJobRecords({ account: workgroup, state: "R" }),
  ]);
  const usage = usageByTres(running);

  spinner?.stop();

  const rows = associations.flatMap((limits) => formatLimitRows(limits, usage));
  if (rows.length === 0 && format === "table") {
    console.log(theme.muted(`\nNo limits set for ${workgroup}.`));
  } else {
    console.log(
      formatReport(format, {
        columns: ["Account", "Resource", "Limit", "InUse"],
        rows,
        numeric: ["Limit", "InUse"],
      }),
    );
  }

  slurm.diagnostics.report();
}
