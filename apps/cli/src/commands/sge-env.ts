import type { Command } from "commander";
import { printError } from "@/lib/theme.ts";
import { exportLines } from "@/lib/shell-quote.ts";
import { parseEnableFlag, translateSgeEnv } from "@/core/sge-env.ts";

interface SgeEnvOptions {
  enable: string;
  json?: boolean;
}

export function registerSgeEnvCommand(program: Command) {
  program
    .command("sge-env")
    .description("Print GridEngine equivalents of the job's Slurm variables")
    .option("--enable <value>", "yes/no or 1/0; 'no' prints nothing", "yes")
    .option("--json", "output as JSON")
    .addHelpText("after", '\nUse in a job script:  eval "$(hs sge-env)"')
    .action((options: SgeEnvOptions) => {
      try {
        runSgeEnv(options);
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });
}

function runSgeEnv(options: SgeEnvOptions) {
  if (!parseEnableFlag(options.enable)) return;

  const vars = translateSgeEnv(process.env);
  if (options.json) {
    console.log(JSON.stringify(vars, null, 2));
    return;
  }
  for (const line of exportLines(vars)) {
    console.log(line);
  }
}
