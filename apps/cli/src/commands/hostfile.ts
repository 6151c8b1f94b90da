import type { Command } from "commander";
import { printError } from "@/lib/theme.ts";
import { CPUS_PER_NODE_ENV, NODELIST_ENV } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";
import { buildHostfile } from "@/core/sge-env.ts";

interface HostfileOptions {
  nodelist?: string;
  cpusPerNode?: string;
}

export function registerHostfileCommand(program: Command) {
  program
    .command("hostfile")
    .description("Print '<host> <slots>' lines for the current job's allocation")
    .option("--nodelist <expression>", `node list (default: $${NODELIST_ENV})`)
    .option(
      "--cpus-per-node <counts>",
      `per-node CPU counts (default: $${CPUS_PER_NODE_ENV})`,
    )
    .action((options: HostfileOptions) => {
      try {
        runHostfile(options);
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });
}

function runHostfile(options: HostfileOptions) {
  const nodeList = options.nodelist ?? process.env[NODELIST_ENV];
  const cpusPerNode = options.cpusPerNode ?? process.env[CPUS_PER_NODE_ENV];
  if (!nodeList || !cpusPerNode) {
    throw new ConfigError(
      `Not inside a job: set ${NODELIST_ENV} and ${CPUS_PER_NODE_ENV} or pass --nodelist and --cpus-per-node.`,
    );
  }

  for (const line of buildHostfile(nodeList, cpusPerNode)) {
    console.log(line);
  }
}
