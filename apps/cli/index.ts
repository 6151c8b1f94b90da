#!/usr/bin/env tsx
import { createRequire } from "node:module";
import { Command } from "commander";
import { registerJobsCommand } from "./src/commands/jobs.ts";
import { registerSummaryCommand } from "./src/commands/summary.ts";
import { registerLimitsCommand } from "./src/commands/limits.ts";
import { registerHostlistCommand } from "./src/commands/hostlist.ts";
import { registerHostfileCommand } from "./src/commands/hostfile.ts";
import { registerSgeEnvCommand } from "./src/commands/sge-env.ts";
import { registerConfigCommand } from "./src/commands/config.ts";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("./package.json");

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name("hs")
    .description("Slurm job, workgroup and hostlist helpers");

  registerJobsCommand(program);
  registerSummaryCommand(program);
  registerLimitsCommand(program);
  registerHostlistCommand(program);
  registerHostfileCommand(program);
  registerSgeEnvCommand(program);
  registerConfigCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
