import { existsSync } from "node:fs";
import type { Command } from "commander";
import { stringify as stringifyTOML } from "smol-toml";
import { printError, theme } from "@/lib/theme.ts";
import { configFilePath } from "@/lib/constants.ts";
import { HpcConfigSchema, loadConfig, saveConfig } from "@/core/config.ts";

export function registerConfigCommand(program: Command) {
  const config = program
    .command("config")
    .description("Show the effective configuration")
    .option("--json", "output as JSON")
    .action((options: { json?: boolean }) => {
      try {
        const path = configFilePath();
        const effective = loadConfig(path);
        if (options.json) {
          console.log(JSON.stringify(effective, null, 2));
          return;
        }
        const source = existsSync(path) ? path : `${path} (not found, defaults)`;
        console.log(theme.muted(`# ${source}`));
        console.log(stringifyTOML(effective).trimEnd());
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });

  config
    .command("init")
    .description("Write a config file with the default settings")
    .option("--force", "overwrite an existing file")
    .action((options: { force?: boolean }) => {
      try {
        const path = configFilePath();
        if (existsSync(path) && !options.force) {
          console.log(theme.warning(`${path} already exists (use --force to overwrite).`));
          return;
        }
        saveConfig(HpcConfigSchema.parse({}), path);
        console.log(theme.success(`Wrote ${path}`));
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });
}
