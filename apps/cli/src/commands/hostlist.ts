import type { Command } from "commander";
import { printError } from "@/lib/theme.ts";
import { loadConfig } from "@/core/config.ts";
import { expandHostlist } from "@/parsers/index.ts";

interface HostlistOptions {
  sort?: boolean;
  allowDuplicates?: boolean;
  count?: boolean;
  delimiter: string;
}

export function registerHostlistCommand(program: Command) {
  program
    .command("hostlist")
    .description("Expand a hostlist expression such as n[01-04],gpu[1-2]")
    .argument("<expression...>", "one or more hostlist expressions")
    .option("-s, --sort", "sort names numerically")
    .option("-d, --allow-duplicates", "keep repeated names")
    .option("-c, --count", "print only the number of hosts")
    .option("--delimiter <string>", "separator between names", "\n")
    .action((expressions: string[], options: HostlistOptions) => {
      try {
        runHostlist(expressions, options);
      } catch (error) {
        printError(error);
        process.exit(1);
      }
    });
}

function runHostlist(expressions: string[], options: HostlistOptions) {
  const config = loadConfig();
  const hosts = expandHostlist(expressions.join(","), {
    sort: options.sort,
    allowDuplicates: options.allowDuplicates,
    maxSize: config.hostlist.max_size,
  });

  if (options.count) {
    console.log(hosts.length);
    return;
  }
  if (hosts.length > 0) {
    console.log(hosts.join(options.delimiter));
  }
}
