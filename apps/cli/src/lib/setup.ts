import type { HpcConfig } from "@hpcsum/shared";
import { CommandRunner } from "@/core/runner.ts";
import { SlurmClient } from "@/core/slurm.ts";
import { loadConfig } from "@/core/config.ts";

export function ensureSetup(): {
  config: HpcConfig;
  runner: CommandRunner;
  slurm: SlurmClient;
} {
  const config = loadConfig();
  const runner = new CommandRunner({
    sshHost: config.scheduler.ssh_host,
    timeoutMs: config.scheduler.timeout_ms,
  });
  const slurm = new SlurmClient(runner, config);

  return { config, runner, slurm };
}
