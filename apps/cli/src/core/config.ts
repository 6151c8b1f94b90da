import { existsSync, mkdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { parse as parseTOML, stringify as stringifyTOML } from "smol-toml";
import { z } from "zod";
import type { HpcConfig } from "@hpcsum/shared";
import { DEFAULT_CONFIG } from "@hpcsum/shared";
import { configFilePath } from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";

const defaults = DEFAULT_CONFIG;

export const HpcConfigSchema = z.object({
  scheduler: z
    .object({
      timeout_ms: z
        .number()
        .int()
        .positive()
        .default(defaults.scheduler.timeout_ms),
      ssh_host: z.string().min(1).optional(),
      squeue: z.string().min(1).default(defaults.scheduler.squeue),
      scontrol: z.string().min(1).default(defaults.scheduler.scontrol),
      sacctmgr: z.string().min(1).default(defaults.scheduler.sacctmgr),
    })
    .default({}),
  hostlist: z
    .object({
      max_size: z.number().int().positive().default(defaults.hostlist.max_size),
    })
    .default({}),
  output: z
    .object({
      format: z
        .enum(["table", "csv", "json", "yaml"])
        .default(defaults.output.format),
    })
    .default({}),
});

/**
 * Load the TOML config. A missing file is not an error: every setting has a
 * default.
 */
export function loadConfig(path: string = configFilePath()): HpcConfig {
  if (!existsSync(path)) {
    return HpcConfigSchema.parse({});
  }

  try {
    const raw = readFileSync(path, "utf-8");
    return HpcConfigSchema.parse(parseTOML(raw));
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid config at ${path}: ${error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
      );
    }
    throw new ConfigError(
      `Failed to read config at ${path}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export function saveConfig(
  config: HpcConfig,
  path: string = configFilePath(),
): void {
  const validated = HpcConfigSchema.parse(config);

  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  writeFileSync(path, stringifyTOML(validated), { mode: 0o600 });
}
