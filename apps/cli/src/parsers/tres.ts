import type { GroupLimits } from "@hpcsum/shared";
import { MalformedExpressionError } from "@/lib/errors.ts";

const MEM_MULTIPLIERS: Record<string, number> = {
  M: 1,
  G: 1024,
  T: 1024 * 1024,
};

/**
 * Parse a trackable-resource limit string (sacctmgr GrpTRES).
 *
 *   cpu=720,mem=3840G,node=10,gres/gpu=4
 *
 * `mem` is normalized to MiB. `gres/<name>` entries land in `gres` keyed by
 * the name after the slash.
 */
export function parseTresLimits(spec: string, account = ""): GroupLimits {
  const limits: Record<string, number> = {};
  const gres: Record<string, number> = {};

  for (const raw of spec.split(",")) {
    const pair = raw.trim();
    if (!pair) continue;

    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new MalformedExpressionError(spec, `expected key=value, got "${pair}"`);
    }
    const key = pair.slice(0, eq);
    const value = pair.slice(eq + 1);

    if (key.startsWith("gres/")) {
      gres[key.slice("gres/".length)] = parseLimit(spec, key, value);
    } else if (key === "mem") {
      const match = value.match(/^(\d+)([MGT])?$/i);
      if (!match) {
        throw new MalformedExpressionError(spec, `invalid memory limit "${value}"`);
      }
      const unit = (match[2] ?? "M").toUpperCase();
      limits.mem = Number(match[1]) * (MEM_MULTIPLIERS[unit] ?? 1);
    } else {
      limits[key] = parseLimit(spec, key, value);
    }
  }

  return Object.freeze({
    account,
    limits: Object.freeze(limits),
    gres: Object.freeze(gres),
  });
}

function parseLimit(spec: string, key: string, value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new MalformedExpressionError(spec, `invalid limit for ${key}: "${value}"`);
  }
  return Number(value);
}
