import { HOSTLIST_MAX_SIZE } from "@hpcsum/shared";
import { MalformedExpressionError } from "@/lib/errors.ts";

/**
 * Decode a Slurm per-node count list such as SLURM_JOB_CPUS_PER_NODE.
 *
 *   "1(x2),2(x3)" → [1, 1, 2, 2, 2]
 *
 * Positions line up with the hosts of the matching node list. An empty list
 * decodes to an empty array.
 */
export function decodeRunLength(
  list: string,
  maxPositions: number = HOSTLIST_MAX_SIZE,
): number[] {
  const trimmed = list.trim();
  if (!trimmed) return [];

  const groups: Array<{ value: number; repeat: number }> = [];
  let positions = 0;

  for (const [index, element] of trimmed.split(",").entries()) {
    const match = element.match(/^(\d+)(?:\(x(\d+)\))?$/);
    if (!match) {
      throw new MalformedExpressionError(
        list,
        element === ""
          ? `empty element at position ${index}`
          : `invalid element "${element}"`,
      );
    }

    const value = Number(match[1]);
    const repeat = match[2] === undefined ? 1 : Number(match[2]);
    if (match[2] !== undefined && (value <= 0 || repeat <= 0)) {
      throw new MalformedExpressionError(
        list,
        `repeated element "${element}" needs a positive value and count`,
      );
    }

    positions += repeat;
    if (positions > maxPositions) {
      throw new MalformedExpressionError(
        list,
        `expands to more than ${maxPositions} positions`,
      );
    }
    groups.push({ value, repeat });
  }

  return groups.flatMap(({ value, repeat }) => Array<number>(repeat).fill(value));
}

/**
 * Total of a per-node count list. An absent, unparseable or zero list still
 * means the job holds one slot, so those all return 1.
 */
export function sumRunLength(list: string | undefined): number {
  if (!list) return 1;

  let counts: number[];
  try {
    counts = decodeRunLength(list);
  } catch (error) {
    if (error instanceof MalformedExpressionError) return 1;
    throw error;
  }

  const total = counts.reduce((sum, n) => sum + n, 0);
  return total > 0 ? total : 1;
}
