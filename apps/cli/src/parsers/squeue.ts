import type { SqueueField, SqueueRow } from "@hpcsum/shared";
import { SQUEUE_DELIMITER, SQUEUE_FIELDS } from "@hpcsum/shared";
import type { Diagnostics } from "@/lib/diagnostics.ts";
import { RowShapeMismatchError } from "@/lib/errors.ts";

/**
 * Build the `--Format` argument for squeue from the field list.
 * Each field gets an explicit width and a `|` suffix, e.g. `JobID:32|`.
 */
export function buildSqueueFormat(
  fields: readonly SqueueField[] = SQUEUE_FIELDS,
): string {
  return fields
    .map((f) => `${f.format}:${f.width}${SQUEUE_DELIMITER}`)
    .join(",");
}

/**
 * Split delimited scheduler output into rows keyed by field name.
 *
 * Fields are trimmed (squeue pads to the requested width). A line may end in
 * one extra delimiter, as squeue's suffixed fields do; `a|` against two keys
 * is still an empty second field. Lines with the wrong number of fields are
 * dropped and reported as RowShapeMismatch.
 */
export function splitDelimitedRows<K extends string>(
  output: string,
  keys: readonly K[],
  diagnostics?: Diagnostics,
  delimiter: string = SQUEUE_DELIMITER,
): Array<Record<K, string>> {
  const rows: Array<Record<K, string>> = [];

  for (const line of output.split("\n")) {
    if (!line.trim()) continue;

    const body = line.trimEnd();
    const parts = body.split(delimiter);
    if (parts.length === keys.length + 1 && parts.at(-1) === "") parts.pop();

    if (parts.length !== keys.length) {
      diagnostics?.add(
        new RowShapeMismatchError(body, keys.length, parts.length),
      );
      continue;
    }

    const row: Partial<Record<K, string>> = {};
    keys.forEach((key, i) => {
      row[key] = (parts[i] ?? "").trim();
    });
    if (isComplete(row, keys)) rows.push(row);
  }

  return rows;
}

function isComplete<K extends string>(
  row: Partial<Record<K, string>>,
  keys: readonly K[],
): row is Record<K, string> {
  return keys.every((key) => row[key] !== undefined);
}

/**
 * Parse `squeue --noheader --Format=<buildSqueueFormat()>` output.
 */
export function parseSqueue(
  output: string,
  diagnostics?: Diagnostics,
): SqueueRow[] {
  return splitDelimitedRows(
    output,
    SQUEUE_FIELDS.map((f) => f.key),
    diagnostics,
  );
}
