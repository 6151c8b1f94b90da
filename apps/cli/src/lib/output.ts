import { stringify as stringifyYAML } from "yaml";
import type { OutputFormat, ReportCell, ReportRow } from "@hpcsum/shared";
import { ConfigError } from "./errors.ts";
import { formatTable } from "./table.ts";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "csv", "json", "yaml"];

export interface Report {
  columns: readonly string[];
  rows: ReportRow[];
  /** Summary rows (grand totals), kept apart from `rows` in every format. */
  totals?: ReportRow[];
  /** Columns right-aligned in table output */
  numeric?: readonly string[];
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/** The --format option if given, else the configured default. */
export function resolveFormat(
  value: string | undefined,
  fallback: OutputFormat,
): OutputFormat {
  if (value === undefined) return fallback;
  if (!isOutputFormat(value)) {
    throw new ConfigError(
      `Unknown output format "${value}". Valid: ${OUTPUT_FORMATS.join(", ")}`,
    );
  }
  return value;
}

function cellText(cell: ReportCell | undefined): string {
  if (cell === null || cell === undefined) return "";
  return String(cell);
}

/** RFC 4180 field quoting. */
export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

function toCsv(report: Report): string {
  const lines = [report.columns.map(csvField).join(",")];
  for (const row of [...report.rows, ...(report.totals ?? [])]) {
    lines.push(report.columns.map((c) => csvField(cellText(row[c]))).join(","));
  }
  return lines.join("\n");
}

function toTable(report: Report): string {
  const numeric = new Set(report.numeric ?? []);
  const alignRight = new Set(
    report.columns.flatMap((c, i) => (numeric.has(c) ? [i] : [])),
  );
  const cells = (rows: ReportRow[]) =>
    rows.map((row) => report.columns.map((c) => cellText(row[c])));

  return formatTable({
    headers: report.columns,
    rows: cells(report.rows),
    footer: cells(report.totals ?? []),
    alignRight,
  }).join("\n");
}

/** Render a report in one of the supported output formats. */
export function formatReport(format: OutputFormat, report: Report): string {
  const data = report.totals
    ? { rows: report.rows, totals: report.totals }
    : report.rows;

  switch (format) {
    case "json":
      return JSON.stringify(data, null, 2);
    case "yaml":
      return stringifyYAML(data).trimEnd();
    case "csv":
      return toCsv(report);
    case "table":
      return toTable(report);
  }
}
