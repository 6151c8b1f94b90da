import { theme } from "./theme.ts";

// --------------- ANSI Utilities ---------------

function stripAnsi(value: string): string {
  return value.replace(/\x1b\[[0-9;]*m/g, "");
}

// --------------- Types ---------------

export interface TableOptions {
  headers: readonly string[];
  rows: string[][];
  /** Left indent in spaces (default: 2) */
  indent?: number;
  /** Columns aligned to the right (numeric columns) */
  alignRight?: ReadonlySet<number>;
  /** Rows drawn after a separator line, e.g. a grand total */
  footer?: string[][];
}

// --------------- Internals ---------------

function computeColumnWidths(
  headers: readonly string[],
  rows: string[][],
): number[] {
  return headers.map((header, index) => {
    const cellWidths = rows.map((row) => stripAnsi(row[index] ?? "").length);
    return Math.max(stripAnsi(header).length, ...cellWidths);
  });
}

function buildRowRenderer(
  widths: number[],
  indent: number,
  alignRight: ReadonlySet<number>,
) {
  const pad = " ".repeat(indent);
  return (cols: readonly string[]) =>
    pad +
    cols
      .map((col, index) => {
        const gap = index < cols.length - 1 ? 2 : 0;
        const fill = " ".repeat(
          Math.max(0, (widths[index] ?? 0) - stripAnsi(col).length),
        );
        const cell = alignRight.has(index) ? `${fill}${col}` : `${col}${fill}`;
        return `${cell}${" ".repeat(gap)}`;
      })
      .join("")
      .trimEnd();
}

// --------------- Table ---------------

/** Lay out a table as lines of text, header first. */
export function formatTable(options: TableOptions): string[] {
  const { headers, rows, indent = 2, alignRight = new Set<number>(), footer = [] } =
    options;
  const widths = computeColumnWidths(headers, [...rows, ...footer]);
  const render = buildRowRenderer(widths, indent, alignRight);

  const lines = [render(headers.map((h) => theme.muted(h)))];
  for (const row of rows) {
    lines.push(render(row));
  }
  if (footer.length > 0) {
    const ruleWidth = widths.reduce((sum, w) => sum + w, 0) + 2 * (widths.length - 1);
    lines.push(" ".repeat(indent) + theme.muted("-".repeat(ruleWidth)));
    for (const row of footer) {
      lines.push(render(row.map((cell) => theme.emphasis(cell))));
    }
  }
  return lines;
}

