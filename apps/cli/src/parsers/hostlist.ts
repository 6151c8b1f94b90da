import { HOSTLIST_MAX_SIZE } from "@hpcsum/shared";
import { MalformedExpressionError } from "@/lib/errors.ts";

export interface HostlistOptions {
  /** Order names by their numeric runs ("n2" before "n10"). */
  sort?: boolean;
  /** Keep repeated names instead of dropping them. */
  allowDuplicates?: boolean;
  /** Refuse expressions that expand to more names than this. */
  maxSize?: number;
}

interface RangeElement {
  low: number;
  high: number;
  width: number;
}

/**
 * Expand a Slurm hostlist expression into the hostnames it denotes.
 *
 *   n[9-11],d[01-02]   → n9 n10 n11 d01 d02
 *   x[1-2]y[1-3]       → x1y1 x1y2 x1y3 x2y1 x2y2 x2y3
 *
 * Brackets may not nest. Every expansion is counted against `maxSize` before
 * any name is built.
 */
export function expandHostlist(
  expression: string,
  options: HostlistOptions = {},
): string[] {
  const maxSize = options.maxSize ?? HOSTLIST_MAX_SIZE;
  const parts = splitTopLevel(expression);

  let total = 0;
  const names: string[] = [];
  for (const part of parts) {
    total += countPart(expression, part, maxSize);
    if (total > maxSize) {
      throw new MalformedExpressionError(
        expression,
        `expands to more than ${maxSize} names`,
      );
    }
    names.push(...expandPart(expression, part, maxSize));
  }

  const unique = options.allowDuplicates ? names : [...new Set(names)];
  return options.sort ? unique.sort(compareHostnames) : unique;
}

/**
 * Expand a bare range list such as "0-3,8,10-11" (the `CPU_IDs` notation).
 * Zero padding follows the width of each range's low bound.
 */
export function expandRangeList(
  list: string,
  maxSize: number = HOSTLIST_MAX_SIZE,
): string[] {
  const elements = parseRangeList(list, list);
  const count = countRange(elements);
  if (count > maxSize) {
    throw new MalformedExpressionError(list, `expands to more than ${maxSize} values`);
  }
  return materializeRange(elements);
}

/**
 * Order hostnames by alternating non-numeric/numeric runs, comparing numeric
 * runs by value. Ties fall back to plain string order so the sort is total.
 */
export function compareHostnames(a: string, b: string): number {
  const runsA = a.match(/\d+|\D+/g) ?? [];
  const runsB = b.match(/\d+|\D+/g) ?? [];
  const len = Math.min(runsA.length, runsB.length);

  for (let i = 0; i < len; i++) {
    const x = runsA[i] ?? "";
    const y = runsB[i] ?? "";
    const xNum = /^\d/.test(x);
    const yNum = /^\d/.test(y);

    if (xNum && yNum) {
      const diff = Number(x) - Number(y);
      if (diff !== 0) return diff;
    } else if (x !== y) {
      // A numeric run sorts before text at the same position.
      if (xNum !== yNum) return xNum ? -1 : 1;
      return x < y ? -1 : 1;
    }
  }

  if (runsA.length !== runsB.length) return runsA.length - runsB.length;
  return a < b ? -1 : a > b ? 1 : 0;
}

// --------------- Grammar ---------------

/** Split at commas outside brackets, validating bracket balance and depth. */
function splitTopLevel(expression: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < expression.length; i++) {
    const ch = expression[i];
    if (ch === "[") {
      if (depth > 0) {
        throw new MalformedExpressionError(expression, `nested "[" at index ${i}`);
      }
      depth++;
    } else if (ch === "]") {
      if (depth === 0) {
        throw new MalformedExpressionError(expression, `unmatched "]" at index ${i}`);
      }
      depth--;
    } else if (ch === "," && depth === 0) {
      parts.push(expression.slice(start, i));
      start = i + 1;
    }
  }

  if (depth !== 0) {
    throw new MalformedExpressionError(expression, 'missing closing "]"');
  }
  parts.push(expression.slice(start));

  return parts.map((p) => p.trim()).filter((p) => p.length > 0);
}

/** Break a part into prefix, bracket contents and the remainder after "]". */
function splitPart(
  part: string,
): { prefix: string; ranges: string; suffix: string } | null {
  const open = part.indexOf("[");
  if (open < 0) return null;
  const close = part.indexOf("]", open);
  return {
    prefix: part.slice(0, open),
    ranges: part.slice(open + 1, close),
    suffix: part.slice(close + 1),
  };
}

function countPart(expression: string, part: string, maxSize: number): number {
  const split = splitPart(part);
  if (!split) return 1;

  const suffixCount = split.suffix ? countPart(expression, split.suffix, maxSize) : 1;
  const rangeCount = countRange(parseRangeList(expression, split.ranges));
  const count = rangeCount * suffixCount;
  if (count > maxSize) {
    throw new MalformedExpressionError(
      expression,
      `expands to more than ${maxSize} names`,
    );
  }
  return count;
}

function expandPart(expression: string, part: string, maxSize: number): string[] {
  const split = splitPart(part);
  if (!split) return [part];

  const suffixes = split.suffix
    ? expandPart(expression, split.suffix, maxSize)
    : [""];
  const values = materializeRange(parseRangeList(expression, split.ranges));

  const names: string[] = [];
  for (const value of values) {
    for (const suffix of suffixes) {
      names.push(`${split.prefix}${value}${suffix}`);
    }
  }
  return names;
}

function parseRangeList(expression: string, list: string): RangeElement[] {
  if (list.trim() === "") {
    throw new MalformedExpressionError(expression, "empty range list");
  }

  return list.split(",").map((raw) => {
    const element = raw.trim();
    const range = element.match(/^(\d+)-(\d+)$/);
    if (range) {
      const low = Number(range[1]);
      const high = Number(range[2]);
      if (high < low) {
        throw new MalformedExpressionError(
          expression,
          `range ${element} has high bound below low bound`,
        );
      }
      return { low, high, width: range[1]?.length ?? 0 };
    }
    if (/^\d+$/.test(element)) {
      const value = Number(element);
      return { low: value, high: value, width: element.length };
    }
    throw new MalformedExpressionError(expression, `invalid range element "${element}"`);
  });
}

function countRange(elements: RangeElement[]): number {
  return elements.reduce((sum, e) => sum + (e.high - e.low + 1), 0);
}

function materializeRange(elements: RangeElement[]): string[] {
  const values: string[] = [];
  for (const { low, high, width } of elements) {
    for (let i = low; i <= high; i++) {
      values.push(String(i).padStart(width, "0"));
    }
  }
  return values;
}
