/**
 * POSIX shell quoting for commands sent over ssh and for `export` lines.
 *
 * Anything outside the safe set is wrapped in single quotes; an embedded
 * single quote becomes '\'' (close, escaped quote, reopen).
 */
const SAFE_CHARS = /^[a-zA-Z0-9_@%+=:,./-]+$/;

export function shellQuote(s: string): string {
  if (s === "") return "''";
  if (SAFE_CHARS.test(s)) return s;
  return "'" + s.replaceAll("'", "'\\''") + "'";
}

export function shellJoin(args: string[]): string {
  return args.map(shellQuote).join(" ");
}

/** `export NAME=value` lines for a variable map, in insertion order. */
export function exportLines(vars: Readonly<Record<string, string>>): string[] {
  return Object.entries(vars).map(
    ([name, value]) => `export ${name}=${shellQuote(value)}`,
  );
}
