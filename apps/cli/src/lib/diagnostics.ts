import { HpcError } from "./errors.ts";
import { theme } from "./theme.ts";

export interface Diagnostic {
  code: string;
  message: string;
}

/**
 * Collects recoverable errors (skipped rows, bad expressions, failed
 * scheduler queries) so a report can finish and list them afterwards.
 */
export class Diagnostics {
  private readonly entries: Diagnostic[] = [];

  add(error: unknown): void {
    if (error instanceof HpcError) {
      this.entries.push({ code: error.code, message: error.message });
    } else if (error instanceof Error) {
      this.entries.push({ code: "ERROR", message: error.message });
    } else {
      this.entries.push({ code: "ERROR", message: String(error) });
    }
  }

  get size(): number {
    return this.entries.length;
  }

  list(): readonly Diagnostic[] {
    return this.entries;
  }

  /** Print every diagnostic to stderr as a warning. */
  report(): void {
    for (const entry of this.entries) {
      console.error(theme.warning(`Warning: ${entry.message}`));
    }
  }
}
