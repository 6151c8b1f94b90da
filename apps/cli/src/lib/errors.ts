export class HpcError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Grammar violation in a hostlist, run-length list or TRES string. */
export class MalformedExpressionError extends HpcError {
  constructor(
    public readonly expression: string,
    reason: string,
  ) {
    super(`Malformed expression "${expression}": ${reason}`, "MALFORMED_EXPRESSION");
  }
}

export class UnresolvedHostError extends HpcError {
  constructor(
    public readonly host: string,
    jobId?: string,
  ) {
    super(
      `No resource mapping for host ${host}${jobId ? ` in job ${jobId}` : ""}`,
      "UNRESOLVED_HOST",
    );
  }
}

export class RowShapeMismatchError extends HpcError {
  constructor(
    public readonly row: string,
    expected: number,
    actual: number,
  ) {
    super(
      `Dropped row with ${actual} fields (expected ${expected}): ${row}`,
      "ROW_SHAPE_MISMATCH",
    );
  }
}

export class SchedulerCommandError extends HpcError {
  constructor(
    command: string,
    public readonly exitCode: number | null,
    detail: string,
  ) {
    super(
      `${command} failed${exitCode === null ? "" : ` (exit ${exitCode})`}${detail ? `: ${detail}` : ""}`,
      "SCHEDULER_COMMAND_FAILED",
    );
  }
}

export class SchedulerTimeoutError extends HpcError {
  constructor(command: string, timeoutMs: number) {
    super(`${command} timed out after ${timeoutMs}ms`, "SCHEDULER_TIMEOUT");
  }
}

export class ConfigError extends HpcError {
  constructor(message: string) {
    super(message, "CONFIG_ERROR");
  }
}
