import { spawn } from "node:child_process";
import { SchedulerCommandError, SchedulerTimeoutError } from "@/lib/errors.ts";
import { shellJoin } from "@/lib/shell-quote.ts";

export interface ExecOptions {
  timeoutMs?: number;
}

/** Anything that can run a scheduler command and hand back its stdout. */
export interface SchedulerRunner {
  exec(command: string, args: string[], options?: ExecOptions): Promise<string>;
}

export interface CommandRunnerOptions {
  /** Run commands on this host through ssh instead of locally. */
  sshHost?: string;
  timeoutMs?: number;
}

/**
 * Runs scheduler commands as child processes, locally or through
 * `ssh -o BatchMode=yes <host>`, killing them once the timeout passes.
 */
export class CommandRunner implements SchedulerRunner {
  private sshHost: string | undefined;
  private timeoutMs: number;

  constructor(options: CommandRunnerOptions = {}) {
    this.sshHost = options.sshHost;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  private argv(command: string, args: string[]): [string, string[]] {
    if (!this.sshHost) return [command, args];
    return [
      "ssh",
      [
        "-o",
        "BatchMode=yes",
        "-o",
        "ConnectTimeout=10",
        this.sshHost,
        shellJoin([command, ...args]),
      ],
    ];
  }

  exec(command: string, args: string[], options?: ExecOptions): Promise<string> {
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;
    const [file, argv] = this.argv(command, args);
    const label = shellJoin([command, ...args]);

    return new Promise<string>((resolve, reject) => {
      const proc = spawn(file, argv, { stdio: ["ignore", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let timedOut = false;

      const timeout = setTimeout(() => {
        timedOut = true;
        proc.kill();
      }, timeoutMs);

      proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

      proc.on("error", (error) => {
        clearTimeout(timeout);
        reject(new SchedulerCommandError(label, null, error.message));
      });

      proc.on("close", (exitCode) => {
        clearTimeout(timeout);
        const out = Buffer.concat(stdout).toString("utf-8");
        const err = Buffer.concat(stderr).toString("utf-8").trim();

        if (timedOut) {
          reject(new SchedulerTimeoutError(label, timeoutMs));
        } else if (exitCode !== 0) {
          reject(new SchedulerCommandError(label, exitCode, err || out.trim()));
        } else {
          resolve(out);
        }
      });
    });
  }
}
