import { spawn, type StdioOptions } from "node:child_process";
import { LaunchError } from "../core/errors.js";
import type { ExitStatus } from "../core/types.js";

/**
 * How one standard stream of a child is wired: shared with this process,
 * collected into memory, discarded, or written to an open file descriptor.
 */
export type StreamDirective = "inherit" | "capture" | "ignore" | { fd: number };

export interface RunOptions {
  stdin?: Exclude<StreamDirective, "capture">;
  stdout?: StreamDirective;
  stderr?: StreamDirective;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface RunResult {
  stdout: string;
  stderr: string;
  status: ExitStatus;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: RunOptions,
) => Promise<RunResult>;

function toStdio(directive: StreamDirective): "inherit" | "pipe" | "ignore" | number {
  if (directive === "capture") return "pipe";
  if (typeof directive === "object") return directive.fd;
  return directive;
}

export function isSuccess(status: ExitStatus): boolean {
  return status.code === 0;
}

export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/^[\w@%+=:,./-]+$/.test(part) ? part : `'${part.replace(/'/g, `'\\''`)}'`))
    .join(" ");
}

/**
 * Starts `command` and waits for it to exit. Resolves with the captured
 * streams and the exit status, including non-zero exits; rejects only when
 * the program cannot be started.
 */
export const runProcess: ProcessRunner = (command, args, options = {}) => {
  const stdio: StdioOptions = [
    toStdio(options.stdin ?? "inherit"),
    toStdio(options.stdout ?? "inherit"),
    toStdio(options.stderr ?? "inherit"),
  ];

  return new Promise<RunResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      stdio,
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    child.on("close", (code, signal) => {
      resolve({
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: Buffer.concat(stderrChunks).toString("utf-8"),
        status: { code, signal },
      });
    });

    child.on("error", (err) => {
      reject(new LaunchError(`Failed to start ${command}: ${err.message}`, command));
    });
  });
};
