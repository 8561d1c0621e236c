import { spawn } from "node:child_process";

export interface CommandRunnerResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when the process was killed for exceeding `timeoutMs` */
  timedOut?: boolean;
}

export interface CommandRunnerOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  stdin?: string | Buffer;
  timeoutMs?: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandRunnerOptions
) => Promise<CommandRunnerResult>;

export function runCommand(
  command: string,
  args: string[],
  options: CommandRunnerOptions = {}
): Promise<CommandRunnerResult> {
  return new Promise((resolve) => {
    const stdin = options.stdin;
    const child = spawn(command, args, {
      stdio: [stdin != null ? "pipe" : "ignore", "pipe", "pipe"],
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : undefined
    });
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer =
      options.timeoutMs !== undefined && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, options.timeoutMs)
        : undefined;

    if (stdin != null && child.stdin) {
      child.stdin.on("error", (error: Error) => {
        stderr += error.message;
      });
      child.stdin.end(stdin);
    }

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string | Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string | Buffer) => {
      stderr += chunk.toString();
    });

    child.on("error", (error: NodeJS.ErrnoException) => {
      clearTimeout(timer);
      const exitCode =
        typeof error.errno === "number" ? Math.abs(error.errno) : 127;
      resolve({
        stdout,
        stderr: stderr ? `${stderr}${error.message}` : error.message,
        exitCode
      });
    });

    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        stdout,
        stderr,
        exitCode: code ?? (timedOut ? 124 : 0),
        ...(timedOut && { timedOut })
      });
    });
  });
}
