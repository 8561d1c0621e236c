import type {
  CommandRunner,
  CommandRunnerResult
} from "../src/backend/run-command.js";

export interface RecordedCall {
  command: string;
  args: string[];
  stdin?: string;
  timeoutMs?: number;
  env?: Record<string, string | undefined>;
}

export type FakeResponse = Partial<CommandRunnerResult> | undefined;

/**
 * Stand-in for the incus binary. `respond` sees the arguments after any
 * `--project` prefix and returns the process result; unmatched calls succeed
 * with empty output.
 */
export function createFakeRunner(
  respond: (args: string[], stdin?: string) => FakeResponse = () => undefined
): { runner: CommandRunner; calls: RecordedCall[]; commands(): string[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options = {}) => {
    const stdin = options.stdin === undefined ? undefined : options.stdin.toString();
    calls.push({ command, args, stdin, timeoutMs: options.timeoutMs, env: options.env });
    const unprefixed = args[0] === "--project" ? args.slice(2) : args;
    const result = respond(unprefixed, stdin) ?? {};
    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.exitCode ?? 0,
      ...(result.timedOut && { timedOut: true })
    };
  };
  return {
    runner,
    calls,
    commands: () =>
      calls.map((call) =>
        (call.args[0] === "--project" ? call.args.slice(2) : call.args).join(" ")
      )
  };
}

export const notFound: FakeResponse = { exitCode: 1, stderr: "Error: Not Found" };
