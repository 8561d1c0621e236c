import YAML from "yaml";
import {
  ReconcileError,
  type ConfigObject,
  type ConfigValue
} from "@incus-converge/reconcile";
import {
  runCommand,
  type CommandRunner,
  type CommandRunnerResult
} from "./run-command.js";
import { redactArgs } from "../utils/redact.js";
import { toConfigObject, toConfigValue } from "./values.js";

export interface IncusClientOptions {
  incusPath?: string;
  project?: string;
  /** Remote prefix for resource names; "local" means none */
  remote?: string;
  timeoutMs?: number;
  runner?: CommandRunner;
}

export interface IncusClient {
  readonly project: string | undefined;
  /** Remote name; undefined for the local server */
  readonly remote: string | undefined;
  /** Qualify a resource name with the configured remote, unless it names one */
  target(name: string): string;
  /** Raw invocation; never throws on a non-zero exit */
  run(args: string[], options?: { stdin?: string }): Promise<CommandRunnerResult>;
  /** Invocation that must succeed; returns stdout */
  exec(args: string[], options?: { stdin?: string }): Promise<string>;
  /** `show`-style command parsed as YAML; null when the daemon says not found */
  show(args: string[]): Promise<ConfigObject | null>;
  /** `list --format json`-style command parsed as JSON */
  list(args: string[]): Promise<ConfigValue[]>;
}

const REFERENTIAL_PATTERNS = [
  /in use/i,
  /currently used/i,
  /not empty/i,
  /referenced/i
];

const NOT_FOUND_PATTERN = /not found/i;

export function createIncusClient(options: IncusClientOptions = {}): IncusClient {
  const incusPath = options.incusPath ?? "incus";
  const runner = options.runner ?? runCommand;
  const project = options.project;
  const remote = options.remote && options.remote !== "local" ? options.remote : undefined;

  const run = (
    args: string[],
    runOptions: { stdin?: string } = {}
  ): Promise<CommandRunnerResult> => {
    const fullArgs = project ? ["--project", project, ...args] : args;
    return runner(incusPath, fullArgs, {
      env: { LC_ALL: "C" },
      stdin: runOptions.stdin,
      timeoutMs: options.timeoutMs
    });
  };

  const exec = async (
    args: string[],
    runOptions: { stdin?: string } = {}
  ): Promise<string> => {
    const result = await run(args, runOptions);
    if (result.timedOut || result.exitCode !== 0) {
      throw classifyFailure(args, result, options.timeoutMs);
    }
    return result.stdout;
  };

  return {
    project,
    remote,
    target(name) {
      return remote && !name.includes(":") ? `${remote}:${name}` : name;
    },
    run,
    exec,
    async show(args) {
      const result = await run(args);
      if (!result.timedOut && result.exitCode !== 0 && NOT_FOUND_PATTERN.test(result.stderr)) {
        return null;
      }
      if (result.timedOut || result.exitCode !== 0) {
        throw classifyFailure(args, result, options.timeoutMs);
      }
      return parseYamlDocument(result.stdout, `incus ${args.join(" ")}`);
    },
    async list(args) {
      const stdout = await exec(args);
      return parseJsonList(stdout, `incus ${args.join(" ")}`);
    }
  };
}

export function classifyFailure(
  args: string[],
  result: CommandRunnerResult,
  timeoutMs?: number
): ReconcileError {
  const command = `incus ${redactArgs(args).join(" ")}`;
  if (result.timedOut) {
    return new ReconcileError(
      "backendTimeout",
      `${command} timed out after ${timeoutMs ?? 0}ms.`
    );
  }
  const detail = result.stderr.trim() || result.stdout.trim() || `exit code ${result.exitCode}`;
  const message = `${command} failed: ${detail}`;
  if (REFERENTIAL_PATTERNS.some((pattern) => pattern.test(detail))) {
    return new ReconcileError("referentialConflict", message);
  }
  if (NOT_FOUND_PATTERN.test(detail)) {
    return new ReconcileError("notFound", message);
  }
  return new ReconcileError("commandFailed", message);
}

export function parseYamlDocument(raw: string, source: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconcileError("schemaMismatch", `Invalid YAML from ${source}: ${detail}`);
  }
  return toConfigObject(parsed, source);
}

export function parseJsonList(raw: string, source: string): ConfigValue[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw.trim() === "" ? "[]" : raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconcileError("schemaMismatch", `Invalid JSON from ${source}: ${detail}`);
  }
  const value = toConfigValue(parsed, source);
  if (!Array.isArray(value)) {
    throw new ReconcileError("schemaMismatch", `Expected a list from ${source}.`);
  }
  return value;
}
