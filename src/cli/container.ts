import {
  createIncusClient,
  type IncusClient
} from "../backend/incus-client.js";
import type { CommandRunner } from "../backend/run-command.js";
import type { ConvergeConfig } from "../config/loader.js";
import type { ClientScope } from "../resources/index.js";
import { nodeFileSystem, type FileSystem } from "../utils/file-system.js";
import { createLoggerFactory, type LoggerFactory, type LoggerFn } from "./logger.js";

export interface CliEnvironment {
  cwd: string;
  variables: Record<string, string | undefined>;
}

export interface CliDependencies {
  fs?: FileSystem;
  env: CliEnvironment;
  /** Replaces the clack renderer; every log line is passed here */
  logger?: LoggerFn;
  /** Sink for --json documents; defaults to stdout */
  output?: (text: string) => void;
  /** Runs the incus binary; tests pass a fake */
  runner?: CommandRunner;
  exitOverride?: boolean;
  suppressCommanderOutput?: boolean;
}

export interface CliContainer {
  fs: FileSystem;
  env: CliEnvironment;
  loggerFactory: LoggerFactory;
  output: (text: string) => void;
  createClient(config: ConvergeConfig, scope?: ClientScope): IncusClient;
}

export function createCliContainer(dependencies: CliDependencies): CliContainer {
  return {
    fs: dependencies.fs ?? nodeFileSystem,
    env: dependencies.env,
    loggerFactory: createLoggerFactory(dependencies.logger),
    output: dependencies.output ?? ((text) => process.stdout.write(text + "\n")),
    createClient(config, scope = {}) {
      // project: null addresses objects outside any project
      const project = scope.project === null ? undefined : scope.project ?? config.project;
      return createIncusClient({
        incusPath: config.incusPath,
        timeoutMs: config.timeoutMs,
        project,
        remote: scope.remote ?? config.remote,
        runner: dependencies.runner
      });
    }
  };
}
