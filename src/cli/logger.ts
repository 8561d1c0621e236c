import { log } from "@clack/prompts";
import chalk from "chalk";
import { resolveOutputFormat } from "./output-format.js";

export type LoggerFn = (message: string) => void;

export interface LoggerContext {
  dryRun?: boolean;
  verbose?: boolean;
  scope?: string;
}

export interface ScopedLogger {
  readonly context: Required<Pick<LoggerContext, "dryRun" | "verbose">> &
    Pick<LoggerContext, "scope">;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  dryRun(message: string): void;
  verbose(message: string): void;
  resolved(label: string, value: string): void;
  child(context: Partial<LoggerContext>): ScopedLogger;
}

export interface LoggerFactory {
  base: LoggerFn;
  create(context?: LoggerContext): ScopedLogger;
}

type Level = "info" | "success" | "warn" | "error" | "dryRun" | "verbose";

const SYMBOLS = {
  info: () => chalk.magenta("●"),
  success: () => chalk.magenta("◆"),
  dryRun: () => chalk.cyan("◇"),
  verbose: () => chalk.gray("│"),
  resolved: () => chalk.magenta("◇")
};

export function createLoggerFactory(emitter?: LoggerFn): LoggerFactory {
  const write = (message: string, level: Level | "resolved"): void => {
    if (emitter) {
      emitter(message);
      return;
    }
    if (resolveOutputFormat() !== "terminal") {
      // json output owns stdout; keep log lines off it
      const stream = resolveOutputFormat() === "json" ? process.stderr : process.stdout;
      stream.write(message + "\n");
      return;
    }
    switch (level) {
      case "warn":
        log.warn(message);
        return;
      case "error":
        log.error(message);
        return;
      default:
        log.message(message, { symbol: SYMBOLS[level]() });
    }
  };

  const create = (context: LoggerContext = {}): ScopedLogger => {
    const dryRun = context.dryRun ?? false;
    const verbose = context.verbose ?? false;
    const scope = context.scope;
    const formatMessage = (message: string): string =>
      scope && verbose ? `[${scope}] ${message}` : message;

    return {
      context: { dryRun, verbose, scope },
      info(message) {
        write(formatMessage(message), "info");
      },
      success(message) {
        write(message, "success");
      },
      warn(message) {
        write(formatMessage(message), "warn");
      },
      error(message) {
        write(formatMessage(message), "error");
      },
      dryRun(message) {
        write(formatMessage(message), "dryRun");
      },
      verbose(message) {
        if (!verbose) {
          return;
        }
        write(formatMessage(message), "verbose");
      },
      resolved(label, value) {
        const message =
          emitter || resolveOutputFormat() !== "terminal"
            ? `${label}: ${value}`
            : `${label}\n   ${value}`;
        write(message, "resolved");
      },
      child(next) {
        return create({
          dryRun: next.dryRun ?? dryRun,
          verbose: next.verbose ?? verbose,
          scope: next.scope ?? scope
        });
      }
    };
  };

  return {
    base: emitter ?? ((message) => write(message, "info")),
    create
  };
}
