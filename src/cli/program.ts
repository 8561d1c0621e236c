import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { Command } from "commander";
import { z } from "zod";
import { isNotFound } from "../utils/file-system.js";
import { registerApplyCommand, registerPlanCommand } from "./commands/apply.js";
import { createCliContainer, type CliDependencies } from "./container.js";

const packageJsonSchema = z.object({ name: z.string(), version: z.string() });

/** Version of the nearest incus-converge package.json above this module. */
export function readPackageVersion(
  moduleUrl: string = import.meta.url,
  readFile: (path: string) => string = (path) => readFileSync(path, "utf8")
): string {
  let dir = dirname(fileURLToPath(moduleUrl));
  for (;;) {
    const candidate = join(dir, "package.json");
    let raw: string | undefined;
    try {
      raw = readFile(candidate);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
    if (raw !== undefined) {
      const parsed = packageJsonSchema.safeParse(JSON.parse(raw));
      if (parsed.success && parsed.data.name === "incus-converge") {
        return parsed.data.version;
      }
    }
    const parent = dirname(dir);
    if (parent === dir) {
      return "0.0.0";
    }
    dir = parent;
  }
}

export function createProgram(dependencies: CliDependencies): Command {
  const container = createCliContainer(dependencies);
  const program = new Command();
  program
    .name("incus-converge")
    .description("Converge Incus resources to the state declared in a YAML manifest.")
    .version(readPackageVersion(), "-V, --version")
    .option("--dry-run", "Plan changes without applying them.")
    .option("--verbose", "Show phases and individual mutations.")
    .option("--json", "Print the reports as a JSON document.")
    .option("--project <name>", "Default Incus project.")
    .option("--remote <name>", "Default Incus remote.")
    .helpOption("-h, --help", "Display help for command");

  registerApplyCommand(program, container);
  registerPlanCommand(program, container);

  program.action(() => {
    program.outputHelp();
  });

  if (dependencies.exitOverride ?? true) {
    applyExitOverride(program);
  }
  if (dependencies.suppressCommanderOutput) {
    suppressCommanderOutput(program);
  }
  return program;
}

export type { CliDependencies };

function applyExitOverride(command: Command): void {
  command.exitOverride();
  for (const child of command.commands) {
    applyExitOverride(child);
  }
}

function suppressCommanderOutput(command: Command): void {
  command.configureOutput({
    writeOut: () => {},
    writeErr: () => {}
  });
  for (const child of command.commands) {
    suppressCommanderOutput(child);
  }
}
