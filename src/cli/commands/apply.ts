import path from "node:path";
import type { Command } from "commander";
import YAML from "yaml";
import { isReconcileError } from "@incus-converge/reconcile";
import { loadConfig, resolveConfig, type ConvergeConfig } from "../../config/loader.js";
import { loadManifest, type Manifest } from "../../manifest/manifest.js";
import {
  describeResource,
  reconcileResource,
  type ControllerContext,
  type ResourceReport
} from "../../resources/index.js";
import { renderDocumentDiff } from "../../utils/dry-run.js";
import type { CliContainer } from "../container.js";
import { CliError, SilentError } from "../errors.js";
import type { ScopedLogger } from "../logger.js";
import { setOutputFormat } from "../output-format.js";
import { createConvergeReporter } from "../reporter.js";

export interface GlobalFlags {
  dryRun: boolean;
  verbose: boolean;
  json: boolean;
  project?: string;
  remote?: string;
}

export interface ApplySummary {
  changed: boolean;
  failed: boolean;
  reports: ResourceReport[];
}

export function resolveGlobalFlags(program: Command): GlobalFlags {
  const opts = program.optsWithGlobals();
  return {
    dryRun: opts.dryRun === true,
    verbose: opts.verbose === true,
    json: opts.json === true,
    project: typeof opts.project === "string" ? opts.project : undefined,
    remote: typeof opts.remote === "string" ? opts.remote : undefined
  };
}

export function registerApplyCommand(program: Command, container: CliContainer): void {
  program
    .command("apply")
    .description("Converge every resource in a manifest.")
    .argument("<manifest>", "Path to the manifest YAML")
    .action(async (manifestPath: string) => {
      await runApply(container, manifestPath, resolveGlobalFlags(program));
    });
}

export function registerPlanCommand(program: Command, container: CliContainer): void {
  program
    .command("plan")
    .description("Show what apply would change, without changing anything.")
    .argument("<manifest>", "Path to the manifest YAML")
    .action(async (manifestPath: string) => {
      await runApply(container, manifestPath, {
        ...resolveGlobalFlags(program),
        dryRun: true
      });
    });
}

export async function runApply(
  container: CliContainer,
  manifestPath: string,
  flags: GlobalFlags
): Promise<ApplySummary> {
  if (flags.json) {
    setOutputFormat("json");
  }
  const logger = container.loggerFactory.create({
    dryRun: flags.dryRun,
    verbose: flags.verbose,
    scope: flags.dryRun ? "plan" : "apply"
  });

  const manifest = await userFacing(() =>
    loadManifest(path.resolve(container.env.cwd, manifestPath), { fs: container.fs })
  );
  const config = await resolveRunConfig(container, manifest, flags);
  logger.verbose(`incus binary: ${config.incusPath ?? "incus"}`);

  const ctx: ControllerContext = {
    connect: (scope) => container.createClient(config, scope),
    dryRun: flags.dryRun,
    observers: createConvergeReporter(logger),
    fs: container.fs
  };

  const reports: ResourceReport[] = [];
  for (const spec of manifest.resources) {
    const resourceLogger = logger.child({
      scope: `${spec.kind}:${describeResource(spec)}`
    });
    const report = await reconcileResource(spec, ctx);
    reports.push(report);
    if (!flags.json) {
      renderReport(resourceLogger, report);
    }
  }

  const summary: ApplySummary = {
    changed: reports.some((report) => report.changed),
    failed: reports.some((report) => report.failed === true),
    reports
  };

  if (flags.json) {
    container.output(JSON.stringify(summary, null, 2));
  } else {
    renderSummary(logger, summary);
  }

  if (summary.failed) {
    throw new SilentError("One or more resources failed to converge.");
  }
  return summary;
}

async function resolveRunConfig(
  container: CliContainer,
  manifest: Manifest,
  flags: GlobalFlags
): Promise<ConvergeConfig> {
  return userFacing(async () => {
    const fileConfig = await loadConfig(container.env.cwd, { fs: container.fs });
    return resolveConfig({ ...fileConfig, ...manifest.defaults }, container.env.variables, {
      project: flags.project,
      remote: flags.remote
    });
  }, (error): error is Error => error instanceof Error);
}

/** Rethrow expected failures as user errors so they print without a stack. */
async function userFacing<T>(
  load: () => Promise<T>,
  isExpected: (error: unknown) => error is Error = isReconcileError
): Promise<T> {
  try {
    return await load();
  } catch (error) {
    if (isExpected(error)) {
      throw new CliError(error.message, { isUserError: true, cause: error });
    }
    throw error;
  }
}

export function renderReport(logger: ScopedLogger, report: ResourceReport): void {
  const label = `${report.resource} ${report.identity}`;
  if (report.failed) {
    const kind = report.cause ? `${report.kind}, ${report.cause}` : report.kind;
    logger.error(`${label}: ${report.msg} (${kind ?? "commandFailed"})`);
  } else if (logger.context.dryRun && report.changed) {
    logger.dryRun(`${label}: ${report.msg}`);
  } else if (report.changed) {
    logger.success(`${label}: ${report.msg}`);
  } else {
    logger.info(`${label}: ${report.msg}`);
  }

  for (const mutation of report.mutations) {
    logger.verbose(mutation);
  }
  if (report.preview) {
    logger.dryRun(
      renderDocumentDiff(label, report.preview.before, report.preview.after).join("\n")
    );
  }
  for (const [key, value] of Object.entries(report.extra ?? {})) {
    if (typeof value === "string") {
      logger.resolved(key, value);
    } else {
      logger.resolved(key, YAML.stringify(value).trimEnd());
    }
  }
}

function renderSummary(logger: ScopedLogger, summary: ApplySummary): void {
  const changed = summary.reports.filter((report) => report.changed).length;
  const failed = summary.reports.filter((report) => report.failed).length;
  const verb = logger.context.dryRun ? "would change" : "changed";
  const line = `${summary.reports.length} resources, ${changed} ${verb}, ${failed} failed`;
  if (failed > 0) {
    logger.warn(line);
  } else {
    logger.success(line);
  }
}
