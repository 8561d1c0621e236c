import chalk from "chalk";
import { createTwoFilesPatch } from "diff";
import YAML from "yaml";
import type { ConfigObject } from "@incus-converge/reconcile";
import { redactDocument } from "./redact.js";

/**
 * Unified diff between the observed document and the one the planned
 * mutations would leave behind, rendered as YAML.
 */
export function renderDocumentDiff(
  label: string,
  before: ConfigObject,
  after: ConfigObject
): string[] {
  const previous = YAML.stringify(redactDocument(before));
  const next = YAML.stringify(redactDocument(after));
  if (previous === next) {
    return [chalk.dim("# no changes")];
  }
  const patch = createTwoFilesPatch(label, label, previous, next, "observed", "planned", {
    context: 3
  });
  const lines: string[] = [];
  for (const line of patch.split("\n")) {
    if (line.length === 0 || line.startsWith("Index:") || line.startsWith("====")) {
      continue;
    }
    if (line.startsWith("---") || line.startsWith("+++")) {
      lines.push(chalk.dim(line.trimEnd()));
    } else if (line.startsWith("@@")) {
      lines.push(chalk.cyan(line));
    } else if (line.startsWith("+")) {
      lines.push(chalk.green("+") + line.slice(1));
    } else if (line.startsWith("-")) {
      lines.push(chalk.red("-") + line.slice(1));
    } else {
      lines.push(chalk.dim(line));
    }
  }
  return lines;
}
