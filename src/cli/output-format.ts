/** "terminal" renders through clack; "plain" and "json" write bare lines to stdout. */
export type OutputFormat = "terminal" | "plain" | "json";

let cached: OutputFormat | undefined;

function parseOutputFormat(raw: string | undefined): OutputFormat | undefined {
  switch (raw?.trim().toLowerCase()) {
    case "terminal":
      return "terminal";
    case "plain":
    case "markdown":
      return "plain";
    case "json":
      return "json";
    default:
      return undefined;
  }
}

export function resolveOutputFormat(
  env: Record<string, string | undefined> = process.env
): OutputFormat {
  if (cached) {
    return cached;
  }
  cached = parseOutputFormat(env.OUTPUT_FORMAT) ?? "terminal";
  return cached;
}

/** Pin the format for the rest of the process, e.g. from a --json flag. */
export function setOutputFormat(format: OutputFormat): void {
  cached = format;
}

export function resetOutputFormatCache(): void {
  cached = undefined;
}
