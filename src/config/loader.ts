import path from "node:path";
import YAML from "yaml";
import { isNotFound, nodeFileSystem } from "../utils/file-system.js";

export type ConvergeConfig = {
  /** Path or name of the incus binary */
  incusPath?: string;
  project?: string;
  remote?: string;
  /** Per-command timeout; unset waits indefinitely */
  timeoutMs?: number;
};

type ConfigLoaderFileSystem = {
  readFile(path: string, encoding: "utf8"): Promise<string>;
};

export const CONFIG_DIR = ".incus-converge";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function pickOptionalString(
  config: Record<string, unknown>,
  key: keyof ConvergeConfig
): string | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`Invalid "${key}": expected a string.`);
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

function pickOptionalPositiveInt(
  config: Record<string, unknown>,
  key: keyof ConvergeConfig,
  options: { min: number }
): number | undefined {
  const value = config[key];
  if (value == null) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value) || !Number.isInteger(value)) {
    throw new Error(`Invalid "${key}": expected an integer.`);
  }
  if (value < options.min) {
    throw new Error(`Invalid "${key}": expected >= ${options.min}.`);
  }
  return value;
}

export async function loadConfig(
  cwd: string,
  deps?: { fs?: ConfigLoaderFileSystem }
): Promise<ConvergeConfig> {
  const fs = deps?.fs ?? nodeFileSystem;
  const configDir = path.join(cwd, CONFIG_DIR);
  const yamlPath = path.join(configDir, "config.yaml");
  const jsonPath = path.join(configDir, "config.json");

  let raw: string | null = null;
  let format: "yaml" | "json" | null = null;
  let sourcePath: string | null = null;

  try {
    raw = await fs.readFile(yamlPath, "utf8");
    format = "yaml";
    sourcePath = yamlPath;
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }

  if (raw == null) {
    try {
      raw = await fs.readFile(jsonPath, "utf8");
      format = "json";
      sourcePath = jsonPath;
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  if (raw == null || format == null || sourcePath == null) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = format === "yaml" ? YAML.parse(raw) : JSON.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid config ${format.toUpperCase()} at ${sourcePath}: ${detail}`);
  }

  if (parsed == null) {
    return {};
  }
  if (!isPlainObject(parsed)) {
    throw new Error(`Invalid config at ${sourcePath}: expected an object.`);
  }

  const result: ConvergeConfig = {};

  const incusPath = pickOptionalString(parsed, "incusPath");
  if (incusPath) result.incusPath = incusPath;
  const project = pickOptionalString(parsed, "project");
  if (project) result.project = project;
  const remote = pickOptionalString(parsed, "remote");
  if (remote) result.remote = remote;

  const timeoutMs = pickOptionalPositiveInt(parsed, "timeoutMs", { min: 1 });
  if (timeoutMs != null) result.timeoutMs = timeoutMs;

  return result;
}

/**
 * Layer environment overrides and command-line flags over the file config.
 * Later layers win; empty values are ignored.
 */
export function resolveConfig(
  fileConfig: ConvergeConfig,
  env: Record<string, string | undefined>,
  flags: Pick<ConvergeConfig, "project" | "remote"> = {}
): ConvergeConfig {
  const result: ConvergeConfig = { ...fileConfig };

  const incusPath = env.INCUS_CONVERGE_BIN?.trim();
  if (incusPath) result.incusPath = incusPath;

  const timeout = env.INCUS_CONVERGE_TIMEOUT_MS?.trim();
  if (timeout) {
    const timeoutMs = pickOptionalPositiveInt(
      { timeoutMs: /^\d+$/.test(timeout) ? Number(timeout) : timeout },
      "timeoutMs",
      { min: 1 }
    );
    if (timeoutMs != null) result.timeoutMs = timeoutMs;
  }

  if (flags.project) result.project = flags.project;
  if (flags.remote) result.remote = flags.remote;
  return result;
}
