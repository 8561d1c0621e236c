import YAML from "yaml";
import { ReconcileError, isConfigObject, type ConfigObject } from "@incus-converge/reconcile";
import { toConfigObject } from "../backend/values.js";
import { isNotFound, type FileSystem } from "../utils/file-system.js";

/** Read a `show`-style YAML document a resource is seeded from. */
export async function loadSourceDocument(fs: FileSystem, path: string): Promise<ConfigObject> {
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new ReconcileError("invalidInput", `Source file "${path}" not found.`);
    }
    throw error;
  }
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconcileError("invalidInput", `Invalid YAML in source file "${path}": ${detail}`, {
      cause: error
    });
  }
  return toConfigObject(parsed, path);
}

export interface InlineDocument {
  description?: string;
  config?: Record<string, string | number | boolean | null>;
  devices?: Record<string, Record<string, string | number | boolean | null>>;
}

/**
 * Inline fields laid over a source document; only `fields` survive from the
 * source. A null config value stays in place and unsets the key.
 */
export function overlayDocument(
  source: ConfigObject,
  inline: InlineDocument,
  fields: readonly string[]
): ConfigObject {
  const document: ConfigObject = {};
  for (const field of fields) {
    const value = source[field];
    if (value !== undefined) {
      document[field] = value;
    }
  }
  if (inline.description !== undefined) {
    document.description = inline.description;
  }
  if (inline.config !== undefined) {
    const base = document.config;
    const config: ConfigObject = isConfigObject(base) ? base : {};
    document.config = { ...config, ...inline.config };
  }
  if (inline.devices !== undefined && fields.includes("devices")) {
    const base = document.devices;
    const devices: ConfigObject = isConfigObject(base) ? base : {};
    document.devices = { ...devices, ...inline.devices };
  }
  return document;
}
