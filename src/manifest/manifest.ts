import YAML from "yaml";
import { z } from "zod";
import { ReconcileError } from "@incus-converge/reconcile";
import { resourceSchema } from "../resources/index.js";
import { isNotFound, nodeFileSystem, type FileSystem } from "../utils/file-system.js";

const manifestSchema = z.object({
  /** Project and remote for resources that do not name their own */
  defaults: z
    .object({
      project: z.string().min(1).optional(),
      remote: z.string().min(1).optional()
    })
    .default({}),
  resources: z.array(resourceSchema)
});

export type Manifest = z.infer<typeof manifestSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path
        .map((segment) => (typeof segment === "number" ? `[${segment}]` : `.${segment}`))
        .join("")
        .replace(/^\./, "");
      return where ? `${where}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

export function parseManifest(raw: string, source: string): Manifest {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconcileError("invalidInput", `Invalid manifest YAML at ${source}: ${detail}`, {
      cause: error
    });
  }
  const result = manifestSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ReconcileError(
      "invalidInput",
      `Invalid manifest at ${source}: ${formatIssues(result.error)}`
    );
  }
  return result.data;
}

export async function loadManifest(
  manifestPath: string,
  deps?: { fs?: FileSystem }
): Promise<Manifest> {
  const fs = deps?.fs ?? nodeFileSystem;
  let raw: string;
  try {
    raw = await fs.readFile(manifestPath, "utf8");
  } catch (error) {
    if (isNotFound(error)) {
      throw new ReconcileError("invalidInput", `Manifest not found: ${manifestPath}`);
    }
    throw error;
  }
  return parseManifest(raw, manifestPath);
}
