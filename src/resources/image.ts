import { z } from "zod";
import {
  ReconcileError,
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createImageBackend, fetchImage } from "../backend/image.js";
import { stringAt } from "../backend/values.js";
import { isFile } from "../utils/file-system.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scopeFields } from "./schema.js";

export const imageSchema = z.object({
  kind: z.literal("image"),
  alias: nameSchema,
  /** Fingerprint (or prefix) the aliased image must have */
  fingerprint: z.string().min(1).optional(),
  state: presence,
  /** Local image file to import, or "remote:image" to copy */
  source: z.string().min(1).optional(),
  /** Replaces the image's properties as a whole */
  properties: configMapSchema.optional(),
  /** Extra aliases to add next to the primary one */
  aliases: z.array(nameSchema).optional(),
  public: z.boolean().optional(),
  autoUpdate: z.boolean().default(false),
  ...scopeFields
});

export type ImageSpec = z.infer<typeof imageSchema>;

const IMAGE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("properties", mergePolicy.propertyReplaceAll({ stringify: true })),
  attributeGroup("public", mergePolicy.fullReplace()),
  attributeGroup("aliases", mergePolicy.listMembership())
]);

function desiredImage(spec: ImageSpec): ConfigObject {
  const desired: ConfigObject = {};
  if (spec.properties !== undefined) desired.properties = spec.properties;
  if (spec.public !== undefined) desired.public = spec.public;
  if (spec.aliases !== undefined) desired.aliases = spec.aliases;
  return desired;
}

export async function reconcileImage(
  spec: ImageSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";

  const existing = await fetchImage(client, spec.alias);
  const found = existing ? stringAt(existing, "fingerprint") : undefined;
  if (found !== undefined && spec.fingerprint !== undefined && !found.startsWith(spec.fingerprint)) {
    throw new ReconcileError(
      "identityConflict",
      `Image found but fingerprint mismatch (found ${found}, expected ${spec.fingerprint}).`
    );
  }

  const backend = createImageBackend(
    client,
    { source: spec.source, public: spec.public, autoUpdate: spec.autoUpdate },
    { isFile: (path) => isFile(ctx.fs, path) }
  );
  const result = await reconcile(
    {
      identity: spec.alias,
      desired: absent ? {} : desiredImage(spec),
      policy: IMAGE_POLICY,
      ensure: spec.state
    },
    backend,
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );

  const fingerprint = (result.observed && stringAt(result.observed, "fingerprint")) || found;
  return toReport("image", "Image", result, {
    dryRun: ctx.dryRun,
    absent,
    ...(fingerprint !== undefined && !absent && { extra: { fingerprint } })
  });
}
