import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createProjectBackend } from "../backend/profile.js";
import type { ControllerContext } from "./context.js";
import { loadSourceDocument, overlayDocument } from "./document-source.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence } from "./schema.js";

export const projectSchema = z.object({
  kind: z.literal("project"),
  name: nameSchema,
  state: presence,
  description: z.string().optional(),
  /** e.g. features.images, limits.instances, restricted */
  config: configMapSchema.optional(),
  source: z.string().min(1).optional(),
  renameFrom: nameSchema.optional(),
  /** Delete the project together with everything in it */
  force: z.boolean().default(false),
  remote: nameSchema.optional()
});

export type ProjectSpec = z.infer<typeof projectSchema>;

const PROJECT_FIELDS = ["config", "description"] as const;

const INLINE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

const SOURCE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

async function desiredProject(spec: ProjectSpec, ctx: ControllerContext): Promise<ConfigObject> {
  if (spec.source === undefined) {
    return overlayDocument({}, spec, PROJECT_FIELDS);
  }
  const source = await loadSourceDocument(ctx.fs, spec.source);
  return { config: {}, description: "", ...overlayDocument(source, spec, PROJECT_FIELDS) };
}

export async function reconcileProject(
  spec: ProjectSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: null, remote: spec.remote });
  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: spec.name,
      desired: absent ? {} : await desiredProject(spec, ctx),
      policy: spec.source !== undefined ? SOURCE_POLICY : INLINE_POLICY,
      ensure: spec.state,
      ...(spec.renameFrom !== undefined && {
        transition: { kind: "rename" as const, source: spec.renameFrom }
      })
    },
    createProjectBackend(client),
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("project", "Project", result, { dryRun: ctx.dryRun, absent });
}
