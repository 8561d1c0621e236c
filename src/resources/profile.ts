import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createProfileBackend } from "../backend/profile.js";
import type { ControllerContext } from "./context.js";
import { loadSourceDocument, overlayDocument } from "./document-source.js";
import { toReport, type ResourceReport } from "./report.js";
import {
  configMapSchema,
  deviceDeclarationSchema,
  nameSchema,
  presence,
  scopeFields
} from "./schema.js";

export const profileSchema = z.object({
  kind: z.literal("profile"),
  name: nameSchema,
  state: presence,
  description: z.string().optional(),
  config: configMapSchema.optional(),
  devices: deviceDeclarationSchema.optional(),
  /** YAML file in `profile show` form; makes the profile match it exactly */
  source: z.string().min(1).optional(),
  renameFrom: nameSchema.optional(),
  force: z.boolean().default(false),
  ...scopeFields
});

export type ProfileSpec = z.infer<typeof profileSchema>;

const PROFILE_FIELDS = ["config", "description", "devices"] as const;

const INLINE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true })),
  attributeGroup("devices", mergePolicy.keyUpsert({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

const SOURCE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("devices", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

export async function desiredProfile(
  spec: ProfileSpec,
  ctx: ControllerContext
): Promise<ConfigObject> {
  if (spec.source !== undefined) {
    const source = await loadSourceDocument(ctx.fs, spec.source);
    return {
      config: {},
      devices: {},
      description: "",
      ...overlayDocument(source, spec, PROFILE_FIELDS)
    };
  }
  return overlayDocument({}, spec, PROFILE_FIELDS);
}

export async function reconcileProfile(
  spec: ProfileSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: spec.name,
      desired: absent ? {} : await desiredProfile(spec, ctx),
      policy: spec.source !== undefined ? SOURCE_POLICY : INLINE_POLICY,
      ensure: spec.state,
      ...(spec.renameFrom !== undefined && {
        transition: { kind: "rename" as const, source: spec.renameFrom }
      })
    },
    createProfileBackend(client),
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("profile", "Profile", result, { dryRun: ctx.dryRun, absent });
}
