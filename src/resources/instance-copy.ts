import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createInstanceBackend, fetchInstance } from "../backend/instance.js";
import type { ControllerContext } from "./context.js";
import { actionReport, toReport, type ResourceReport } from "./report.js";
import { nameSchema, scopeFields } from "./schema.js";

export const instanceCopySchema = z.object({
  kind: z.literal("instance-copy"),
  /** Source instance, optionally "remote:name" */
  source: nameSchema,
  dest: nameSchema,
  move: z.boolean().default(false),
  instanceOnly: z.boolean().default(false),
  mode: z.enum(["pull", "push", "relay"]).default("pull"),
  storage: nameSchema.optional(),
  profiles: z.array(nameSchema).optional(),
  noProfiles: z.boolean().default(false),
  ephemeral: z.boolean().default(false),
  /** Start (or stop) the destination once it exists */
  started: z.boolean().optional(),
  ...scopeFields
});

export type InstanceCopySpec = z.infer<typeof instanceCopySchema>;

const COPY_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("status", mergePolicy.keyUpsert())
]);

export async function reconcileInstanceCopy(
  spec: InstanceCopySpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const desired: ConfigObject = {};
  if (spec.started !== undefined) {
    desired.status = spec.started ? "running" : "stopped";
  }

  if (!spec.move && (await fetchInstance(client, spec.dest)) && spec.started === undefined) {
    return actionReport("instance-copy", spec.dest, "Destination instance already exists", false);
  }

  const result = await reconcile(
    {
      identity: spec.dest,
      desired,
      policy: COPY_POLICY,
      transition: { kind: spec.move ? "move" : "copy", source: spec.source },
      createMissing: false
    },
    createInstanceBackend(client, {
      copy: {
        instanceOnly: spec.instanceOnly,
        mode: spec.mode,
        storage: spec.storage,
        profiles: spec.profiles,
        noProfiles: spec.noProfiles,
        ephemeral: spec.ephemeral
      }
    }),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );

  if (spec.move && !result.error && result.transitions.length === 0 && result.planned.length === 0) {
    return actionReport("instance-copy", spec.dest, "Instance already moved", false);
  }
  return toReport("instance-copy", "Instance", result, { dryRun: ctx.dryRun });
}
