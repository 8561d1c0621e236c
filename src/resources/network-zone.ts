import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createNetworkZoneBackend } from "../backend/network.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scopeFields } from "./schema.js";

export const networkZoneSchema = z.object({
  kind: z.literal("network-zone"),
  /** DNS zone name, e.g. example.internal */
  name: nameSchema,
  state: presence,
  description: z.string().optional(),
  config: configMapSchema.optional(),
  ...scopeFields
});

export type NetworkZoneSpec = z.infer<typeof networkZoneSchema>;

const ZONE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

export async function reconcileNetworkZone(
  spec: NetworkZoneSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;

  const result = await reconcile(
    { identity: spec.name, desired, policy: ZONE_POLICY, ensure: spec.state },
    createNetworkZoneBackend(client),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("network-zone", "Network zone", result, { dryRun: ctx.dryRun, absent });
}
