import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createNetworkBackend } from "../backend/network.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scopeFields } from "./schema.js";

export const networkSchema = z.object({
  kind: z.literal("network"),
  name: nameSchema,
  state: presence,
  /** bridge, macvlan, sriov, ovn or physical */
  type: z.string().min(1).default("bridge"),
  description: z.string().optional(),
  config: configMapSchema.optional(),
  /** Cluster member for member-specific network definitions */
  target: z.string().min(1).optional(),
  force: z.boolean().default(false),
  ...scopeFields
});

export type NetworkSpec = z.infer<typeof networkSchema>;

const NETWORK_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

export async function reconcileNetwork(
  spec: NetworkSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;

  const result = await reconcile(
    { identity: spec.name, desired, policy: NETWORK_POLICY, ensure: spec.state },
    createNetworkBackend(client, { type: spec.type, target: spec.target }),
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("network", "Network", result, { dryRun: ctx.dryRun, absent });
}
