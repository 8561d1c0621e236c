import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createNetworkAclBackend, normalizeAclRules } from "../backend/network.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scalarSchema, scopeFields } from "./schema.js";

const ruleSchema = z
  .object({
    action: z.enum(["allow", "allow-stateless", "drop", "reject"]),
    state: z.enum(["enabled", "disabled", "logged"]).default("enabled")
  })
  .catchall(scalarSchema);

export const networkAclSchema = z.object({
  kind: z.literal("network-acl"),
  name: nameSchema,
  state: presence,
  description: z.string().optional(),
  /** Rule lists replace the ACL's rules as a whole */
  egress: z.array(ruleSchema).optional(),
  ingress: z.array(ruleSchema).optional(),
  config: configMapSchema.optional(),
  renameFrom: nameSchema.optional(),
  force: z.boolean().default(false),
  ...scopeFields
});

export type NetworkAclSpec = z.infer<typeof networkAclSchema>;

const ACL_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace()),
  attributeGroup("egress", mergePolicy.propertyReplaceAll()),
  attributeGroup("ingress", mergePolicy.propertyReplaceAll())
]);

export function desiredAcl(spec: NetworkAclSpec): ConfigObject {
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;
  if (spec.egress !== undefined) desired.egress = normalizeAclRules(spec.egress);
  if (spec.ingress !== undefined) desired.ingress = normalizeAclRules(spec.ingress);
  return desired;
}

export async function reconcileNetworkAcl(
  spec: NetworkAclSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: spec.name,
      desired: absent ? {} : desiredAcl(spec),
      policy: ACL_POLICY,
      ensure: spec.state,
      ...(spec.renameFrom !== undefined && {
        transition: { kind: "rename" as const, source: spec.renameFrom }
      })
    },
    createNetworkAclBackend(client),
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("network-acl", "Network ACL", result, { dryRun: ctx.dryRun, absent });
}
