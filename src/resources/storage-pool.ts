import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createStoragePoolBackend } from "../backend/storage.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scopeFields } from "./schema.js";

export const storagePoolSchema = z.object({
  kind: z.literal("storage-pool"),
  name: nameSchema,
  state: presence,
  /** dir, zfs, btrfs, lvm, ceph...; required to create the pool */
  driver: z.string().min(1).optional(),
  description: z.string().optional(),
  config: configMapSchema.optional(),
  ...scopeFields
});

export type StoragePoolSpec = z.infer<typeof storagePoolSchema>;

const POOL_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true, unitAware: ["size"] })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

export async function reconcileStoragePool(
  spec: StoragePoolSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;

  const result = await reconcile(
    { identity: spec.name, desired, policy: POOL_POLICY, ensure: spec.state },
    createStoragePoolBackend(client, { driver: spec.driver, description: spec.description }),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("storage-pool", "Storage pool", result, { dryRun: ctx.dryRun, absent });
}
