import { z } from "zod";
import {
  ReconcileError,
  attributeGroup,
  isConfigObject,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createInstanceConfigBackend } from "../backend/instance.js";
import { mapAt } from "../backend/values.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import {
  configMapSchema,
  deviceMapSchema,
  nameSchema,
  presence,
  scopeFields
} from "./schema.js";

export const instanceConfigSchema = z.object({
  kind: z.literal("instance-config"),
  instance: nameSchema,
  state: presence,
  /** Keys to set; when absent, the keys (or a list of key names) to remove */
  config: z.union([configMapSchema, z.array(nameSchema)]).optional(),
  /** Devices to add or update; when absent, the devices to remove */
  devices: z.union([deviceMapSchema, z.array(nameSchema)]).optional(),
  ...scopeFields
});

export type InstanceConfigSpec = z.infer<typeof instanceConfigSchema>;

const PRESENT_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true, unitAware: ["limits.memory"] })),
  attributeGroup("devices", mergePolicy.keyUpsert({ stringify: true }))
]);

const ABSENT_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyRemoveSubset()),
  attributeGroup("devices", mergePolicy.keyRemoveSubset())
]);

/**
 * Device entries may name only the settings to change; they are laid over
 * the device as it exists. A null setting removes it.
 */
export function mergeDevices(
  partial: Record<string, Record<string, string | number | boolean | null>>,
  existing: ConfigObject
): ConfigObject {
  const devices: ConfigObject = {};
  for (const [name, settings] of Object.entries(partial)) {
    const current = existing[name];
    const merged: ConfigObject = isConfigObject(current) ? { ...current } : {};
    for (const [key, value] of Object.entries(settings)) {
      if (value === null) {
        delete merged[key];
      } else {
        merged[key] = value;
      }
    }
    devices[name] = merged;
  }
  return devices;
}

export async function reconcileInstanceConfig(
  spec: InstanceConfigSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const backend = createInstanceConfigBackend(client);
  const absent = spec.state === "absent";
  const desired: ConfigObject = {};

  if (absent) {
    if (spec.config !== undefined) desired.config = spec.config;
    if (spec.devices !== undefined) desired.devices = spec.devices;
  } else {
    if (Array.isArray(spec.config) || Array.isArray(spec.devices)) {
      throw new ReconcileError(
        "invalidInput",
        `Lists of names are only accepted with state "absent" (instance "${spec.instance}").`
      );
    }
    if (spec.config !== undefined) desired.config = spec.config;
    if (spec.devices !== undefined) {
      const observed = await backend.fetch(spec.instance);
      desired.devices = mergeDevices(spec.devices, observed ? mapAt(observed, "devices") : {});
    }
  }

  // Removal is a subset diff of an existing instance, never a deletion.
  const result = await reconcile(
    {
      identity: spec.instance,
      desired,
      policy: absent ? ABSENT_POLICY : PRESENT_POLICY,
      createMissing: false
    },
    backend,
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("instance-config", "Instance config", result, { dryRun: ctx.dryRun });
}
