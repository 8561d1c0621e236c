import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createInstanceBackend, fetchInstanceState } from "../backend/instance.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import {
  configMapSchema,
  deviceDeclarationSchema,
  nameSchema,
  presence,
  scopeFields
} from "./schema.js";

export const instanceSchema = z.object({
  kind: z.literal("instance"),
  name: nameSchema,
  state: presence,
  /** Desired run status; an instance that should exist is started by default */
  started: z.boolean().default(true),
  image: z.string().min(1).optional(),
  vm: z.boolean().default(false),
  ephemeral: z.boolean().default(false),
  empty: z.boolean().default(false),
  type: z.string().min(1).optional(),
  target: z.string().min(1).optional(),
  network: z.string().min(1).optional(),
  storage: z.string().min(1).optional(),
  profiles: z.array(nameSchema).optional(),
  noProfiles: z.boolean().default(false),
  config: configMapSchema.optional(),
  devices: deviceDeclarationSchema.optional(),
  /** Free-form labels stored as user.* config keys */
  tags: configMapSchema.optional(),
  description: z.string().optional(),
  cloudInit: z
    .object({
      userData: z.string().optional(),
      networkConfig: z.string().optional(),
      vendorData: z.string().optional(),
      /** Expose the cloud-init data as a config drive (for images without the agent) */
      disk: z.boolean().default(false)
    })
    .optional(),
  renameFrom: nameSchema.optional(),
  force: z.boolean().default(false),
  ...scopeFields
});

export type InstanceSpec = z.infer<typeof instanceSchema>;

const MEMORY_KEYS = ["limits.memory"];

export const INSTANCE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true, unitAware: MEMORY_KEYS })),
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true }), {
    source: "tags",
    keyPrefix: "user."
  }),
  attributeGroup("devices", mergePolicy.keyUpsert({ stringify: true })),
  attributeGroup("profiles", mergePolicy.listMembership({ exhaustive: true, ordered: true })),
  attributeGroup("description", mergePolicy.fullReplace()),
  attributeGroup("status", mergePolicy.keyUpsert())
]);

function cloudInitConfig(cloudInit: InstanceSpec["cloudInit"]): ConfigObject {
  const config: ConfigObject = {};
  if (!cloudInit) {
    return config;
  }
  if (cloudInit.userData !== undefined) config["cloud-init.user-data"] = cloudInit.userData;
  if (cloudInit.networkConfig !== undefined) {
    config["cloud-init.network-config"] = cloudInit.networkConfig;
  }
  if (cloudInit.vendorData !== undefined) config["cloud-init.vendor-data"] = cloudInit.vendorData;
  return config;
}

export function desiredInstance(spec: InstanceSpec): ConfigObject {
  const desired: ConfigObject = {};

  const cloudConfig = cloudInitConfig(spec.cloudInit);
  if (spec.config || Object.keys(cloudConfig).length > 0) {
    desired.config = { ...spec.config, ...cloudConfig };
  }

  if (spec.devices || spec.cloudInit?.disk) {
    const devices: ConfigObject = { ...spec.devices };
    if (spec.cloudInit?.disk) {
      devices["cloud-init"] = { type: "disk", source: "cloud-init:config" };
    }
    desired.devices = devices;
  }

  if (spec.tags) {
    desired.tags = spec.tags;
  }
  if (spec.noProfiles) {
    desired.profiles = [];
  } else if (spec.profiles) {
    desired.profiles = spec.profiles;
  }
  if (spec.description !== undefined) {
    desired.description = spec.description;
  }
  desired.status = spec.started ? "running" : "stopped";
  return desired;
}

export async function reconcileInstance(
  spec: InstanceSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const backend = createInstanceBackend(client, {
    create: {
      image: spec.image,
      vm: spec.vm,
      ephemeral: spec.ephemeral,
      empty: spec.empty,
      noProfiles: spec.noProfiles,
      network: spec.network,
      storage: spec.storage,
      type: spec.type,
      target: spec.target
    }
  });

  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: spec.name,
      desired: absent ? {} : desiredInstance(spec),
      policy: INSTANCE_POLICY,
      ensure: spec.state,
      ...(spec.renameFrom !== undefined && {
        transition: { kind: "rename" as const, source: spec.renameFrom }
      })
    },
    backend,
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );

  let extra: ConfigObject | undefined;
  if (!absent && !ctx.dryRun && !result.error) {
    extra = { state: await fetchInstanceState(client, result.identity) };
  }
  return toReport("instance", "Instance", result, { dryRun: ctx.dryRun, absent, extra });
}
