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
import {
  attachArgs,
  createStorageVolumeBackend,
  createVolumeSnapshotBackend,
  isVolumeAttached,
  restoreVolumeSnapshot,
  volumeIdentity,
  type VolumeCreateOptions,
  type VolumeRef
} from "../backend/storage.js";
import type { IncusClient } from "../backend/incus-client.js";
import type { ControllerContext } from "./context.js";
import {
  actionReport,
  mergeReports,
  toReport,
  type ResourceReport
} from "./report.js";
import { configMapSchema, nameSchema, scopeFields } from "./schema.js";

export const storageVolumeSchema = z.object({
  kind: z.literal("storage-volume"),
  pool: nameSchema,
  name: nameSchema,
  state: z.enum(["present", "absent", "restored", "copied"]).default("present"),
  type: z.enum(["filesystem", "block"]).default("filesystem"),
  contentType: z.enum(["filesystem", "block", "iso"]).optional(),
  description: z.string().optional(),
  config: configMapSchema.optional(),
  /** Snapshot to create, delete or restore instead of the volume itself */
  snapshot: nameSchema.optional(),
  targetPool: nameSchema.optional(),
  targetVolume: nameSchema.optional(),
  /** With state "copied": move instead of copy */
  move: z.boolean().default(false),
  /** Cluster member for creation and copies */
  target: z.string().min(1).optional(),
  attach: z
    .object({
      instance: nameSchema,
      device: nameSchema.optional(),
      path: z.string().min(1).optional()
    })
    .optional(),
  ...scopeFields
});

export type StorageVolumeSpec = z.infer<typeof storageVolumeSchema>;

const VOLUME_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true, unitAware: ["size"] })),
  attributeGroup("description", mergePolicy.fullReplace())
]);

const SNAPSHOT_POLICY: ResourcePolicy = resourcePolicy([]);

function createOptions(spec: StorageVolumeSpec): VolumeCreateOptions {
  return {
    description: spec.description,
    type: spec.type,
    contentType: spec.contentType,
    target: spec.target
  };
}

function desiredVolume(spec: StorageVolumeSpec): ConfigObject {
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;
  return desired;
}

export async function reconcileStorageVolume(
  spec: StorageVolumeSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const volume: VolumeRef = { pool: spec.pool, name: spec.name };

  switch (spec.state) {
    case "present":
    case "absent":
      return spec.snapshot !== undefined
        ? reconcileVolumeSnapshot(spec, spec.snapshot, client, ctx)
        : reconcileVolume(spec, volume, client, ctx);
    case "restored":
      return restoreVolume(spec, volume, client, ctx);
    case "copied":
      return copyVolume(spec, client, ctx);
  }
}

async function reconcileVolume(
  spec: StorageVolumeSpec,
  volume: VolumeRef,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: volumeIdentity(volume),
      desired: absent ? {} : desiredVolume(spec),
      policy: VOLUME_POLICY,
      ensure: absent ? "absent" : "present"
    },
    createStorageVolumeBackend(client, createOptions(spec)),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  const report = toReport("storage-volume", "Storage volume", result, {
    dryRun: ctx.dryRun,
    absent
  });
  if (absent || !spec.attach || report.failed) {
    return report;
  }
  return mergeReports(report, await attachVolume(spec, volume, spec.attach, client, ctx));
}

async function attachVolume(
  spec: StorageVolumeSpec,
  volume: VolumeRef,
  attachment: NonNullable<StorageVolumeSpec["attach"]>,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const identity = volumeIdentity(volume);
  if (await isVolumeAttached(client, volume, attachment)) {
    return actionReport("storage-volume", identity, "Storage volume already attached", false);
  }
  if (ctx.dryRun) {
    return actionReport(
      "storage-volume",
      identity,
      `Storage volume would be attached to ${attachment.instance}`,
      true
    );
  }
  await client.exec(attachArgs(client, volume, attachment, createOptions(spec)));
  return actionReport(
    "storage-volume",
    identity,
    `Storage volume attached to ${attachment.instance}`,
    true
  );
}

async function reconcileVolumeSnapshot(
  spec: StorageVolumeSpec,
  snapshot: string,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const volume: VolumeRef = { pool: spec.pool, name: spec.name };
  const absent = spec.state === "absent";
  const volumes = createStorageVolumeBackend(client, createOptions(spec));
  if (!absent && !(await volumes.fetch(volumeIdentity(volume)))) {
    throw new ReconcileError(
      "notFound",
      `Storage volume "${volumeIdentity(volume)}" does not exist.`
    );
  }
  const result = await reconcile(
    {
      identity: snapshot,
      desired: {},
      policy: SNAPSHOT_POLICY,
      ensure: absent ? "absent" : "present"
    },
    createVolumeSnapshotBackend(client, volume),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("storage-volume", "Snapshot", result, {
    dryRun: ctx.dryRun,
    absent,
    identity: `${volumeIdentity(volume)}/${snapshot}`
  });
}

async function restoreVolume(
  spec: StorageVolumeSpec,
  volume: VolumeRef,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const snapshot = spec.snapshot;
  if (snapshot === undefined) {
    throw new ReconcileError("invalidInput", `"snapshot" is required for state "restored".`);
  }
  const identity = `${volumeIdentity(volume)}/${snapshot}`;
  if (!(await createVolumeSnapshotBackend(client, volume).fetch(snapshot))) {
    throw new ReconcileError("notFound", `Snapshot "${identity}" not found.`);
  }
  if (ctx.dryRun) {
    return actionReport("storage-volume", identity, "Snapshot would be restored", true);
  }
  await restoreVolumeSnapshot(client, volume, snapshot);
  return actionReport("storage-volume", identity, "Snapshot restored", true);
}

async function copyVolume(
  spec: StorageVolumeSpec,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  if (spec.targetPool === undefined || spec.targetVolume === undefined) {
    throw new ReconcileError(
      "invalidInput",
      `"targetPool" and "targetVolume" are required for state "copied".`
    );
  }
  const source = volumeIdentity({ pool: spec.pool, name: spec.name });
  const destination = volumeIdentity({ pool: spec.targetPool, name: spec.targetVolume });
  const result = await reconcile(
    {
      identity: destination,
      desired: desiredVolume(spec),
      policy: VOLUME_POLICY,
      transition: { kind: spec.move ? "move" : "copy", source },
      createMissing: false
    },
    createStorageVolumeBackend(client, createOptions(spec)),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("storage-volume", "Storage volume", result, { dryRun: ctx.dryRun });
}
