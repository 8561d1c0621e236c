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
import { createInstanceConfigBackend } from "../backend/instance.js";
import { createInstanceSnapshotBackend, restoreInstanceSnapshot } from "../backend/snapshot.js";
import type { IncusClient } from "../backend/incus-client.js";
import type { ControllerContext } from "./context.js";
import { actionReport, toReport, type ResourceReport } from "./report.js";
import { nameSchema, scopeFields } from "./schema.js";

export const instanceSnapshotSchema = z.object({
  kind: z.literal("instance-snapshot"),
  instance: nameSchema,
  /** Snapshot name; omit to manage the automatic snapshot schedule instead */
  name: nameSchema.optional(),
  state: z.enum(["present", "absent", "restored", "renamed"]).default("present"),
  newName: nameSchema.optional(),
  /** Expiry passed on creation, e.g. "30d" */
  expires: z.string().min(1).optional(),
  /** Replace an existing snapshot of the same name */
  reuse: z.boolean().default(false),
  stateful: z.boolean().default(false),
  schedule: z
    .object({
      cron: z.string().optional(),
      cronStopped: z.boolean().optional(),
      pattern: z.string().optional(),
      expiry: z.string().optional()
    })
    .optional(),
  ...scopeFields
});

export type InstanceSnapshotSpec = z.infer<typeof instanceSnapshotSchema>;

const SNAPSHOT_POLICY: ResourcePolicy = resourcePolicy([]);

const SCHEDULE_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true }))
]);

export function scheduleConfig(schedule: InstanceSnapshotSpec["schedule"]): ConfigObject {
  const config: ConfigObject = {};
  if (!schedule) {
    return config;
  }
  if (schedule.cron !== undefined) config["snapshots.schedule"] = schedule.cron;
  if (schedule.cronStopped !== undefined) {
    config["snapshots.schedule.stopped"] = String(schedule.cronStopped);
  }
  if (schedule.pattern !== undefined) config["snapshots.pattern"] = schedule.pattern;
  if (schedule.expiry !== undefined) config["snapshots.expiry"] = schedule.expiry;
  return config;
}

export async function reconcileInstanceSnapshot(
  spec: InstanceSnapshotSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  if (spec.name === undefined) {
    if (spec.state !== "present") {
      throw new ReconcileError(
        "invalidInput",
        `"name" is required for snapshot state "${spec.state}".`
      );
    }
    return reconcileSchedule(spec, client, ctx);
  }
  const name = spec.name;
  const identity = `${spec.instance}/${name}`;
  const backend = createInstanceSnapshotBackend(client, spec.instance, {
    stateful: spec.stateful,
    expires: spec.expires
  });

  switch (spec.state) {
    case "present":
    case "absent": {
      const result = await reconcile(
        {
          identity: name,
          desired: {},
          policy: SNAPSHOT_POLICY,
          ensure: spec.state,
          reusable: true
        },
        backend,
        { reuse: spec.reuse, dryRun: ctx.dryRun, observers: ctx.observers }
      );
      return toReport("instance-snapshot", "Snapshot", result, {
        dryRun: ctx.dryRun,
        absent: spec.state === "absent",
        identity
      });
    }
    case "restored": {
      if (!(await backend.fetch(name))) {
        throw new ReconcileError("notFound", `Snapshot "${identity}" does not exist.`);
      }
      if (ctx.dryRun) {
        return actionReport("instance-snapshot", identity, "Instance would be restored from snapshot", true);
      }
      await restoreInstanceSnapshot(client, spec.instance, name, { stateful: spec.stateful });
      return actionReport("instance-snapshot", identity, "Instance restored", true);
    }
    case "renamed": {
      const newName = spec.newName;
      if (newName === undefined) {
        throw new ReconcileError("invalidInput", `"newName" is required for snapshot state "renamed".`);
      }
      const result = await reconcile(
        {
          identity: newName,
          desired: {},
          policy: SNAPSHOT_POLICY,
          transition: { kind: "rename", source: name },
          createMissing: false
        },
        backend,
        { dryRun: ctx.dryRun, observers: ctx.observers }
      );
      if (result.error?.kind === "notFound") {
        result.error.message = `Snapshot "${identity}" does not exist.`;
      }
      return toReport("instance-snapshot", "Snapshot", result, {
        dryRun: ctx.dryRun,
        identity: `${spec.instance}/${newName}`
      });
    }
  }
}

async function reconcileSchedule(
  spec: InstanceSnapshotSpec,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const config = scheduleConfig(spec.schedule);
  const result = await reconcile(
    {
      identity: spec.instance,
      desired: Object.keys(config).length > 0 ? { config } : {},
      policy: SCHEDULE_POLICY,
      createMissing: false
    },
    createInstanceConfigBackend(client),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("instance-snapshot", "Snapshot schedule", result, { dryRun: ctx.dryRun });
}
