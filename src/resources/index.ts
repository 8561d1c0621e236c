import { z } from "zod";
import { clusterSchema, reconcileCluster } from "./cluster.js";
import type { ControllerContext } from "./context.js";
import { imageSchema, reconcileImage } from "./image.js";
import { instanceSchema, reconcileInstance } from "./instance.js";
import { instanceConfigSchema, reconcileInstanceConfig } from "./instance-config.js";
import { instanceCopySchema, reconcileInstanceCopy } from "./instance-copy.js";
import { instanceSnapshotSchema, reconcileInstanceSnapshot } from "./instance-snapshot.js";
import { networkSchema, reconcileNetwork } from "./network.js";
import { networkAclSchema, reconcileNetworkAcl } from "./network-acl.js";
import { networkForwardSchema, reconcileNetworkForward } from "./network-forward.js";
import { networkZoneSchema, reconcileNetworkZone } from "./network-zone.js";
import { profileSchema, reconcileProfile } from "./profile.js";
import { projectSchema, reconcileProject } from "./project.js";
import { failureReport, type ResourceReport } from "./report.js";
import { reconcileStoragePool, storagePoolSchema } from "./storage-pool.js";
import { reconcileStorageVolume, storageVolumeSchema } from "./storage-volume.js";

export type { ControllerContext, ClientScope } from "./context.js";
export type { ResourceKind, ResourceReport, DocumentPreview } from "./report.js";

export const resourceSchema = z.discriminatedUnion("kind", [
  instanceSchema,
  instanceConfigSchema,
  instanceSnapshotSchema,
  instanceCopySchema,
  profileSchema,
  projectSchema,
  networkSchema,
  networkAclSchema,
  networkZoneSchema,
  networkForwardSchema,
  storagePoolSchema,
  storageVolumeSchema,
  imageSchema,
  clusterSchema
]);

export type ResourceSpec = z.infer<typeof resourceSchema>;

/** Display identity of a manifest entry, used before anything is fetched. */
export function describeResource(spec: ResourceSpec): string {
  switch (spec.kind) {
    case "instance-config":
      return spec.instance;
    case "instance-snapshot":
      return spec.name === undefined ? spec.instance : `${spec.instance}/${spec.name}`;
    case "instance-copy":
      return spec.dest;
    case "network-forward":
      return `${spec.network}/${spec.listenAddress}`;
    case "storage-volume":
      return `${spec.pool}/${spec.name}`;
    case "image":
      return spec.alias;
    case "cluster":
      return spec.name ?? "cluster";
    default:
      return spec.name;
  }
}

function dispatch(spec: ResourceSpec, ctx: ControllerContext): Promise<ResourceReport> {
  switch (spec.kind) {
    case "instance":
      return reconcileInstance(spec, ctx);
    case "instance-config":
      return reconcileInstanceConfig(spec, ctx);
    case "instance-snapshot":
      return reconcileInstanceSnapshot(spec, ctx);
    case "instance-copy":
      return reconcileInstanceCopy(spec, ctx);
    case "profile":
      return reconcileProfile(spec, ctx);
    case "project":
      return reconcileProject(spec, ctx);
    case "network":
      return reconcileNetwork(spec, ctx);
    case "network-acl":
      return reconcileNetworkAcl(spec, ctx);
    case "network-zone":
      return reconcileNetworkZone(spec, ctx);
    case "network-forward":
      return reconcileNetworkForward(spec, ctx);
    case "storage-pool":
      return reconcileStoragePool(spec, ctx);
    case "storage-volume":
      return reconcileStorageVolume(spec, ctx);
    case "image":
      return reconcileImage(spec, ctx);
    case "cluster":
      return reconcileCluster(spec, ctx);
  }
}

/**
 * Reconcile one manifest entry. Never throws: validation and backend errors
 * raised outside the converger come back as a failed report.
 */
export async function reconcileResource(
  spec: ResourceSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  try {
    return await dispatch(spec, ctx);
  } catch (error) {
    return failureReport(spec.kind, describeResource(spec), error);
  }
}
