import {
  ReconcileError,
  isConfigObject,
  type ResourceBackend
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { createKeyValueBackend } from "./key-value-backend.js";
import { keyValueArgs, mapAt } from "./values.js";

export interface StoragePoolCreateOptions {
  driver?: string;
  description?: string;
}

export function createStoragePoolBackend(
  client: IncusClient,
  options: StoragePoolCreateOptions = {}
): ResourceBackend {
  return createKeyValueBackend(client, {
    noun: "Storage pool",
    command: ["storage"],
    locate: (name) => [client.target(name)],
    createArgs: (name, desired) => {
      if (!options.driver) {
        throw new ReconcileError(
          "invalidInput",
          `"driver" is required to create storage pool "${name}".`
        );
      }
      const config = desired.config;
      return [
        "storage",
        "create",
        client.target(name),
        options.driver,
        ...(options.description ? ["--description", options.description] : []),
        ...(isConfigObject(config) ? keyValueArgs(config, "storage pool config") : [])
      ];
    }
  });
}

// ============================================================================
// Volumes
// ============================================================================

export interface VolumeRef {
  pool: string;
  name: string;
}

/** Volume identities are "pool/name". */
export function volumeIdentity(ref: VolumeRef): string {
  return `${ref.pool}/${ref.name}`;
}

export function parseVolumeIdentity(identity: string): VolumeRef {
  const slash = identity.indexOf("/");
  if (slash <= 0 || slash === identity.length - 1) {
    throw new ReconcileError(
      "invalidInput",
      `Volume identity "${identity}" must look like "pool/name".`
    );
  }
  return { pool: identity.slice(0, slash), name: identity.slice(slash + 1) };
}

export interface VolumeCreateOptions {
  description?: string;
  type?: "filesystem" | "block";
  contentType?: "filesystem" | "block" | "iso";
  /** Cluster member to create the volume on, also used for copy/move */
  target?: string;
}

export function createStorageVolumeBackend(
  client: IncusClient,
  options: VolumeCreateOptions = {}
): ResourceBackend {
  const locate = (identity: string): string[] => {
    const ref = parseVolumeIdentity(identity);
    return [client.target(ref.pool), ref.name];
  };
  const typeFlag = options.contentType
    ? [`--type=${options.contentType}`]
    : options.type === "block"
      ? ["--type=block"]
      : [];
  const targetFlag = options.target ? [`--target=${options.target}`] : [];

  return createKeyValueBackend(client, {
    noun: "Storage volume",
    command: ["storage", "volume"],
    locate,
    createArgs: (identity, desired) => {
      const config = desired.config;
      return [
        "storage",
        "volume",
        "create",
        ...locate(identity),
        ...(options.description ? ["--description", options.description] : []),
        ...typeFlag,
        ...targetFlag,
        ...(isConfigObject(config) ? keyValueArgs(config, "storage volume config") : [])
      ];
    },
    transitionArgs: (source, dest, transition) => [
      "storage",
      "volume",
      transition.mode === "copy" ? "copy" : "move",
      client.target(source),
      client.target(dest),
      ...targetFlag
    ]
  });
}

/** Snapshots of one volume, keyed by snapshot name. */
export function createVolumeSnapshotBackend(
  client: IncusClient,
  volume: VolumeRef
): ResourceBackend {
  const pool = client.target(volume.pool);
  const snapshotCommand = (verb: string, snapshot: string): string[] => [
    "storage",
    "volume",
    "snapshot",
    verb,
    pool,
    volume.name,
    snapshot
  ];

  return {
    async fetch(snapshot) {
      const document = await client.show([
        "storage",
        "volume",
        "show",
        pool,
        `${volume.name}/${snapshot}`
      ]);
      return document ? { description: document.description ?? "" } : null;
    },
    async apply(snapshot, mutation) {
      throw new ReconcileError(
        "schemaMismatch",
        `Volume snapshot "${snapshot}" cannot be modified (${mutation.operation} ${mutation.path.join(".")}).`
      );
    },
    async create(snapshot) {
      await client.exec(snapshotCommand("create", snapshot));
    },
    async renameOrMove(source, dest) {
      await client.exec([
        "storage",
        "volume",
        "snapshot",
        "rename",
        pool,
        volume.name,
        source,
        dest
      ]);
    },
    async delete(snapshot) {
      await client.exec(snapshotCommand("delete", snapshot));
    }
  };
}

export async function restoreVolumeSnapshot(
  client: IncusClient,
  volume: VolumeRef,
  snapshot: string
): Promise<void> {
  await client.exec([
    "storage",
    "volume",
    "snapshot",
    "restore",
    client.target(volume.pool),
    volume.name,
    snapshot
  ]);
}

// ============================================================================
// Attachment
// ============================================================================

export interface VolumeAttachment {
  instance: string;
  /** Device name on the instance; defaults to the volume name */
  device?: string;
  path?: string;
}

export async function isVolumeAttached(
  client: IncusClient,
  volume: VolumeRef,
  attachment: VolumeAttachment
): Promise<boolean> {
  const config = await client.show(["config", "show", client.target(attachment.instance)]);
  if (!config) {
    throw new ReconcileError(
      "notFound",
      `Instance "${attachment.instance}" not found.`
    );
  }
  return mapAt(config, "devices")[attachment.device ?? volume.name] !== undefined;
}

/**
 * `storage volume attach pool volume instance [device] [path]`. The path only
 * applies to filesystem volumes that are not ISOs; the device name is passed
 * when it differs from the default or when a path follows it.
 */
export function attachArgs(
  client: IncusClient,
  volume: VolumeRef,
  attachment: VolumeAttachment,
  options: VolumeCreateOptions = {}
): string[] {
  const device = attachment.device ?? volume.name;
  const isFilesystem = (options.type ?? "filesystem") === "filesystem";
  const hasPath =
    attachment.path !== undefined && isFilesystem && options.contentType !== "iso";
  const args = [
    "storage",
    "volume",
    "attach",
    client.target(volume.pool),
    volume.name,
    attachment.instance
  ];
  if (device !== volume.name || hasPath) {
    args.push(device);
  }
  if (hasPath && attachment.path !== undefined) {
    args.push(attachment.path);
  }
  return args;
}
