import {
  ReconcileError,
  formatMutation,
  type ResourceBackend
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { stringAt } from "./values.js";

export interface SnapshotCreateOptions {
  stateful?: boolean;
  /** Expiry date or time span passed to `snapshot create --expiry` */
  expires?: string;
}

/** Snapshots of one instance, keyed by snapshot name. */
export function createInstanceSnapshotBackend(
  client: IncusClient,
  instance: string,
  options: SnapshotCreateOptions = {}
): ResourceBackend {
  const target = client.target(instance);

  return {
    async fetch(snapshot) {
      const document = await client.show(["snapshot", "show", target, snapshot]);
      if (!document) {
        return null;
      }
      const expiresAt = stringAt(document, "expires_at");
      return {
        stateful: document.stateful === true,
        ...(expiresAt !== undefined && { expires_at: expiresAt })
      };
    },
    async apply(snapshot, mutation) {
      throw new ReconcileError(
        "schemaMismatch",
        `Snapshot "${snapshot}" cannot be modified in place (${formatMutation(mutation)}).`
      );
    },
    async create(snapshot) {
      await client.exec([
        "snapshot",
        "create",
        target,
        snapshot,
        ...(options.stateful ? ["--stateful"] : []),
        ...(options.expires ? ["--expiry", options.expires] : [])
      ]);
    },
    async renameOrMove(source, dest) {
      await client.exec(["snapshot", "rename", target, source, dest]);
    },
    async delete(snapshot) {
      await client.exec(["snapshot", "delete", target, snapshot]);
    }
  };
}

export async function restoreInstanceSnapshot(
  client: IncusClient,
  instance: string,
  snapshot: string,
  options: { stateful?: boolean } = {}
): Promise<void> {
  await client.exec([
    "snapshot",
    "restore",
    client.target(instance),
    snapshot,
    ...(options.stateful ? ["--stateful"] : [])
  ]);
}
