import {
  ReconcileError,
  applyMutations,
  formatMutation,
  isConfigObject,
  type ConfigObject,
  type ConfigValue,
  type DeleteOptions,
  type Mutation,
  type ObservedState,
  type ResourceBackend
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { formatConfigValue, mapAt, requireValue, stringAt, stringListAt } from "./values.js";

function remoteArgs(client: IncusClient): string[] {
  return client.remote ? [`${client.remote}:`] : [];
}

export async function listClusterMembers(client: IncusClient): Promise<ConfigValue[]> {
  return client.list(["cluster", "list", "--format=json", ...remoteArgs(client)]);
}

export async function listClusterGroups(client: IncusClient): Promise<ConfigObject[]> {
  const groups = await client.list([
    "cluster",
    "group",
    "list",
    "--format=json",
    ...remoteArgs(client)
  ]);
  return groups.filter(isConfigObject);
}

/** `cluster enable`; false when the server is already clustered. */
export async function enableClustering(
  client: IncusClient,
  name: string
): Promise<boolean> {
  const members = await listClusterMembers(client);
  if (members.length > 0) {
    return false;
  }
  await client.exec(["cluster", "enable", client.target(name)]);
  return true;
}

/**
 * `cluster add` prints the join token, sometimes after a "Member ... join
 * token:" banner; the token is then the last line.
 */
export function parseJoinToken(stdout: string): string {
  const token = stdout.trim();
  if (!token.startsWith("Member ")) {
    return token;
  }
  const lines = token.split("\n");
  return lines.length > 1 ? (lines.at(-1) ?? token).trim() : token;
}

export async function requestJoinToken(
  client: IncusClient,
  name: string
): Promise<string> {
  const stdout = await client.exec(["cluster", "add", client.target(name)]);
  return parseJoinToken(stdout);
}

// ============================================================================
// Members
// ============================================================================

/** Existing cluster members: config keys and group assignment. */
export function createClusterMemberBackend(client: IncusClient): ResourceBackend {
  const fetch = async (name: string): Promise<ObservedState | null> => {
    const member = await client.show(["cluster", "show", client.target(name)]);
    if (!member) {
      return null;
    }
    return {
      config: mapAt(member, "config"),
      groups: stringListAt(member, "groups").sort()
    };
  };

  return {
    fetch,

    async apply(name: string, mutation: Mutation): Promise<void> {
      const target = client.target(name);
      const [attribute, key] = mutation.path;

      if (attribute === "config" && key !== undefined) {
        if (mutation.operation === "set") {
          const value = formatConfigValue(
            requireValue(mutation.value, formatMutation(mutation)),
            `config.${key}`
          );
          await client.exec(["cluster", "set", target, `${key}=${value}`]);
          return;
        }
        if (mutation.operation === "unset") {
          await client.exec(["cluster", "unset", target, key]);
          return;
        }
      }

      if (attribute === "groups") {
        const current = await fetch(name);
        const next = applyMutations(
          { groups: current ? stringListAt(current, "groups") : [] },
          [mutation]
        );
        await client.exec([
          "cluster",
          "group",
          "assign",
          target,
          stringListAt(next, "groups").join(",")
        ]);
        return;
      }

      throw new ReconcileError(
        "schemaMismatch",
        `Cluster member does not support "${formatMutation(mutation)}".`
      );
    },

    async create(name: string): Promise<void> {
      throw new ReconcileError(
        "invalidInput",
        `Cluster member "${name}" must join through a token.`
      );
    },

    async renameOrMove(source: string, dest: string): Promise<void> {
      await client.exec(["cluster", "rename", client.target(source), dest]);
    },

    async delete(name: string, options: DeleteOptions): Promise<void> {
      await client.exec([
        "cluster",
        "remove",
        client.target(name),
        ...(options.force ? ["--force", "--yes"] : [])
      ]);
    }
  };
}

// ============================================================================
// Groups
// ============================================================================

export function createClusterGroupBackend(
  client: IncusClient,
  descriptions: Record<string, string> = {}
): ResourceBackend {
  return {
    async fetch(name) {
      const groups = await listClusterGroups(client);
      const group = groups.find((entry) => stringAt(entry, "name") === name);
      return group ? { description: stringAt(group, "description") ?? "" } : null;
    },
    async apply(name, mutation) {
      throw new ReconcileError(
        "schemaMismatch",
        `Cluster group "${name}" does not support "${formatMutation(mutation)}".`
      );
    },
    async create(name) {
      const description = descriptions[name];
      await client.exec([
        "cluster",
        "group",
        "create",
        client.target(name),
        ...(description ? ["--description", description] : [])
      ]);
    },
    async renameOrMove(source, dest) {
      await client.exec(["cluster", "group", "rename", client.target(source), dest]);
    },
    async delete(name) {
      await client.exec(["cluster", "group", "delete", client.target(name)]);
    }
  };
}
