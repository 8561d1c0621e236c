import {
  ReconcileError,
  formatMutation,
  type ConfigObject,
  type DeleteOptions,
  type DesiredState,
  type Mutation,
  type ObservedState,
  type ResourceBackend,
  type TransitionOptions
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { formatConfigValue, mapAt, requireValue } from "./values.js";

/**
 * Command layout of a family whose config keys are written one at a time
 * through `set`/`unset` (network, storage pool, storage volume).
 */
export interface KeyValueFamily {
  noun: string;
  command: readonly string[];
  /** Positional arguments naming one object */
  locate(identity: string): string[];
  /** Flags appended to every show/set/unset/delete (e.g. --target) */
  trailing?: readonly string[];
  createArgs(identity: string, desired: DesiredState): string[];
  deleteArgs?(identity: string, force: boolean): string[];
  transitionArgs?(source: string, dest: string, options: TransitionOptions): string[];
}

export function createKeyValueBackend(
  client: IncusClient,
  family: KeyValueFamily
): ResourceBackend {
  const trailing = family.trailing ?? [];
  const base = (verb: string, identity: string): string[] => [
    ...family.command,
    verb,
    ...family.locate(identity)
  ];

  return {
    async fetch(identity: string): Promise<ObservedState | null> {
      const document = await client.show([...base("show", identity), ...trailing]);
      if (!document) {
        return null;
      }
      return projectKeyValueDocument(document);
    },

    async apply(identity: string, mutation: Mutation): Promise<void> {
      await client.exec(keyValueMutationArgs(family, identity, mutation));
    },

    async create(identity: string, desired: DesiredState): Promise<void> {
      await client.exec(family.createArgs(identity, desired));
    },

    async renameOrMove(
      source: string,
      dest: string,
      options: TransitionOptions
    ): Promise<void> {
      if (!family.transitionArgs) {
        throw new ReconcileError(
          "invalidInput",
          `${family.noun} resources cannot be renamed or moved.`
        );
      }
      await client.exec(family.transitionArgs(source, dest, options));
    },

    async delete(identity: string, options: DeleteOptions): Promise<void> {
      const args = family.deleteArgs
        ? family.deleteArgs(identity, options.force)
        : [...base("delete", identity), ...trailing];
      await client.exec(args);
    }
  };
}

export function projectKeyValueDocument(document: ConfigObject): ObservedState {
  const description = document.description;
  return {
    config: mapAt(document, "config"),
    description: typeof description === "string" ? description : ""
  };
}

/** One set/unset invocation per config key; description goes through --property. */
export function keyValueMutationArgs(
  family: KeyValueFamily,
  identity: string,
  mutation: Mutation
): string[] {
  const trailing = family.trailing ?? [];
  const located = family.locate(identity);
  const [attribute, key] = mutation.path;

  if (attribute === "config" && key !== undefined && mutation.path.length === 2) {
    if (mutation.operation === "set") {
      const value = formatConfigValue(
        requireValue(mutation.value, formatMutation(mutation)),
        `config.${key}`
      );
      return [...family.command, "set", ...located, `${key}=${value}`, ...trailing];
    }
    if (mutation.operation === "unset") {
      return [...family.command, "unset", ...located, key, ...trailing];
    }
  }

  if (attribute === "description" && mutation.path.length === 1) {
    const value =
      mutation.operation === "unset"
        ? ""
        : formatConfigValue(requireValue(mutation.value, "description"), "description");
    return [
      ...family.command,
      "set",
      ...located,
      `description=${value}`,
      "--property",
      ...trailing
    ];
  }

  throw new ReconcileError(
    "schemaMismatch",
    `${family.noun} does not support "${formatMutation(mutation)}".`
  );
}
