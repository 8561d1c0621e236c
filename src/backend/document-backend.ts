import YAML from "yaml";
import {
  ReconcileError,
  applyMutations,
  describeError,
  isConfigObject,
  type ConfigObject,
  type DeleteOptions,
  type DesiredState,
  type Mutation,
  type ObservedState,
  type ResourceBackend
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { stringifyConfig } from "./values.js";

/**
 * Command layout of a family whose daemon object is edited as a whole YAML
 * document (profile, project, ACL, zone, forward).
 */
export interface DocumentFamily {
  noun: string;
  /** Top-level document fields the family governs and writes back */
  fields: readonly string[];
  /** Arguments naming one object, e.g. ["profile"] + name */
  command: readonly string[];
  /** Extra positional arguments before the name (e.g. the forward's network) */
  locate(identity: string): string[];
  createArgs?(identity: string): string[];
  deleteArgs?(identity: string, force: boolean): string[];
  /** Omit to make renames unsupported */
  renameArgs?(source: string, dest: string): string[];
  /** Canonical form for comparison; runs on fetched and written documents */
  normalize?(document: ConfigObject): ConfigObject;
}

export function createDocumentBackend(
  client: IncusClient,
  family: DocumentFamily
): ResourceBackend {
  const show = async (identity: string): Promise<ConfigObject | null> =>
    client.show([...family.command, "show", ...family.locate(identity)]);

  const project = (document: ConfigObject): ConfigObject => {
    const picked: ConfigObject = {};
    for (const field of family.fields) {
      const value = document[field];
      if (value !== undefined) {
        picked[field] = value;
      }
    }
    return family.normalize ? family.normalize(picked) : picked;
  };

  const write = async (identity: string, document: ConfigObject): Promise<void> => {
    const body: ConfigObject = { ...document };
    const config = body.config;
    if (isConfigObject(config)) {
      body.config = stringifyConfig(config, `${family.noun} config`);
    }
    await client.exec([...family.command, "edit", ...family.locate(identity)], {
      stdin: YAML.stringify(body)
    });
  };

  const remove = async (identity: string, force: boolean): Promise<void> => {
    const args = family.deleteArgs
      ? family.deleteArgs(identity, force)
      : [...family.command, "delete", ...family.locate(identity)];
    await client.exec(args);
  };

  return {
    async fetch(identity: string): Promise<ObservedState | null> {
      const document = await show(identity);
      return document ? project(document) : null;
    },

    async apply(identity: string, mutation: Mutation): Promise<void> {
      const document = await show(identity);
      if (!document) {
        throw new ReconcileError("notFound", `${family.noun} "${identity}" not found.`);
      }
      await write(identity, applyMutations(project(document), [mutation]));
    },

    async create(identity: string, desired: DesiredState): Promise<void> {
      const args = family.createArgs
        ? family.createArgs(identity)
        : [...family.command, "create", ...family.locate(identity)];
      await client.exec(args);

      const seeded = seedDocument(desired, family.fields);
      if (Object.keys(seeded).length === 0) {
        return;
      }
      try {
        await write(identity, seeded);
      } catch (error) {
        try {
          await remove(identity, true);
        } catch (cleanupError) {
          throw new ReconcileError(
            "commandFailed",
            `Failed to configure created ${family.noun} "${identity}": ${describeError(error)}; cleanup also failed: ${describeError(cleanupError)}`,
            { cause: error }
          );
        }
        throw error;
      }
    },

    async renameOrMove(source: string, dest: string): Promise<void> {
      if (!family.renameArgs) {
        throw new ReconcileError(
          "invalidInput",
          `${family.noun} resources cannot be renamed.`
        );
      }
      await client.exec(family.renameArgs(source, dest));
    },

    async delete(identity: string, options: DeleteOptions): Promise<void> {
      await remove(identity, options.force);
    }
  };
}

/** First document written after `create`: the governed desired fields. */
function seedDocument(
  desired: DesiredState,
  fields: readonly string[]
): ConfigObject {
  const seeded: ConfigObject = {};
  for (const field of fields) {
    const value = desired[field];
    if (value === undefined || value === null) {
      continue;
    }
    seeded[field] = isConfigObject(value) ? withoutNulls(value) : value;
  }
  return seeded;
}

function withoutNulls(map: ConfigObject): ConfigObject {
  const result: ConfigObject = {};
  for (const [key, value] of Object.entries(map)) {
    if (value !== null) {
      result[key] = value;
    }
  }
  return result;
}
