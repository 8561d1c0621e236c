import YAML from "yaml";
import {
  ReconcileError,
  applyMutations,
  formatMutation,
  isConfigObject,
  type ConfigObject,
  type ConfigValue,
  type Mutation,
  type ObservedState,
  type ResourceBackend
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import { mapAt, stringAt } from "./values.js";

export interface ImageCreateOptions {
  /** Local image file (imported) or "remote:image" (copied) */
  source?: string;
  public?: boolean;
  autoUpdate?: boolean;
}

export interface ImageBackendDependencies {
  isFile(path: string): Promise<boolean>;
}

/**
 * Find the image an alias or fingerprint prefix refers to. `image list` does
 * a fuzzy search, so the result is matched exactly here. An alias wins over a
 * fingerprint prefix anywhere in the list.
 */
export function findImage(entries: ConfigValue[], identifier: string): ConfigObject | null {
  const wanted = identifier.split(":").at(-1) ?? identifier;
  const images = entries.filter(isConfigObject);
  const byAlias = images.find((entry) => aliasNames(entry).includes(wanted));
  if (byAlias) {
    return byAlias;
  }
  if (wanted === "") {
    return null;
  }
  return images.find((entry) => (stringAt(entry, "fingerprint") ?? "").startsWith(wanted)) ?? null;
}

function aliasNames(entry: ConfigObject): string[] {
  const aliases = entry.aliases;
  if (!Array.isArray(aliases)) {
    return [];
  }
  return aliases.flatMap((alias) => {
    if (!isConfigObject(alias)) return [];
    const name = stringAt(alias, "name");
    return name === undefined ? [] : [name];
  });
}

export async function fetchImage(
  client: IncusClient,
  alias: string
): Promise<ObservedState | null> {
  const entries = await client.list(["image", "list", client.target(alias), "--format", "json"]);
  const image = findImage(entries, alias);
  if (!image) {
    return null;
  }
  return {
    fingerprint: stringAt(image, "fingerprint") ?? "",
    properties: mapAt(image, "properties"),
    public: image.public === true,
    aliases: aliasNames(image)
  };
}

export function createImageBackend(
  client: IncusClient,
  options: ImageCreateOptions,
  dependencies: ImageBackendDependencies
): ResourceBackend {
  const requireImage = async (alias: string): Promise<ObservedState> => {
    const image = await fetchImage(client, alias);
    if (!image) {
      throw new ReconcileError("notFound", `Image "${alias}" not found.`);
    }
    return image;
  };

  return {
    fetch: (alias) => fetchImage(client, alias),

    async apply(alias: string, mutation: Mutation): Promise<void> {
      const image = await requireImage(alias);
      const fingerprint = stringAt(image, "fingerprint") ?? alias;
      const [attribute] = mutation.path;

      if (attribute === "aliases" && typeof mutation.value === "string") {
        if (mutation.operation === "addItem") {
          await client.exec(["image", "alias", "create", client.target(mutation.value), fingerprint]);
          return;
        }
        if (mutation.operation === "removeItem") {
          await client.exec(["image", "alias", "delete", client.target(mutation.value)]);
          return;
        }
      }

      if (attribute === "properties" || attribute === "public") {
        const document = await client.show(["image", "show", client.target(fingerprint)]);
        if (!document) {
          throw new ReconcileError("notFound", `Image "${fingerprint}" not found.`);
        }
        const editable: ConfigObject = {
          auto_update: document.auto_update ?? false,
          properties: mapAt(document, "properties"),
          public: document.public ?? false
        };
        await client.exec(["image", "edit", client.target(fingerprint)], {
          stdin: YAML.stringify(applyMutations(editable, [mutation]))
        });
        return;
      }

      throw new ReconcileError(
        "schemaMismatch",
        `Image does not support "${formatMutation(mutation)}".`
      );
    },

    async create(alias: string): Promise<void> {
      const source = options.source;
      if (!source) {
        throw new ReconcileError(
          "invalidInput",
          `Image "${alias}" not found and no "source" provided.`
        );
      }
      const remote = client.remote;

      if (await dependencies.isFile(source)) {
        const rootfs = `${source}.root`;
        await client.exec([
          "image",
          "import",
          source,
          ...((await dependencies.isFile(rootfs)) ? [rootfs] : []),
          ...(remote ? [`${remote}:`] : []),
          "--alias",
          alias,
          ...(options.public ? ["--public"] : [])
        ]);
        return;
      }

      await client.exec([
        "image",
        "copy",
        source,
        `${remote ?? "local"}:`,
        "--alias",
        alias,
        ...(options.autoUpdate ? ["--auto-update"] : []),
        ...(options.public ? ["--public"] : [])
      ]);
    },

    async renameOrMove(source: string): Promise<void> {
      throw new ReconcileError(
        "invalidInput",
        `Image "${source}" cannot be renamed; manage its aliases instead.`
      );
    },

    async delete(alias: string): Promise<void> {
      await client.exec(["image", "delete", client.target(alias)]);
    }
  };
}
