import {
  ReconcileError,
  applyMutations,
  formatMutation,
  isConfigObject,
  valuesEqual,
  type ConfigObject,
  type ConfigValue,
  type DeleteOptions,
  type DesiredState,
  type Mutation,
  type ObservedState,
  type ResourceBackend,
  type TransitionOptions
} from "@incus-converge/reconcile";
import type { IncusClient } from "./incus-client.js";
import {
  formatConfigValue,
  keyValueArgs,
  mapAt,
  requireValue,
  stringAt,
  stringListAt
} from "./values.js";

export interface InstanceCreateOptions {
  /** e.g. "images:debian/12"; required unless `empty` */
  image?: string;
  vm?: boolean;
  ephemeral?: boolean;
  empty?: boolean;
  noProfiles?: boolean;
  network?: string;
  storage?: string;
  /** Instance type such as "c1.micro" */
  type?: string;
  /** Cluster member to create on */
  target?: string;
}

export interface InstanceCopyOptions {
  instanceOnly?: boolean;
  /** Transfer mode; "pull" is the daemon default */
  mode?: "pull" | "push" | "relay";
  storage?: string;
  profiles?: string[];
  noProfiles?: boolean;
  ephemeral?: boolean;
}

export interface InstanceBackendOptions {
  create?: InstanceCreateOptions;
  copy?: InstanceCopyOptions;
}

const STATUS_COMMANDS: Record<string, string> = {
  running: "start",
  stopped: "stop",
  frozen: "pause"
};

/** Whole instance: config, devices, profiles, description and run status. */
export function createInstanceBackend(
  client: IncusClient,
  options: InstanceBackendOptions = {}
): ResourceBackend {
  const fetch = (name: string): Promise<ObservedState | null> =>
    fetchInstance(client, name);

  return {
    fetch,
    apply: (name, mutation) => applyInstanceMutation(client, name, mutation, fetch),

    async create(name: string, desired: DesiredState): Promise<void> {
      await client.exec(initArgs(client, name, desired, options.create ?? {}));
    },

    async renameOrMove(
      source: string,
      dest: string,
      transition: TransitionOptions
    ): Promise<void> {
      if (transition.mode === "copy") {
        await client.exec(copyArgs(client, source, dest, options.copy ?? {}));
        return;
      }
      const args = ["move", client.target(source), client.target(dest)];
      if (transition.mode === "move") {
        args.push(...transferFlags(options.copy ?? {}));
      }
      await client.exec(args);
    },

    async delete(name: string, deleteOptions: DeleteOptions): Promise<void> {
      await client.exec([
        "delete",
        client.target(name),
        ...(deleteOptions.force ? ["--force"] : [])
      ]);
    }
  };
}

/**
 * Config and devices of an existing instance, read through `config show`.
 * Never creates or deletes the instance itself.
 */
export function createInstanceConfigBackend(client: IncusClient): ResourceBackend {
  const fetch = async (name: string): Promise<ObservedState | null> => {
    const document = await client.show(["config", "show", client.target(name)]);
    if (!document) {
      return null;
    }
    return {
      config: mapAt(document, "config"),
      devices: mapAt(document, "devices")
    };
  };
  const unsupported = (action: string, name: string): ReconcileError =>
    new ReconcileError(
      "invalidInput",
      `Instance config cannot ${action} instance "${name}".`
    );

  return {
    fetch,
    apply: (name, mutation) => applyInstanceMutation(client, name, mutation, fetch),
    async create(name) {
      throw unsupported("create", name);
    },
    async renameOrMove(source) {
      throw unsupported("rename", source);
    },
    async delete(name) {
      throw unsupported("delete", name);
    }
  };
}

export async function fetchInstance(
  client: IncusClient,
  name: string
): Promise<ObservedState | null> {
  const colon = name.indexOf(":");
  const filter =
    colon >= 0
      ? `${name.slice(0, colon + 1)}^${name.slice(colon + 1)}$`
      : client.target(`^${name}$`);
  const entries = await client.list(["list", "--format=json", filter]);
  const entry = entries.find(isConfigObject);
  if (!entry) {
    return null;
  }
  return {
    config: mapAt(entry, "config"),
    devices: mapAt(entry, "devices"),
    profiles: stringListAt(entry, "profiles"),
    description: stringAt(entry, "description") ?? "",
    status: (stringAt(entry, "status") ?? "").toLowerCase()
  };
}

/** Runtime state (`/1.0/instances/<name>/state`); null when unavailable. */
export async function fetchInstanceState(
  client: IncusClient,
  name: string
): Promise<ConfigObject | null> {
  const result = await client.run([
    "query",
    client.target(`/1.0/instances/${name}/state`)
  ]);
  if (result.exitCode !== 0) {
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(result.stdout);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReconcileError("schemaMismatch", `Invalid JSON from incus query: ${detail}`);
  }
  return isConfigObject(parsed) ? parsed : null;
}

// ============================================================================
// Mutations
// ============================================================================

async function applyInstanceMutation(
  client: IncusClient,
  name: string,
  mutation: Mutation,
  fetch: (name: string) => Promise<ObservedState | null>
): Promise<void> {
  const target = client.target(name);
  const [attribute, key] = mutation.path;

  switch (attribute) {
    case "config":
      if (key === undefined) break;
      if (mutation.operation === "set") {
        const value = formatConfigValue(
          requireValue(mutation.value, formatMutation(mutation)),
          `config.${key}`
        );
        await client.exec(["config", "set", target, key, value]);
        return;
      }
      if (mutation.operation === "unset") {
        await client.exec(["config", "unset", target, key]);
        return;
      }
      break;
    case "devices":
      if (key === undefined) break;
      if (mutation.operation === "unset") {
        await client.exec(["config", "device", "remove", target, key]);
        return;
      }
      if (mutation.operation === "set") {
        const current = await fetch(name);
        const existing = current ? mapAt(current, "devices")[key] : undefined;
        for (const args of deviceArgs(target, key, existing, mutation.value)) {
          await client.exec(args);
        }
        return;
      }
      break;
    case "profiles":
      await applyProfileMutation(client, name, mutation, fetch);
      return;
    case "status":
      if (mutation.operation === "set" && typeof mutation.value === "string") {
        const verb = STATUS_COMMANDS[mutation.value];
        if (verb) {
          await client.exec([verb, target]);
          return;
        }
      }
      break;
    case "description":
      if (mutation.path.length === 1) {
        const value =
          mutation.operation === "unset"
            ? ""
            : formatConfigValue(requireValue(mutation.value, "description"), "description");
        await client.exec(["config", "set", target, `description=${value}`, "--property"]);
        return;
      }
      break;
    default:
      break;
  }

  throw new ReconcileError(
    "schemaMismatch",
    `Instance does not support "${formatMutation(mutation)}".`
  );
}

/**
 * Commands turning one device into its desired definition: add when missing,
 * remove and re-add when the type changes, otherwise set and unset the
 * individual keys.
 */
export function deviceArgs(
  target: string,
  device: string,
  existing: ConfigValue | undefined,
  desired: ConfigValue | undefined
): string[][] {
  if (!isConfigObject(desired)) {
    throw new ReconcileError(
      "schemaMismatch",
      `Device "${device}" must be a map of settings.`
    );
  }
  const type = desired.type;
  if (typeof type !== "string" || type === "") {
    throw new ReconcileError(
      "invalidInput",
      `Device "${device}" is missing required "type".`
    );
  }
  const settings: ConfigObject = { ...desired };
  delete settings.type;
  const add = [
    "config",
    "device",
    "add",
    target,
    device,
    type,
    ...keyValueArgs(settings, `devices.${device}`)
  ];

  if (!isConfigObject(existing)) {
    return [add];
  }
  if (existing.type !== type) {
    return [["config", "device", "remove", target, device], add];
  }

  const commands: string[][] = [];
  const changed: ConfigObject = {};
  for (const [settingKey, value] of Object.entries(settings)) {
    if (value !== null && !valuesEqual(value, existing[settingKey], { stringify: true })) {
      changed[settingKey] = value;
    }
  }
  if (Object.keys(changed).length > 0) {
    commands.push([
      "config",
      "device",
      "set",
      target,
      device,
      ...keyValueArgs(changed, `devices.${device}`)
    ]);
  }
  for (const settingKey of Object.keys(existing)) {
    if (settingKey !== "type" && (settings[settingKey] === undefined || settings[settingKey] === null)) {
      commands.push(["config", "device", "unset", target, device, settingKey]);
    }
  }
  return commands;
}

async function applyProfileMutation(
  client: IncusClient,
  name: string,
  mutation: Mutation,
  fetch: (name: string) => Promise<ObservedState | null>
): Promise<void> {
  const target = client.target(name);
  const profile = mutation.value;

  if (mutation.operation === "addItem" && mutation.index === undefined && typeof profile === "string") {
    await client.exec(["profile", "add", target, profile]);
    return;
  }
  if (mutation.operation === "removeItem" && typeof profile === "string") {
    await client.exec(["profile", "remove", target, profile]);
    return;
  }
  if (mutation.operation === "addItem" || mutation.operation === "replaceAll") {
    const current = await fetch(name);
    const next = applyMutations(
      { profiles: current ? stringListAt(current, "profiles") : [] },
      [mutation]
    );
    await client.exec([
      "profile",
      "assign",
      target,
      stringListAt(next, "profiles").join(",")
    ]);
    return;
  }
  throw new ReconcileError(
    "schemaMismatch",
    `Instance does not support "${formatMutation(mutation)}".`
  );
}

// ============================================================================
// Creation and copies
// ============================================================================

function initArgs(
  client: IncusClient,
  name: string,
  desired: DesiredState,
  create: InstanceCreateOptions
): string[] {
  if (!create.image && !create.empty) {
    throw new ReconcileError(
      "invalidInput",
      `"image" is required to create instance "${name}".`
    );
  }
  const args = ["init"];
  if (create.image) {
    args.push(create.image);
  }
  args.push(client.target(name));
  if (create.vm) args.push("--vm");
  if (create.ephemeral) args.push("--ephemeral");
  if (create.empty) args.push("--empty");

  const profiles = desired.profiles;
  if (create.noProfiles) {
    args.push("--no-profiles");
  } else if (Array.isArray(profiles)) {
    for (const profile of profiles) {
      if (typeof profile === "string") {
        args.push("--profile", profile);
      }
    }
  }

  if (create.network) args.push("--network", create.network);
  if (create.storage) args.push("--storage", create.storage);
  if (create.type) args.push("--type", create.type);
  if (create.target) args.push("--target", create.target);

  const config = desired.config;
  if (isConfigObject(config)) {
    for (const pair of keyValueArgs(config, "config")) {
      args.push("--config", pair);
    }
  }
  const description = desired.description;
  if (typeof description === "string" && description !== "") {
    args.push("--description", description);
  }
  return args;
}

/** Flags shared by `copy` and `move`. */
function transferFlags(copy: InstanceCopyOptions): string[] {
  const flags: string[] = [];
  if (copy.instanceOnly) flags.push("--instance-only");
  if (copy.mode && copy.mode !== "pull") flags.push("--mode", copy.mode);
  if (copy.storage) flags.push("--storage", copy.storage);
  return flags;
}

function copyArgs(
  client: IncusClient,
  source: string,
  dest: string,
  copy: InstanceCopyOptions
): string[] {
  const args = ["copy", client.target(source), client.target(dest), ...transferFlags(copy)];
  if (copy.noProfiles) {
    args.push("--no-profiles");
  } else if (copy.profiles) {
    for (const profile of copy.profiles) {
      args.push("--profile", profile);
    }
  }
  if (copy.ephemeral) args.push("--ephemeral");
  return args;
}
