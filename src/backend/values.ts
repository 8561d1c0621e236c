import {
  ReconcileError,
  isConfigObject,
  type ConfigObject,
  type ConfigValue
} from "@incus-converge/reconcile";

/**
 * Narrow parsed YAML/JSON into the engine's value model. Anything that is not
 * plain data (dates, functions, undefined) is a schemaMismatch.
 */
export function toConfigValue(value: unknown, where: string): ConfigValue {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => toConfigValue(item, `${where}[${index}]`));
  }
  if (typeof value === "object" && Object.getPrototypeOf(value) === Object.prototype) {
    const result: ConfigObject = {};
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined) {
        result[key] = toConfigValue(entry, `${where}.${key}`);
      }
    }
    return result;
  }
  throw new ReconcileError(
    "schemaMismatch",
    `Unexpected ${typeof value} at ${where}.`
  );
}

export function toConfigObject(value: unknown, where: string): ConfigObject {
  const converted = toConfigValue(value ?? {}, where);
  if (!isConfigObject(converted)) {
    throw new ReconcileError("schemaMismatch", `Expected a map at ${where}.`);
  }
  return converted;
}

export function mapAt(state: ConfigObject, key: string): ConfigObject {
  const value = state[key];
  return isConfigObject(value) ? value : {};
}

export function stringAt(state: ConfigObject, key: string): string | undefined {
  const value = state[key];
  return typeof value === "string" ? value : undefined;
}

export function stringListAt(state: ConfigObject, key: string): string[] {
  const value = state[key];
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === "string");
}

/** Daemon form of a config value: booleans lowercase, numbers in decimal. */
export function formatConfigValue(value: ConfigValue, where: string): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean" || typeof value === "number") {
    return String(value);
  }
  throw new ReconcileError(
    "schemaMismatch",
    `${where} must be a scalar, got ${JSON.stringify(value)}.`
  );
}

/** `key=value` arguments for create/set subcommands. */
export function keyValueArgs(config: ConfigObject, where: string): string[] {
  const args: string[] = [];
  for (const [key, value] of Object.entries(config)) {
    if (value === null) {
      continue;
    }
    args.push(`${key}=${formatConfigValue(value, `${where}.${key}`)}`);
  }
  return args;
}

/** Config map with every value in daemon form; null entries dropped. */
export function stringifyConfig(config: ConfigObject, where: string): ConfigObject {
  const result: ConfigObject = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== null) {
      result[key] = formatConfigValue(value, `${where}.${key}`);
    }
  }
  return result;
}

export function requireValue(
  value: ConfigValue | undefined,
  where: string
): ConfigValue {
  if (value === undefined) {
    throw new ReconcileError("schemaMismatch", `${where} carries no value.`);
  }
  return value;
}
