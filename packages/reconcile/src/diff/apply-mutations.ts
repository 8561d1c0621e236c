import { ReconcileError } from "../errors.js";
import type {
  AttributePath,
  ConfigObject,
  ConfigValue,
  Mutation
} from "../types.js";
import { isConfigObject } from "../types.js";
import { cloneValue, valuesEqual } from "./normalize.js";

/**
 * Apply mutations to a copy of `state` and return it. Used by the in-memory
 * backend, by document-style backends (read-modify-write) and by dry runs.
 */
export function applyMutations(
  state: ConfigObject,
  mutations: readonly Mutation[]
): ConfigObject {
  let next = cloneValue(state);
  for (const mutation of mutations) {
    next = applyMutation(next, mutation);
  }
  return next;
}

function applyMutation(state: ConfigObject, mutation: Mutation): ConfigObject {
  const { path } = mutation;
  switch (mutation.operation) {
    case "set":
    case "replaceAll":
      setPath(state, path, cloneValue(requireValue(mutation)));
      return state;
    case "unset":
      unsetPath(state, path);
      return state;
    case "addItem": {
      const list = listAt(state, path);
      const item = requireValue(mutation);
      const index =
        mutation.index === undefined
          ? list.length
          : Math.min(Math.max(mutation.index, 0), list.length);
      list.splice(index, 0, cloneValue(item));
      setPath(state, path, list);
      return state;
    }
    case "removeItem": {
      const item = requireValue(mutation);
      const list = listAt(state, path).filter(
        (candidate) => !valuesEqual(candidate, item)
      );
      setPath(state, path, list);
      return state;
    }
    default: {
      const never: never = mutation.operation;
      throw new ReconcileError("schemaMismatch", `Unknown operation: ${String(never)}`);
    }
  }
}

function requireValue(mutation: Mutation): ConfigValue {
  if (mutation.value === undefined) {
    throw new ReconcileError(
      "schemaMismatch",
      `${mutation.operation} on ${formatPath(mutation.path)} carries no value.`
    );
  }
  return mutation.value;
}

function parentOf(
  state: ConfigObject,
  path: AttributePath,
  create: boolean
): { parent: ConfigObject; key: string } | null {
  if (path.length === 0) {
    throw new ReconcileError("schemaMismatch", "Mutation path is empty.");
  }
  let cursor = state;
  for (const segment of path.slice(0, -1)) {
    const child = cursor[segment];
    if (isConfigObject(child)) {
      cursor = child;
      continue;
    }
    if (!create) {
      return null;
    }
    if (child !== undefined && child !== null) {
      throw new ReconcileError(
        "schemaMismatch",
        `Cannot descend into ${formatPath(path)}: "${segment}" is not a map.`
      );
    }
    const created: ConfigObject = {};
    cursor[segment] = created;
    cursor = created;
  }
  return { parent: cursor, key: path[path.length - 1] ?? "" };
}

function setPath(state: ConfigObject, path: AttributePath, value: ConfigValue): void {
  const target = parentOf(state, path, true);
  if (target) {
    target.parent[target.key] = value;
  }
}

function unsetPath(state: ConfigObject, path: AttributePath): void {
  const target = parentOf(state, path, false);
  if (target) {
    delete target.parent[target.key];
  }
}

function listAt(state: ConfigObject, path: AttributePath): ConfigValue[] {
  const target = parentOf(state, path, false);
  const current = target ? target.parent[target.key] : undefined;
  if (current === undefined || current === null) {
    return [];
  }
  if (!Array.isArray(current)) {
    throw new ReconcileError(
      "schemaMismatch",
      `${formatPath(path)} is not a list.`
    );
  }
  return [...current];
}

export function formatPath(path: AttributePath): string {
  return path.join(".");
}

export function formatMutation(mutation: Mutation): string {
  const target = formatPath(mutation.path);
  switch (mutation.operation) {
    case "set":
      return `set ${target} = ${formatValue(mutation.value)}`;
    case "unset":
      return `unset ${target}`;
    case "addItem":
      return `add ${formatValue(mutation.value)} to ${target}`;
    case "removeItem":
      return `remove ${formatValue(mutation.value)} from ${target}`;
    case "replaceAll":
      return `replace ${target} with ${formatValue(mutation.value)}`;
  }
}

function formatValue(value: ConfigValue | undefined): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value ?? null);
}
