import { ReconcileError } from "../errors.js";
import type {
  AttributeGroup,
  ConfigObject,
  ConfigValue,
  DesiredState,
  DiffResult,
  ListMembershipPolicy,
  Mutation,
  ObservedState,
  ResourcePolicy
} from "../types.js";
import { isConfigObject } from "../types.js";
import { type Normalization, valuesEqual } from "./normalize.js";

/**
 * Compute the ordered mutations that turn `observed` into `desired` for every
 * attribute group of the policy. Pure; throws only on malformed shapes.
 */
export function diff(
  desired: DesiredState,
  observed: ObservedState,
  policy: ResourcePolicy
): DiffResult {
  const mutations = policy.groups.flatMap((group) =>
    diffGroup(desired, observed, group)
  );
  return { mutations, changed: mutations.length > 0 };
}

export function diffGroup(
  desired: DesiredState,
  observed: ObservedState,
  group: AttributeGroup
): Mutation[] {
  const desiredValue = desired[group.source ?? group.attribute];
  if (desiredValue === undefined) {
    return [];
  }
  const observedValue = observed[group.attribute];
  const { policy } = group;

  switch (policy.kind) {
    case "keyUpsert":
    case "fullReplace":
      if (isConfigObject(desiredValue)) {
        return diffMap(desiredValue, observedValue, group, policy, {
          removeExtras: policy.kind === "fullReplace"
        });
      }
      return diffWhole(desiredValue, observedValue, group.attribute, policy, "set");
    case "propertyReplaceAll":
      return diffWhole(
        desiredValue,
        observedValue,
        group.attribute,
        policy,
        "replaceAll"
      );
    case "keyRemoveSubset":
      return diffRemoveSubset(desiredValue, observedValue, group);
    case "listMembership":
      return diffMembership(desiredValue, observedValue, group.attribute, policy);
    default: {
      const never: never = policy;
      throw new ReconcileError(
        "schemaMismatch",
        `Unknown merge policy: ${JSON.stringify(never)}`
      );
    }
  }
}

// ============================================================================
// Maps
// ============================================================================

function diffMap(
  desired: ConfigObject,
  observedValue: ConfigValue | undefined,
  group: AttributeGroup,
  normalization: Normalization,
  options: { removeExtras: boolean }
): Mutation[] {
  const observed = requireMap(observedValue, group.attribute);
  const prefix = group.keyPrefix ?? "";
  const projected = new Map<string, ConfigValue>();
  for (const [key, value] of Object.entries(desired)) {
    projected.set(`${prefix}${key}`, value);
  }

  const unsets: Mutation[] = [];
  const sets: Mutation[] = [];

  if (options.removeExtras) {
    for (const key of Object.keys(observed)) {
      if (key.startsWith(prefix) && !projected.has(key)) {
        unsets.push({ operation: "unset", path: [group.attribute, key] });
      }
    }
  }

  for (const [key, value] of projected) {
    const current = observed[key];
    if (value === null) {
      if (current !== undefined) {
        unsets.push({ operation: "unset", path: [group.attribute, key] });
      }
      continue;
    }
    if (current === undefined || !valuesEqual(value, current, normalization, key)) {
      sets.push({ operation: "set", path: [group.attribute, key], value });
    }
  }

  return [...unsets, ...sets];
}

function diffWhole(
  desired: ConfigValue,
  observed: ConfigValue | undefined,
  attribute: string,
  normalization: Normalization,
  operation: "set" | "replaceAll"
): Mutation[] {
  if (desired === null) {
    if (observed === undefined || observed === null) {
      return [];
    }
    return [{ operation: "unset", path: [attribute] }];
  }
  const baseline = observed ?? emptyLike(desired);
  if (valuesEqual(desired, baseline, normalization, attribute)) {
    return [];
  }
  return [{ operation, path: [attribute], value: desired }];
}

function emptyLike(value: ConfigValue): ConfigValue | undefined {
  if (Array.isArray(value)) {
    return [];
  }
  if (isConfigObject(value)) {
    return {};
  }
  return undefined;
}

function diffRemoveSubset(
  desired: ConfigValue,
  observedValue: ConfigValue | undefined,
  group: AttributeGroup
): Mutation[] {
  const keys = namedKeys(desired, group.attribute);
  const observed = requireMap(observedValue, group.attribute);
  const prefix = group.keyPrefix ?? "";
  return keys
    .map((key) => `${prefix}${key}`)
    .filter((key) => observed[key] !== undefined)
    .map((key): Mutation => ({ operation: "unset", path: [group.attribute, key] }));
}

function namedKeys(value: ConfigValue, attribute: string): string[] {
  if (isConfigObject(value)) {
    return Object.keys(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => {
      if (typeof item !== "string") {
        throw new ReconcileError(
          "schemaMismatch",
          `"${attribute}" must list key names to remove.`
        );
      }
      return item;
    });
  }
  throw new ReconcileError(
    "schemaMismatch",
    `"${attribute}" must be a list of keys or a map when removing.`
  );
}

function requireMap(
  value: ConfigValue | undefined,
  attribute: string
): ConfigObject {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isConfigObject(value)) {
    throw new ReconcileError(
      "schemaMismatch",
      `Observed "${attribute}" is not a map.`
    );
  }
  return value;
}

// ============================================================================
// Lists
// ============================================================================

type ListItem = string | number | boolean;

function diffMembership(
  desiredValue: ConfigValue,
  observedValue: ConfigValue | undefined,
  attribute: string,
  policy: ListMembershipPolicy
): Mutation[] {
  const desired = requireItems(desiredValue, `Desired "${attribute}"`);
  const observed =
    observedValue === undefined || observedValue === null
      ? []
      : requireItems(observedValue, `Observed "${attribute}"`);
  const path = [attribute];
  const has = (items: ListItem[], item: ListItem) =>
    items.some((candidate) => candidate === item);

  if (policy.removeNamed) {
    return dedupe(desired)
      .filter((item) => has(observed, item))
      .map((item): Mutation => ({ operation: "removeItem", path, value: item }));
  }

  const target = dedupe(desired);
  const removals = policy.exhaustive
    ? dedupe(observed).filter((item) => !has(target, item))
    : [];
  const additions = target.filter((item) => !has(observed, item));

  if (policy.ordered && policy.exhaustive) {
    const surviving = observed.filter((item) => has(target, item));
    const expected = target.filter((item) => has(observed, item));
    const inOrder =
      surviving.length === expected.length &&
      surviving.every((item, index) => item === expected[index]);
    if (!inOrder) {
      return [{ operation: "replaceAll", path, value: target }];
    }
  }

  const removeMutations = removals.map(
    (item): Mutation => ({ operation: "removeItem", path, value: item })
  );
  const addMutations = additions.map((item): Mutation => {
    if (policy.ordered && policy.exhaustive) {
      return { operation: "addItem", path, value: item, index: target.indexOf(item) };
    }
    return { operation: "addItem", path, value: item };
  });
  return [...removeMutations, ...addMutations];
}

function requireItems(value: ConfigValue, label: string): ListItem[] {
  if (!Array.isArray(value)) {
    throw new ReconcileError("schemaMismatch", `${label} is not a list.`);
  }
  return value.map((item) => {
    if (
      typeof item === "string" ||
      typeof item === "number" ||
      typeof item === "boolean"
    ) {
      return item;
    }
    throw new ReconcileError(
      "schemaMismatch",
      `${label} must contain only scalar items.`
    );
  });
}

function dedupe(items: ListItem[]): ListItem[] {
  return Array.from(new Set(items));
}
