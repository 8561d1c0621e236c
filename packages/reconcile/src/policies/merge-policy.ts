import type {
  AttributeGroup,
  FullReplacePolicy,
  KeyRemoveSubsetPolicy,
  KeyUpsertPolicy,
  ListMembershipPolicy,
  MergePolicy,
  PropertyReplaceAllPolicy,
  ResourcePolicy
} from "../types.js";

export interface NormalizationOptions {
  /** Compare scalars by string form */
  stringify?: boolean;
  /** Keys compared as byte sizes */
  unitAware?: readonly string[];
}

export interface MembershipOptions {
  /** Remove observed items desired does not list (default false) */
  exhaustive?: boolean;
  /** Item order is significant (default false) */
  ordered?: boolean;
}

function fullReplace(options: NormalizationOptions = {}): FullReplacePolicy {
  return {
    kind: "fullReplace",
    stringify: options.stringify,
    unitAware: options.unitAware
  };
}

function keyUpsert(options: NormalizationOptions = {}): KeyUpsertPolicy {
  return {
    kind: "keyUpsert",
    stringify: options.stringify,
    unitAware: options.unitAware
  };
}

function keyRemoveSubset(): KeyRemoveSubsetPolicy {
  return { kind: "keyRemoveSubset" };
}

function listMembership(options: MembershipOptions = {}): ListMembershipPolicy {
  return {
    kind: "listMembership",
    exhaustive: options.exhaustive ?? false,
    ordered: options.ordered ?? false
  };
}

/** Desired names the items to take out of the list (absent state). */
function listRemoval(): ListMembershipPolicy {
  return {
    kind: "listMembership",
    exhaustive: false,
    ordered: false,
    removeNamed: true
  };
}

/**
 * Whole-value replacement. Destructive: anything missing from the desired
 * value disappears from the resource.
 */
function propertyReplaceAll(
  options: NormalizationOptions = {}
): PropertyReplaceAllPolicy {
  return {
    kind: "propertyReplaceAll",
    stringify: options.stringify,
    unitAware: options.unitAware
  };
}

export const mergePolicy = {
  fullReplace,
  keyUpsert,
  keyRemoveSubset,
  listMembership,
  listRemoval,
  propertyReplaceAll
};

export function attributeGroup(
  attribute: string,
  policy: MergePolicy,
  projection: { source?: string; keyPrefix?: string } = {}
): AttributeGroup {
  return {
    attribute,
    policy,
    ...(projection.source !== undefined && { source: projection.source }),
    ...(projection.keyPrefix !== undefined && { keyPrefix: projection.keyPrefix })
  };
}

export function resourcePolicy(
  groups: readonly AttributeGroup[],
  options: { verify?: boolean } = {}
): ResourcePolicy {
  return { groups, verify: options.verify ?? true };
}
