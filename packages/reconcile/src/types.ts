// ============================================================================
// State Types
// ============================================================================

export type ConfigPrimitive = string | number | boolean | null;
export type ConfigValue = ConfigPrimitive | ConfigObject | ConfigArray;
export interface ConfigObject {
  [key: string]: ConfigValue;
}
export type ConfigArray = ConfigValue[];

/** User intent for one resource; never mutated during a reconciliation. */
export type DesiredState = Readonly<ConfigObject>;

/** Backend-reported state; fetched fresh for every reconciliation. */
export type ObservedState = ConfigObject;

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ============================================================================
// Mutations
// ============================================================================

export type MutationOperation =
  | "set"
  | "unset"
  | "addItem"
  | "removeItem"
  | "replaceAll";

export type AttributePath = readonly string[];

export interface Mutation {
  operation: MutationOperation;
  path: AttributePath;
  value?: ConfigValue;
  /** Desired position of an item added to an order-sensitive list */
  index?: number;
}

// ============================================================================
// Merge Policies
// ============================================================================

interface ScalarNormalization {
  /** Compare scalars by their string form (the daemon reports strings) */
  stringify?: boolean;
  /** Keys whose values are byte sizes and compare by magnitude */
  unitAware?: readonly string[];
}

export interface FullReplacePolicy extends ScalarNormalization {
  kind: "fullReplace";
}

export interface KeyUpsertPolicy extends ScalarNormalization {
  kind: "keyUpsert";
}

export interface KeyRemoveSubsetPolicy {
  kind: "keyRemoveSubset";
}

export interface ListMembershipPolicy {
  kind: "listMembership";
  /** Remove observed items that desired does not list */
  exhaustive: boolean;
  /** Item order is meaningful and must end up as desired */
  ordered: boolean;
  /** Desired lists the items to remove instead of the items to keep */
  removeNamed?: boolean;
}

export interface PropertyReplaceAllPolicy extends ScalarNormalization {
  kind: "propertyReplaceAll";
}

export type MergePolicy =
  | FullReplacePolicy
  | KeyUpsertPolicy
  | KeyRemoveSubsetPolicy
  | ListMembershipPolicy
  | PropertyReplaceAllPolicy;

export type MergePolicyKind = MergePolicy["kind"];

export interface AttributeGroup {
  /** Attribute of the observed state this group governs */
  attribute: string;
  policy: MergePolicy;
  /** Desired attribute to read from, when it differs from `attribute` */
  source?: string;
  /** Prefix projected onto desired keys; observed keys outside it are ignored */
  keyPrefix?: string;
}

export interface ResourcePolicy {
  groups: readonly AttributeGroup[];
  /** Re-fetch and re-diff after applying; off for asynchronous backends */
  verify?: boolean;
}

export interface DiffResult {
  mutations: Mutation[];
  changed: boolean;
}

// ============================================================================
// Backend
// ============================================================================

export interface DeleteOptions {
  force: boolean;
}

export type TransitionKind = "rename" | "move" | "copy";

export interface TransitionOptions {
  force: boolean;
  mode: TransitionKind;
}

/**
 * Capability the engine uses to read and write one resource family.
 * Implementations raise ReconcileError for classified failures.
 */
export interface ResourceBackend {
  /** Returns null when the resource does not exist */
  fetch(identity: string): Promise<ObservedState | null>;
  apply(identity: string, mutation: Mutation): Promise<void>;
  create(identity: string, desired: DesiredState): Promise<void>;
  renameOrMove(
    source: string,
    dest: string,
    options: TransitionOptions
  ): Promise<void>;
  delete(identity: string, options: DeleteOptions): Promise<void>;
}

// ============================================================================
// Reconciliation
// ============================================================================

export type Ensure = "present" | "absent";

export interface IdentityTransition {
  kind: TransitionKind;
  source: string;
}

export interface ReconcileRequest {
  identity: string;
  desired: DesiredState;
  policy: ResourcePolicy;
  ensure?: Ensure;
  transition?: IdentityTransition;
  /** Existing sub-resource may be recreated when `reuse` is requested */
  reusable?: boolean;
  /** Create the resource when it is missing (default true) */
  createMissing?: boolean;
}

export type ConvergePhase =
  | "resolveIdentity"
  | "fetchObserved"
  | "diff"
  | "apply"
  | "verify"
  | "done";

export interface ConvergeObservers {
  onPhase?(phase: ConvergePhase, identity: string): void;
  onMutationStart?(identity: string, mutation: Mutation): void;
  onMutationComplete?(identity: string, mutation: Mutation): void;
  onMutationError?(identity: string, mutation: Mutation, error: unknown): void;
}

export interface ReconcileOptions {
  force?: boolean;
  reuse?: boolean;
  dryRun?: boolean;
  /** Overrides the policy's verify flag */
  verify?: boolean;
  observers?: ConvergeObservers;
}

export type ErrorKind =
  | "schemaMismatch"
  | "identityConflict"
  | "partialApply"
  | "backendTimeout"
  | "referentialConflict"
  | "notFound"
  | "verificationFailed"
  | "commandFailed"
  | "invalidInput";

export interface ReconcileFailure {
  kind: ErrorKind;
  message: string;
  /** Kind of the backend error behind a partialApply */
  cause?: ErrorKind;
}

export type TransitionStep =
  | { kind: "create"; identity: string }
  | { kind: "delete"; identity: string }
  | { kind: TransitionKind; identity: string; from: string };

export interface ReconcileResult {
  changed: boolean;
  /** Resource name after the operation */
  identity: string;
  mutationsApplied: Mutation[];
  /** Mutations the diff produced; equals mutationsApplied on a clean run */
  planned: Mutation[];
  transitions: TransitionStep[];
  /** State the diff ran against; null when nothing was diffed */
  observed: ObservedState | null;
  error?: ReconcileFailure;
}
