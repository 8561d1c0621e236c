// Main exports
export { diff, diffGroup } from "./diff/diff-engine.js";
export { applyMutations, formatMutation, formatPath } from "./diff/apply-mutations.js";
export { parseByteSize, valuesEqual } from "./diff/normalize.js";
export { mergePolicy, attributeGroup, resourcePolicy } from "./policies/merge-policy.js";
export { reconcile } from "./execution/converger.js";
export {
  ReconcileError,
  isReconcileError,
  describeError,
  errorKindOf
} from "./errors.js";

// Types
export type {
  ConfigPrimitive,
  ConfigObject,
  ConfigValue,
  ConfigArray,
  DesiredState,
  ObservedState,
  Mutation,
  MutationOperation,
  AttributePath,
  MergePolicy,
  MergePolicyKind,
  AttributeGroup,
  ResourcePolicy,
  DiffResult,
  ResourceBackend,
  DeleteOptions,
  TransitionKind,
  TransitionOptions,
  Ensure,
  IdentityTransition,
  ReconcileRequest,
  ReconcileOptions,
  ReconcileResult,
  ReconcileFailure,
  ConvergePhase,
  ConvergeObservers,
  ErrorKind,
  TransitionStep
} from "./types.js";
export type { NormalizationOptions, MembershipOptions } from "./policies/merge-policy.js";
export { isConfigObject } from "./types.js";
