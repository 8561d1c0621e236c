import { diff } from "../diff/diff-engine.js";
import { formatPath } from "../diff/apply-mutations.js";
import {
  ReconcileError,
  describeError,
  errorKindOf
} from "../errors.js";
import type {
  ConvergePhase,
  IdentityTransition,
  Mutation,
  ObservedState,
  ErrorKind,
  ReconcileFailure,
  ReconcileOptions,
  ReconcileRequest,
  ReconcileResult,
  ResourceBackend,
  TransitionStep
} from "../types.js";

interface RunState {
  identity: string;
  changed: boolean;
  applied: Mutation[];
  planned: Mutation[];
  transitions: TransitionStep[];
  observed: ObservedState | null;
}

/**
 * Bring one resource to its desired state.
 *
 * fetch → diff → apply each mutation → verify, strictly in sequence. Never
 * throws: failures come back in `result.error` with whatever was applied
 * before them.
 */
export async function reconcile(
  request: ReconcileRequest,
  backend: ResourceBackend,
  options: ReconcileOptions = {}
): Promise<ReconcileResult> {
  const run: RunState = {
    identity: request.identity,
    changed: false,
    applied: [],
    planned: [],
    transitions: [],
    observed: null
  };

  try {
    await converge(request, backend, options, run);
    notify(options, "done", run.identity);
    return toResult(run);
  } catch (error) {
    const failure: ReconcileFailure = {
      kind: errorKindOf(error),
      message: describeError(error)
    };
    if (error instanceof PartialApplyError) {
      failure.cause = error.causeKind;
    }
    return toResult(run, failure);
  }
}

async function converge(
  request: ReconcileRequest,
  backend: ResourceBackend,
  options: ReconcileOptions,
  run: RunState
): Promise<void> {
  const { identity } = request;

  if ((request.ensure ?? "present") === "absent") {
    notify(options, "fetchObserved", identity);
    const existing = await backend.fetch(identity);
    if (existing) {
      await deleteResource(backend, identity, options, run);
    }
    return;
  }

  notify(options, "resolveIdentity", identity);
  let observed = request.transition
    ? await resolveIdentity(request.transition, identity, backend, options, run)
    : undefined;

  notify(options, "fetchObserved", identity);
  if (observed === undefined) {
    observed = await backend.fetch(identity);
  }

  if (observed && request.reusable && options.reuse) {
    await deleteResource(backend, identity, options, run);
    observed = null;
  }

  if (!observed) {
    if (request.createMissing === false) {
      throw new ReconcileError("notFound", `"${identity}" not found.`);
    }
    observed = await createResource(request, backend, options, run);
  }

  notify(options, "diff", identity);
  run.observed = observed;
  const { mutations } = diff(request.desired, observed, request.policy);
  run.planned = mutations;
  if (mutations.length === 0) {
    return;
  }
  if (options.dryRun) {
    run.changed = true;
    return;
  }

  notify(options, "apply", identity);
  await applyAll(identity, mutations, backend, options, run);

  if (options.verify ?? request.policy.verify ?? true) {
    notify(options, "verify", identity);
    await verify(request, backend);
  }
}

// ============================================================================
// Identity
// ============================================================================

/**
 * Returns the observed state to diff against when resolution already knows
 * it, or undefined when it must be fetched under the new identity.
 */
async function resolveIdentity(
  transition: IdentityTransition,
  identity: string,
  backend: ResourceBackend,
  options: ReconcileOptions,
  run: RunState
): Promise<ObservedState | null | undefined> {
  const source = await backend.fetch(transition.source);
  const destination = await backend.fetch(identity);

  if (source && destination) {
    if (!options.force && !options.reuse) {
      if (transition.kind === "copy") {
        return destination;
      }
      throw new ReconcileError(
        "identityConflict",
        `Cannot ${transition.kind} "${transition.source}" to "${identity}": destination already exists.`
      );
    }
    await deleteResource(backend, identity, options, run);
  }

  if (source) {
    if (!options.dryRun) {
      await backend.renameOrMove(transition.source, identity, {
        force: Boolean(options.force),
        mode: transition.kind
      });
    }
    record(run, { kind: transition.kind, identity, from: transition.source });
    return options.dryRun ? source : undefined;
  }

  if (destination) {
    return destination;
  }
  if (transition.kind === "rename") {
    return null;
  }
  throw new ReconcileError(
    "notFound",
    `Source "${transition.source}" not found.`
  );
}

async function createResource(
  request: ReconcileRequest,
  backend: ResourceBackend,
  options: ReconcileOptions,
  run: RunState
): Promise<ObservedState> {
  if (options.dryRun) {
    record(run, { kind: "create", identity: request.identity });
    return {};
  }
  await backend.create(request.identity, request.desired);
  record(run, { kind: "create", identity: request.identity });
  const created = await backend.fetch(request.identity);
  if (!created) {
    throw new ReconcileError(
      "notFound",
      `"${request.identity}" was created but could not be retrieved.`
    );
  }
  return created;
}

async function deleteResource(
  backend: ResourceBackend,
  identity: string,
  options: ReconcileOptions,
  run: RunState
): Promise<void> {
  if (!options.dryRun) {
    await backend.delete(identity, { force: Boolean(options.force) });
  }
  record(run, { kind: "delete", identity });
}

function record(run: RunState, step: TransitionStep): void {
  run.transitions.push(step);
  run.changed = true;
}

// ============================================================================
// Apply & Verify
// ============================================================================

async function applyAll(
  identity: string,
  mutations: Mutation[],
  backend: ResourceBackend,
  options: ReconcileOptions,
  run: RunState
): Promise<void> {
  const observers = options.observers;
  for (const mutation of mutations) {
    observers?.onMutationStart?.(identity, mutation);
    try {
      await backend.apply(identity, mutation);
    } catch (error) {
      observers?.onMutationError?.(identity, mutation, error);
      throw new PartialApplyError(
        `Applied ${run.applied.length} of ${mutations.length} mutations to "${identity}"; ${mutationTarget(mutation)} failed: ${describeError(error)}`,
        errorKindOf(error)
      );
    }
    run.applied.push(mutation);
    run.changed = true;
    observers?.onMutationComplete?.(identity, mutation);
  }
}

async function verify(
  request: ReconcileRequest,
  backend: ResourceBackend
): Promise<void> {
  const after = await backend.fetch(request.identity);
  if (!after) {
    throw new ReconcileError(
      "verificationFailed",
      `"${request.identity}" disappeared while being reconciled.`
    );
  }
  const drift = diff(request.desired, after, request.policy);
  if (drift.changed) {
    throw new ReconcileError(
      "verificationFailed",
      `"${request.identity}" did not converge: ${drift.mutations.map(mutationTarget).join(", ")}`
    );
  }
}

class PartialApplyError extends ReconcileError {
  readonly causeKind: ErrorKind;

  constructor(message: string, causeKind: ErrorKind) {
    super("partialApply", message);
    this.causeKind = causeKind;
  }
}

// ============================================================================
// Result
// ============================================================================

function toResult(run: RunState, failure?: ReconcileFailure): ReconcileResult {
  const result: ReconcileResult = {
    changed: run.changed,
    identity: run.identity,
    mutationsApplied: run.applied,
    planned: run.planned,
    transitions: run.transitions,
    observed: run.observed
  };
  if (failure) {
    result.error = { ...failure };
  }
  return result;
}

function notify(
  options: ReconcileOptions,
  phase: ConvergePhase,
  identity: string
): void {
  options.observers?.onPhase?.(phase, identity);
}

/** Operation and path only; values may carry secrets. */
function mutationTarget(mutation: Mutation): string {
  return `${mutation.operation} ${formatPath(mutation.path)}`;
}
