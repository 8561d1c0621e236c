import {
  applyMutations,
  describeError,
  errorKindOf,
  formatMutation,
  type ConfigObject,
  type ErrorKind,
  type ReconcileResult,
  type TransitionStep
} from "@incus-converge/reconcile";
import { redactDocument, redactMutation } from "../utils/redact.js";

export type ResourceKind =
  | "instance"
  | "instance-config"
  | "instance-snapshot"
  | "instance-copy"
  | "profile"
  | "project"
  | "network"
  | "network-acl"
  | "network-zone"
  | "network-forward"
  | "storage-pool"
  | "storage-volume"
  | "image"
  | "cluster";

export interface DocumentPreview {
  before: ConfigObject;
  after: ConfigObject;
}

export interface ResourceReport {
  resource: ResourceKind;
  identity: string;
  changed: boolean;
  msg: string;
  failed?: boolean;
  /** Error kind of a failed reconciliation */
  kind?: ErrorKind;
  /** Kind of the backend error behind a partialApply */
  cause?: ErrorKind;
  /** Applied mutations, or the planned ones on a dry run */
  mutations: string[];
  transitions: TransitionStep[];
  /** Document before and after the planned mutations (dry run only) */
  preview?: DocumentPreview;
  extra?: ConfigObject;
}

const PAST_TENSE: Record<TransitionStep["kind"], string> = {
  create: "created",
  delete: "deleted",
  rename: "renamed",
  move: "moved",
  copy: "copied"
};

export interface OutcomeOptions {
  dryRun: boolean;
  /** Reconciliation towards absence */
  absent?: boolean;
}

/**
 * "Profile created", "Instance would be renamed and updated",
 * "Network matches configuration".
 */
export function describeOutcome(
  noun: string,
  result: ReconcileResult,
  options: OutcomeOptions
): string {
  const verbs: string[] = [];
  for (const step of result.transitions) {
    const verb = PAST_TENSE[step.kind];
    if (verb === "created" && verbs.at(-1) === "deleted") {
      verbs[verbs.length - 1] = "recreated";
      continue;
    }
    if (!verbs.includes(verb)) {
      verbs.push(verb);
    }
  }
  const mutations = options.dryRun ? result.planned : result.mutationsApplied;
  if (mutations.length > 0 && !verbs.includes("created") && !verbs.includes("recreated")) {
    verbs.push("updated");
  }

  if (verbs.length === 0) {
    return options.absent ? `${noun} already absent` : `${noun} matches configuration`;
  }
  const joined = verbs.join(" and ");
  return options.dryRun ? `${noun} would be ${joined}` : `${noun} ${joined}`;
}

export function toReport(
  resource: ResourceKind,
  noun: string,
  result: ReconcileResult,
  options: OutcomeOptions & { extra?: ConfigObject; identity?: string }
): ResourceReport {
  const mutations = options.dryRun ? result.planned : result.mutationsApplied;
  const report: ResourceReport = {
    resource,
    identity: options.identity ?? result.identity,
    changed: result.changed,
    msg: describeOutcome(noun, result, options),
    mutations: mutations.map((mutation) => formatMutation(redactMutation(mutation))),
    transitions: result.transitions
  };
  if (result.error) {
    report.failed = true;
    report.kind = result.error.kind;
    report.msg = result.error.message;
    if (result.error.cause) {
      report.cause = result.error.cause;
    }
  }
  if (options.dryRun && result.observed && result.planned.length > 0) {
    report.preview = {
      before: redactDocument(result.observed),
      after: redactDocument(applyMutations(result.observed, result.planned))
    };
  }
  if (options.extra) {
    report.extra = options.extra;
  }
  return report;
}

/** Report for an action outside the converger (restore, attach, join token). */
export function actionReport(
  resource: ResourceKind,
  identity: string,
  msg: string,
  changed: boolean,
  extra?: ConfigObject
): ResourceReport {
  return {
    resource,
    identity,
    changed,
    msg,
    mutations: [],
    transitions: [],
    ...(extra && { extra })
  };
}

export function failureReport(
  resource: ResourceKind,
  identity: string,
  error: unknown
): ResourceReport {
  return {
    resource,
    identity,
    changed: false,
    failed: true,
    kind: errorKindOf(error),
    msg: describeError(error),
    mutations: [],
    transitions: []
  };
}

/** Fold a follow-up step into an earlier report of the same resource. */
export function mergeReports(first: ResourceReport, second: ResourceReport): ResourceReport {
  if (first.failed) {
    return first;
  }
  const merged: ResourceReport = {
    ...first,
    changed: first.changed || second.changed,
    msg: second.changed || second.failed ? second.msg : first.msg,
    mutations: [...first.mutations, ...second.mutations],
    transitions: [...first.transitions, ...second.transitions]
  };
  if (second.failed) {
    merged.failed = true;
    if (second.kind) merged.kind = second.kind;
    if (second.cause) merged.cause = second.cause;
  }
  if (second.extra) {
    merged.extra = { ...first.extra, ...second.extra };
  }
  return merged;
}
