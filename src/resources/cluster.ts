import { z } from "zod";
import {
  ReconcileError,
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourceBackend,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import {
  createClusterGroupBackend,
  createClusterMemberBackend,
  enableClustering,
  listClusterGroups,
  listClusterMembers,
  requestJoinToken
} from "../backend/cluster.js";
import type { IncusClient } from "../backend/incus-client.js";
import type { ControllerContext } from "./context.js";
import { actionReport, toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, scopeFields } from "./schema.js";

const groupDefinitionSchema = z.object({
  name: nameSchema,
  description: z.string().optional()
});

export const clusterSchema = z.object({
  kind: z.literal("cluster"),
  /** Cluster member name; not needed to list or to manage groups */
  name: nameSchema.optional(),
  state: z.enum(["enabled", "present", "absent", "listed"]).default("present"),
  config: configMapSchema.optional(),
  /**
   * Group definitions create groups; group names assign them to the member
   * (or delete them with state "absent").
   */
  groups: z.union([z.array(nameSchema), z.array(groupDefinitionSchema)]).optional(),
  /** With state "listed": list groups instead of members */
  listGroups: z.boolean().default(false),
  /** Remove a degraded member */
  force: z.boolean().default(false),
  ...scopeFields
});

export type ClusterSpec = z.infer<typeof clusterSchema>;
type GroupDefinition = z.infer<typeof groupDefinitionSchema>;

const MEMBER_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.keyUpsert({ stringify: true })),
  // Group membership is a set, but `cluster group assign` takes the whole
  // list: item-wise removal before addition would pass through an empty
  // assignment, which the daemon rejects. Desired and observed are sorted.
  attributeGroup("groups", mergePolicy.fullReplace())
]);

const GROUP_POLICY: ResourcePolicy = resourcePolicy([]);

function groupNames(groups: ClusterSpec["groups"]): string[] | undefined {
  if (groups === undefined || groups.length === 0) {
    return undefined;
  }
  const items: Array<string | GroupDefinition> = groups;
  return items.flatMap((group) => (typeof group === "string" ? [group] : []));
}

function groupDefinitions(groups: ClusterSpec["groups"]): GroupDefinition[] {
  if (groups === undefined) {
    return [];
  }
  const items: Array<string | GroupDefinition> = groups;
  return items.flatMap((group) => (typeof group === "string" ? [] : [group]));
}

function requireName(spec: ClusterSpec): string {
  if (spec.name === undefined) {
    throw new ReconcileError("invalidInput", `"name" is required for cluster state "${spec.state}".`);
  }
  return spec.name;
}

export async function reconcileCluster(
  spec: ClusterSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  switch (spec.state) {
    case "enabled":
      return enable(requireName(spec), client, ctx);
    case "listed":
      return list(spec, client);
    case "present":
      return present(spec, client, ctx);
    case "absent":
      return absent(spec, client, ctx);
  }
}

async function enable(
  name: string,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  if (ctx.dryRun) {
    const members = await listClusterMembers(client);
    return members.length > 0
      ? actionReport("cluster", name, "Clustering already enabled", false)
      : actionReport("cluster", name, "Clustering would be enabled", true);
  }
  const enabled = await enableClustering(client, name);
  return enabled
    ? actionReport("cluster", name, "Clustering enabled", true)
    : actionReport("cluster", name, "Clustering already enabled", false);
}

async function list(spec: ClusterSpec, client: IncusClient): Promise<ResourceReport> {
  if (spec.listGroups) {
    const groups = await listClusterGroups(client);
    return actionReport("cluster", "groups", "Cluster groups listed", false, { groups });
  }
  const members = await listClusterMembers(client);
  return actionReport("cluster", "members", "Cluster members listed", false, { members });
}

async function present(
  spec: ClusterSpec,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const definitions = groupDefinitions(spec.groups);
  if (definitions.length > 0) {
    const report = await createGroups(definitions, client, ctx);
    if (spec.name === undefined || report.failed) {
      return report;
    }
    const member = await reconcileMember(spec.name, { config: spec.config }, client, ctx);
    return {
      ...member,
      changed: report.changed || member.changed,
      msg: member.failed ? member.msg : "Groups processed",
      mutations: [...report.mutations, ...member.mutations],
      transitions: [...report.transitions, ...member.transitions]
    };
  }

  const name = requireName(spec);
  const existing = await createClusterMemberBackend(client).fetch(name);
  if (!existing) {
    if (ctx.dryRun) {
      return actionReport("cluster", name, "Join token would be generated", true);
    }
    const token = await requestJoinToken(client, name);
    return actionReport("cluster", name, "Join token generated", true, { token });
  }
  return reconcileMember(name, { config: spec.config, groups: groupNames(spec.groups) }, client, ctx);
}

async function reconcileMember(
  name: string,
  wanted: { config?: ConfigObject; groups?: string[] },
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const desired: ConfigObject = {};
  if (wanted.config !== undefined) desired.config = wanted.config;
  if (wanted.groups !== undefined) desired.groups = [...new Set(wanted.groups)].sort();

  const result = await reconcile(
    { identity: name, desired, policy: MEMBER_POLICY, createMissing: false },
    createClusterMemberBackend(client),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("cluster", "Member", result, {
    dryRun: ctx.dryRun,
    ...(result.observed && { extra: { member: result.observed } })
  });
}

async function createGroups(
  definitions: GroupDefinition[],
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const descriptions: Record<string, string> = {};
  for (const group of definitions) {
    if (group.description) descriptions[group.name] = group.description;
  }
  return reconcileGroups(
    definitions.map((group) => group.name),
    "present",
    createClusterGroupBackend(client, descriptions),
    ctx
  );
}

async function reconcileGroups(
  names: string[],
  ensure: "present" | "absent",
  backend: ResourceBackend,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const summary = actionReport("cluster", names.join(","), "", false);
  for (const name of names) {
    const result = await reconcile(
      { identity: name, desired: {}, policy: GROUP_POLICY, ensure },
      backend,
      { dryRun: ctx.dryRun, observers: ctx.observers }
    );
    const report = toReport("cluster", `Cluster group "${name}"`, result, {
      dryRun: ctx.dryRun,
      absent: ensure === "absent"
    });
    if (report.failed) {
      return { ...report, identity: summary.identity, changed: summary.changed || report.changed };
    }
    summary.changed = summary.changed || report.changed;
    summary.transitions.push(...report.transitions);
  }
  const verb = ensure === "absent" ? "deleted" : "created";
  if (!summary.changed) {
    summary.msg = ensure === "absent" ? "Groups already absent" : "Groups already exist";
  } else {
    summary.msg = ctx.dryRun ? `Groups would be ${verb}` : `Groups ${verb}`;
  }
  return summary;
}

async function absent(
  spec: ClusterSpec,
  client: IncusClient,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const names = groupNames(spec.groups);
  if (names !== undefined) {
    return reconcileGroups(names, "absent", createClusterGroupBackend(client), ctx);
  }
  const name = requireName(spec);
  const result = await reconcile(
    { identity: name, desired: {}, policy: MEMBER_POLICY, ensure: "absent" },
    createClusterMemberBackend(client),
    { force: spec.force, dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("cluster", "Member", result, { dryRun: ctx.dryRun, absent: true });
}
