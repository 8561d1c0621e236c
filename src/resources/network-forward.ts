import { z } from "zod";
import {
  attributeGroup,
  mergePolicy,
  reconcile,
  resourcePolicy,
  type ConfigObject,
  type ResourcePolicy
} from "@incus-converge/reconcile";
import { createNetworkForwardBackend, normalizeForwardPorts } from "../backend/network.js";
import type { ControllerContext } from "./context.js";
import { toReport, type ResourceReport } from "./report.js";
import { configMapSchema, nameSchema, presence, scopeFields } from "./schema.js";

const portSchema = z.object({
  protocol: z.enum(["tcp", "udp"]),
  /** Port or range, e.g. "80" or "8000-8010" */
  listenPort: z.union([z.string().min(1), z.number().int()]),
  targetAddress: z.string().min(1),
  targetPort: z.union([z.string().min(1), z.number().int()]).optional(),
  description: z.string().optional()
});

export const networkForwardSchema = z.object({
  kind: z.literal("network-forward"),
  network: nameSchema,
  listenAddress: z.string().min(1),
  state: presence,
  description: z.string().optional(),
  config: configMapSchema.optional(),
  /** Replaces the forward's port list as a whole */
  ports: z.array(portSchema).optional(),
  ...scopeFields
});

export type NetworkForwardSpec = z.infer<typeof networkForwardSchema>;

const FORWARD_POLICY: ResourcePolicy = resourcePolicy([
  attributeGroup("config", mergePolicy.fullReplace({ stringify: true })),
  attributeGroup("description", mergePolicy.fullReplace()),
  attributeGroup("ports", mergePolicy.propertyReplaceAll())
]);

export function desiredForward(spec: NetworkForwardSpec): ConfigObject {
  const desired: ConfigObject = {};
  if (spec.config !== undefined) desired.config = spec.config;
  if (spec.description !== undefined) desired.description = spec.description;
  if (spec.ports !== undefined) {
    desired.ports = normalizeForwardPorts(
      spec.ports.map((port) => {
        const entry: ConfigObject = {
          protocol: port.protocol,
          listen_port: port.listenPort,
          target_address: port.targetAddress
        };
        if (port.targetPort !== undefined) entry.target_port = port.targetPort;
        if (port.description !== undefined) entry.description = port.description;
        return entry;
      })
    );
  }
  return desired;
}

export async function reconcileNetworkForward(
  spec: NetworkForwardSpec,
  ctx: ControllerContext
): Promise<ResourceReport> {
  const client = ctx.connect({ project: spec.project, remote: spec.remote });
  const absent = spec.state === "absent";
  const result = await reconcile(
    {
      identity: spec.listenAddress,
      desired: absent ? {} : desiredForward(spec),
      policy: FORWARD_POLICY,
      ensure: spec.state
    },
    createNetworkForwardBackend(client, spec.network),
    { dryRun: ctx.dryRun, observers: ctx.observers }
  );
  return toReport("network-forward", "Network forward", result, {
    dryRun: ctx.dryRun,
    absent,
    identity: `${spec.network}/${spec.listenAddress}`
  });
}
