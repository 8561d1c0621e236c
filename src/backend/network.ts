import {
  isConfigObject,
  type ConfigObject,
  type ConfigValue,
  type ResourceBackend
} from "@incus-converge/reconcile";
import { createDocumentBackend } from "./document-backend.js";
import type { IncusClient } from "./incus-client.js";
import { createKeyValueBackend } from "./key-value-backend.js";
import { keyValueArgs } from "./values.js";

export interface NetworkCreateOptions {
  type?: string;
  /** Cluster member the network definition is created on */
  target?: string;
}

export function createNetworkBackend(
  client: IncusClient,
  options: NetworkCreateOptions = {}
): ResourceBackend {
  const targetFlags = options.target ? ["--target", options.target] : [];
  return createKeyValueBackend(client, {
    noun: "Network",
    command: ["network"],
    locate: (name) => [client.target(name)],
    trailing: targetFlags,
    createArgs: (name, desired) => {
      const config = desired.config;
      return [
        "network",
        "create",
        client.target(name),
        ...(options.type ? ["--type", options.type] : []),
        ...targetFlags,
        ...(isConfigObject(config) ? keyValueArgs(config, "network config") : [])
      ];
    }
  });
}

// ============================================================================
// ACLs and zones
// ============================================================================

const ACL_RULE_LISTS = ["egress", "ingress"] as const;

/** Rules compare on the fields they set; the daemon reports the rest as "". */
export function normalizeAclRules(rules: ConfigValue | undefined): ConfigValue[] {
  if (!Array.isArray(rules)) {
    return [];
  }
  return rules.map((rule) => {
    if (!isConfigObject(rule)) {
      return rule;
    }
    const trimmed: ConfigObject = {};
    for (const [key, value] of Object.entries(rule)) {
      if (value !== "" && value !== null) {
        trimmed[key] = typeof value === "number" ? String(value) : value;
      }
    }
    return trimmed;
  });
}

export function createNetworkAclBackend(client: IncusClient): ResourceBackend {
  return createDocumentBackend(client, {
    noun: "Network ACL",
    fields: ["config", "description", ...ACL_RULE_LISTS],
    command: ["network", "acl"],
    locate: (name) => [client.target(name)],
    renameArgs: (source, dest) => [
      "network",
      "acl",
      "rename",
      client.target(source),
      dest
    ],
    normalize: (document) => {
      const normalized: ConfigObject = { ...document };
      for (const list of ACL_RULE_LISTS) {
        if (document[list] !== undefined) {
          normalized[list] = normalizeAclRules(document[list]);
        }
      }
      return normalized;
    }
  });
}

export function createNetworkZoneBackend(client: IncusClient): ResourceBackend {
  return createDocumentBackend(client, {
    noun: "Network zone",
    fields: ["config", "description"],
    command: ["network", "zone"],
    locate: (name) => [client.target(name)]
  });
}

// ============================================================================
// Forwards
// ============================================================================

const FORWARD_PORT_KEYS = [
  "protocol",
  "listen_port",
  "target_address",
  "target_port",
  "description"
] as const;

const PORT_SORT_KEYS = ["listen_port", "protocol", "target_address", "target_port"] as const;

/**
 * Canonical port list: known keys only, values as strings, description
 * defaulting to "", target_port defaulting to listen_port. Sorted by
 * listen_port (numerically), ties broken by protocol, target_address and
 * target_port.
 */
export function normalizeForwardPorts(ports: ConfigValue | undefined): ConfigObject[] {
  if (!Array.isArray(ports)) {
    return [];
  }
  const normalized = ports.filter(isConfigObject).map((port) => {
    const entry: ConfigObject = {};
    for (const key of FORWARD_PORT_KEYS) {
      const value = port[key];
      if (value !== undefined && value !== null) {
        entry[key] = typeof value === "string" ? value : JSON.stringify(value);
      }
    }
    if (entry.description === undefined) {
      entry.description = "";
    }
    if (entry.target_port === undefined && entry.listen_port !== undefined) {
      entry.target_port = entry.listen_port;
    }
    return entry;
  });
  return normalized.sort((left, right) => {
    for (const key of PORT_SORT_KEYS) {
      const order = String(left[key] ?? "").localeCompare(String(right[key] ?? ""), "en", {
        numeric: true
      });
      if (order !== 0) {
        return order;
      }
    }
    return 0;
  });
}

/** Forwards are keyed by listen address inside one network. */
export function createNetworkForwardBackend(
  client: IncusClient,
  network: string
): ResourceBackend {
  return createDocumentBackend(client, {
    noun: "Network forward",
    fields: ["config", "description", "ports"],
    command: ["network", "forward"],
    locate: (listenAddress) => [client.target(network), listenAddress],
    normalize: (document) =>
      document.ports === undefined
        ? document
        : { ...document, ports: normalizeForwardPorts(document.ports) }
  });
}
