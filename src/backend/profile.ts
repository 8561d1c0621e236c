import type { ResourceBackend } from "@incus-converge/reconcile";
import { createDocumentBackend } from "./document-backend.js";
import type { IncusClient } from "./incus-client.js";

export function createProfileBackend(client: IncusClient): ResourceBackend {
  return createDocumentBackend(client, {
    noun: "Profile",
    fields: ["config", "description", "devices"],
    command: ["profile"],
    locate: (name) => [client.target(name)],
    renameArgs: (source, dest) => ["profile", "rename", client.target(source), dest]
  });
}

/** Projects are global objects: `client` must not carry --project. */
export function createProjectBackend(client: IncusClient): ResourceBackend {
  return createDocumentBackend(client, {
    noun: "Project",
    fields: ["config", "description"],
    command: ["project"],
    locate: (name) => [client.target(name)],
    deleteArgs: (name, force) => [
      "project",
      "delete",
      client.target(name),
      ...(force ? ["--force"] : [])
    ],
    renameArgs: (source, dest) => [
      "project",
      "rename",
      client.target(source),
      client.target(dest)
    ]
  });
}
