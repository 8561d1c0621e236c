#!/usr/bin/env node
import { createProgram } from "./cli/program.js";
import { createCliMain, isCliInvocation } from "./cli/bootstrap.js";

export { reconcileResource, resourceSchema } from "./resources/index.js";
export type { ResourceReport, ResourceSpec, ControllerContext } from "./resources/index.js";
export { createIncusClient } from "./backend/incus-client.js";
export type { IncusClient, IncusClientOptions } from "./backend/incus-client.js";
export { loadManifest, parseManifest } from "./manifest/manifest.js";

const main = createCliMain(createProgram);

if (isCliInvocation(process.argv, import.meta.url)) {
  void main();
}

export { main, isCliInvocation };
