import type { ConvergeObservers } from "@incus-converge/reconcile";
import type { IncusClient } from "../backend/incus-client.js";
import type { FileSystem } from "../utils/file-system.js";

export interface ClientScope {
  /** Project to act in; null for global objects such as projects themselves */
  project?: string | null;
  remote?: string;
}

export interface ControllerContext {
  /** Client bound to the configured defaults, overridden by the resource scope */
  connect(scope?: ClientScope): IncusClient;
  dryRun: boolean;
  observers?: ConvergeObservers;
  fs: FileSystem;
}
