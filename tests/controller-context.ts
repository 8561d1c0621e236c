import { createFsFromVolume, Volume } from "memfs";
import { createIncusClient } from "../src/backend/incus-client.js";
import type { CommandRunner } from "../src/backend/run-command.js";
import type { ClientScope, ControllerContext } from "../src/resources/index.js";
import type { FileSystem } from "../src/utils/file-system.js";

export function createMemoryFileSystem(files: Record<string, string> = {}): FileSystem {
  return createFsFromVolume(Volume.fromJSON(files)).promises as unknown as FileSystem;
}

/** Context whose clients all talk to `runner`; records the scopes asked for. */
export function createTestContext(
  runner: CommandRunner,
  options: { dryRun?: boolean; files?: Record<string, string> } = {}
): ControllerContext & { scopes: ClientScope[] } {
  const scopes: ClientScope[] = [];
  return {
    scopes,
    connect(scope = {}) {
      scopes.push(scope);
      return createIncusClient({
        runner,
        project: scope.project ?? undefined,
        remote: scope.remote
      });
    },
    dryRun: options.dryRun ?? false,
    fs: createMemoryFileSystem(options.files)
  };
}
