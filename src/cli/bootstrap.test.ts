import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { MockInstance } from "vitest";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import { ReconcileError } from "@incus-converge/reconcile";
import { CliError, SilentError } from "./errors.js";

const mocks = vi.hoisted(() => ({
  error: vi.fn(),
  message: vi.fn()
}));

vi.mock("@clack/prompts", () => ({
  log: mocks
}));

import { createCliMain, isCliInvocation } from "./bootstrap.js";

class FailingProgram extends Command {
  constructor(private readonly failure: unknown) {
    super();
  }

  override async parseAsync(): Promise<this> {
    throw this.failure;
  }
}

describe("createCliMain", () => {
  let exitSpy: MockInstance<[code?: string | number | null | undefined], never>;

  beforeEach(() => {
    exitSpy = vi
      .spyOn(process, "exit")
      .mockImplementation((code?: string | number | null) => {
        throw new Error(`exit:${code ?? "undefined"}`);
      });
  });

  afterEach(() => {
    exitSpy.mockRestore();
    vi.clearAllMocks();
  });

  it("prints user errors without a prefix", async () => {
    const main = createCliMain(
      () => new FailingProgram(new CliError("Manifest not found: site.yaml", { isUserError: true }))
    );

    await expect(main()).rejects.toThrow("exit:1");
    expect(mocks.error).toHaveBeenCalledWith("Manifest not found: site.yaml");
  });

  it("prefixes unexpected errors", async () => {
    const main = createCliMain(() => new FailingProgram(new Error("boom")));

    await expect(main()).rejects.toThrow("exit:1");
    expect(mocks.error).toHaveBeenCalledWith("Error: boom");
    expect(mocks.message).toHaveBeenCalledWith(
      "Re-run with --verbose to trace each incus command.",
      { symbol: "●" }
    );
  });

  it("names the failure kind of engine errors", async () => {
    const main = createCliMain(
      () => new FailingProgram(new ReconcileError("backendTimeout", "incus did not answer"))
    );

    await expect(main()).rejects.toThrow("exit:1");
    expect(mocks.error).toHaveBeenCalledWith("Error (backendTimeout): incus did not answer");
    expect(mocks.message).not.toHaveBeenCalled();
  });

  it("exits quietly after an already reported failure", async () => {
    const main = createCliMain(() => new FailingProgram(new SilentError()));

    await expect(main()).rejects.toThrow("exit:1");
    expect(mocks.error).not.toHaveBeenCalled();
  });

  it("passes the process environment to the program factory", async () => {
    const factory = vi.fn(() => new FailingProgram(new SilentError()));
    const main = createCliMain(factory);

    await expect(main()).rejects.toThrow("exit:1");
    expect(factory).toHaveBeenCalledWith({
      env: { cwd: process.cwd(), variables: process.env },
      exitOverride: false
    });
  });
});

describe("isCliInvocation", () => {
  const moduleUrl = pathToFileURL("/opt/incus-converge/dist/src/index.js").href;

  it("matches the entry script directly", () => {
    expect(
      isCliInvocation(["node", "/opt/incus-converge/dist/src/index.js"], moduleUrl, () => {
        throw new Error("unused");
      })
    ).toBe(true);
  });

  it("follows a symlinked bin", () => {
    expect(
      isCliInvocation(
        ["node", "/usr/local/bin/incus-converge"],
        moduleUrl,
        () => "/opt/incus-converge/dist/src/index.js"
      )
    ).toBe(true);
  });

  it("rejects other entries", () => {
    expect(isCliInvocation(["node", "/tmp/other.js"], moduleUrl, (path) => path)).toBe(false);
    expect(isCliInvocation(["node"], moduleUrl)).toBe(false);
  });
});
