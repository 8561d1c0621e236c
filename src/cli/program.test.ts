import { describe, it, expect, vi, beforeEach } from "vitest";
import { createMemoryFileSystem } from "../../tests/controller-context.js";
import { createDocumentDaemon } from "../../tests/document-daemon.js";
import { createFakeRunner } from "../../tests/fake-runner.js";
import type { CommandRunner } from "../backend/run-command.js";
import { SilentError } from "./errors.js";
import { resetOutputFormatCache } from "./output-format.js";
import { createProgram, readPackageVersion } from "./program.js";

const MANIFEST = [
  "defaults:",
  "  project: web",
  "resources:",
  "  - kind: profile",
  "    name: base",
  "    config:",
  "      limits.cpu: 2",
  ""
].join("\n");

function setup(runner: CommandRunner, files: Record<string, string> = { "/work/site.yaml": MANIFEST }) {
  const lines: string[] = [];
  const outputs: string[] = [];
  const program = createProgram({
    fs: createMemoryFileSystem(files),
    env: { cwd: "/work", variables: {} },
    logger: (message) => lines.push(message),
    output: (text) => outputs.push(text),
    runner,
    suppressCommanderOutput: true
  });
  return { program, lines, outputs };
}

describe("incus-converge apply", () => {
  beforeEach(() => {
    resetOutputFormatCache();
  });

  it("converges the manifest in the default project", async () => {
    const daemon = createDocumentDaemon(["profile"]);
    const fake = createFakeRunner(daemon.respond);
    const { program, lines } = setup(fake.runner);

    await program.parseAsync(["node", "incus-converge", "apply", "site.yaml"]);

    expect(lines).toEqual(["profile base: Profile created", "1 resources, 1 changed, 0 failed"]);
    expect(fake.calls[0]?.args).toEqual(["--project", "web", "profile", "show", "base"]);
    expect(daemon.documents.get("base")).toEqual({ config: { "limits.cpu": "2" } });
  });

  it("lets --project override the manifest default", async () => {
    const fake = createFakeRunner(createDocumentDaemon(["profile"]).respond);
    const { program } = setup(fake.runner);

    await program.parseAsync(["node", "incus-converge", "--project", "ops", "apply", "site.yaml"]);

    expect(fake.calls[0]?.args).toEqual(["--project", "ops", "profile", "show", "base"]);
  });

  it("exits non-zero after reporting a failed resource", async () => {
    const fake = createFakeRunner(() => ({ exitCode: 1, stderr: "permission denied" }));
    const { program, lines } = setup(fake.runner);

    await expect(
      program.parseAsync(["node", "incus-converge", "apply", "site.yaml"])
    ).rejects.toBeInstanceOf(SilentError);
    expect(lines).toEqual([
      "profile base: incus profile show base failed: permission denied (commandFailed)",
      "1 resources, 0 changed, 1 failed"
    ]);
  });

  it("reports an invalid manifest as a user error", async () => {
    const fake = createFakeRunner();
    const { program } = setup(fake.runner, {
      "/work/site.yaml": "resources:\n  - kind: profile\n    name: \"\"\n"
    });

    await expect(
      program.parseAsync(["node", "incus-converge", "apply", "site.yaml"])
    ).rejects.toMatchObject({
      isUserError: true,
      message:
        "Invalid manifest at /work/site.yaml: resources[0].name: String must contain at least 1 character(s)"
    });
    expect(fake.calls).toEqual([]);
  });

  it("reports a missing manifest", async () => {
    const { program } = setup(createFakeRunner().runner);

    await expect(
      program.parseAsync(["node", "incus-converge", "apply", "missing.yaml"])
    ).rejects.toMatchObject({ isUserError: true, message: "Manifest not found: /work/missing.yaml" });
  });

  it("reports an invalid config file", async () => {
    const { program } = setup(createFakeRunner().runner, {
      "/work/site.yaml": MANIFEST,
      "/work/.incus-converge/config.yaml": "timeoutMs: -5\n"
    });

    await expect(
      program.parseAsync(["node", "incus-converge", "apply", "site.yaml"])
    ).rejects.toMatchObject({ isUserError: true, message: 'Invalid "timeoutMs": expected >= 1.' });
  });
});

describe("incus-converge plan", () => {
  beforeEach(() => {
    resetOutputFormatCache();
  });

  it("prints the planned reports as JSON without writing", async () => {
    const fake = createFakeRunner(createDocumentDaemon(["profile"]).respond);
    const { program, lines, outputs } = setup(fake.runner);

    await program.parseAsync(["node", "incus-converge", "--json", "plan", "site.yaml"]);

    expect(lines).toEqual([]);
    expect(fake.commands()).toEqual(["profile show base"]);
    expect(outputs).toHaveLength(1);
    const summary: unknown = JSON.parse(outputs[0] ?? "");
    expect(summary).toMatchObject({
      changed: true,
      failed: false,
      reports: [
        {
          resource: "profile",
          identity: "base",
          changed: true,
          msg: "Profile would be created",
          mutations: ["set config.limits.cpu = 2"]
        }
      ]
    });
  });

  it("shows the planned document diff in the terminal", async () => {
    const daemon = createDocumentDaemon(["profile"], {
      base: { config: { "limits.cpu": "1" }, description: "" }
    });
    const fake = createFakeRunner(daemon.respond);
    const { program, lines } = setup(fake.runner);

    await program.parseAsync(["node", "incus-converge", "plan", "site.yaml"]);

    expect(lines).toEqual([
      "profile base: Profile would be updated",
      [
        "--- profile base\tobserved",
        "+++ profile base\tplanned",
        "@@ -1,3 +1,3 @@",
        " config:",
        '-  limits.cpu: "1"',
        "+  limits.cpu: 2",
        ' description: ""'
      ].join("\n"),
      "1 resources, 1 would change, 0 failed"
    ]);
    expect(daemon.documents.get("base")).toEqual({
      config: { "limits.cpu": "1" },
      description: ""
    });
  });
});

describe("readPackageVersion", () => {
  it("walks up to the project's package.json", () => {
    const files: Record<string, string> = {
      "/a/b/package.json": '{"name":"other","version":"9.9.9"}',
      "/a/package.json": '{"name":"incus-converge","version":"1.2.3"}'
    };
    const readFile = vi.fn((path: string) => {
      const content = files[path];
      if (content === undefined) {
        throw Object.assign(new Error(`ENOENT: ${path}`), { code: "ENOENT" });
      }
      return content;
    });

    expect(readPackageVersion("file:///a/b/c/program.js", readFile)).toBe("1.2.3");
    expect(readFile.mock.calls.map(([path]) => path)).toEqual([
      "/a/b/c/package.json",
      "/a/b/package.json",
      "/a/package.json"
    ]);
  });
});
