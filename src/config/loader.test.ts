import { describe, it, expect } from "vitest";
import { createMemoryFileSystem } from "../../tests/controller-context.js";
import { loadConfig, resolveConfig } from "./loader.js";

describe("loadConfig", () => {
  it("returns an empty config when no file exists", async () => {
    await expect(loadConfig("/work", { fs: createMemoryFileSystem() })).resolves.toEqual({});
  });

  it("reads the YAML file", async () => {
    const fs = createMemoryFileSystem({
      "/work/.incus-converge/config.yaml":
        "incusPath: /usr/local/bin/incus\nproject: web\nremote: ' edge '\ntimeoutMs: 30000\n"
    });

    await expect(loadConfig("/work", { fs })).resolves.toEqual({
      incusPath: "/usr/local/bin/incus",
      project: "web",
      remote: "edge",
      timeoutMs: 30000
    });
  });

  it("falls back to JSON", async () => {
    const fs = createMemoryFileSystem({
      "/work/.incus-converge/config.json": '{"project":"ops"}'
    });

    await expect(loadConfig("/work", { fs })).resolves.toEqual({ project: "ops" });
  });

  it("prefers YAML over JSON", async () => {
    const fs = createMemoryFileSystem({
      "/work/.incus-converge/config.yaml": "project: web\n",
      "/work/.incus-converge/config.json": '{"project":"ops"}'
    });

    await expect(loadConfig("/work", { fs })).resolves.toEqual({ project: "web" });
  });

  it("treats an empty file as no settings", async () => {
    const fs = createMemoryFileSystem({ "/work/.incus-converge/config.yaml": "" });

    await expect(loadConfig("/work", { fs })).resolves.toEqual({});
  });

  it("rejects a document that is not a map", async () => {
    const fs = createMemoryFileSystem({ "/work/.incus-converge/config.yaml": "- web\n" });

    await expect(loadConfig("/work", { fs })).rejects.toThrow(
      "Invalid config at /work/.incus-converge/config.yaml: expected an object."
    );
  });

  it("rejects wrongly typed values", async () => {
    const fs = createMemoryFileSystem({
      "/work/.incus-converge/config.yaml": "project: 7\n"
    });

    await expect(loadConfig("/work", { fs })).rejects.toThrow('Invalid "project": expected a string.');
  });

  it("rejects fractional timeouts", async () => {
    const fs = createMemoryFileSystem({
      "/work/.incus-converge/config.yaml": "timeoutMs: 1.5\n"
    });

    await expect(loadConfig("/work", { fs })).rejects.toThrow(
      'Invalid "timeoutMs": expected an integer.'
    );
  });
});

describe("resolveConfig", () => {
  it("layers environment and flags over the file", () => {
    expect(
      resolveConfig(
        { incusPath: "incus", project: "web", remote: "edge", timeoutMs: 1000 },
        { INCUS_CONVERGE_BIN: "/opt/incus", INCUS_CONVERGE_TIMEOUT_MS: "5000" },
        { project: "ops" }
      )
    ).toEqual({ incusPath: "/opt/incus", project: "ops", remote: "edge", timeoutMs: 5000 });
  });

  it("ignores empty overrides", () => {
    expect(
      resolveConfig({ project: "web" }, { INCUS_CONVERGE_BIN: " " }, { project: "" })
    ).toEqual({ project: "web" });
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => resolveConfig({}, { INCUS_CONVERGE_TIMEOUT_MS: "soon" })).toThrow(
      'Invalid "timeoutMs": expected an integer.'
    );
  });
});
