import { describe, it, expect } from "vitest";
import YAML from "yaml";
import { createTestContext } from "../../tests/controller-context.js";
import { createFakeRunner, notFound, type FakeResponse } from "../../tests/fake-runner.js";
import { reconcileResource } from "./index.js";
import { reconcileStoragePool, storagePoolSchema } from "./storage-pool.js";
import { reconcileStorageVolume, storageVolumeSchema } from "./storage-volume.js";

interface FakeObject {
  config: Record<string, string>;
  description: string;
}

function keyValues(args: string[]): Record<string, string> {
  const config: Record<string, string> = {};
  for (const arg of args) {
    if (!arg.startsWith("--") && arg.includes("=")) {
      const [key = "", value = ""] = arg.split("=");
      config[key] = value;
    }
  }
  return config;
}

/** Pools, volumes ("pool/name"), volume snapshots ("pool/name/snap") and instance devices. */
function storageDaemon(state: {
  pools?: Record<string, FakeObject>;
  volumes?: Record<string, FakeObject>;
  snapshots?: string[];
  devices?: Record<string, Record<string, Record<string, string>>>;
}) {
  const pools = state.pools ?? {};
  const volumes = state.volumes ?? {};
  const snapshots = new Set(state.snapshots ?? []);
  const devices = state.devices ?? {};
  const show = (object: FakeObject | undefined): FakeResponse =>
    object ? { stdout: YAML.stringify({ ...object, used_by: [] }) } : notFound;

  const respond = (args: string[]): FakeResponse => {
    if (args[0] === "config" && args[1] === "show") {
      const instance = devices[args[2] ?? ""];
      return instance ? { stdout: YAML.stringify({ config: {}, devices: instance }) } : notFound;
    }
    if (args[0] !== "storage") {
      return { exitCode: 1, stderr: "unexpected" };
    }
    if (args[1] !== "volume") {
      const [, verb, pool = "", driver] = args;
      switch (verb) {
        case "show":
          return show(pools[pool]);
        case "create":
          pools[pool] = { config: { source: driver ?? "", ...keyValues(args.slice(4)) }, description: "" };
          return undefined;
        case "set": {
          const [key = "", value = ""] = (args[3] ?? "").split("=");
          const target = pools[pool];
          if (target) target.config[key] = value;
          return undefined;
        }
        default:
          return { exitCode: 1, stderr: "unexpected" };
      }
    }
    const [, , verb = "", first = "", second = "", third = ""] = args;
    switch (verb) {
      case "show":
        if (second.includes("/")) {
          return snapshots.has(`${first}/${second}`) ? { stdout: "description: \"\"\n" } : notFound;
        }
        return show(volumes[`${first}/${second}`]);
      case "create":
        volumes[`${first}/${second}`] = { config: keyValues(args.slice(5)), description: "" };
        return undefined;
      case "copy": {
        const source = volumes[first];
        if (!source) return notFound;
        volumes[second] = { config: { ...source.config }, description: source.description };
        return undefined;
      }
      case "attach": {
        const instance = devices[third];
        if (instance) instance[args[6] ?? second] = { type: "disk", pool: first, source: second };
        return undefined;
      }
      case "snapshot":
        return undefined;
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };
  return { respond, pools, volumes, devices };
}

describe("reconcileStoragePool", () => {
  it("requires a driver to create a pool", async () => {
    const fake = createFakeRunner(storageDaemon({}).respond);

    const report = await reconcileStoragePool(
      storagePoolSchema.parse({ kind: "storage-pool", name: "fast" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      changed: false,
      failed: true,
      kind: "invalidInput",
      msg: '"driver" is required to create storage pool "fast".'
    });
  });

  it("creates the pool with its driver and config", async () => {
    const daemon = storageDaemon({});
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileStoragePool(
      storagePoolSchema.parse({
        kind: "storage-pool",
        name: "fast",
        driver: "zfs",
        config: { size: "10GiB" }
      }),
      createTestContext(fake.runner)
    );

    expect(report.msg).toBe("Storage pool created");
    expect(fake.commands()).toContain("storage create fast zfs size=10GiB");
  });

  it("compares sizes by magnitude", async () => {
    const fake = createFakeRunner(
      storageDaemon({ pools: { fast: { config: { size: "10GiB" }, description: "" } } }).respond
    );

    const report = await reconcileStoragePool(
      storagePoolSchema.parse({
        kind: "storage-pool",
        name: "fast",
        config: { size: "10240MiB" }
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: false, msg: "Storage pool matches configuration" });
  });
});

describe("reconcileStorageVolume", () => {
  it("creates a volume and attaches it at a path", async () => {
    const daemon = storageDaemon({ devices: { c1: {} } });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileStorageVolume(
      storageVolumeSchema.parse({
        kind: "storage-volume",
        pool: "default",
        name: "data",
        config: { size: "5GiB" },
        attach: { instance: "c1", path: "/srv" }
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "default/data",
      changed: true,
      msg: "Storage volume attached to c1",
      transitions: [{ kind: "create", identity: "default/data" }]
    });
    expect(fake.commands()).toEqual([
      "storage volume show default data",
      "storage volume create default data size=5GiB",
      "storage volume show default data",
      "config show c1",
      "storage volume attach default data c1 data /srv"
    ]);
  });

  it("leaves an attached volume alone", async () => {
    const fake = createFakeRunner(
      storageDaemon({
        volumes: { "default/data": { config: {}, description: "" } },
        devices: { c1: { data: { type: "disk", pool: "default", source: "data" } } }
      }).respond
    );

    const report = await reconcileStorageVolume(
      storageVolumeSchema.parse({
        kind: "storage-volume",
        pool: "default",
        name: "data",
        attach: { instance: "c1" }
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: false, msg: "Storage volume matches configuration" });
  });

  it("refuses to snapshot a missing volume", async () => {
    const fake = createFakeRunner(storageDaemon({}).respond);

    const report = await reconcileResource(
      storageVolumeSchema.parse({
        kind: "storage-volume",
        pool: "default",
        name: "data",
        snapshot: "snap0"
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "default/data",
      failed: true,
      kind: "notFound",
      msg: 'Storage volume "default/data" does not exist.'
    });
  });

  it("restores an existing snapshot", async () => {
    const fake = createFakeRunner(storageDaemon({ snapshots: ["default/data/snap0"] }).respond);

    const report = await reconcileStorageVolume(
      storageVolumeSchema.parse({
        kind: "storage-volume",
        pool: "default",
        name: "data",
        state: "restored",
        snapshot: "snap0"
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "default/data/snap0",
      changed: true,
      msg: "Snapshot restored"
    });
    expect(fake.commands()).toEqual([
      "storage volume show default data/snap0",
      "storage volume snapshot restore default data snap0"
    ]);
  });

  it("copies a volume to another pool", async () => {
    const daemon = storageDaemon({
      volumes: { "default/data": { config: { size: "5GiB" }, description: "" } }
    });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileStorageVolume(
      storageVolumeSchema.parse({
        kind: "storage-volume",
        pool: "default",
        name: "data",
        state: "copied",
        targetPool: "backup",
        targetVolume: "data"
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "backup/data",
      changed: true,
      msg: "Storage volume copied"
    });
    expect(fake.commands()).toContain("storage volume copy default/data backup/data");
    expect(daemon.volumes["backup/data"]).toEqual({ config: { size: "5GiB" }, description: "" });
  });
});
