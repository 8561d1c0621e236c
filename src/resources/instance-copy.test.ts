import { describe, it, expect } from "vitest";
import { createTestContext } from "../../tests/controller-context.js";
import { createFakeRunner } from "../../tests/fake-runner.js";
import { createInstanceDaemon, fakeInstance } from "../../tests/instance-daemon.js";
import { instanceCopySchema, reconcileInstanceCopy } from "./instance-copy.js";

const copy = (fields: Record<string, unknown>) =>
  instanceCopySchema.parse({ kind: "instance-copy", source: "c1", dest: "c2", ...fields });

describe("reconcileInstanceCopy", () => {
  it("copies the source under the destination name", async () => {
    const daemon = createInstanceDaemon({ c1: fakeInstance({ status: "Running" }) });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileInstanceCopy(
      copy({ instanceOnly: true, profiles: ["default", "gpu"] }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "c2",
      changed: true,
      msg: "Instance copied",
      transitions: [{ kind: "copy", identity: "c2", from: "c1" }]
    });
    expect(fake.commands()).toContain(
      "copy c1 c2 --instance-only --profile default --profile gpu"
    );
  });

  it("leaves an existing destination alone", async () => {
    const fake = createFakeRunner(
      createInstanceDaemon({ c1: fakeInstance(), c2: fakeInstance() }).respond
    );

    const report = await reconcileInstanceCopy(copy({}), createTestContext(fake.runner));

    expect(report).toMatchObject({ changed: false, msg: "Destination instance already exists" });
    expect(fake.commands()).toEqual(["list --format=json ^c2$"]);
  });

  it("starts the copy when asked", async () => {
    const daemon = createInstanceDaemon({ c1: fakeInstance() });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileInstanceCopy(
      copy({ started: true }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      msg: "Instance copied and updated",
      mutations: ["set status = running"]
    });
    expect(daemon.instances.get("c2")?.status).toBe("Running");
  });

  it("moves the source", async () => {
    const daemon = createInstanceDaemon({ c1: fakeInstance() });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileInstanceCopy(
      copy({ move: true, storage: "fast" }),
      createTestContext(fake.runner)
    );

    expect(report.msg).toBe("Instance moved");
    expect(fake.commands()).toContain("move c1 c2 --storage fast");
    expect([...daemon.instances.keys()]).toEqual(["c2"]);
  });

  it("treats a finished move as converged", async () => {
    const fake = createFakeRunner(createInstanceDaemon({ c2: fakeInstance() }).respond);

    const report = await reconcileInstanceCopy(
      copy({ move: true }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: false, msg: "Instance already moved" });
  });

  it("fails when neither source nor destination exists", async () => {
    const fake = createFakeRunner(createInstanceDaemon().respond);

    const report = await reconcileInstanceCopy(copy({}), createTestContext(fake.runner));

    expect(report).toMatchObject({
      failed: true,
      kind: "notFound",
      msg: 'Source "c1" not found.'
    });
  });
});
