import { describe, it, expect } from "vitest";
import YAML from "yaml";
import { parseJoinToken } from "../backend/cluster.js";
import { createTestContext } from "../../tests/controller-context.js";
import { createFakeRunner, notFound, type FakeResponse } from "../../tests/fake-runner.js";
import { clusterSchema, reconcileCluster } from "./cluster.js";

interface FakeMember {
  config: Record<string, string>;
  groups: string[];
}

function clusterDaemon(
  members: Record<string, FakeMember> = {},
  groups: Record<string, string> = {}
) {
  const respond = (args: string[]): FakeResponse => {
    const [family, verb, first = "", second = "", third = ""] = args;
    if (family !== "cluster") return { exitCode: 1, stderr: "unexpected" };
    switch (verb) {
      case "list":
        return {
          stdout: JSON.stringify(
            Object.keys(members).map((name) => ({ server_name: name, status: "Online" }))
          )
        };
      case "enable":
        members[first] = { config: {}, groups: ["default"] };
        return undefined;
      case "show": {
        const member = members[first];
        return member ? { stdout: YAML.stringify({ server_name: first, ...member }) } : notFound;
      }
      case "add":
        return { stdout: `Member ${first} join token:\ntest-token\n` };
      case "remove":
        delete members[first];
        return undefined;
      case "group":
        switch (first) {
          case "list":
            return {
              stdout: JSON.stringify(
                Object.entries(groups).map(([name, description]) => ({ name, description }))
              )
            };
          case "create":
            groups[second] = args[5] ?? "";
            return undefined;
          case "delete":
            delete groups[second];
            return undefined;
          case "assign": {
            const member = members[second];
            if (member) member.groups = third.split(",");
            return undefined;
          }
          default:
            return { exitCode: 1, stderr: "unexpected" };
        }
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };
  return { members, groups, respond };
}

describe("parseJoinToken", () => {
  it("takes the last line after the banner", () => {
    expect(parseJoinToken("Member node2 join token:\ntest-token\n")).toBe("test-token");
  });

  it("returns bare output as is", () => {
    expect(parseJoinToken("test-token\n")).toBe("test-token");
  });
});

describe("reconcileCluster", () => {
  it("enables clustering on a standalone server", async () => {
    const daemon = clusterDaemon();
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node1", state: "enabled" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ identity: "node1", changed: true, msg: "Clustering enabled" });
    expect(fake.commands()).toEqual(["cluster list --format=json", "cluster enable node1"]);
  });

  it("leaves an existing cluster alone", async () => {
    const fake = createFakeRunner(
      clusterDaemon({ node1: { config: {}, groups: ["default"] } }).respond
    );

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node1", state: "enabled" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: false, msg: "Clustering already enabled" });
  });

  it("issues a join token for an unknown member", async () => {
    const fake = createFakeRunner(
      clusterDaemon({ node1: { config: {}, groups: ["default"] } }).respond
    );

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node2" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      changed: true,
      msg: "Join token generated",
      extra: { token: "test-token" }
    });
  });

  it("does not request a token on a dry run", async () => {
    const fake = createFakeRunner(clusterDaemon().respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node2" }),
      createTestContext(fake.runner, { dryRun: true })
    );

    expect(report.msg).toBe("Join token would be generated");
    expect(fake.commands()).toEqual(["cluster show node2"]);
  });

  it("assigns a member's groups in one call", async () => {
    const daemon = clusterDaemon({ node1: { config: {}, groups: ["default"] } });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node1", groups: ["gpu", "default"] }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      changed: true,
      msg: "Member updated",
      mutations: ['set groups = ["default","gpu"]'],
      extra: { member: { config: {}, groups: ["default"] } }
    });
    expect(fake.commands()).toContain("cluster group assign node1 default,gpu");
    expect(daemon.members.node1?.groups).toEqual(["default", "gpu"]);
  });

  it("swaps a member's groups without an empty assignment", async () => {
    const daemon = clusterDaemon({ node1: { config: {}, groups: ["default"] } });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node1", groups: ["gpu"] }),
      createTestContext(fake.runner)
    );

    expect(report.mutations).toEqual(['set groups = ["gpu"]']);
    expect(fake.commands().filter((command) => command.startsWith("cluster group assign"))).toEqual([
      "cluster group assign node1 gpu"
    ]);
    expect(daemon.members.node1?.groups).toEqual(["gpu"]);
  });

  it("creates groups from definitions", async () => {
    const daemon = clusterDaemon();
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({
        kind: "cluster",
        groups: [{ name: "gpu", description: "GPU nodes" }]
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ identity: "gpu", changed: true, msg: "Groups created" });
    expect(fake.commands()).toContain("cluster group create gpu --description GPU nodes");
    expect(daemon.groups).toEqual({ gpu: "GPU nodes" });
  });

  it("deletes named groups", async () => {
    const daemon = clusterDaemon({}, { gpu: "", arm: "" });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", state: "absent", groups: ["gpu", "x86"] }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ identity: "gpu,x86", changed: true, msg: "Groups deleted" });
    expect(daemon.groups).toEqual({ arm: "" });
  });

  it("force-removes a member", async () => {
    const daemon = clusterDaemon({ node3: { config: {}, groups: ["default"] } });
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", name: "node3", state: "absent", force: true }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: true, msg: "Member deleted" });
    expect(fake.commands()).toContain("cluster remove node3 --force --yes");
  });

  it("lists members", async () => {
    const fake = createFakeRunner(
      clusterDaemon({ node1: { config: {}, groups: ["default"] } }).respond
    );

    const report = await reconcileCluster(
      clusterSchema.parse({ kind: "cluster", state: "listed" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "members",
      changed: false,
      extra: { members: [{ server_name: "node1", status: "Online" }] }
    });
  });
});
