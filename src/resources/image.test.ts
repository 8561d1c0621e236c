import { describe, it, expect } from "vitest";
import YAML from "yaml";
import { createTestContext } from "../../tests/controller-context.js";
import { createFakeRunner, notFound, type FakeResponse } from "../../tests/fake-runner.js";
import { reconcileResource } from "./index.js";
import { imageSchema, reconcileImage } from "./image.js";

interface FakeImage {
  fingerprint: string;
  aliases: { name: string }[];
  properties: Record<string, string>;
  public: boolean;
}

function imageDaemon(images: FakeImage[] = []) {
  const byFingerprint = (fingerprint: string) =>
    images.find((image) => image.fingerprint === fingerprint);
  const added = (alias: string): FakeImage => ({
    fingerprint: "f00dcafe",
    aliases: [{ name: alias }],
    properties: {},
    public: false
  });

  const respond = (args: string[], stdin?: string): FakeResponse => {
    const [family, verb, first = "", second = "", third = "", fourth = ""] = args;
    if (family !== "image") return { exitCode: 1, stderr: "unexpected" };
    switch (verb) {
      case "list":
        return { stdout: JSON.stringify(images) };
      case "copy":
        images.push(added(fourth));
        return undefined;
      case "import":
        images.push(added(third));
        return undefined;
      case "show": {
        const image = byFingerprint(first);
        return image
          ? { stdout: YAML.stringify({ auto_update: false, properties: image.properties, public: image.public }) }
          : notFound;
      }
      case "edit": {
        const image = byFingerprint(first);
        if (!image) return notFound;
        const edited: unknown = YAML.parse(stdin ?? "");
        if (typeof edited === "object" && edited !== null) {
          if ("properties" in edited && typeof edited.properties === "object" && edited.properties !== null) {
            image.properties = Object.fromEntries(
              Object.entries(edited.properties).map(([key, value]) => [key, String(value)])
            );
          }
          if ("public" in edited) image.public = edited.public === true;
        }
        return undefined;
      }
      case "alias":
        if (first === "create") byFingerprint(third)?.aliases.push({ name: second });
        return undefined;
      case "delete": {
        const index = images.findIndex((image) => image.aliases.some((alias) => alias.name === first));
        if (index < 0) return notFound;
        images.splice(index, 1);
        return undefined;
      }
      default:
        return { exitCode: 1, stderr: "unexpected" };
    }
  };
  return { images, respond };
}

const debian = (): FakeImage => ({
  fingerprint: "abc123",
  aliases: [{ name: "debian" }],
  properties: { os: "debian", release: "12" },
  public: false
});

describe("reconcileImage", () => {
  it("copies a missing image from a remote", async () => {
    const daemon = imageDaemon();
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileImage(
      imageSchema.parse({ kind: "image", alias: "debian", source: "images:debian/12" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "debian",
      changed: true,
      msg: "Image created",
      extra: { fingerprint: "f00dcafe" }
    });
    expect(fake.commands()).toContain("image copy images:debian/12 local: --alias debian");
  });

  it("imports a local image file", async () => {
    const daemon = imageDaemon();
    const fake = createFakeRunner(daemon.respond);

    await reconcileImage(
      imageSchema.parse({
        kind: "image",
        alias: "debian",
        source: "/images/debian.tar.xz",
        public: true
      }),
      createTestContext(fake.runner, { files: { "/images/debian.tar.xz": "image" } })
    );

    expect(fake.commands()).toContain("image import /images/debian.tar.xz --alias debian --public");
  });

  it("fails when the image is missing and has no source", async () => {
    const fake = createFakeRunner(imageDaemon().respond);

    const report = await reconcileImage(
      imageSchema.parse({ kind: "image", alias: "debian" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      failed: true,
      kind: "invalidInput",
      msg: 'Image "debian" not found and no "source" provided.'
    });
  });

  it("rejects an alias that points at another fingerprint", async () => {
    const fake = createFakeRunner(imageDaemon([debian()]).respond);

    const report = await reconcileResource(
      imageSchema.parse({ kind: "image", alias: "debian", fingerprint: "def456" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      identity: "debian",
      failed: true,
      kind: "identityConflict",
      msg: "Image found but fingerprint mismatch (found abc123, expected def456)."
    });
  });

  it("replaces the properties as a whole", async () => {
    const daemon = imageDaemon([debian()]);
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileImage(
      imageSchema.parse({
        kind: "image",
        alias: "debian",
        fingerprint: "abc",
        properties: { os: "debian" }
      }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({
      changed: true,
      msg: "Image updated",
      mutations: ['replace properties with {"os":"debian"}'],
      extra: { fingerprint: "abc123" }
    });
    const edit = fake.calls.find((call) => call.args[1] === "edit");
    expect(edit?.stdin).toBe("auto_update: false\nproperties:\n  os: debian\npublic: false\n");
    expect(daemon.images[0]?.properties).toEqual({ os: "debian" });
  });

  it("adds extra aliases to the image's fingerprint", async () => {
    const daemon = imageDaemon([debian()]);
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileImage(
      imageSchema.parse({ kind: "image", alias: "debian", aliases: ["bookworm"] }),
      createTestContext(fake.runner)
    );

    expect(report.mutations).toEqual(["add bookworm to aliases"]);
    expect(fake.commands()).toContain("image alias create bookworm abc123");
  });

  it("deletes the image on absent", async () => {
    const daemon = imageDaemon([debian()]);
    const fake = createFakeRunner(daemon.respond);

    const report = await reconcileImage(
      imageSchema.parse({ kind: "image", alias: "debian", state: "absent" }),
      createTestContext(fake.runner)
    );

    expect(report).toMatchObject({ changed: true, msg: "Image deleted" });
    expect(report.extra).toBeUndefined();
    expect(daemon.images).toEqual([]);
  });
});
