import { mkdtemp, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BuildFailure } from "../src/models/errors.js";
import {
  CONTROLLER_DOCKERFILE,
  HELPER_DOCKERFILE,
  ImageBuilder,
} from "../src/services/image-builder.js";
import { FakeImageTool, fail } from "./helpers/fakes.js";

describe("ImageBuilder", () => {
  let sourceDir: string;
  let imageTool: FakeImageTool;
  let builder: ImageBuilder;

  beforeEach(async () => {
    sourceDir = await mkdtemp(path.join(os.tmpdir(), "image-builder-test-"));
    await writeFile(path.join(sourceDir, CONTROLLER_DOCKERFILE), "FROM scratch\n");
    await writeFile(path.join(sourceDir, HELPER_DOCKERFILE), "FROM scratch\n");
    imageTool = new FakeImageTool();
    builder = new ImageBuilder(imageTool, sourceDir);
  });

  afterEach(async () => {
    await rm(sourceDir, { recursive: true, force: true });
  });

  it("never builds when skipping and the image exists", async () => {
    imageTool.existing.add("sonic-change-agent:test");

    const result = await builder.ensureImage(
      "sonic-change-agent:test",
      path.join(sourceDir, "does-not-exist"),
      sourceDir,
      true,
    );

    expect(result).toEqual({ image: "sonic-change-agent:test", built: false });
    expect(imageTool.builds).toHaveLength(0);
  });

  it("builds when skipping and the image is missing", async () => {
    const dockerfile = path.join(sourceDir, CONTROLLER_DOCKERFILE);

    const result = await builder.ensureImage(
      "sonic-change-agent:test",
      dockerfile,
      sourceDir,
      true,
    );

    expect(result).toEqual({ image: "sonic-change-agent:test", built: true });
    expect(imageTool.builds).toEqual([
      { dockerfile, tag: "sonic-change-agent:test", context: sourceDir },
    ]);
  });

  it("rebuilds an existing image when not skipping", async () => {
    imageTool.existing.add("sonic-change-agent:test");

    await builder.ensureImage(
      "sonic-change-agent:test",
      path.join(sourceDir, CONTROLLER_DOCKERFILE),
      sourceDir,
      false,
    );

    expect(imageTool.builds).toHaveLength(1);
  });

  it("fails when the Dockerfile does not exist", async () => {
    const missing = path.join(sourceDir, "Dockerfile.missing");

    const result = builder.ensureImage("agent:test", missing, sourceDir, false);

    await expect(result).rejects.toBeInstanceOf(BuildFailure);
    await expect(result).rejects.toThrow(`Dockerfile not found at ${missing}`);
    expect(imageTool.builds).toHaveLength(0);
  });

  it("carries the build output when the build fails", async () => {
    imageTool.buildOutcome = fail("step 3/7: go build: exit status 2");

    const result = builder.ensureImage(
      "agent:test",
      path.join(sourceDir, CONTROLLER_DOCKERFILE),
      sourceDir,
      false,
    );

    await expect(result).rejects.toMatchObject({
      name: "BuildFailure",
      stage: "images",
      image: "agent:test",
      message: "Failed to build image agent:test",
      detail: "step 3/7: go build: exit status 2",
    });
  });

  it("prepares the controller image, then the helper image", async () => {
    const results = await builder.ensureImages(
      { primary: "sonic-change-agent:test", helper: "gnoi-light:test" },
      true,
    );

    expect(results.map((result) => result.image)).toEqual([
      "sonic-change-agent:test",
      "gnoi-light:test",
    ]);
    expect(imageTool.builds.map((build) => build.dockerfile)).toEqual([
      path.join(sourceDir, CONTROLLER_DOCKERFILE),
      path.join(sourceDir, HELPER_DOCKERFILE),
    ]);
  });
});
