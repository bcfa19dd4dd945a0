import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Application, SilentReporter } from ".";
import { makeConfig, makeTempDir, writeJpeg } from "./testing/fixtures";

describe("Application", () => {
  let root: string;
  let inputDir: string;
  let outputDir: string;

  beforeEach(async () => {
    root = await makeTempDir();
    inputDir = path.join(root, "incoming");
    outputDir = path.join(root, "gallery", "fall-equinox");
    await fs.mkdir(inputDir);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("runs the batch with the configured limits", async () => {
    await writeJpeg(path.join(inputDir, "leaf.jpg"), {
      width: 500,
      height: 250,
      dateTimeOriginal: "2024:09:22 16:43:00",
    });
    const config = { ...makeConfig(inputDir, outputDir, { maxWidth: 120, quality: 60 }), event: "fall-equinox" };
    const app = new Application(config, { reporter: new SilentReporter() });

    const report = await app.runOptimization();

    expect(report.successful).toBe(1);
    expect(report.results[0]).toMatchObject({
      targetName: "fall-equinox-2024-09-22-1643.jpg",
      width: 120,
      height: 60,
    });
    expect(app.getConfig()).toBe(config);
  });

  it("refuses to start a second run while one is in progress", async () => {
    const app = new Application(makeConfig(inputDir, outputDir), { reporter: new SilentReporter() });

    const first = app.runOptimization();
    await expect(app.runOptimization()).rejects.toThrow(
      "An optimization run is already in progress"
    );
    await expect(first).resolves.toMatchObject({ totalImages: 0 });
  });
});
