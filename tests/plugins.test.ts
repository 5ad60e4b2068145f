import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Installer } from "../src/installer.js";
import { crossCheckDeclaredFiles, planInstall } from "../src/planner.js";
import { BUILTIN_PLUGINS } from "../src/plugins/index.js";
import { initializeRegistry } from "../src/registry.js";
import { assertValidMetadata } from "../src/validator.js";
import { makeTempDir } from "./fixtures.js";

describe("built-in plugins", () => {
  let project = "";
  let appDir = "";

  beforeEach(async () => {
    project = makeTempDir();
    appDir = path.join(project, "app");
    await fs.ensureDir(appDir);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(project);
  });

  it.each(BUILTIN_PLUGINS.map(candidate => ({ name: String(candidate.name), candidate })))(
    "$name validates and generates exactly its declared files",
    async ({ candidate }) => {
      const metadata = assertValidMetadata(candidate);
      const plan = await planInstall(metadata, appDir);
      expect(crossCheckDeclaredFiles(metadata, plan)).toEqual({ undeclared: [], missing: [] });
      expect(plan.entries.map(entry => entry.relativePath)).toEqual(metadata.filesGenerated);
    }
  );

  it("places the referral module inside the target directory", async () => {
    const catalog = initializeRegistry();
    await fs.ensureDir(path.join(appDir, "user"));

    const outcome = await new Installer(catalog).install("referral", appDir);

    expect(outcome.mode).toBe("apply");
    const models = await fs.readFile(path.join(appDir, "referral", "models.py"), "utf8");
    expect(models).toContain("class Referral(Base):");
  });

  it("places deploy-vps at the project root with an empty placeholder", async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    const catalog = initializeRegistry();

    const outcome = await new Installer(catalog).install("deploy_vps", appDir);

    expect(outcome.mode).toBe("apply");
    expect(await fs.readFile(path.join(project, "deploy-vps", "generated", ".gitkeep"), "utf8")).toBe("");
    expect(await fs.readFile(path.join(project, "deploy-vps", "scripts", "deploy.sh"), "utf8")).toMatch(/^#!\/usr\/bin\/env bash\n/);
    expect(await fs.readdir(appDir)).toEqual([]);
  });
});
