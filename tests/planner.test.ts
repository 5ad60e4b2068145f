import fs from "fs-extra";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { conflictingPaths, crossCheckDeclaredFiles, planInstall, planTotals } from "../src/planner.js";
import { assertValidMetadata } from "../src/validator.js";
import { INIT_CONTENT, MODELS_CONTENT, makeTempDir, referralCandidate, REFERRAL_NOTES } from "./fixtures.js";

describe("planInstall", () => {
  let root = "";

  beforeEach(() => {
    root = makeTempDir();
  });

  afterEach(async () => {
    await fs.remove(root);
  });

  it("plans files in generator order with sizes and create actions", async () => {
    const plan = await planInstall(assertValidMetadata(referralCandidate()), root);

    expect(plan.plugin).toBe("referral");
    expect(plan.version).toBe("1.0.0");
    expect(plan.postInstallNotes).toBe(REFERRAL_NOTES);
    expect(plan.targetDir).toBe(path.resolve(root));
    expect(plan.entries).toEqual([
      {
        path: path.join(root, "referral", "__init__.py"),
        relativePath: "referral/__init__.py",
        content: INIT_CONTENT,
        sizeBytes: 40,
        existsAlready: false,
        action: "create"
      },
      {
        path: path.join(root, "referral", "models.py"),
        relativePath: "referral/models.py",
        content: MODELS_CONTENT,
        sizeBytes: 900,
        existsAlready: false,
        action: "create"
      }
    ]);
  });

  it("marks existing files for overwrite", async () => {
    await fs.outputFile(path.join(root, "referral", "models.py"), "old");
    const plan = await planInstall(assertValidMetadata(referralCandidate()), root);
    expect(plan.entries.map(entry => entry.action)).toEqual(["create", "overwrite"]);
    expect(plan.entries[1]?.existsAlready).toBe(true);
    expect(conflictingPaths(plan)).toEqual([path.join(root, "referral", "models.py")]);
  });

  it("yields identical plans on repeated calls", async () => {
    const metadata = assertValidMetadata(referralCandidate());
    const first = await planInstall(metadata, root);
    const second = await planInstall(metadata, root);
    expect(second).toEqual(first);
  });

  it("invokes the generator once with the resolved target directory and writes nothing", async () => {
    const generator = vi.fn(() => [{ path: "notes.txt", content: "hello" }]);
    const relativeTarget = path.relative(process.cwd(), root);
    await planInstall(assertValidMetadata(referralCandidate({ contentGenerator: generator })), relativeTarget);
    expect(generator).toHaveBeenCalledTimes(1);
    expect(generator).toHaveBeenCalledWith(path.resolve(root));
    expect(await fs.readdir(root)).toEqual([]);
  });

  it("counts sizes in UTF-8 bytes", async () => {
    const generator = () => [{ path: "café.txt", content: "café" }];
    const plan = await planInstall(assertValidMetadata(referralCandidate({ contentGenerator: generator })), root);
    expect(plan.entries[0]?.sizeBytes).toBe(5);
  });

  it("resolves paths that leave the target directory", async () => {
    const generator = () => [{ path: "../deploy-vps/README.md", content: "# deploy" }];
    const plan = await planInstall(assertValidMetadata(referralCandidate({ contentGenerator: generator })), root);
    expect(plan.entries[0]?.path).toBe(path.join(path.dirname(root), "deploy-vps", "README.md"));
    expect(plan.entries[0]?.relativePath).toBe("../deploy-vps/README.md");
  });
});

describe("planTotals", () => {
  it("sums sizes and counts actions", async () => {
    const root = makeTempDir();
    await fs.outputFile(path.join(root, "referral", "__init__.py"), "old");
    const plan = await planInstall(assertValidMetadata(referralCandidate()), root);
    expect(planTotals(plan)).toEqual({ files: 2, bytes: 940, creates: 1, overwrites: 1 });
    await fs.remove(root);
  });
});

describe("crossCheckDeclaredFiles", () => {
  it("reports undeclared and missing files", async () => {
    const root = makeTempDir();
    const metadata = assertValidMetadata(
      referralCandidate({ filesGenerated: ["referral/__init__.py", "referral/./config.py"] })
    );
    const plan = await planInstall(metadata, root);
    expect(crossCheckDeclaredFiles(metadata, plan)).toEqual({
      undeclared: ["referral/models.py"],
      missing: ["referral/config.py"]
    });
    await fs.remove(root);
  });
});
