import fs from "fs-extra";
import os from "os";
import path from "path";
import { GeneratedFile, PluginCandidate } from "../src/types.js";

export const INIT_CONTENT = `${"#".repeat(39)}\n`;
export const MODELS_CONTENT = "x = 1\n".repeat(150);

export const REFERRAL_NOTES = "Register the referral router in app/apis/v1.py.";

export function referralFiles(): GeneratedFile[] {
  return [
    { path: "referral/__init__.py", content: INIT_CONTENT },
    { path: "referral/models.py", content: MODELS_CONTENT }
  ];
}

/**
 * Valid definition of a two-file `referral` plugin; fields may be overridden.
 */
export function referralCandidate(overrides: PluginCandidate = {}): PluginCandidate {
  return {
    name: "referral",
    description: "User referral system",
    version: "1.0.0",
    dependencies: [],
    filesGenerated: ["referral/__init__.py", "referral/models.py"],
    configRequired: false,
    postInstallNotes: REFERRAL_NOTES,
    contentGenerator: referralFiles,
    ...overrides
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "kitforge-"));
}

/**
 * Every file under `root` mapped to its content, keyed by `/`-separated relative path.
 */
export async function snapshotTree(root: string): Promise<Record<string, string>> {
  const result: Record<string, string> = {};
  async function walk(dir: string): Promise<void> {
    for (const name of await fs.readdir(dir)) {
      const absolute = path.join(dir, name);
      if ((await fs.stat(absolute)).isDirectory()) {
        await walk(absolute);
      } else {
        result[path.relative(root, absolute).split(path.sep).join("/")] = await fs.readFile(absolute, "utf8");
      }
    }
  }
  await walk(root);
  return result;
}
