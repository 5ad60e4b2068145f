// CHANGE: Compute install plans from a plugin's content generator and the live filesystem.
// WHY: Dry runs and real installs must present and write the same files in the same order.

import fs from "fs-extra";
import path from "path";
import { INSTALL } from "./config.js";
import { debug } from "./logger.js";
import { FilePlanEntry, InstallPlan, PlanTotals, PluginMetadata } from "./types.js";

function toPortable(relativePath: string): string {
  return relativePath.split(path.sep).join("/");
}

/**
 * Build the ordered plan for installing a plugin into a target directory.
 *
 * The generator runs exactly once. Existence is probed per file at call time, so
 * `existsAlready` and `action` reflect the filesystem at the moment of planning only.
 *
 * @param metadata - Validated plugin metadata.
 * @param targetDir - Directory generated paths are resolved against.
 * @returns Plan in generator order.
 */
export async function planInstall(metadata: PluginMetadata, targetDir: string): Promise<InstallPlan> {
  const root = path.resolve(targetDir);
  const generated = metadata.contentGenerator(root);
  debug(`Content generator for ${metadata.name} produced ${generated.length} file(s).`);

  const entries: FilePlanEntry[] = [];
  for (const file of generated) {
    const absolute = path.resolve(root, file.path);
    const existsAlready = await fs.pathExists(absolute);
    entries.push({
      path: absolute,
      relativePath: toPortable(path.relative(root, absolute)),
      content: file.content,
      sizeBytes: Buffer.byteLength(file.content, INSTALL.ENCODING),
      existsAlready,
      action: existsAlready ? "overwrite" : "create"
    });
  }

  return {
    plugin: metadata.name,
    version: metadata.version,
    postInstallNotes: metadata.postInstallNotes,
    targetDir: root,
    entries
  };
}

export function planTotals(plan: InstallPlan): PlanTotals {
  let bytes = 0;
  let overwrites = 0;
  for (const entry of plan.entries) {
    bytes += entry.sizeBytes;
    if (entry.action === "overwrite") {
      overwrites += 1;
    }
  }
  return {
    files: plan.entries.length,
    bytes,
    creates: plan.entries.length - overwrites,
    overwrites
  };
}

/**
 * Absolute paths the plan would overwrite, in plan order.
 */
export function conflictingPaths(plan: InstallPlan): string[] {
  return plan.entries.filter(entry => entry.action === "overwrite").map(entry => entry.path);
}

/**
 * Compare a plugin's declared file list with what its generator actually planned.
 *
 * @returns `undeclared` (planned but not declared) and `missing` (declared but not planned).
 */
export function crossCheckDeclaredFiles(
  metadata: PluginMetadata,
  plan: InstallPlan
): { readonly undeclared: readonly string[]; readonly missing: readonly string[] } {
  const declared = new Set(metadata.filesGenerated.map(file => toPortable(path.normalize(file))));
  const planned = new Set(plan.entries.map(entry => entry.relativePath));
  return {
    undeclared: [...planned].filter(file => !declared.has(file)),
    missing: [...declared].filter(file => !planned.has(file))
  };
}
