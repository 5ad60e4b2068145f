// CHANGE: Plain-text rendering of plans, plugin listings and written-file trees.
// WHY: The CLI prints these; tests assert them without terminal colour codes.

import path from "path";
import { planTotals } from "./planner.js";
import { ApplyOutcome, InstallPlan, PluginMetadata } from "./types.js";

export const DRY_RUN_FOOTER = "Dry run: no files were created.";

/**
 * Path shown to the user: relative to `baseDir` with `/` separators.
 */
export function displayPath(filePath: string, baseDir: string): string {
  const relative = path.relative(baseDir, filePath);
  return (relative.length > 0 ? relative : ".").split(path.sep).join("/");
}

/**
 * One row per planned file: action, size in bytes and path, in plan order.
 */
export function planRows(plan: InstallPlan, baseDir: string): string[] {
  const width = Math.max(1, ...plan.entries.map(entry => String(entry.sizeBytes).length));
  return plan.entries.map(
    entry => `${entry.action.padEnd(10)}${String(entry.sizeBytes).padStart(width)} bytes  ${displayPath(entry.path, baseDir)}`
  );
}

export function planSummary(plan: InstallPlan): string {
  const totals = planTotals(plan);
  return `${totals.files} file(s), ${totals.bytes} bytes total (${totals.creates} to create, ${totals.overwrites} to overwrite)`;
}

/**
 * Full dry-run report: rows, summary, post-install notes and the no-write statement.
 *
 * @param plan - Plan to describe.
 * @param baseDir - Directory paths are shown relative to.
 */
export function renderPreview(plan: InstallPlan, baseDir: string): string[] {
  return [
    `Plugin ${plan.plugin}@${plan.version} would write into ${displayPath(plan.targetDir, baseDir)}:`,
    ...planRows(plan, baseDir).map(row => `  ${row}`),
    "",
    planSummary(plan),
    "",
    "Post-install notes:",
    ...plan.postInstallNotes.trim().split("\n"),
    "",
    DRY_RUN_FOOTER
  ];
}

/**
 * Rows for `console.table` in `--list` output.
 */
export function pluginListRows(plugins: readonly PluginMetadata[]): Array<Record<string, string>> {
  return plugins.map(plugin => ({
    Plugin: plugin.name,
    Version: plugin.version,
    Description: plugin.description,
    Dependencies: plugin.dependencies.length > 0 ? plugin.dependencies.join(", ") : "None",
    Config: plugin.configRequired ? "required" : "none"
  }));
}

/**
 * Deepest directory containing every given absolute path.
 */
export function commonDirectory(paths: readonly string[]): string {
  if (paths.length === 0) {
    return path.sep;
  }
  const split = paths.map(filePath => path.dirname(filePath).split(path.sep));
  const first = split[0] ?? [];
  let length = first.length;
  for (const segments of split.slice(1)) {
    let shared = 0;
    while (shared < length && shared < segments.length && segments[shared] === first[shared]) {
      shared += 1;
    }
    length = shared;
  }
  const joined = first.slice(0, length).join(path.sep);
  return joined.length > 0 ? joined : path.sep;
}

interface TreeNode {
  readonly children: Map<string, TreeNode>;
}

function renderNode(node: TreeNode, prefix: string, lines: string[]): void {
  const entries = [...node.children.entries()].sort(([leftName, left], [rightName, right]) => {
    const leftIsDir = left.children.size > 0;
    const rightIsDir = right.children.size > 0;
    if (leftIsDir !== rightIsDir) {
      return leftIsDir ? -1 : 1;
    }
    return leftName < rightName ? -1 : leftName > rightName ? 1 : 0;
  });
  entries.forEach(([name, child], index) => {
    const last = index === entries.length - 1;
    const isDir = child.children.size > 0;
    lines.push(`${prefix}${last ? "└── " : "├── "}${name}${isDir ? "/" : ""}`);
    if (isDir) {
      renderNode(child, `${prefix}${last ? "    " : "│   "}`, lines);
    }
  });
}

/**
 * Directory tree of written files, rooted at their deepest common directory.
 * Directories are listed before files; both sorted by name.
 *
 * @param writtenPaths - Absolute file paths.
 */
export function renderTree(writtenPaths: readonly string[]): string[] {
  if (writtenPaths.length === 0) {
    return [];
  }
  const rootDir = commonDirectory(writtenPaths);
  const root: TreeNode = { children: new Map() };
  for (const filePath of writtenPaths) {
    let node = root;
    for (const segment of path.relative(rootDir, filePath).split(path.sep)) {
      let child = node.children.get(segment);
      if (!child) {
        child = { children: new Map() };
        node.children.set(segment, child);
      }
      node = child;
    }
  }
  const lines = [`${path.basename(rootDir) || rootDir}/`];
  renderNode(root, "", lines);
  return lines;
}

/**
 * Post-install report lines: per-file confirmations, tree and summary fields.
 *
 * @param outcome - Result of a real install.
 * @param metadata - Installed plugin.
 * @param baseDir - Directory paths are shown relative to.
 */
export function renderApplySummary(outcome: ApplyOutcome, metadata: PluginMetadata, baseDir: string): string[] {
  const location = displayPath(commonDirectory(outcome.writtenPaths), baseDir);
  return [
    ...outcome.writtenPaths.map(filePath => `  ✓ Created: ${displayPath(filePath, baseDir)}`),
    "",
    ...renderTree(outcome.writtenPaths),
    "",
    `Plugin:        ${metadata.name}`,
    `Version:       ${metadata.version}`,
    `Location:      ${location}`,
    `Files Created: ${outcome.writtenPaths.length}`,
    `Dependencies:  ${metadata.dependencies.length > 0 ? metadata.dependencies.join(", ") : "None"}`
  ];
}
