#!/usr/bin/env node
// CHANGE: Delegate execution to the CLI runner.
// WHY: Importing the package must not parse process arguments.

import { pathToFileURL } from "url";
import { runCli } from "./cli.js";

const executedDirectly = process.argv[1]
  ? pathToFileURL(process.argv[1]).href === import.meta.url
  : false;

if (executedDirectly) {
  void runCli(process.argv).then(code => {
    process.exitCode = code;
  });
}

export { runCli };
export * from "./errors.js";
export { Installer, diskWriter } from "./installer.js";
export type { FileWriter, InstallerDependencies } from "./installer.js";
export { checkDependencies, directoryPresenceProbe } from "./dependencies.js";
export type { PresenceProbe } from "./dependencies.js";
export { conflictingPaths, crossCheckDeclaredFiles, planInstall, planTotals } from "./planner.js";
export { PluginRegistry, initializeRegistry } from "./registry.js";
export type { PluginCatalog } from "./registry.js";
export { assertValidMetadata, validateMetadata } from "./validator.js";
export type { ValidationResult } from "./validator.js";
export type * from "./types.js";
