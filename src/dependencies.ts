// CHANGE: Flat dependency gate run before any planning.
// WHY: A plugin must not be planned or written into a project lacking the modules it builds on.

import fs from "fs-extra";
import path from "path";
import { CLI } from "./config.js";
import { MissingDependencyError } from "./errors.js";
import { debug } from "./logger.js";
import { PluginMetadata } from "./types.js";

export type DependencyCheckResult = { readonly ok: true } | { readonly ok: false; readonly error: MissingDependencyError };

/**
 * Decides which dependency names are already present in a target directory.
 */
export interface PresenceProbe {
  satisfied(targetDir: string, names: readonly string[]): Promise<ReadonlySet<string>>;
}

/**
 * Treat a dependency as present when `<targetDir>/<name>` exists.
 */
export const directoryPresenceProbe: PresenceProbe = {
  async satisfied(targetDir, names) {
    const present = new Set<string>();
    for (const name of names) {
      const marker = path.join(targetDir, name);
      if (await fs.pathExists(marker)) {
        present.add(name);
      } else {
        debug(`Dependency marker absent: ${marker}`);
      }
    }
    return present;
  }
};

/**
 * Command that would add a missing dependency to the project.
 */
export function dependencyHint(name: string): string {
  return name === "user" ? `${CLI.NAME} adduser --auth-type email` : `${CLI.NAME} startmodule ${name}`;
}

/**
 * Check every declared dependency against the satisfied set.
 *
 * Non-transitive: dependencies of dependencies are not inspected.
 *
 * @returns `ok`, or an error naming all missing dependencies in declaration order.
 */
export function checkDependencies(metadata: PluginMetadata, satisfied: ReadonlySet<string>): DependencyCheckResult {
  const missing = metadata.dependencies.filter(name => !satisfied.has(name));
  if (missing.length === 0) {
    return { ok: true };
  }
  return {
    ok: false,
    error: new MissingDependencyError(metadata.name, missing, missing.map(dependencyHint))
  };
}
