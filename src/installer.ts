// CHANGE: Orchestrate lookup, target check, dependency gate, planning, then preview or apply.
// WHY: Dry runs and real installs share one code path up to the final write.

import fs from "fs-extra";
import path from "path";
import { INSTALL } from "./config.js";
import { checkDependencies, directoryPresenceProbe, PresenceProbe } from "./dependencies.js";
import { FileConflictError, PartialWriteError, TargetDirectoryNotFoundError } from "./errors.js";
import { debug, info } from "./logger.js";
import { conflictingPaths, crossCheckDeclaredFiles, planInstall } from "./planner.js";
import { PluginCatalog } from "./registry.js";
import { InstallOptions, InstallOutcome, InstallPlan } from "./types.js";

/**
 * Destination for planned file contents.
 */
export interface FileWriter {
  write(filePath: string, content: string): Promise<void>;
}

/**
 * Writes through fs-extra, creating parent directories as needed.
 */
export const diskWriter: FileWriter = {
  async write(filePath, content) {
    await fs.outputFile(filePath, content, INSTALL.ENCODING);
  }
};

export interface InstallerDependencies {
  readonly probe?: PresenceProbe;
  readonly writer?: FileWriter;
}

/**
 * Installs registered plugins into project directories.
 */
export class Installer {
  private readonly probe: PresenceProbe;
  private readonly writer: FileWriter;

  constructor(
    private readonly catalog: PluginCatalog,
    dependencies: InstallerDependencies = {}
  ) {
    this.probe = dependencies.probe ?? directoryPresenceProbe;
    this.writer = dependencies.writer ?? diskWriter;
  }

  /**
   * Install a plugin, or preview the install when `dryRun` is set.
   *
   * Preview never writes and never reports conflicts as failures. Apply refuses to
   * overwrite existing files unless `force` is set, and checks every conflict before
   * the first write.
   *
   * @param pluginName - Registered plugin name.
   * @param targetDir - Directory the plugin installs into.
   * @param options - `force` and `dryRun` switches.
   * @throws PluginNotFoundError, TargetDirectoryNotFoundError, MissingDependencyError,
   *   FileConflictError or PartialWriteError.
   */
  async install(pluginName: string, targetDir: string, options: InstallOptions = {}): Promise<InstallOutcome> {
    const metadata = this.catalog.get(pluginName);
    const root = path.resolve(targetDir);

    if (!(await fs.pathExists(root))) {
      throw new TargetDirectoryNotFoundError(root);
    }

    const satisfied = await this.probe.satisfied(root, metadata.dependencies);
    const dependencyCheck = checkDependencies(metadata, satisfied);
    if (!dependencyCheck.ok) {
      throw dependencyCheck.error;
    }

    const plan = await planInstall(metadata, root);
    const { undeclared, missing } = crossCheckDeclaredFiles(metadata, plan);
    if (undeclared.length > 0) {
      debug(`${metadata.name} generated undeclared file(s): ${undeclared.join(", ")}`);
    }
    if (missing.length > 0) {
      debug(`${metadata.name} declared file(s) it did not generate: ${missing.join(", ")}`);
    }

    if (options.dryRun) {
      debug(`Dry run for ${metadata.name}: ${plan.entries.length} file(s) planned, nothing written.`);
      return { mode: "preview", plan };
    }

    const writtenPaths = await this.apply(plan, options.force === true);
    return {
      mode: "apply",
      plan,
      writtenPaths,
      postInstallNotes: metadata.postInstallNotes
    };
  }

  private async apply(plan: InstallPlan, force: boolean): Promise<string[]> {
    const conflicts = conflictingPaths(plan);
    if (conflicts.length > 0) {
      if (!force) {
        throw new FileConflictError(plan.plugin, conflicts);
      }
      info(`Overwriting ${conflicts.length} existing file(s) for ${plan.plugin} (--force).`);
    }

    const written: string[] = [];
    for (const entry of plan.entries) {
      try {
        await this.writer.write(entry.path, entry.content);
      } catch (error) {
        throw new PartialWriteError(plan.plugin, [...written], entry.path, { cause: error });
      }
      written.push(entry.path);
      debug(`Wrote ${entry.path} (${entry.sizeBytes} bytes, ${entry.action})`);
    }
    return written;
  }
}
