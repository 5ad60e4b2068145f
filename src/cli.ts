// CHANGE: Expose the install engine through the `addplugin` command.
// WHY: Every failure must end as a non-zero exit code and a readable stderr line, never a raw crash.

import chalk from "chalk";
import { Command, CommanderError } from "commander";
import path from "path";
import { CLI, INSTALL } from "./config.js";
import { MissingDependencyError, PluginNotFoundError, isPluginEngineError } from "./errors.js";
import { Installer } from "./installer.js";
import { debug, error as logError, info, setLogLevel, warn } from "./logger.js";
import { displayPath, pluginListRows, renderApplySummary, renderPreview } from "./preview.js";
import { initializeRegistry, PluginCatalog } from "./registry.js";

export interface AddPluginCliOptions {
  readonly list?: boolean;
  readonly dryRun?: boolean;
  readonly force?: boolean;
  readonly verbose?: boolean;
  readonly dir: string;
}

/**
 * Collaborators the command runs against.
 *
 * @property catalog - Plugin catalog; built from the built-in plugins when omitted.
 * @property cwd - Directory `--dir` and displayed paths are relative to.
 */
export interface CliContext {
  readonly catalog?: PluginCatalog;
  readonly cwd?: string;
}

/**
 * Print every registered plugin.
 */
export function listAction(catalog: PluginCatalog): void {
  const plugins = catalog.list();
  if (plugins.length === 0) {
    warn("No plugins available.");
    return;
  }
  info(`Available plugins (${plugins.length}):`);
  console.table(pluginListRows(plugins));
  console.log(chalk.dim(`Usage: ${CLI.NAME} addplugin <plugin_name> [--dry-run] [--force] [--dir <path>]`));
}

/**
 * `addplugin` entry point: list, preview or install.
 *
 * @param catalog - Registered plugins.
 * @param name - Plugin to install; listing is shown when absent.
 * @param options - Parsed command options.
 * @param cwd - Base for `--dir` and displayed paths.
 */
export async function addPluginAction(
  catalog: PluginCatalog,
  name: string | undefined,
  options: AddPluginCliOptions,
  cwd: string
): Promise<void> {
  if (options.verbose) {
    setLogLevel("debug");
  }
  if (options.list || name === undefined) {
    listAction(catalog);
    return;
  }

  const targetDir = path.resolve(cwd, options.dir);
  info(`Adding plugin ${name} into ${displayPath(targetDir, cwd)}${options.dryRun ? " (dry run)" : ""}`);

  const installer = new Installer(catalog);
  const outcome = await installer.install(name, targetDir, {
    dryRun: options.dryRun === true,
    force: options.force === true
  });

  if (outcome.mode === "preview") {
    for (const line of renderPreview(outcome.plan, cwd)) {
      console.log(line);
    }
    return;
  }

  const metadata = catalog.get(name);
  for (const line of renderApplySummary(outcome, metadata, cwd)) {
    console.log(line);
  }
  console.log("");
  if (metadata.configRequired) {
    warn(`Plugin ${metadata.name} needs additional configuration before use.`);
  }
  console.log(chalk.green.bold("Next steps:"));
  console.log(outcome.postInstallNotes.trim());
  console.log("");
  console.log(chalk.green(`Plugin '${metadata.name}' added successfully.`));
}

/**
 * Report a failed command on stderr.
 */
export function reportFailure(failure: unknown, catalog: PluginCatalog): void {
  if (!isPluginEngineError(failure)) {
    logError(`Error: ${failure instanceof Error ? failure.message : String(failure)}`);
    return;
  }
  logError(`${failure.kind}: ${failure.message}`);
  if (failure instanceof PluginNotFoundError) {
    listAction(catalog);
  } else if (failure instanceof MissingDependencyError) {
    failure.missing.forEach((dependency, index) => {
      warn(`Tip: add the ${dependency} module first: ${failure.hints[index] ?? ""}`);
    });
  }
  if (failure.cause instanceof Error) {
    debug(`Caused by: ${failure.cause.stack ?? failure.cause.message}`);
  }
}

/**
 * Construct commander program with configured commands.
 *
 * @param catalog - Plugins available to `addplugin`.
 * @param cwd - Base directory for relative paths.
 * @returns Ready-to-use commander instance.
 */
export function buildProgram(catalog: PluginCatalog, cwd: string = process.cwd()): Command {
  const program = new Command();
  program
    .name(CLI.NAME)
    .description(CLI.DESCRIPTION)
    .version(CLI.VERSION)
    .exitOverride()
    .configureOutput({
      outputError: (str: string) => logError(str.trim())
    });

  program
    .command("addplugin")
    .description("Add a pre-built plugin module to your project")
    .argument("[name]", "plugin to add (e.g. referral)")
    .option("-l, --list", "list available plugins")
    .option("--dry-run", "preview the files without writing anything")
    .option("-f, --force", "overwrite existing files")
    .option("-d, --dir <path>", "directory the plugin is installed into", INSTALL.DEFAULT_DIR)
    .option("-v, --verbose", "enable debug logging")
    .action(async (name: string | undefined, options: AddPluginCliOptions) => addPluginAction(catalog, name, options, cwd));

  return program;
}

/**
 * Execute CLI with provided argv array.
 *
 * @param argv - Process arguments.
 * @param context - Catalog and working directory overrides.
 * @returns Process exit code.
 */
export async function runCli(argv: readonly string[], context: CliContext = {}): Promise<number> {
  const catalog = context.catalog ?? initializeRegistry();
  const program = buildProgram(catalog, context.cwd ?? process.cwd());
  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (failure) {
    if (failure instanceof CommanderError) {
      return failure.exitCode;
    }
    reportFailure(failure, catalog);
    return 1;
  }
}
