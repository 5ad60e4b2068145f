// CHANGE: Define strongly typed domain models for the plugin install pipeline.
// WHY: Metadata, plans and outcomes cross every stage between lookup and write.

/**
 * One file produced by a plugin's content generator.
 *
 * @property path - Path relative to the target directory, or absolute.
 * @property content - Full file text.
 */
export interface GeneratedFile {
  readonly path: string;
  readonly content: string;
}

/**
 * Pure function computing a plugin's files for a target directory.
 *
 * Invariant: must not touch the filesystem beyond reading; called only at plan time.
 */
export type ContentGenerator = (targetDir: string) => readonly GeneratedFile[];

/**
 * Validated, immutable descriptor of an installable plugin.
 *
 * @property name - Bare identifier, unique within a registry.
 * @property version - `MAJOR.MINOR.PATCH`.
 * @property dependencies - Plugins or modules that must already be present in the target directory.
 * @property filesGenerated - Declared paths relative to the target directory; informational.
 * @property configRequired - Whether manual configuration follows installation.
 * @property postInstallNotes - Instructions displayed after a real install.
 * @property contentGenerator - Authoritative source of the files to write.
 */
export interface PluginMetadata {
  readonly name: string;
  readonly description: string;
  readonly version: string;
  readonly dependencies: readonly string[];
  readonly filesGenerated: readonly string[];
  readonly configRequired: boolean;
  readonly postInstallNotes: string;
  readonly contentGenerator: ContentGenerator;
}

/**
 * Plugin definition before validation. Every field is unchecked.
 */
export type PluginCandidate = {
  readonly [K in keyof PluginMetadata]?: unknown;
};

export type FileAction = "create" | "overwrite";

/**
 * Planned write of a single file.
 *
 * @property path - Absolute destination.
 * @property relativePath - Destination relative to the plan's target directory, `/`-separated.
 * @property sizeBytes - UTF-8 byte length of `content`.
 * @property existsAlready - Whether the destination existed when planned.
 */
export interface FilePlanEntry {
  readonly path: string;
  readonly relativePath: string;
  readonly content: string;
  readonly sizeBytes: number;
  readonly existsAlready: boolean;
  readonly action: FileAction;
}

/**
 * Ordered snapshot of the writes a real install would perform.
 *
 * Invariant: valid only at the instant it was computed.
 */
export interface InstallPlan {
  readonly plugin: string;
  readonly version: string;
  readonly postInstallNotes: string;
  readonly targetDir: string;
  readonly entries: readonly FilePlanEntry[];
}

export interface PlanTotals {
  readonly files: number;
  readonly bytes: number;
  readonly creates: number;
  readonly overwrites: number;
}

export interface InstallOptions {
  readonly force?: boolean;
  readonly dryRun?: boolean;
}

export interface PreviewOutcome {
  readonly mode: "preview";
  readonly plan: InstallPlan;
}

export interface ApplyOutcome {
  readonly mode: "apply";
  readonly plan: InstallPlan;
  readonly writtenPaths: readonly string[];
  readonly postInstallNotes: string;
}

export type InstallOutcome = PreviewOutcome | ApplyOutcome;
