// CHANGE: Error taxonomy for validation, registration, lookup and install failures.
// WHY: The command layer maps every failure to an exit code and a `<kind>: <message>` line.

export type ErrorKind =
  | "InvalidNameError"
  | "MissingDescriptionError"
  | "InvalidVersionError"
  | "InstallerNotCallableError"
  | "MissingPostInstallNotesError"
  | "EmptyFileListError"
  | "InvalidMetadataFieldError"
  | "PluginValidationError"
  | "DuplicatePluginError"
  | "RegistryFrozenError"
  | "PluginNotFoundError"
  | "TargetDirectoryNotFoundError"
  | "MissingDependencyError"
  | "FileConflictError"
  | "PartialWriteError";

/**
 * Base class of every error raised by the engine.
 */
export abstract class PluginEngineError extends Error {
  abstract readonly kind: ErrorKind;
}

/**
 * A single structural problem found in a plugin definition.
 *
 * @property plugin - Offending plugin name, when it is a string.
 */
export abstract class MetadataViolationError extends PluginEngineError {
  constructor(
    message: string,
    readonly plugin?: string
  ) {
    super(message);
  }
}

export class InvalidNameError extends MetadataViolationError {
  readonly kind = "InvalidNameError";

  constructor(readonly value: unknown) {
    super(`Plugin name ${JSON.stringify(value) ?? String(value)} is not a bare identifier (letters, digits, underscore; not starting with a digit)`);
  }
}

export class MissingDescriptionError extends MetadataViolationError {
  readonly kind = "MissingDescriptionError";

  constructor(plugin?: string) {
    super("Plugin description must be a non-empty string", plugin);
  }
}

export class InvalidVersionError extends MetadataViolationError {
  readonly kind = "InvalidVersionError";

  constructor(
    readonly value: unknown,
    plugin?: string
  ) {
    super(`Plugin version ${JSON.stringify(value) ?? String(value)} must match MAJOR.MINOR.PATCH`, plugin);
  }
}

export class InstallerNotCallableError extends MetadataViolationError {
  readonly kind = "InstallerNotCallableError";

  constructor(plugin?: string) {
    super("Plugin contentGenerator must be a function", plugin);
  }
}

export class MissingPostInstallNotesError extends MetadataViolationError {
  readonly kind = "MissingPostInstallNotesError";

  constructor(plugin?: string) {
    super("Plugin postInstallNotes must be a non-empty string", plugin);
  }
}

export class EmptyFileListError extends MetadataViolationError {
  readonly kind = "EmptyFileListError";

  constructor(plugin?: string) {
    super("Plugin filesGenerated must be a non-empty list of paths", plugin);
  }
}

export class InvalidMetadataFieldError extends MetadataViolationError {
  readonly kind = "InvalidMetadataFieldError";

  constructor(
    readonly field: string,
    expectation: string,
    plugin?: string
  ) {
    super(`Plugin ${field} must be ${expectation}`, plugin);
  }
}

/**
 * Registration rejected a candidate; carries every violation found.
 */
export class PluginValidationError extends PluginEngineError {
  readonly kind = "PluginValidationError";

  constructor(
    readonly plugin: string,
    readonly violations: readonly MetadataViolationError[]
  ) {
    super(
      `Plugin "${plugin}" failed validation with ${violations.length} violation(s): ${violations
        .map(violation => `${violation.kind}: ${violation.message}`)
        .join("; ")}`
    );
  }
}

export class DuplicatePluginError extends PluginEngineError {
  readonly kind = "DuplicatePluginError";

  constructor(readonly plugin: string) {
    super(`Plugin "${plugin}" is already registered`);
  }
}

export class RegistryFrozenError extends PluginEngineError {
  readonly kind = "RegistryFrozenError";

  constructor(readonly plugin: string) {
    super(`Cannot register "${plugin}": the plugin registry is frozen`);
  }
}

/**
 * Lookup miss.
 *
 * @property knownNames - Every registered name, sorted.
 * @property suggestions - Known names close to the requested one.
 */
export class PluginNotFoundError extends PluginEngineError {
  readonly kind = "PluginNotFoundError";

  constructor(
    readonly plugin: string,
    readonly knownNames: readonly string[],
    readonly suggestions: readonly string[] = []
  ) {
    const hint = suggestions.length > 0 ? ` Did you mean ${suggestions.map(name => `"${name}"`).join(" or ")}?` : "";
    super(`Unknown plugin "${plugin}".${hint} Known plugins: ${knownNames.length > 0 ? knownNames.join(", ") : "none"}`);
  }
}

export class TargetDirectoryNotFoundError extends PluginEngineError {
  readonly kind = "TargetDirectoryNotFoundError";

  constructor(readonly targetDir: string) {
    super(`Target directory "${targetDir}" not found. Run the command from the project root or pass --dir.`);
  }
}

/**
 * @property missing - Every unsatisfied dependency, in declaration order.
 * @property hints - Commands that would provide each missing dependency.
 */
export class MissingDependencyError extends PluginEngineError {
  readonly kind = "MissingDependencyError";

  constructor(
    readonly plugin: string,
    readonly missing: readonly string[],
    readonly hints: readonly string[] = []
  ) {
    super(`Plugin "${plugin}" requires missing module(s): ${missing.join(", ")}`);
  }
}

export class FileConflictError extends PluginEngineError {
  readonly kind = "FileConflictError";

  constructor(
    readonly plugin: string,
    readonly conflicts: readonly string[]
  ) {
    super(
      `Plugin "${plugin}" would overwrite ${conflicts.length} existing file(s); use --force to overwrite:\n${conflicts
        .map(path => `  ${path}`)
        .join("\n")}`
    );
  }
}

/**
 * A write failed after earlier writes of the same install succeeded.
 *
 * @property written - Paths written before the failure, in order.
 * @property failedPath - Path whose write failed.
 */
export class PartialWriteError extends PluginEngineError {
  readonly kind = "PartialWriteError";

  constructor(
    readonly plugin: string,
    readonly written: readonly string[],
    readonly failedPath: string,
    options?: { readonly cause?: unknown }
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    const listing =
      written.length > 0 ? `\nFiles written before the failure:\n${written.map(path => `  ${path}`).join("\n")}` : "\nNo files were written.";
    super(`Plugin "${plugin}" failed writing ${failedPath}${reason}${listing}`, options);
  }
}

export function isPluginEngineError(value: unknown): value is PluginEngineError {
  return value instanceof PluginEngineError;
}
