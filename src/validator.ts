// CHANGE: Structural validation of plugin definitions.
// WHY: Only definitions passing every check may enter the registry; authors need all violations at once.

import {
  EmptyFileListError,
  InstallerNotCallableError,
  InvalidMetadataFieldError,
  InvalidNameError,
  InvalidVersionError,
  MetadataViolationError,
  MissingDescriptionError,
  MissingPostInstallNotesError,
  PluginValidationError
} from "./errors.js";
import { ContentGenerator, PluginCandidate, PluginMetadata } from "./types.js";

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const VERSION_COMPONENT_PATTERN = /^\d+$/;

export type ValidationResult =
  | { readonly ok: true; readonly metadata: PluginMetadata }
  | { readonly ok: false; readonly violations: readonly MetadataViolationError[] };

export function isBareIdentifier(value: unknown): value is string {
  return typeof value === "string" && IDENTIFIER_PATTERN.test(value);
}

/**
 * Check a version string is exactly three dot-separated non-negative integers.
 */
export function isSemanticVersion(value: unknown): value is string {
  if (typeof value !== "string") {
    return false;
  }
  const components = value.split(".");
  return components.length === 3 && components.every(component => VERSION_COMPONENT_PATTERN.test(component));
}

function isNonBlank(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isContentGenerator(value: unknown): value is ContentGenerator {
  return typeof value === "function";
}

function isStringList(value: unknown): value is readonly string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

/**
 * Validate a plugin definition without short-circuiting.
 *
 * Checks run in a fixed order: name, description, version, content generator,
 * post-install notes, declared files, then the optional `dependencies` and
 * `configRequired` field shapes.
 *
 * @param candidate - Unchecked plugin definition.
 * @returns The narrowed metadata, or every violation found.
 */
export function validateMetadata(candidate: PluginCandidate): ValidationResult {
  const violations: MetadataViolationError[] = [];
  const { name, description, version, contentGenerator, postInstallNotes, filesGenerated, dependencies, configRequired } =
    candidate;
  const label = typeof name === "string" && name.length > 0 ? name : undefined;

  if (!isBareIdentifier(name)) {
    violations.push(new InvalidNameError(name));
  }
  if (!isNonBlank(description)) {
    violations.push(new MissingDescriptionError(label));
  }
  if (!isSemanticVersion(version)) {
    violations.push(new InvalidVersionError(version, label));
  }
  if (!isContentGenerator(contentGenerator)) {
    violations.push(new InstallerNotCallableError(label));
  }
  if (!isNonBlank(postInstallNotes)) {
    violations.push(new MissingPostInstallNotesError(label));
  }
  if (!isStringList(filesGenerated) || filesGenerated.length === 0) {
    violations.push(new EmptyFileListError(label));
  }
  if (dependencies !== undefined && !isStringList(dependencies)) {
    violations.push(new InvalidMetadataFieldError("dependencies", "a list of plugin names", label));
  }
  if (configRequired !== undefined && typeof configRequired !== "boolean") {
    violations.push(new InvalidMetadataFieldError("configRequired", "a boolean", label));
  }

  if (
    violations.length > 0 ||
    !isBareIdentifier(name) ||
    !isNonBlank(description) ||
    !isSemanticVersion(version) ||
    !isContentGenerator(contentGenerator) ||
    !isNonBlank(postInstallNotes) ||
    !isStringList(filesGenerated)
  ) {
    return { ok: false, violations };
  }

  return {
    ok: true,
    metadata: Object.freeze({
      name,
      description,
      version,
      dependencies: Object.freeze([...(isStringList(dependencies) ? dependencies : [])]),
      filesGenerated: Object.freeze([...filesGenerated]),
      configRequired: configRequired === true,
      postInstallNotes,
      contentGenerator
    })
  };
}

/**
 * Validate a definition and return its metadata, throwing on any violation.
 *
 * @throws PluginValidationError carrying every violation.
 */
export function assertValidMetadata(candidate: PluginCandidate): PluginMetadata {
  const result = validateMetadata(candidate);
  if (!result.ok) {
    throw new PluginValidationError(describeCandidate(candidate), result.violations);
  }
  return result.metadata;
}

/**
 * Best-effort label for a definition that may have no usable name.
 */
export function describeCandidate(candidate: PluginCandidate): string {
  return typeof candidate.name === "string" && candidate.name.length > 0 ? candidate.name : "<unnamed>";
}
