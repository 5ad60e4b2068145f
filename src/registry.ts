// CHANGE: Name-keyed plugin table built once from the static plugin list, then frozen.
// WHY: The installer reads a fixed catalog; nothing may add or replace plugins mid-run.

import { DuplicatePluginError, PluginNotFoundError, PluginValidationError, RegistryFrozenError } from "./errors.js";
import { debug, error as logError, warn } from "./logger.js";
import { BUILTIN_PLUGINS } from "./plugins/index.js";
import { PluginCandidate, PluginMetadata } from "./types.js";
import { describeCandidate, validateMetadata } from "./validator.js";

/**
 * Read-only view of a populated registry.
 */
export interface PluginCatalog {
  readonly size: number;
  list(): readonly PluginMetadata[];
  get(name: string): PluginMetadata;
  has(name: string): boolean;
}

function normaliseForSuggestion(name: string): string {
  return name.toLowerCase().replace(/-/g, "_");
}

/**
 * Known names close enough to a failed lookup key to suggest.
 *
 * @param key - Requested name.
 * @param knownNames - Registered names.
 */
export function suggestNames(key: string, knownNames: readonly string[]): string[] {
  const wanted = normaliseForSuggestion(key);
  if (wanted.length === 0) {
    return [];
  }
  return knownNames.filter(name => {
    const candidate = normaliseForSuggestion(name);
    return candidate === wanted || candidate.startsWith(wanted) || wanted.startsWith(candidate);
  });
}

/**
 * Append-only table of validated plugins.
 */
export class PluginRegistry implements PluginCatalog {
  private readonly plugins = new Map<string, PluginMetadata>();
  private frozen = false;

  get size(): number {
    return this.plugins.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Validate and insert a plugin definition.
   *
   * @param candidate - Unchecked plugin definition.
   * @returns Stored metadata.
   * @throws PluginValidationError, DuplicatePluginError or RegistryFrozenError; nothing is inserted.
   */
  register(candidate: PluginCandidate): PluginMetadata {
    const label = describeCandidate(candidate);
    if (this.frozen) {
      throw new RegistryFrozenError(label);
    }
    const result = validateMetadata(candidate);
    if (!result.ok) {
      throw new PluginValidationError(label, result.violations);
    }
    const { metadata } = result;
    if (this.plugins.has(metadata.name)) {
      throw new DuplicatePluginError(metadata.name);
    }
    this.plugins.set(metadata.name, metadata);
    debug(`Registered plugin ${metadata.name}@${metadata.version}`);
    return metadata;
  }

  /**
   * All plugins sorted by name.
   */
  list(): readonly PluginMetadata[] {
    return [...this.plugins.values()].sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));
  }

  /**
   * Exact-match lookup.
   *
   * @throws PluginNotFoundError listing known names and close matches.
   */
  get(name: string): PluginMetadata {
    const metadata = this.plugins.get(name);
    if (!metadata) {
      const knownNames = this.list().map(plugin => plugin.name);
      throw new PluginNotFoundError(name, knownNames, suggestNames(name, knownNames));
    }
    return metadata;
  }

  has(name: string): boolean {
    return this.plugins.has(name);
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }
}

/**
 * Build the process-wide catalog from a fixed list of plugin definitions.
 *
 * A definition that fails registration is logged and skipped; the others still register.
 *
 * @param sources - Plugin definitions in registration order.
 * @returns Frozen registry.
 */
export function initializeRegistry(sources: readonly PluginCandidate[] = BUILTIN_PLUGINS): PluginCatalog {
  const registry = new PluginRegistry();
  for (const source of sources) {
    try {
      registry.register(source);
    } catch (error) {
      if (error instanceof PluginValidationError) {
        logError(`Skipping plugin "${error.plugin}": failed validation.`);
        for (const violation of error.violations) {
          logError(`  ${violation.kind}: ${violation.message}`);
        }
      } else if (error instanceof DuplicatePluginError) {
        logError(`Skipping plugin "${error.plugin}": ${error.message}`);
      } else {
        throw error;
      }
    }
  }
  debug(`Plugin registry initialised with ${registry.size}/${sources.length} plugins.`);
  if (registry.size < sources.length) {
    warn(`${sources.length - registry.size} plugin definition(s) were rejected during discovery.`);
  }
  return registry.freeze();
}
