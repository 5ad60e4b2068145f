// CHANGE: Centralise CLI configuration with environment overrides.
// WHY: The default plugin directory differs between project layouts.

import * as dotenv from "dotenv";

dotenv.config();

/**
 * Install-time settings.
 *
 * Invariant: `DEFAULT_DIR` is resolved against the working directory by the CLI.
 */
export const INSTALL = {
  DEFAULT_DIR: process.env.KITFORGE_PLUGIN_DIR ?? "app",
  ENCODING: "utf8"
} as const;

/**
 * Program identity reported by `--version` and help output.
 */
export const CLI = {
  NAME: "kitforge",
  DESCRIPTION: "Project generator plugin installer",
  VERSION: "1.0.0"
} as const;
