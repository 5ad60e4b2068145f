import fs from "fs-extra";
import path from "path";
import { fileURLToPath } from "url";
import { INSTALL } from "../config.js";

// Resolves to <package>/templates from both src/plugins and dist/plugins.
const TEMPLATE_ROOT = fileURLToPath(new URL("../../templates/", import.meta.url));

/**
 * Read a plugin's template text.
 *
 * @param plugin - Template directory name.
 * @param file - Output path relative to the plugin's template directory, `/`-separated.
 */
export function readTemplate(plugin: string, file: string): string {
  return fs.readFileSync(path.join(TEMPLATE_ROOT, plugin, ...file.split("/")) + ".tmpl", INSTALL.ENCODING);
}
