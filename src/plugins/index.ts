import { PluginCandidate } from "../types.js";
import { deployVpsPlugin } from "./deploy-vps.js";
import { referralPlugin } from "./referral.js";

/**
 * Plugins shipped with the CLI, in registration order.
 *
 * New plugins are added here; nothing is discovered from disk at runtime.
 */
export const BUILTIN_PLUGINS: readonly PluginCandidate[] = [referralPlugin, deployVpsPlugin];
