/**
 * @hashroute/remap
 *
 * Deterministic, content-addressed host rewriting for a reverse proxy:
 * the same host and path always map to `{fnv64}.{suffix}`.
 */

export { type CliCommand, type CliIo, parseArgs, runCli } from "./cli.js";
export { validateRemapOptions } from "./config.js";
export { HOST_SEPARATOR, MAX_HASH_HEX_DIGITS } from "./constants.js";
export { formatRemappedHost } from "./hostname.js";
export { deleteInstance, HashRemapInstance, newInstance, withRemapInstance } from "./instance.js";
export { createConsoleLogger, gateDebug, LOG_TAG } from "./logger.js";
export { getRemapRequests, recordRemapOutcome } from "./metrics.js";
export { HashRemapPlugin, type HashRemapPluginOptions, PLUGIN_NAME } from "./plugin.js";
export { remap } from "./remap.js";
export type {
  DidRemapResult,
  FormattedHost,
  HashRemapOptions,
  NoRemapResult,
  RemapLogger,
  RemapRequest,
  RemapStatus,
  RewriteResult,
} from "./types.js";
export { UrlRemapRequest } from "./url-request.js";

export const PACKAGE_NAME = "@hashroute/remap" as const;
