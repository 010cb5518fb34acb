import { RemapConfigurationError } from "@hashroute/errors";
import { deleteInstance, type HashRemapInstance, newInstance } from "./instance.js";
import { createConsoleLogger, gateDebug } from "./logger.js";
import { remap } from "./remap.js";
import type { RemapLogger, RemapRequest, RewriteResult } from "./types.js";

export const PLUGIN_NAME = "hash_remap";

export interface HashRemapPluginOptions {
  readonly debug?: boolean;
  readonly logger?: RemapLogger;
}

/**
 * Remap-plugin lifecycle as the proxy drives it: one `init`, one
 * `newInstance` per rule that references the plugin, `doRemap` per
 * matching request, `deleteInstance` when the rule goes away.
 *
 * Rule arguments are `[fromUrl, toUrl, suffix, ...]`.
 */
export class HashRemapPlugin {
  private readonly debug: boolean;
  private readonly rawLogger: RemapLogger;
  private readonly logger: RemapLogger;
  private initialized = false;

  constructor(options?: HashRemapPluginOptions) {
    this.debug = options?.debug ?? false;
    this.rawLogger = options?.logger ?? createConsoleLogger();
    this.logger = gateDebug(this.rawLogger, this.debug);
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  init(): void {
    if (this.initialized) return;
    this.initialized = true;
    this.logger.debug("remap plugin initialized");
  }

  /**
   * @throws RemapConfigurationError when the suffix argument is missing or empty
   */
  newInstance(args: readonly string[]): HashRemapInstance {
    const [fromUrl, toUrl, suffix] = args;
    if (suffix === undefined) {
      throw new RemapConfigurationError(`Missing parameters for ${PLUGIN_NAME}`);
    }

    this.logger.debug(`new instance fromURL: ${fromUrl} toURL: ${toUrl}`);
    return newInstance({ suffix, debug: this.debug, logger: this.rawLogger });
  }

  deleteInstance(instance: HashRemapInstance | null | undefined): void {
    deleteInstance(instance);
  }

  doRemap(
    instance: HashRemapInstance | null | undefined,
    request: RemapRequest | null | undefined,
  ): RewriteResult {
    return remap(instance, request);
  }
}
