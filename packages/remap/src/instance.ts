import { validateRemapOptions } from "./config.js";
import { HOST_SEPARATOR, MAX_HASH_HEX_DIGITS } from "./constants.js";
import { createConsoleLogger, gateDebug } from "./logger.js";
import type { HashRemapOptions, RemapLogger } from "./types.js";

const encoder = new TextEncoder();

/**
 * Per-rule remap state. Read-only once constructed and safe to share
 * across concurrent requests; scratch space is allocated per call.
 */
export class HashRemapInstance {
  readonly suffix: string;
  /** UTF-8 byte length of the suffix */
  readonly suffixLength: number;
  /** Upper bound of the formatted host: hex digits + separator + suffix */
  readonly scratchCapacity: number;
  readonly debug: boolean;
  readonly logger: RemapLogger;

  private released = false;

  constructor(options: HashRemapOptions) {
    this.suffix = options.suffix;
    this.suffixLength = encoder.encode(options.suffix).length;
    this.scratchCapacity = MAX_HASH_HEX_DIGITS + HOST_SEPARATOR.length + this.suffixLength;
    this.debug = options.debug ?? false;
    this.logger = gateDebug(options.logger ?? createConsoleLogger(), this.debug);
  }

  get isReleased(): boolean {
    return this.released;
  }

  /** Mark released. Returns false if it already was. */
  release(): boolean {
    if (this.released) return false;
    this.released = true;
    return true;
  }
}

/**
 * Create the instance for one remap rule.
 *
 * @throws RemapConfigurationError when the suffix is missing, null, or empty
 */
export function newInstance(options: string | HashRemapOptions | null | undefined): HashRemapInstance {
  const instance = new HashRemapInstance(validateRemapOptions(options));
  instance.logger.debug(
    `created instance for suffix "${instance.suffix}" (scratch capacity ${instance.scratchCapacity})`,
  );
  return instance;
}

/**
 * Release a rule's instance. A null handle or a second release is a no-op.
 */
export function deleteInstance(instance: HashRemapInstance | null | undefined): void {
  if (instance === null || instance === undefined) return;
  if (instance.release()) {
    instance.logger.debug(`deleted instance for suffix "${instance.suffix}"`);
  }
}

/**
 * Run `fn` with an instance owned by this call; it is released afterwards,
 * even when `fn` throws.
 */
export function withRemapInstance<T>(
  options: string | HashRemapOptions,
  fn: (instance: HashRemapInstance) => T,
): T {
  const instance = newInstance(options);
  try {
    return fn(instance);
  } finally {
    deleteInstance(instance);
  }
}
