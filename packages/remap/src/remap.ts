import {
  getErrorMessage,
  RemapHostMutationRejectedError,
  RemapInvalidRequestStateError,
  type RemapRuntimeError,
  RemapScratchOverflowError,
} from "@hashroute/errors";
import { hashFnv64, hashFnv64Continue } from "@hashroute/fnv";
import { formatRemappedHost } from "./hostname.js";
import type { HashRemapInstance } from "./instance.js";
import { createConsoleLogger } from "./logger.js";
import { recordRemapOutcome } from "./metrics.js";
import type { FormattedHost, NoRemapResult, RemapLogger, RemapRequest, RewriteResult } from "./types.js";

const fallbackLogger = createConsoleLogger();
const decoder = new TextDecoder();

function noRemap(error: RemapRuntimeError, logger: RemapLogger): NoRemapResult {
  logger.warn(`no remap [${error.code}]: ${error.message}`);
  return { status: "no_remap", error };
}

/**
 * Rewrite the request host to `{fnv64(host ‖ path)}.{suffix}`.
 *
 * Validate → extract → hash → format → bounds check → apply, with no
 * retries. Any failure returns `no_remap` and leaves the request as it was;
 * the proxy then uses the rule's static destination.
 */
export function remap(
  instance: HashRemapInstance | null | undefined,
  request: RemapRequest | null | undefined,
): RewriteResult {
  const result = evaluate(instance, request);
  recordRemapOutcome(result);
  return result;
}

function evaluate(
  instance: HashRemapInstance | null | undefined,
  request: RemapRequest | null | undefined,
): RewriteResult {
  if (instance === null || instance === undefined) {
    return noRemap(new RemapInvalidRequestStateError("remap instance is missing"), fallbackLogger);
  }
  const logger = instance.logger;
  if (instance.isReleased) {
    return noRemap(new RemapInvalidRequestStateError("remap instance has been released"), logger);
  }
  if (request === null || request === undefined) {
    return noRemap(new RemapInvalidRequestStateError("request is missing"), logger);
  }

  let host: Uint8Array;
  let path: Uint8Array;
  try {
    host = request.getHost();
    path = request.getPath();
  } catch (error) {
    return noRemap(
      new RemapInvalidRequestStateError(`could not read request URL: ${getErrorMessage(error)}`, {
        cause: error,
      }),
      logger,
    );
  }

  // Host and path form one stream with no separator between them.
  const hash = hashFnv64Continue(path, hashFnv64(host));

  let formatted: FormattedHost;
  try {
    formatted = formatRemappedHost(hash, instance.suffix, instance.scratchCapacity);
  } catch (error) {
    if (error instanceof RemapScratchOverflowError) {
      return noRemap(error, logger);
    }
    throw error;
  }

  let accepted: boolean;
  try {
    accepted = request.setHost(formatted.bytes);
  } catch (error) {
    return noRemap(new RemapHostMutationRejectedError(formatted.host, { cause: error }), logger);
  }
  if (!accepted) {
    return noRemap(new RemapHostMutationRejectedError(formatted.host), logger);
  }

  if (instance.debug) {
    logger.debug(`host changed from [${decoder.decode(host)}] to [${formatted.host}]`);
  }

  return {
    status: "did_remap",
    host: formatted.host,
    hostBytes: formatted.bytes,
    length: formatted.length,
    hash,
  };
}
