import { RemapScratchOverflowError } from "@hashroute/errors";
import { formatFnv64 } from "@hashroute/fnv";
import { HOST_SEPARATOR } from "./constants.js";
import type { FormattedHost } from "./types.js";

const encoder = new TextEncoder();

/**
 * Format `{hex(hash)}.{suffix}` into a fresh zero-filled buffer of
 * `capacity` bytes.
 *
 * @throws RemapScratchOverflowError if the host does not fit; nothing
 *   truncated is ever returned
 */
export function formatRemappedHost(hash: bigint, suffix: string, capacity: number): FormattedHost {
  const host = `${formatFnv64(hash)}${HOST_SEPARATOR}${suffix}`;
  const scratch = new Uint8Array(capacity);
  const { read, written } = encoder.encodeInto(host, scratch);

  if (read < host.length) {
    throw new RemapScratchOverflowError(encoder.encode(host).length, capacity);
  }

  return { host, bytes: scratch.subarray(0, written), length: written };
}
