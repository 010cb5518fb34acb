/**
 * Core types for @hashroute/remap
 *
 * Rewrites a request's host to `{fnv64(host ‖ path)}.{suffix}` so that the
 * same resource always lands on the same downstream cache node.
 */

import type { RemapRuntimeError } from "@hashroute/errors";

// ---------------------------------------------------------------------------
// Request contract (implemented by the proxy)
// ---------------------------------------------------------------------------

/**
 * Accessors the proxy exposes for one in-flight request.
 * Host and path are raw bytes; either may be empty.
 */
export interface RemapRequest {
  getHost(): Uint8Array;
  /** Path without its leading "/" */
  getPath(): Uint8Array;
  /** Overwrite the host. Returns false, leaving the request untouched, on refusal. */
  setHost(host: Uint8Array): boolean;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export interface RemapLogger {
  debug(message: string): void;
  warn(message: string): void;
}

/** Per-rule configuration */
export interface HashRemapOptions {
  /** Routing-domain suffix appended after the hash, e.g. "tlmc.isp.example" */
  readonly suffix: string;
  /** Emit debug lines for lifecycle and host changes (default: false) */
  readonly debug?: boolean;
  /** Log sink (default: console, tagged "[hash-remap]") */
  readonly logger?: RemapLogger;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export type RemapStatus = "did_remap" | "no_remap";

export interface DidRemapResult {
  readonly status: "did_remap";
  /** The new hostname, `{hex}.{suffix}` */
  readonly host: string;
  /** UTF-8 bytes handed to `setHost` */
  readonly hostBytes: Uint8Array;
  readonly length: number;
  readonly hash: bigint;
}

/** The proxy falls back to the rule's static destination host */
export interface NoRemapResult {
  readonly status: "no_remap";
  readonly error: RemapRuntimeError;
}

export type RewriteResult = DidRemapResult | NoRemapResult;

export interface FormattedHost {
  readonly host: string;
  readonly bytes: Uint8Array;
  readonly length: number;
}
