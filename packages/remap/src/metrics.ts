/**
 * OTel metrics for remap decisions.
 *
 * Lazily initialized: the counter is only created on first access.
 * When no meter provider is registered, it is a no-op instrument.
 */

import type { Counter } from "@opentelemetry/api";
import { metrics } from "@opentelemetry/api";
import type { RewriteResult } from "./types.js";

const METER_NAME = "hashroute";

let _remapRequests: Counter | undefined;

/**
 * Get the counter for remap decisions, one increment per request.
 */
export function getRemapRequests(): Counter {
  if (_remapRequests === undefined) {
    _remapRequests = metrics.getMeter(METER_NAME).createCounter("hashroute.remap.requests", {
      description: "Remap decisions by outcome",
    });
  }
  return _remapRequests;
}

/**
 * Record the outcome of one remap call.
 */
export function recordRemapOutcome(result: RewriteResult): void {
  if (result.status === "did_remap") {
    getRemapRequests().add(1, { outcome: result.status });
  } else {
    getRemapRequests().add(1, { outcome: result.status, code: result.error.code });
  }
}
