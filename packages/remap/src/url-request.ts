import { domainToASCII } from "node:url";
import type { RemapRequest } from "./types.js";

const encoder = new TextEncoder();
const strictDecoder = new TextDecoder("utf-8", { fatal: true });

// Each of these ends the host component; the URL would keep only what precedes it.
const HOST_DELIMITERS = /[:/\\?#]/;

function decodeHost(bytes: Uint8Array): string | undefined {
  try {
    return strictDecoder.decode(bytes);
  } catch {
    // Not UTF-8: the URL cannot hold it, which the caller reports as a refusal.
    return undefined;
  }
}

/**
 * RemapRequest over a WHATWG URL.
 *
 * The path is exposed without its leading "/", the way the proxy's path
 * accessor returns it, so `http://www.example/hello/world` hashes as
 * `www.examplehello/world`.
 */
export class UrlRemapRequest implements RemapRequest {
  readonly url: URL;

  constructor(url: URL | string) {
    this.url = typeof url === "string" ? new URL(url) : url;
  }

  getHost(): Uint8Array {
    return encoder.encode(this.url.hostname);
  }

  getPath(): Uint8Array {
    const pathname = this.url.pathname;
    return encoder.encode(pathname.startsWith("/") ? pathname.slice(1) : pathname);
  }

  /**
   * The URL silently ignores or truncates hosts it cannot parse; either
   * case is reported as a refusal with the original host restored.
   */
  setHost(host: Uint8Array): boolean {
    const candidate = decodeHost(host);
    if (candidate === undefined || candidate.length === 0) return false;
    if (HOST_DELIMITERS.test(candidate)) return false;

    const expected = domainToASCII(candidate);
    if (expected.length === 0) return false;

    const before = this.url.hostname;
    this.url.hostname = candidate;
    if (this.url.hostname !== expected) {
      this.url.hostname = before;
      return false;
    }
    return true;
  }

  toString(): string {
    return this.url.href;
  }
}
