import type { RemapRequest } from "@hashroute/remap";
import { type Mock, vi } from "vitest";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export interface MockRemapRequestInit {
  readonly host?: string;
  /** Path without its leading "/" */
  readonly path?: string;
  /** Make `setHost` refuse every write (default: false) */
  readonly rejectSetHost?: boolean;
}

/**
 * Mock RemapRequest for testing
 *
 * Holds host and path as strings and exposes the accessors as vitest spies.
 * A refused `setHost` leaves `host` untouched, like the proxy does.
 *
 * @example
 * ```typescript
 * import { MockRemapRequest } from '@hashroute/test-utils';
 *
 * const request = new MockRemapRequest({ host: 'www.example', path: 'hello/world' });
 * remap(instance, request);
 * expect(request.setHost).toHaveBeenCalledOnce();
 * expect(request.host).toBe('627da9c298545b23.tlmc.isp.example');
 * ```
 */
export class MockRemapRequest implements RemapRequest {
  host: string;
  path: string;
  rejectSetHost: boolean;

  readonly getHost: Mock<() => Uint8Array> = vi.fn(() => encoder.encode(this.host));

  readonly getPath: Mock<() => Uint8Array> = vi.fn(() => encoder.encode(this.path));

  readonly setHost: Mock<(host: Uint8Array) => boolean> = vi.fn((host: Uint8Array) => {
    if (this.rejectSetHost) return false;
    this.host = decoder.decode(host);
    return true;
  });

  constructor(init?: MockRemapRequestInit) {
    this.host = init?.host ?? "";
    this.path = init?.path ?? "";
    this.rejectSetHost = init?.rejectSetHost ?? false;
  }

  /**
   * Reset all spy function call history
   */
  reset(): void {
    this.getHost.mockClear();
    this.getPath.mockClear();
    this.setHost.mockClear();
  }
}
