import { RemapHostMutationRejectedError } from "@hashroute/errors";
import { MockRemapRequest } from "@hashroute/test-utils";
import { afterEach, describe, expect, it, vi } from "vitest";
import { newInstance } from "../instance.js";
import { getRemapRequests, recordRemapOutcome } from "../metrics.js";
import { remap } from "../remap.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("remap metrics", () => {
  describe("getRemapRequests", () => {
    it("returns a counter instrument", () => {
      const counter = getRemapRequests();
      expect(typeof counter.add).toBe("function");
    });

    it("returns same instance on subsequent calls (lazy singleton)", () => {
      expect(getRemapRequests()).toBe(getRemapRequests());
    });
  });

  describe("recordRemapOutcome", () => {
    it("does not throw without OTel provider (no-op)", () => {
      expect(() =>
        recordRemapOutcome({
          status: "no_remap",
          error: new RemapHostMutationRejectedError("x.cdn.test"),
        }),
      ).not.toThrow();
    });

    it("tags failures with their error code", () => {
      const add = vi.spyOn(getRemapRequests(), "add");

      recordRemapOutcome({ status: "no_remap", error: new RemapHostMutationRejectedError("x") });

      expect(add).toHaveBeenCalledWith(1, {
        outcome: "no_remap",
        code: "REMAP_HOST_MUTATION_REJECTED",
      });
    });
  });

  it("counts every remap call once", () => {
    const add = vi.spyOn(getRemapRequests(), "add");
    const instance = newInstance({ suffix: "cdn.test", logger: { debug: vi.fn(), warn: vi.fn() } });

    remap(instance, new MockRemapRequest({ host: "www.example" }));
    remap(instance, null);

    expect(add).toHaveBeenCalledTimes(2);
    expect(add).toHaveBeenNthCalledWith(1, 1, { outcome: "did_remap" });
    expect(add).toHaveBeenNthCalledWith(2, 1, {
      outcome: "no_remap",
      code: "REMAP_INVALID_REQUEST_STATE",
    });
  });
});
