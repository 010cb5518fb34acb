import { describe, expect, it } from "vitest";
import {
  HashRemapPlugin,
  newInstance,
  PACKAGE_NAME,
  PLUGIN_NAME,
  remap,
  UrlRemapRequest,
} from "../index.js";

describe("@hashroute/remap", () => {
  it("should export package name", () => {
    expect(PACKAGE_NAME).toBe("@hashroute/remap");
  });

  it("should export the plugin facade", () => {
    expect(PLUGIN_NAME).toBe("hash_remap");
    expect(new HashRemapPlugin().isInitialized).toBe(false);
  });

  it("rewrites a URL end to end", () => {
    const instance = newInstance({
      suffix: "tlmc.isp.example",
      logger: { debug: () => undefined, warn: () => undefined },
    });
    const request = new UrlRemapRequest("http://www.example/hello/world");

    const result = remap(instance, request);

    expect(result).toMatchObject({ status: "did_remap", hash: 0x627da9c298545b23n, length: 33 });
    expect(request.toString()).toBe("http://627da9c298545b23.tlmc.isp.example/hello/world");
  });
});
