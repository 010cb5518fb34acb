import { describe, expect, it } from "vitest";
import { newInstance } from "../instance.js";
import { remap } from "../remap.js";
import { UrlRemapRequest } from "../url-request.js";

const decode = (bytes: Uint8Array): string => new TextDecoder().decode(bytes);
const encode = (text: string): Uint8Array => new TextEncoder().encode(text);

describe("UrlRemapRequest", () => {
  it("reads the hostname", () => {
    const request = new UrlRemapRequest("http://www.example/hello/world");
    expect(decode(request.getHost())).toBe("www.example");
  });

  it("reads the path without its leading slash", () => {
    const request = new UrlRemapRequest("http://www.example/hello/world");
    expect(decode(request.getPath())).toBe("hello/world");
  });

  it("reads an empty path for the root", () => {
    const request = new UrlRemapRequest("http://www.example/");
    expect(request.getPath()).toHaveLength(0);
  });

  it("excludes the query string from the path", () => {
    const request = new UrlRemapRequest("http://www.example/hello/world?x=1");
    expect(decode(request.getPath())).toBe("hello/world");
  });

  it("wraps an existing URL without copying it", () => {
    const url = new URL("http://www.example/");
    const request = new UrlRemapRequest(url);

    expect(request.setHost(encode("abc.cdn.test"))).toBe(true);
    expect(url.hostname).toBe("abc.cdn.test");
  });

  it("keeps port, path and query when the host changes", () => {
    const request = new UrlRemapRequest("http://www.example:8080/a/b?c=d");

    request.setHost(encode("abc.cdn.test"));

    expect(request.toString()).toBe("http://abc.cdn.test:8080/a/b?c=d");
  });

  it("accepts mixed case by lowercasing", () => {
    const request = new UrlRemapRequest("http://www.example/");

    expect(request.setHost(encode("ABC.Cdn.Test"))).toBe(true);
    expect(request.url.hostname).toBe("abc.cdn.test");
  });

  it("refuses a host the URL would truncate", () => {
    const request = new UrlRemapRequest("http://www.example/");

    expect(request.setHost(encode("abc/def"))).toBe(false);
    expect(request.url.hostname).toBe("www.example");
  });

  it("refuses a host the URL would ignore", () => {
    const request = new UrlRemapRequest("http://www.example/");

    expect(request.setHost(encode("abc:80"))).toBe(false);
    expect(request.url.hostname).toBe("www.example");
  });

  it("refuses an empty host", () => {
    const request = new UrlRemapRequest("http://www.example/");
    expect(request.setHost(new Uint8Array(0))).toBe(false);
  });

  it("refuses bytes that are not UTF-8", () => {
    const request = new UrlRemapRequest("http://www.example/");

    expect(request.setHost(Uint8Array.of(0xff, 0xfe))).toBe(false);
    expect(request.url.hostname).toBe("www.example");
  });
});

describe("remap over a URL", () => {
  it("rewrites the documented example", () => {
    const request = new UrlRemapRequest("http://www.example/");

    const result = remap(newInstance("tlmc.isp.example"), request);

    expect(result.status).toBe("did_remap");
    expect(request.toString()).toBe("http://24d4dc434ba8a1da.tlmc.isp.example/");
  });

  it("hashes host and path as one stream", () => {
    const request = new UrlRemapRequest("http://www.example/hello/world");

    remap(newInstance("tlmc.isp.example"), request);

    expect(request.toString()).toBe("http://627da9c298545b23.tlmc.isp.example/hello/world");
  });

  it("hashes the percent-encoded path", () => {
    const request = new UrlRemapRequest("http://www.example/hello world");

    remap(newInstance("cdn.test"), request);

    expect(request.url.hostname).toBe("7b5017ff5d91d0db.cdn.test");
  });

  it("routes the same resource to the same node regardless of query", () => {
    const plain = new UrlRemapRequest("http://images.example/a/b.png");
    const withQuery = new UrlRemapRequest("http://images.example/a/b.png?w=200");
    const instance = newInstance("cdn.test");

    remap(instance, plain);
    remap(instance, withQuery);

    expect(plain.url.hostname).toBe("8d7c801f659d2dac.cdn.test");
    expect(withQuery.url.hostname).toBe("8d7c801f659d2dac.cdn.test");
  });
});
