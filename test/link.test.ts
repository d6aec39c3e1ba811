import { describe, expect, it } from "vitest";
import { decodeProxyLink, encodeProxyLink, encodeQueryComponent } from "../src/link";

describe("encodeProxyLink", () => {
  it("percent-encodes the target into the url parameter", () => {
    expect(encodeProxyLink("http://site.test/dir/pic.png", "/proxy")).toBe(
      "/proxy?url=http%3A%2F%2Fsite.test%2Fdir%2Fpic.png",
    );
  });

  it("encodes spaces as %20", () => {
    expect(encodeProxyLink("http://h/a b", "/p")).toBe("/p?url=http%3A%2F%2Fh%2Fa%20b");
  });

  it("escapes characters that would end a url() token", () => {
    expect(encodeQueryComponent("a(b)!*'")).toBe("a%28b%29%21%2A%27");
  });

  it("uses the given script path", () => {
    expect(encodeProxyLink("http://h/", "/tools/web")).toBe("/tools/web?url=http%3A%2F%2Fh%2F");
  });
});

describe("decodeProxyLink", () => {
  it("reproduces the encoded target exactly", () => {
    const targets = [
      "http://site.test/",
      "http://h/a?x=1&y=2#frag",
      "http://h/a+b c",
      "https://h:8443/ü/%41",
      "http://h/(paren)/it's*",
    ];

    for (const target of targets) {
      expect(decodeProxyLink(encodeProxyLink(target, "/proxy"))).toBe(target);
    }
  });

  it("returns null for links without a url parameter", () => {
    expect(decodeProxyLink("/proxy")).toBeNull();
    expect(decodeProxyLink("/proxy?other=1")).toBeNull();
  });
});
