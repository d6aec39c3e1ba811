import { afterEach, describe, expect, it, vi } from "vitest";
import { UpstreamError } from "../src/errors";
import type { FetchResult, UpstreamFetcher } from "../src/fetcher";
import { handleProxyRequest, normalizeTargetUrl } from "../src/proxy";

const htmlResult: FetchResult = {
  status: 200,
  headers: [
    ["Content-Type", "text/html"],
    ["Content-Length", "19"],
    ["X-Frame-Options", "DENY"],
    ["Set-Cookie", "a=1"],
  ],
  body: Buffer.from('<img src="pic.png">'),
  effectiveUrl: "http://site.test/dir/page.html",
  contentType: "text/html; charset=utf-8",
};

const fakeFetcher = (result: FetchResult) =>
  vi.fn<Parameters<UpstreamFetcher>, ReturnType<UpstreamFetcher>>().mockResolvedValue(result);

afterEach(() => {
  vi.restoreAllMocks();
});

describe("normalizeTargetUrl", () => {
  it("prepends http:// to host-only targets", () => {
    expect(normalizeTargetUrl("site.test/a").href).toBe("http://site.test/a");
    expect(normalizeTargetUrl("HTTPS://site.test").href).toBe("https://site.test/");
  });

  it("rejects targets without a host", () => {
    expect(() => normalizeTargetUrl("http://")).toThrow("Invalid URL provided.");
  });
});

describe("handleProxyRequest", () => {
  it("asks for the form when no url is given", async () => {
    const fetcher = fakeFetcher(htmlResult);

    await expect(handleProxyRequest({ url: "/proxy", headers: {} }, { fetcher })).resolves.toEqual({
      kind: "form",
      scriptPath: "/proxy",
    });
    await expect(handleProxyRequest({ url: "/proxy?url=", headers: {} }, { fetcher })).resolves.toEqual({
      kind: "form",
      scriptPath: "/proxy",
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it("answers 400 without fetching when the target has no host", async () => {
    const fetcher = fakeFetcher(htmlResult);
    const result = await handleProxyRequest({ url: "/proxy?url=http%3A%2F%2F", headers: {} }, { fetcher });

    expect(result).toEqual({
      kind: "response",
      status: 400,
      headers: [["Content-Type", "text/plain; charset=utf-8"]],
      body: Buffer.from("Invalid URL provided."),
    });
    expect(fetcher).not.toHaveBeenCalled();
  });

  it("fetches, filters headers and rewrites the page", async () => {
    const fetcher = fakeFetcher(htmlResult);
    const result = await handleProxyRequest(
      {
        url: "/proxy?url=site.test%2Fdir%2Fpage.html",
        headers: { "user-agent": "test-agent", cookie: "session=test-secret" },
      },
      { fetcher },
    );

    expect(fetcher).toHaveBeenCalledWith({
      url: "http://site.test/dir/page.html",
      headers: { "user-agent": "test-agent", host: "site.test" },
    });
    expect(result).toEqual({
      kind: "response",
      status: 200,
      headers: [
        ["Set-Cookie", "a=1"],
        ["Content-Type", "text/html; charset=utf-8"],
      ],
      body: Buffer.from('<img src="/proxy?url=http%3A%2F%2Fsite.test%2Fdir%2Fpic.png">'),
      upstreamUrl: "http://site.test/dir/page.html",
    });
  });

  it("keeps the upstream status and builds links from the request path", async () => {
    const fetcher = fakeFetcher({
      status: 404,
      headers: [],
      body: Buffer.from("a{b:url(x.png)}"),
      effectiveUrl: "http://site.test/css/missing.css",
      contentType: "text/css",
    });
    const result = await handleProxyRequest(
      { url: "/tools/view?url=http%3A%2F%2Fsite.test%2Fcss%2Fmissing.css", headers: {} },
      { fetcher },
    );

    expect(result.kind === "response" && result.status).toBe(404);
    expect(result.kind === "response" && result.body.toString()).toBe(
      'a{b:url("/tools/view?url=http%3A%2F%2Fsite.test%2Fcss%2Fx.png")}',
    );
  });

  it("answers 502 with the transport error", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetcher = vi
      .fn<Parameters<UpstreamFetcher>, ReturnType<UpstreamFetcher>>()
      .mockRejectedValue(new UpstreamError("getaddrinfo ENOTFOUND site.test"));

    const result = await handleProxyRequest({ url: "/proxy?url=site.test", headers: {} }, { fetcher });

    expect(result).toEqual({
      kind: "response",
      status: 502,
      headers: [["Content-Type", "text/plain; charset=utf-8"]],
      body: Buffer.from("Failed to fetch the upstream URL: getaddrinfo ENOTFOUND site.test"),
    });
  });

  it("answers 504 when the pipeline outlives its deadline", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const fetcher: UpstreamFetcher = () => new Promise<FetchResult>(() => {});

    const result = await handleProxyRequest(
      { url: "/proxy?url=site.test", headers: {} },
      { fetcher, requestTimeoutMs: 20 },
    );

    expect(result.kind === "response" && result.status).toBe(504);
    expect(result.kind === "response" && result.body.toString()).toBe("Proxy request timed out");
  });

  it("answers 504 when the rewrite finishes past the deadline", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(performance, "now").mockReturnValueOnce(0).mockReturnValueOnce(1_000);
    const fetcher = fakeFetcher(htmlResult);

    const result = await handleProxyRequest(
      { url: "/proxy?url=site.test", headers: {} },
      { fetcher, requestTimeoutMs: 500 },
    );

    expect(result.kind === "response" && result.status).toBe(504);
  });

  it("labels rewritten HTML as UTF-8", async () => {
    const fetcher = fakeFetcher({
      status: 200,
      headers: [["Content-Type", "text/html; charset=iso-8859-1"]],
      body: Buffer.from([0x63, 0x61, 0x66, 0xe9]),
      effectiveUrl: "http://site.test/",
      contentType: "text/html; charset=iso-8859-1",
    });

    const result = await handleProxyRequest({ url: "/proxy?url=site.test", headers: {} }, { fetcher });

    expect(result.kind === "response" && result.headers).toEqual([["Content-Type", "text/html; charset=utf-8"]]);
    expect(result.kind === "response" && result.body.toString("utf8")).toBe("café");
  });

  it("lets unexpected errors through", async () => {
    const fetcher = vi
      .fn<Parameters<UpstreamFetcher>, ReturnType<UpstreamFetcher>>()
      .mockRejectedValue(new TypeError("boom"));

    await expect(handleProxyRequest({ url: "/proxy?url=site.test", headers: {} }, { fetcher })).rejects.toThrow(
      "boom",
    );
  });
});
