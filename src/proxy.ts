import { InputError, ProxyError, RequestTimeoutError } from "./errors";
import type { UpstreamFetcher } from "./fetcher";
import {
  buildUpstreamHeaders,
  headersToLogObject,
  processHeaders,
  type ClientHeaders,
  type HeaderPair,
} from "./headers";
import { ContentRewriter } from "./rewriter";
import { scriptPathOf } from "./utils/pathname";

export type ProxyRequest = {
  /** Request URI as received, path and query. */
  url: string;
  headers: ClientHeaders;
};

export type ProxyResponse =
  | { kind: "form"; scriptPath: string }
  | {
      kind: "response";
      status: number;
      headers: HeaderPair[];
      body: Buffer;
      upstreamUrl?: string;
    };

export type ProxyDependencies = {
  fetcher: UpstreamFetcher;
  requestTimeoutMs?: number;
  blockedHeaders?: string[];
  debug?: boolean;
};

const hasScheme = /^https?:\/\//i;

export const normalizeTargetUrl = (raw: string): URL => {
  const candidate = hasScheme.test(raw) ? raw : `http://${raw}`;

  let target: URL;
  try {
    target = new URL(candidate);
  } catch {
    throw new InputError();
  }

  if (!target.hostname) throw new InputError();
  return target;
};

// The timer cannot interrupt the synchronous rewrite, so elapsed time is
// checked again once the work settles.
const withDeadline = async <T>(work: () => Promise<T>, timeoutMs: number): Promise<T> => {
  const startedAt = performance.now();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new RequestTimeoutError(timeoutMs)), timeoutMs);
  });

  const result = await Promise.race([work(), deadline]).finally(() => clearTimeout(timer));
  if (performance.now() - startedAt > timeoutMs) throw new RequestTimeoutError(timeoutMs);
  return result;
};

const plainText = (status: number, message: string): ProxyResponse => ({
  kind: "response",
  status,
  headers: [["Content-Type", "text/plain; charset=utf-8"]],
  body: Buffer.from(message, "utf8"),
});

const runPipeline = async (
  request: ProxyRequest,
  target: URL,
  scriptPath: string,
  deps: ProxyDependencies,
): Promise<ProxyResponse> => {
  const upstream = await deps.fetcher({
    url: target.toString(),
    headers: buildUpstreamHeaders(request.headers, target),
  });

  if (deps.debug) {
    console.log("[proxy:upstream:res]", {
      url: upstream.effectiveUrl,
      status: upstream.status,
      headers: headersToLogObject(upstream.headers),
    });
  }

  const rewriter = new ContentRewriter(scriptPath);
  const { body, contentType } = rewriter.rewrite(upstream.body, upstream.contentType, upstream.effectiveUrl);

  const { headers } = processHeaders(upstream.headers, {
    effectiveUrl: upstream.effectiveUrl,
    scriptPath,
    contentType,
    extraBlockedHeaders: deps.blockedHeaders,
  });

  return {
    kind: "response",
    status: upstream.status,
    headers,
    body,
    upstreamUrl: upstream.effectiveUrl,
  };
};

/**
 * Runs one proxied request: validate the `url` parameter, fetch it, filter
 * the headers and rewrite the body. Proxy failures become plain-text
 * responses (400 bad target, 502 transport failure, 504 deadline).
 */
export const handleProxyRequest = async (
  request: ProxyRequest,
  deps: ProxyDependencies,
): Promise<ProxyResponse> => {
  const scriptPath = scriptPathOf(request.url);
  const rawTarget = new URL(request.url, "http://proxy.invalid").searchParams.get("url");

  if (!rawTarget) return { kind: "form", scriptPath };

  try {
    const target = normalizeTargetUrl(rawTarget);
    const pipeline = () => runPipeline(request, target, scriptPath, deps);
    return deps.requestTimeoutMs
      ? await withDeadline(pipeline, deps.requestTimeoutMs)
      : await pipeline();
  } catch (err) {
    if (!(err instanceof ProxyError)) throw err;
    if (err.status >= 500) console.error(`[proxy:error] ${err.message}`);
    return plainText(err.status, err.message);
  }
};
