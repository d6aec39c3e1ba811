import { encodeProxyLink } from "./link";
import { resolveUrl } from "./resolver";

export type HeaderPair = [name: string, value: string];

export type HeaderDecision = "forward-verbatim" | "drop" | "rewrite-and-forward";

export type HeaderProcessingOptions = {
  effectiveUrl: string;
  scriptPath: string;
  contentType: string;
  extraBlockedHeaders?: string[];
};

export type ProcessedHeaders = {
  headers: HeaderPair[];
  location: string | null;
  decisions: Array<{ name: string; decision: HeaderDecision }>;
};

// Pin the client to the upstream origin, or describe framing that no longer
// holds once the body is buffered and rewritten.
const blockedHeaderNames = new Set([
  "content-security-policy",
  "x-frame-options",
  "strict-transport-security",
  "content-length",
  "transfer-encoding",
  "content-encoding",
]);

const hopByHopHeaderNames = new Set([
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "te",
  "trailer",
  "trailers",
  "upgrade",
]);

const redactedHeaderNames = new Set([
  "authorization",
  "cookie",
  "proxy-authorization",
  "set-cookie",
]);

// Client request headers passed on to the upstream.
const forwardableRequestHeaders = ["user-agent", "accept", "accept-language", "dnt"];

const statusLine = /^HTTP\//i;

export type ClientHeaders = Record<string, string | string[] | undefined>;

export const buildUpstreamHeaders = (
  clientHeaders: ClientHeaders,
  target: URL,
): Record<string, string> => {
  const upstreamHeaders: Record<string, string> = {};

  for (const [name, value] of Object.entries(clientHeaders)) {
    const key = name.toLowerCase();
    if (!forwardableRequestHeaders.includes(key) || value === undefined) continue;
    upstreamHeaders[key] = Array.isArray(value) ? value.join(", ") : value;
  }

  // Virtual hosting needs the target's own Host, not the proxy's.
  upstreamHeaders["host"] = target.host;
  return upstreamHeaders;
};

export const parseHeaderBlock = (block: string): HeaderPair[] => {
  const pairs: HeaderPair[] = [];

  for (const line of block.split(/\r\n|\n|\r/)) {
    if (!line.trim() || statusLine.test(line)) continue;

    const colon = line.indexOf(":");
    const name = (colon === -1 ? line : line.slice(0, colon)).trim();
    const value = colon === -1 ? "" : line.slice(colon + 1).trim();
    if (name) pairs.push([name, value]);
  }

  return pairs;
};

const connectionListedHeaders = (pairs: HeaderPair[]): Set<string> => {
  const listed = new Set<string>();
  for (const [name, value] of pairs) {
    if (name.toLowerCase() !== "connection") continue;
    for (const token of value.split(",")) {
      const normalized = token.trim().toLowerCase();
      if (normalized) listed.add(normalized);
    }
  }
  return listed;
};

export const classifyHeader = (
  name: string,
  extraBlocked: ReadonlySet<string> = new Set(),
): HeaderDecision => {
  const key = name.trim().toLowerCase();
  if (blockedHeaderNames.has(key) || hopByHopHeaderNames.has(key) || extraBlocked.has(key)) {
    return "drop";
  }
  if (key === "location") return "rewrite-and-forward";
  return "forward-verbatim";
};

/**
 * Filters upstream response headers for the client.
 *
 * Blocked and hop-by-hop headers are dropped, `Location` is resolved against
 * the effective URL and routed back through the proxy, and everything else is
 * forwarded in order with duplicates intact. Upstream `Content-Type` lines are
 * replaced by the declared content type, appended last.
 */
export const processHeaders = (
  rawHeaders: string | HeaderPair[],
  options: HeaderProcessingOptions,
): ProcessedHeaders => {
  const pairs = typeof rawHeaders === "string" ? parseHeaderBlock(rawHeaders) : rawHeaders;
  const extraBlocked = new Set([
    ...connectionListedHeaders(pairs),
    ...(options.extraBlockedHeaders ?? []).map((name) => name.toLowerCase()),
  ]);

  const forwarded: HeaderPair[] = [];
  const decisions: ProcessedHeaders["decisions"] = [];
  let location: string | null = null;

  for (const [rawName, rawValue] of pairs) {
    const name = rawName.trim();
    const value = rawValue.trim();
    const decision = classifyHeader(name, extraBlocked);
    decisions.push({ name, decision });

    if (decision === "drop") continue;

    if (decision === "rewrite-and-forward") {
      location = encodeProxyLink(resolveUrl(value, options.effectiveUrl), options.scriptPath);
      continue;
    }

    if (name.toLowerCase() === "content-type") continue;
    forwarded.push([name, value]);
  }

  if (location !== null) forwarded.push(["Location", location]);
  if (options.contentType) forwarded.push(["Content-Type", options.contentType]);

  return { headers: forwarded, location, decisions };
};

export const headersToLogObject = (headers: HeaderPair[] | Record<string, unknown>) => {
  const out: Record<string, string> = {};
  const entries = Array.isArray(headers) ? headers : Object.entries(headers);

  for (const [name, value] of entries) {
    const key = name.toLowerCase();
    const text = redactedHeaderNames.has(key) ? "[redacted]" : String(value);
    out[name] = out[name] === undefined ? text : `${out[name]}, ${text}`;
  }
  return out;
};
