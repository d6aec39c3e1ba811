import { Agent as HttpsAgent } from "node:https";
import axios, { type AxiosInstance } from "axios";
import { UpstreamError } from "./errors";
import type { HeaderPair } from "./headers";

export type UpstreamRequest = {
  url: string;
  headers: Record<string, string>;
};

export type FetchResult = {
  status: number;
  /** Final response headers in arrival order, duplicates kept. */
  headers: HeaderPair[];
  body: Buffer;
  effectiveUrl: string;
  contentType: string;
};

export type UpstreamFetcher = (request: UpstreamRequest) => Promise<FetchResult>;

export type AxiosFetcherOptions = {
  connectTimeoutMs: number;
  timeoutMs: number;
  maxRedirects: number;
  insecureTls: boolean;
  client?: AxiosInstance;
};

const readRawHeaders = (nativeResponse: unknown): HeaderPair[] | null => {
  if (typeof nativeResponse !== "object" || nativeResponse === null) return null;
  if (!("rawHeaders" in nativeResponse)) return null;

  const raw = nativeResponse.rawHeaders;
  if (!Array.isArray(raw)) return null;

  const pairs: HeaderPair[] = [];
  for (let i = 0; i + 1 < raw.length; i += 2) {
    const name: unknown = raw[i];
    const value: unknown = raw[i + 1];
    if (typeof name === "string" && typeof value === "string") pairs.push([name, value]);
  }
  return pairs;
};

const readResponseUrl = (nativeResponse: unknown): string | null => {
  if (typeof nativeResponse !== "object" || nativeResponse === null) return null;
  if (!("responseUrl" in nativeResponse)) return null;
  return typeof nativeResponse.responseUrl === "string" ? nativeResponse.responseUrl : null;
};

const headersFromObject = (headers: object): HeaderPair[] => {
  const pairs: HeaderPair[] = [];
  for (const [name, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      for (const item of value) pairs.push([name, String(item)]);
    } else if (value !== undefined && value !== null) {
      pairs.push([name, String(value)]);
    }
  }
  return pairs;
};

const lastContentType = (headers: HeaderPair[]): string => {
  let contentType = "";
  for (const [name, value] of headers) {
    if (name.toLowerCase() === "content-type") contentType = value;
  }
  return contentType;
};

const describeFailure = (err: unknown, timeoutMs: number): string => {
  if (axios.isAxiosError(err)) {
    if (err.code === "ERR_CANCELED") return `Operation timed out after ${timeoutMs} milliseconds`;
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") return `Connection timed out (${err.message})`;
    return err.code ? `${err.code}: ${err.message}` : err.message;
  }
  return err instanceof Error ? err.message : String(err);
};

/**
 * Upstream fetcher backed by axios. Redirects are followed, bodies are
 * decompressed, and every HTTP status is returned as a result; only
 * transport failures reject, as {@link UpstreamError}.
 */
export const createAxiosFetcher = (options: AxiosFetcherOptions): UpstreamFetcher => {
  const client = options.client ?? axios.create();
  // Certificate checks are skipped on purpose when insecureTls is set, so
  // self-signed and misconfigured targets still load.
  const httpsAgent = new HttpsAgent({ rejectUnauthorized: !options.insecureTls });

  return async (request) => {
    try {
      const response = await client.request<ArrayBuffer>({
        method: "GET",
        url: request.url,
        headers: request.headers,
        responseType: "arraybuffer",
        validateStatus: () => true,
        maxRedirects: options.maxRedirects,
        decompress: true,
        // Socket inactivity bound; covers the connect phase.
        timeout: options.connectTimeoutMs,
        signal: AbortSignal.timeout(options.timeoutMs),
        httpsAgent,
      });

      const nativeResponse: unknown = response.request?.res;
      const headers = readRawHeaders(nativeResponse) ?? headersFromObject(response.headers);

      return {
        status: response.status,
        headers,
        body: Buffer.from(response.data),
        effectiveUrl: readResponseUrl(nativeResponse) ?? request.url,
        contentType: lastContentType(headers),
      };
    } catch (err) {
      throw new UpstreamError(describeFailure(err, options.timeoutMs), { cause: err });
    }
  };
};
