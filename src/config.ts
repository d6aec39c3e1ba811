export type ProxyConfig = {
  port: number;
  debug: boolean;
  /** Skips upstream certificate checks. Off in production unless asked for. */
  insecureTls: boolean;
  connectTimeoutMs: number;
  timeoutMs: number;
  requestTimeoutMs: number;
  maxRedirects: number;
  blockedHeaders: string[];
};

type Env = Record<string, string | undefined>;

/** Defaults for a proxy built without `loadConfig`; TLS checks follow NODE_ENV. */
export const defaultProxyConfig = (env: Env = process.env): ProxyConfig => ({
  port: 3000,
  debug: true,
  insecureTls: env.NODE_ENV !== "production",
  connectTimeoutMs: 15_000,
  timeoutMs: 30_000,
  requestTimeoutMs: 120_000,
  maxRedirects: 10,
  blockedHeaders: [],
});

const readNumber = (value: string | undefined, fallback: number): number => {
  if (!value || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
};

const readFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === "") return fallback;
  return value.trim().toLowerCase() !== "false";
};

const readList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((name) => name.trim().toLowerCase())
    .filter(Boolean);

export const loadConfig = (env: Env = process.env): ProxyConfig => {
  const defaults = defaultProxyConfig(env);

  return {
    port: readNumber(env.PORT, defaults.port),
    debug: readFlag(env.DEBUG, defaults.debug),
    insecureTls: readFlag(env.PROXY_INSECURE_TLS, defaults.insecureTls),
    connectTimeoutMs: readNumber(env.PROXY_CONNECT_TIMEOUT_MS, defaults.connectTimeoutMs),
    timeoutMs: readNumber(env.PROXY_TIMEOUT_MS, defaults.timeoutMs),
    requestTimeoutMs: readNumber(env.PROXY_REQUEST_TIMEOUT_MS, defaults.requestTimeoutMs),
    maxRedirects: readNumber(env.PROXY_MAX_REDIRECTS, defaults.maxRedirects),
    blockedHeaders: readList(env.PROXY_BLOCKED_HEADERS),
  };
};
