export class ProxyError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing or unparseable target; answered before anything is fetched. */
export class InputError extends ProxyError {
  constructor(message = "Invalid URL provided.") {
    super(message, 400);
  }
}

/** DNS, connect, TLS or timeout failure talking to the upstream. */
export class UpstreamError extends ProxyError {
  constructor(
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to fetch the upstream URL: ${reason}`, 502, options);
  }
}

export class RequestTimeoutError extends ProxyError {
  constructor(public readonly timeoutMs: number) {
    super("Proxy request timed out", 504);
  }
}
