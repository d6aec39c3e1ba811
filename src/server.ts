import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { defaultProxyConfig, type ProxyConfig } from "./config";
import { createAxiosFetcher, type UpstreamFetcher } from "./fetcher";
import { renderForm } from "./form";
import { headersToLogObject, type HeaderPair } from "./headers";
import { handleProxyRequest, type ProxyResponse } from "./proxy";

export type RewritingProxyOptions = Partial<ProxyConfig> & {
    fetcher?: UpstreamFetcher;
};

export class RewritingProxy {
    private server: Server;
    private config: ProxyConfig;
    private fetcher: UpstreamFetcher;
    private requestSeq = 0;

    constructor(options: RewritingProxyOptions = {}) {
        const { fetcher, ...overrides } = options;
        this.config = { ...defaultProxyConfig(), ...overrides };
        this.fetcher = fetcher ?? createAxiosFetcher(this.config);
        this.server = this.createServer();
    }

    public get port(): number {
        const address = this.server.address();
        return address !== null && typeof address === "object"
            ? address.port
            : this.config.port;
    }

    public listen(): Promise<number> {
        return new Promise((resolve, reject) => {
            this.server.once("error", reject);
            this.server.listen(this.config.port, () => {
                this.server.off("error", reject);
                resolve(this.port);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            this.server.close((err) => (err ? reject(err) : resolve()));
            this.server.closeAllConnections();
        });
    }

    private createServer = () => {
        return createServer((req, res) => {
            this.fetchHandle(req, res).catch((err: unknown) => {
                console.error("[proxy:error] Unhandled error:", err);
                if (!res.headersSent) {
                    res.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
                }
                res.end("Proxy Error");
            });
        });
    };

    private fetchHandle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
        const requestId = ++this.requestSeq;
        const startedAt = performance.now();

        if (req.method?.toLowerCase() === "connect") {
            res.writeHead(501, { "content-type": "text/plain; charset=utf-8" });
            res.end("connect not supported");
            return;
        }

        const url = req.url ?? "/";

        if (this.config.debug) {
            console.log("[client:req]", {
                id: requestId,
                method: req.method,
                url,
                headers: headersToLogObject(req.headers),
            });
        }

        const result = await handleProxyRequest(
            { url, headers: req.headers },
            {
                fetcher: this.fetcher,
                requestTimeoutMs: this.config.requestTimeoutMs,
                blockedHeaders: this.config.blockedHeaders,
                debug: this.config.debug,
            },
        );

        this.send(res, result, requestId);

        if (this.config.debug) {
            console.log("[client:res]", {
                id: requestId,
                status: res.statusCode,
                ms: Math.round(performance.now() - startedAt),
            });
        }
    };

    private send(res: ServerResponse, result: ProxyResponse, requestId: number) {
        if (result.kind === "form") {
            res.writeHead(200, { "content-type": "text/html; charset=utf-8" });
            res.end(renderForm(result.scriptPath));
            return;
        }

        res.statusCode = result.status;
        for (const [name, value] of result.headers) {
            this.appendHeader(res, name, value);
        }

        if (this.config.debug) {
            res.setHeader("x-proxy-id", String(requestId));
            if (result.upstreamUrl) {
                this.appendHeader(res, "x-proxy-upstream", new URL(result.upstreamUrl).origin);
            }
        }

        res.end(result.body);
    }

    private appendHeader(res: ServerResponse, name: HeaderPair[0], value: HeaderPair[1]) {
        try {
            res.appendHeader(name, value);
        } catch (err) {
            // Node rejects names and values with characters HTTP does not allow.
            console.error("[proxy:res] Dropping invalid header", { name, error: String(err) });
        }
    }
}
