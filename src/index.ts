import { loadConfig } from "./config"
import { RewritingProxy } from "./server"

const config = loadConfig()
const server = new RewritingProxy(config)

server.listen().then((port) => {
    console.log(`Rewriting proxy listening on http://localhost:${port}`)
    if (config.insecureTls) {
        console.log("[proxy:tls] Upstream certificate verification is disabled")
    }
}).catch((err: unknown) => {
    console.error("[proxy:error] Failed to start:", err)
    process.exit(1)
})
