import { serve } from "@hono/node-server"
import { createRequestHandler } from "./app"
import { loadConfig } from "./config"
import { createLoggers } from "./logger"
import type { ServerContext } from "./server-context"
import { BlacklistStore } from "./services/blacklist"
import { QrDecoder } from "./services/qr-decoder"
import { SafeBrowsingClient } from "./services/safe-browsing-client"
import { ScanStats } from "./services/scan-stats"
import { VerdictAggregator } from "./services/verdict-aggregator"
import { VerdictCache } from "./services/verdict-cache"
import { VirusTotalClient } from "./services/virustotal-client"

const config = loadConfig()
const loggers = createLoggers(config)
const blacklist = BlacklistStore.fromFile(config.blacklistFile, config.blacklistDomains, loggers.app)
const providers = [
  new VirusTotalClient(config, loggers.app),
  new SafeBrowsingClient(config, loggers.app),
]
const verdictCache = new VerdictCache(config.cache.maxEntries)
const aggregator = new VerdictAggregator(
  {
    overallTimeoutMs: config.overallTimeoutMs,
    cache: config.cache,
  },
  {
    blacklist,
    providers,
    cache: verdictCache,
    loggers,
  },
)

const ctx: ServerContext = {
  config,
  loggers,
  blacklist,
  providers,
  verdictCache,
  aggregator,
  qrDecoder: new QrDecoder(),
  scanStats: new ScanStats(),
}

serve(
  {
    fetch: createRequestHandler(ctx),
    hostname: config.host,
    port: config.port,
  },
  (info) => {
    loggers.app.info(
      {
        host: info.address,
        port: info.port,
        overallTimeoutMs: config.overallTimeoutMs,
        blacklistSize: blacklist.size,
        virustotalConfigured: Boolean(config.virustotal.apiKey),
        virustotalRateLimitTier: config.virustotal.rateLimit.tier,
        safeBrowsingConfigured: Boolean(config.safeBrowsing.apiKey),
      },
      "qrguard started",
    )

    console.log(`qrguard listening on http://${info.address}:${info.port}`)
  },
)
