import type { AppConfig } from "./config"
import type { Loggers } from "./logger"
import type { BlacklistStore } from "./services/blacklist"
import type { QrDecoder } from "./services/qr-decoder"
import type { ReputationProvider } from "./services/reputation-provider"
import type { ScanStats } from "./services/scan-stats"
import type { VerdictAggregator } from "./services/verdict-aggregator"
import type { VerdictCache } from "./services/verdict-cache"

export interface ServerContext {
  config: AppConfig
  loggers: Loggers
  blacklist: BlacklistStore
  providers: ReputationProvider[]
  verdictCache: VerdictCache
  aggregator: VerdictAggregator
  qrDecoder: QrDecoder
  scanStats: ScanStats
}
