import { loadConfig, type AppConfig } from "../src/config"
import { createSilentLoggers, type Loggers } from "../src/logger"
import type { ServerContext } from "../src/server-context"
import { BlacklistStore } from "../src/services/blacklist"
import { QrDecoder } from "../src/services/qr-decoder"
import type { FetchImpl } from "../src/services/reputation-client"
import type { ExternalSource, ReputationProvider } from "../src/services/reputation-provider"
import { ScanStats } from "../src/services/scan-stats"
import { VerdictAggregator } from "../src/services/verdict-aggregator"
import { VerdictCache } from "../src/services/verdict-cache"
import type { ProviderDetail, ProviderResult, ProviderStatus, UrlCandidate } from "../src/types"

export interface FakeClock {
  nowMs: number
  sleeps: number[]
  now: () => number
  sleep: (ms: number) => Promise<void>
}

export function fakeClock(start = 0): FakeClock {
  const clock: FakeClock = {
    nowMs: start,
    sleeps: [],
    now: () => clock.nowMs,
    sleep: async (ms) => {
      clock.sleeps.push(ms)
      clock.nowMs += ms
    },
  }
  return clock
}

export interface RecordedCall {
  url: string
  init: RequestInit | undefined
}

export function mockFetch(
  handler: (call: RecordedCall, attempt: number) => Response | Promise<Response>,
): { calls: RecordedCall[]; fetchImpl: FetchImpl } {
  const calls: RecordedCall[] = []
  const fetchImpl: FetchImpl = async (input, init) => {
    const call = { url: String(input), init }
    calls.push(call)
    return handler(call, calls.length)
  }
  return { calls, fetchImpl }
}

export function json(payload: unknown, status = 200): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: { "content-type": "application/json" },
  })
}

export function providerResult(
  source: ProviderResult["source"],
  status: ProviderStatus,
  detail: ProviderDetail = {},
): ProviderResult {
  return {
    source,
    status,
    detail,
    latencyMs: 1,
    fetchedAt: "2026-01-01T00:00:00.000Z",
  }
}

export function wait(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export class StubProvider implements ReputationProvider {
  calls = 0
  readonly checkedUrls: string[] = []

  constructor(
    readonly source: ExternalSource,
    private readonly behavior: (candidate: UrlCandidate, deadline: number) => Promise<ProviderResult>,
    readonly configured = true,
  ) {}

  async check(candidate: UrlCandidate, deadline: number): Promise<ProviderResult> {
    this.calls += 1
    this.checkedUrls.push(candidate.normalized)
    return this.behavior(candidate, deadline)
  }
}

export function answering(source: ExternalSource, status: ProviderStatus, delayMs = 0): StubProvider {
  return new StubProvider(source, async () => {
    if (delayMs > 0) {
      await wait(delayMs)
    }
    return providerResult(source, status)
  })
}

export function silent(source: ExternalSource): StubProvider {
  return new StubProvider(source, () => new Promise<ProviderResult>(() => {}))
}

export const TEST_CACHE_SETTINGS = {
  maxEntries: 100,
  safeTtlMs: 60_000,
  unsafeTtlMs: 10_000,
  unknownTtlMs: 5_000,
}

export interface AggregatorFixture {
  aggregator: VerdictAggregator
  cache: VerdictCache
  loggers: Loggers
  blacklist: BlacklistStore
}

export function makeAggregator(
  providers: ReputationProvider[],
  options: { overallTimeoutMs?: number; blacklist?: string[]; now?: () => number } = {},
): AggregatorFixture {
  const loggers = createSilentLoggers()
  const now = options.now ?? Date.now
  const cache = new VerdictCache(TEST_CACHE_SETTINGS.maxEntries, now)
  const blacklist = new BlacklistStore(options.blacklist ?? ["evil.test"])
  const aggregator = new VerdictAggregator(
    {
      overallTimeoutMs: options.overallTimeoutMs ?? 1_000,
      cache: TEST_CACHE_SETTINGS,
    },
    { blacklist, providers, cache, loggers, now },
  )

  return { aggregator, cache, loggers, blacklist }
}

export function makeContext(
  providers: ReputationProvider[],
  configOverrides: Record<string, string> = {},
): ServerContext {
  const config: AppConfig = loadConfig({ QRGUARD_BLACKLIST_DOMAINS: "evil.test", ...configOverrides })
  const { aggregator, cache, loggers, blacklist } = makeAggregator(providers, {
    overallTimeoutMs: config.overallTimeoutMs,
    blacklist: config.blacklistDomains,
  })

  return {
    config,
    loggers,
    blacklist,
    providers,
    verdictCache: cache,
    aggregator,
    qrDecoder: new QrDecoder(),
    scanStats: new ScanStats(),
  }
}
