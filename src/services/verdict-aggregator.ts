import type pino from "pino"
import type { VerdictCacheSettings } from "../config"
import type { Loggers } from "../logger"
import type { ProviderResult, ProviderSource, SkippedSource, UrlCandidate, Verdict } from "../types"
import type { BlacklistStore } from "./blacklist"
import type { ExternalSource, ReputationProvider } from "./reputation-provider"
import type { VerdictCache } from "./verdict-cache"
import { buildVerdict } from "./verdict-policy"

export interface VerdictAggregatorSettings {
  overallTimeoutMs: number
  cache: VerdictCacheSettings
}

interface VerdictAggregatorDependencies {
  blacklist: BlacklistStore
  providers: ReputationProvider[]
  cache: VerdictCache
  loggers: Loggers
  now?: () => number
}

interface LateResult {
  result: ProviderResult
  expiresAt: number
}

interface LaunchedChecks {
  tasks: Promise<ProviderResult>[]
  skipped: SkippedSource[]
}

const MAX_LATE_RESULTS = 500

/**
 * Fans a URL out to the blacklist and the reputation providers, joins the
 * answers against one deadline and folds them into a verdict.
 */
export class VerdictAggregator {
  private readonly blacklist: BlacklistStore
  private readonly providers: ReputationProvider[]
  private readonly cache: VerdictCache
  private readonly logger: pino.Logger
  private readonly securityLogger: pino.Logger
  private readonly now: () => number
  private readonly lateResults = new Map<string, LateResult>()
  private readonly background = new Set<Promise<void>>()

  constructor(
    private readonly settings: VerdictAggregatorSettings,
    dependencies: VerdictAggregatorDependencies,
  ) {
    this.blacklist = dependencies.blacklist
    this.providers = dependencies.providers
    this.cache = dependencies.cache
    this.logger = dependencies.loggers.app
    this.securityLogger = dependencies.loggers.security
    this.now = dependencies.now ?? Date.now
  }

  async evaluate(candidate: UrlCandidate, overallTimeoutMs = this.settings.overallTimeoutMs): Promise<Verdict> {
    const key = candidate.normalized
    const cached = this.cache.get(key)
    if (cached) {
      return cached
    }

    const deadline = this.now() + overallTimeoutMs
    const joining = this.cache.isInFlight(key)
    const shared = this.cache.singleFlight(key, () => this.compute(candidate, overallTimeoutMs))

    // A joiner still answers by its own deadline, even if the flight it joined runs longer.
    return joining ? this.joinWithinDeadline(candidate, shared, deadline) : shared
  }

  /** Resolves once background enrichment and late-result bookkeeping have finished. */
  async settled(): Promise<void> {
    while (this.background.size > 0) {
      await Promise.all([...this.background])
    }
  }

  private async compute(candidate: UrlCandidate, overallTimeoutMs: number): Promise<Verdict> {
    const key = candidate.normalized
    const deadline = this.now() + overallTimeoutMs
    const blacklisted = this.blacklist.lookup(candidate)
    const launched = this.launchChecks(candidate, deadline)

    if (blacklisted.status === "MATCHED_UNSAFE") {
      const early = buildVerdict(candidate, [blacklisted], launched.skipped, this.now(), true)
      this.store(key, early)
      this.trackBackground(this.enrich(candidate, blacklisted, launched))
      return early
    }

    const results = await Promise.all(launched.tasks)
    const verdict = buildVerdict(candidate, [blacklisted, ...results], launched.skipped, this.now())
    this.store(key, verdict)
    return verdict
  }

  private launchChecks(candidate: UrlCandidate, deadline: number): LaunchedChecks {
    const tasks: Promise<ProviderResult>[] = []
    const skipped: SkippedSource[] = []

    for (const provider of this.providers) {
      if (!provider.configured) {
        skipped.push({ source: provider.source, reason: "CONFIGURATION_MISSING" })
        continue
      }

      const carried = this.takeLateResult(provider.source, candidate.normalized)
      if (carried) {
        tasks.push(Promise.resolve(carried))
        continue
      }

      tasks.push(this.boundByDeadline(provider, candidate, deadline))
    }

    return { tasks, skipped }
  }

  private boundByDeadline(
    provider: ReputationProvider,
    candidate: UrlCandidate,
    deadline: number,
  ): Promise<ProviderResult> {
    const started = this.now()
    const check = provider.check(candidate, deadline)

    return new Promise<ProviderResult>((resolve) => {
      let timedOut = false
      const timer = setTimeout(() => {
        timedOut = true
        resolve({
          source: provider.source,
          status: "UNAVAILABLE",
          detail: {
            reason: "TIMEOUT",
            message: `${provider.source} did not answer before the deadline`,
          },
          latencyMs: this.now() - started,
          fetchedAt: new Date(started).toISOString(),
        })
        this.trackBackground(this.recordLateResult(candidate, check))
      }, Math.max(0, deadline - this.now()))

      void check.then(
        (result) => {
          if (!timedOut) {
            clearTimeout(timer)
            resolve(result)
          }
        },
        (error: unknown) => {
          if (!timedOut) {
            clearTimeout(timer)
            resolve(this.failedCheck(provider.source, started, error))
          }
        },
      )
    })
  }

  private joinWithinDeadline(candidate: UrlCandidate, shared: Promise<Verdict>, deadline: number): Promise<Verdict> {
    return new Promise<Verdict>((resolve, reject) => {
      const timer = setTimeout(() => {
        resolve(this.deadlineVerdict(candidate))
      }, Math.max(0, deadline - this.now()))

      void shared.then(
        (verdict) => {
          clearTimeout(timer)
          resolve(verdict)
        },
        (error: unknown) => {
          clearTimeout(timer)
          reject(error)
        },
      )
    })
  }

  /** Blacklist answer plus a TIMEOUT per configured provider. Never cached. */
  private deadlineVerdict(candidate: UrlCandidate): Verdict {
    const decidedAt = this.now()
    const blacklisted = this.blacklist.lookup(candidate)
    const results: ProviderResult[] = [blacklisted]
    const skipped: SkippedSource[] = []

    for (const provider of this.providers) {
      if (!provider.configured) {
        skipped.push({ source: provider.source, reason: "CONFIGURATION_MISSING" })
        continue
      }

      results.push({
        source: provider.source,
        status: "UNAVAILABLE",
        detail: {
          reason: "TIMEOUT",
          message: `${provider.source} did not answer before the deadline`,
        },
        latencyMs: 0,
        fetchedAt: new Date(decidedAt).toISOString(),
      })
    }

    return buildVerdict(candidate, results, skipped, decidedAt, blacklisted.status === "MATCHED_UNSAFE")
  }

  private async recordLateResult(candidate: UrlCandidate, check: Promise<ProviderResult>): Promise<void> {
    let result: ProviderResult
    try {
      result = await check
    } catch (error) {
      this.logger.warn({ url: candidate.normalized, error }, "late provider check rejected")
      return
    }

    if (result.status !== "MATCHED_UNSAFE" && result.status !== "CONFIRMED_SAFE") {
      return
    }

    this.rememberLateResult(candidate.normalized, result)

    if (result.status === "MATCHED_UNSAFE" && this.cache.invalidate(candidate.normalized)) {
      this.logger.info(
        { url: candidate.normalized, source: result.source },
        "late threat match evicted cached verdict",
      )
    }
  }

  private async enrich(candidate: UrlCandidate, blacklisted: ProviderResult, launched: LaunchedChecks): Promise<void> {
    const results = await Promise.all(launched.tasks)
    const enriched = buildVerdict(candidate, [blacklisted, ...results], launched.skipped, this.now(), true)
    // The UNSAFE outcome was already logged when the early verdict went out.
    this.cache.put(candidate.normalized, enriched, this.ttlFor(enriched))
  }

  private store(key: string, verdict: Verdict): void {
    this.cache.put(key, verdict, this.ttlFor(verdict))

    if (verdict.isSafe === "UNSAFE") {
      this.securityLogger.warn(
        {
          url: key,
          matchedSources: verdict.contributingResults
            .filter((result) => result.status === "MATCHED_UNSAFE")
            .map((result) => result.source),
          shortCircuited: verdict.shortCircuited,
        },
        "unsafe verdict",
      )
    }
  }

  private ttlFor(verdict: Verdict): number {
    if (verdict.isSafe === "SAFE") {
      return this.settings.cache.safeTtlMs
    }

    if (verdict.isSafe === "UNSAFE") {
      return this.settings.cache.unsafeTtlMs
    }

    return this.settings.cache.unknownTtlMs
  }

  private trackBackground(task: Promise<void>): void {
    const tracked = task
      .catch((error: unknown) => {
        this.logger.error({ error }, "background verdict task failed")
      })
      .finally(() => {
        this.background.delete(tracked)
      })

    this.background.add(tracked)
  }

  private rememberLateResult(key: string, result: ProviderResult): void {
    const ttlMs = result.status === "MATCHED_UNSAFE" ? this.settings.cache.unsafeTtlMs : this.settings.cache.safeTtlMs
    const mapKey = lateResultKey(result.source, key)
    this.lateResults.delete(mapKey)
    this.lateResults.set(mapKey, { result, expiresAt: this.now() + ttlMs })

    while (this.lateResults.size > MAX_LATE_RESULTS) {
      const oldest = this.lateResults.keys().next()
      if (oldest.done) {
        break
      }
      this.lateResults.delete(oldest.value)
    }
  }

  private takeLateResult(source: ExternalSource, key: string): ProviderResult | null {
    const mapKey = lateResultKey(source, key)
    const late = this.lateResults.get(mapKey)
    if (!late) {
      return null
    }

    this.lateResults.delete(mapKey)
    return this.now() < late.expiresAt ? late.result : null
  }

  private failedCheck(source: ExternalSource, started: number, error: unknown): ProviderResult {
    this.logger.error({ source, error }, "reputation provider rejected instead of reporting unavailable")

    return {
      source,
      status: "UNAVAILABLE",
      detail: {
        reason: "TRANSPORT_ERROR",
        message: error instanceof Error ? error.message : String(error),
      },
      latencyMs: this.now() - started,
      fetchedAt: new Date(started).toISOString(),
    }
  }
}

function lateResultKey(source: ProviderSource, key: string): string {
  return `${source} ${key}`
}
