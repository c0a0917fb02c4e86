import { describe, expect, test } from "vitest"
import { loadConfig } from "../src/config"
import { classifyCandidate } from "../src/lib/url"
import { createSilentLoggers } from "../src/logger"
import { SafeBrowsingClient } from "../src/services/safe-browsing-client"
import { VirusTotalClient } from "../src/services/virustotal-client"
import type { UrlCandidate } from "../src/types"
import { StubProvider, answering, fakeClock, makeAggregator, silent } from "./helpers"

function candidate(raw: string): UrlCandidate {
  const classified = classifyCandidate(raw)
  if (classified.kind !== "URL") {
    throw new Error("expected URL")
  }
  return classified
}

describe("verdict aggregator", () => {
  test("a blacklist hit answers without waiting for providers", async () => {
    const { aggregator } = makeAggregator([silent("VIRUSTOTAL"), silent("SAFE_BROWSING")], {
      overallTimeoutMs: 1_000,
    })
    const started = Date.now()

    const verdict = await aggregator.evaluate(candidate("https://login.evil.test/reset"))

    expect(Date.now() - started).toBeLessThan(500)
    expect(verdict.isSafe).toBe("UNSAFE")
    expect(verdict.shortCircuited).toBe(true)
    expect(verdict.contributingResults.map((result) => result.source)).toEqual(["BLACKLIST"])
    expect(verdict.contributingResults[0]?.detail.match).toBe("evil.test")
  })

  test("enriches a short-circuited verdict once providers answer", async () => {
    const { aggregator, cache } = makeAggregator([
      answering("VIRUSTOTAL", "MATCHED_UNSAFE", 20),
      answering("SAFE_BROWSING", "CONFIRMED_SAFE", 20),
    ])

    const early = await aggregator.evaluate(candidate("http://evil.test/"))
    await aggregator.settled()
    const enriched = cache.get("http://evil.test/")

    expect(early.contributingResults.length).toBe(1)
    expect(enriched?.isSafe).toBe("UNSAFE")
    expect(enriched?.shortCircuited).toBe(true)
    expect(enriched?.contributingResults.map((result) => result.status)).toEqual([
      "MATCHED_UNSAFE",
      "MATCHED_UNSAFE",
      "CONFIRMED_SAFE",
    ])
  })

  test("is safe when every provider confirms", async () => {
    const { aggregator } = makeAggregator([
      answering("SAFE_BROWSING", "CONFIRMED_SAFE", 5),
      answering("VIRUSTOTAL", "CONFIRMED_SAFE", 15),
    ])

    const verdict = await aggregator.evaluate(candidate("https://docs.test/guide"))

    expect(verdict.isSafe).toBe("SAFE")
    expect(verdict.shortCircuited).toBe(false)
    expect(verdict.skippedSources).toEqual([])
    expect(verdict.contributingResults.map((result) => result.source)).toEqual([
      "BLACKLIST",
      "VIRUSTOTAL",
      "SAFE_BROWSING",
    ])
  })

  test("a single threat match is unsafe whichever provider answers first", async () => {
    const vtFirst = makeAggregator([
      answering("VIRUSTOTAL", "MATCHED_UNSAFE", 1),
      answering("SAFE_BROWSING", "CONFIRMED_SAFE", 30),
    ])
    const sbFirst = makeAggregator([
      answering("VIRUSTOTAL", "MATCHED_UNSAFE", 30),
      answering("SAFE_BROWSING", "CONFIRMED_SAFE", 1),
    ])

    const verdicts = await Promise.all([
      vtFirst.aggregator.evaluate(candidate("http://mixed.test/")),
      sbFirst.aggregator.evaluate(candidate("http://mixed.test/")),
    ])

    expect(verdicts.map((verdict) => verdict.isSafe)).toEqual(["UNSAFE", "UNSAFE"])
    expect(verdicts.map((verdict) => verdict.shortCircuited)).toEqual([false, false])
  })

  test("is unknown when a provider is unavailable or inconclusive", async () => {
    const unavailable = makeAggregator([
      answering("VIRUSTOTAL", "CONFIRMED_SAFE"),
      answering("SAFE_BROWSING", "UNAVAILABLE"),
    ])
    const inconclusive = makeAggregator([
      answering("VIRUSTOTAL", "INCONCLUSIVE"),
      answering("SAFE_BROWSING", "CONFIRMED_SAFE"),
    ])

    const first = await unavailable.aggregator.evaluate(candidate("http://maybe.test/"))
    const second = await inconclusive.aggregator.evaluate(candidate("http://maybe.test/"))

    expect(first.isSafe).toBe("UNKNOWN")
    expect(second.isSafe).toBe("UNKNOWN")
  })

  test("skips providers without credentials", async () => {
    const config = loadConfig({})
    const logger = createSilentLoggers().app
    const { aggregator } = makeAggregator([
      new VirusTotalClient(config, logger),
      new SafeBrowsingClient(config, logger),
    ])

    const verdict = await aggregator.evaluate(candidate("http://plain.test/"))

    expect(verdict.isSafe).toBe("UNKNOWN")
    expect(verdict.contributingResults.map((result) => result.status)).toEqual(["INCONCLUSIVE"])
    expect(verdict.skippedSources).toEqual([
      { source: "VIRUSTOTAL", reason: "CONFIGURATION_MISSING" },
      { source: "SAFE_BROWSING", reason: "CONFIGURATION_MISSING" },
    ])
  })

  test("serves a repeated url from the cache", async () => {
    const vt = answering("VIRUSTOTAL", "CONFIRMED_SAFE")
    const sb = answering("SAFE_BROWSING", "CONFIRMED_SAFE")
    const { aggregator } = makeAggregator([vt, sb])

    const first = await aggregator.evaluate(candidate("http://Repeat.test/page/"))
    const second = await aggregator.evaluate(candidate("http://repeat.test/page"))

    expect(second).toBe(first)
    expect(vt.calls).toBe(1)
    expect(sb.calls).toBe(1)
  })

  test("concurrent requests for one url share a single fan-out", async () => {
    const vt = answering("VIRUSTOTAL", "CONFIRMED_SAFE", 20)
    const sb = answering("SAFE_BROWSING", "CONFIRMED_SAFE", 20)
    const { aggregator, cache } = makeAggregator([vt, sb])

    const verdicts = await Promise.all(
      ["http://shared.test/a", "http://SHARED.test/a/", "http://shared.test/a#top", "http://shared.test./a"].map(
        (raw) => aggregator.evaluate(candidate(raw)),
      ),
    )

    expect(vt.calls).toBe(1)
    expect(sb.calls).toBe(1)
    expect(new Set(verdicts).size).toBe(1)
    expect(cache.stats().joined).toBe(3)
  })

  test("records a provider that misses the deadline as timed out", async () => {
    const { aggregator } = makeAggregator([silent("VIRUSTOTAL"), answering("SAFE_BROWSING", "CONFIRMED_SAFE")], {
      overallTimeoutMs: 150,
    })
    const started = Date.now()

    const verdict = await aggregator.evaluate(candidate("http://slow.test/"))
    const elapsed = Date.now() - started

    expect(elapsed).toBeGreaterThanOrEqual(140)
    expect(elapsed).toBeLessThan(600)
    expect(verdict.isSafe).toBe("UNKNOWN")
    expect(verdict.contributingResults[1]?.status).toBe("UNAVAILABLE")
    expect(verdict.contributingResults[1]?.detail.reason).toBe("TIMEOUT")
  })

  test("honors a per-call timeout", async () => {
    const { aggregator } = makeAggregator([silent("VIRUSTOTAL")], { overallTimeoutMs: 5_000 })
    const started = Date.now()

    const verdict = await aggregator.evaluate(candidate("http://hurry.test/"), 100)

    expect(Date.now() - started).toBeLessThan(1_000)
    expect(verdict.contributingResults[1]?.detail.reason).toBe("TIMEOUT")
  })

  test("a late confirmation is used by the next evaluation", async () => {
    const vt = answering("VIRUSTOTAL", "CONFIRMED_SAFE", 150)
    const { aggregator, cache } = makeAggregator([vt, answering("SAFE_BROWSING", "CONFIRMED_SAFE")], {
      overallTimeoutMs: 50,
    })

    const first = await aggregator.evaluate(candidate("http://late.test/"))
    await aggregator.settled()
    cache.invalidate("http://late.test/")
    const second = await aggregator.evaluate(candidate("http://late.test/"))

    expect(first.isSafe).toBe("UNKNOWN")
    expect(second.isSafe).toBe("SAFE")
    expect(vt.calls).toBe(1)
  })

  test("a late threat match evicts the cached verdict", async () => {
    const vt = answering("VIRUSTOTAL", "MATCHED_UNSAFE", 150)
    const { aggregator, cache } = makeAggregator([vt, answering("SAFE_BROWSING", "CONFIRMED_SAFE")], {
      overallTimeoutMs: 50,
    })

    const first = await aggregator.evaluate(candidate("http://sleeper.test/"))
    await aggregator.settled()
    const evicted = cache.get("http://sleeper.test/")
    const second = await aggregator.evaluate(candidate("http://sleeper.test/"))

    expect(first.isSafe).toBe("UNKNOWN")
    expect(evicted).toBeNull()
    expect(second.isSafe).toBe("UNSAFE")
    expect(vt.calls).toBe(1)
  })

  test("a provider that throws counts as unavailable", async () => {
    const broken = new StubProvider("SAFE_BROWSING", async () => {
      throw new Error("socket hang up")
    })
    const { aggregator } = makeAggregator([answering("VIRUSTOTAL", "CONFIRMED_SAFE"), broken])

    const verdict = await aggregator.evaluate(candidate("http://flaky.test/"))

    expect(verdict.isSafe).toBe("UNKNOWN")
    expect(verdict.contributingResults[2]?.detail).toEqual({
      reason: "TRANSPORT_ERROR",
      message: "socket hang up",
    })
  })

  test("a caller joining a longer flight still answers by its own deadline", async () => {
    const vt = silent("VIRUSTOTAL")
    const sb = silent("SAFE_BROWSING")
    const { aggregator, cache } = makeAggregator([vt, sb])

    const first = aggregator.evaluate(candidate("http://patient.test/"), 600)
    const started = Date.now()
    const joined = await aggregator.evaluate(candidate("http://patient.test/"), 100)
    const elapsed = Date.now() - started

    expect(elapsed).toBeLessThan(400)
    expect(joined.isSafe).toBe("UNKNOWN")
    expect(joined.contributingResults.map((result) => result.detail.reason)).toEqual([
      undefined,
      "TIMEOUT",
      "TIMEOUT",
    ])
    expect(vt.calls).toBe(1)
    expect(sb.calls).toBe(1)
    expect(cache.stats().size).toBe(0)

    const original = await first
    expect(original).not.toBe(joined)
    expect(cache.get("http://patient.test/")).toBe(original)
  })

  test("a late result is not reused once it has expired", async () => {
    const clock = fakeClock(1_000_000)
    const vt = answering("VIRUSTOTAL", "CONFIRMED_SAFE", 150)
    const { aggregator } = makeAggregator([vt, answering("SAFE_BROWSING", "CONFIRMED_SAFE")], {
      overallTimeoutMs: 50,
      now: clock.now,
    })

    const first = await aggregator.evaluate(candidate("http://stale.test/"))
    await aggregator.settled()
    // Past both the cached UNKNOWN verdict and the late SAFE answer.
    clock.nowMs += 60_001
    const second = await aggregator.evaluate(candidate("http://stale.test/"))

    expect(first.isSafe).toBe("UNKNOWN")
    expect(vt.calls).toBe(2)
    expect(second.isSafe).toBe("UNKNOWN")
    expect(second.contributingResults[1]?.detail.reason).toBe("TIMEOUT")
  })
})
