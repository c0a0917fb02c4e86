import type {
  ProviderResult,
  ProviderSource,
  SafetyStatus,
  SkippedSource,
  UrlCandidate,
  Verdict,
} from "../types"

const SOURCE_ORDER: Record<ProviderSource, number> = {
  BLACKLIST: 0,
  VIRUSTOTAL: 1,
  SAFE_BROWSING: 2,
}

/**
 * One threat signal is enough for UNSAFE. SAFE needs at least one external
 * provider and every external provider confirming; a blacklist miss neither
 * confirms nor objects.
 */
export function combineResults(results: readonly ProviderResult[]): SafetyStatus {
  if (results.some((result) => result.status === "MATCHED_UNSAFE")) {
    return "UNSAFE"
  }

  const external = results.filter((result) => result.source !== "BLACKLIST")
  if (external.length > 0 && external.every((result) => result.status === "CONFIRMED_SAFE")) {
    return "SAFE"
  }

  return "UNKNOWN"
}

export function buildVerdict(
  candidate: UrlCandidate,
  results: readonly ProviderResult[],
  skippedSources: readonly SkippedSource[],
  decidedAt: number,
  shortCircuited = false,
): Verdict {
  const ordered = [...results].sort((left, right) => SOURCE_ORDER[left.source] - SOURCE_ORDER[right.source])

  return Object.freeze({
    candidate,
    isSafe: combineResults(ordered),
    contributingResults: Object.freeze(ordered),
    skippedSources: Object.freeze([...skippedSources]),
    shortCircuited,
    decidedAt: new Date(decidedAt).toISOString(),
  })
}
