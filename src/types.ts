export type ProviderSource = "BLACKLIST" | "VIRUSTOTAL" | "SAFE_BROWSING"

export type ProviderStatus = "MATCHED_UNSAFE" | "CONFIRMED_SAFE" | "INCONCLUSIVE" | "UNAVAILABLE"

export type UnavailableReason =
  | "TIMEOUT"
  | "RATE_LIMITED"
  | "TRANSPORT_ERROR"
  | "HTTP_ERROR"
  | "MALFORMED_PROVIDER_RESPONSE"
  | "CONFIGURATION_MISSING"

export type SafetyStatus = "SAFE" | "UNSAFE" | "UNKNOWN"

export interface UrlCandidate {
  kind: "URL"
  raw: string
  url: URL
  normalized: string
}

export interface OpaqueCandidate {
  kind: "OPAQUE_TEXT"
  raw: string
}

export type Candidate = UrlCandidate | OpaqueCandidate

export interface ProviderDetail {
  reason?: UnavailableReason
  message?: string
  [key: string]: unknown
}

export interface ProviderResult {
  readonly source: ProviderSource
  readonly status: ProviderStatus
  readonly detail: Readonly<ProviderDetail>
  readonly latencyMs: number
  readonly fetchedAt: string
}

export interface SkippedSource {
  source: ProviderSource
  reason: UnavailableReason
}

export interface Verdict {
  readonly candidate: UrlCandidate
  readonly isSafe: SafetyStatus
  readonly contributingResults: readonly ProviderResult[]
  readonly skippedSources: readonly SkippedSource[]
  readonly shortCircuited: boolean
  readonly decidedAt: string
}

/** Result of decoding one payload and, for URLs, judging it. */
export type Assessment =
  | { kind: "opaque"; candidate: OpaqueCandidate }
  | { kind: "verdict"; verdict: Verdict }
