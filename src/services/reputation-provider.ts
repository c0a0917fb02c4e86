import type { ProviderResult, ProviderSource, UrlCandidate } from "../types"

export type ExternalSource = Exclude<ProviderSource, "BLACKLIST">

export interface ReputationProvider {
  readonly source: ExternalSource
  readonly configured: boolean
  /** Never rejects; failures come back as an UNAVAILABLE result. */
  check(candidate: UrlCandidate, deadline: number): Promise<ProviderResult>
}
