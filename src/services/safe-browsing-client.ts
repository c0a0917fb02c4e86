import type pino from "pino"
import { z } from "zod"
import type { AppConfig, SafeBrowsingSettings } from "../config"
import type { UrlCandidate } from "../types"
import {
  ReputationClient,
  type ProviderFinding,
  type ReputationClientDependencies,
} from "./reputation-client"

const ThreatMatchSchema = z.object({
  threatType: z.string(),
  platformType: z.string().optional(),
  threatEntryType: z.string().optional(),
  threat: z.object({ url: z.string().optional() }).optional(),
  cacheDuration: z.string().optional(),
})

const ThreatMatchesResponseSchema = z.object({
  matches: z.array(ThreatMatchSchema).optional(),
})

export class SafeBrowsingClient extends ReputationClient {
  readonly source = "SAFE_BROWSING" as const

  private readonly sb: SafeBrowsingSettings

  constructor(config: AppConfig, logger: pino.Logger, dependencies: ReputationClientDependencies = {}) {
    super(
      {
        apiKey: config.safeBrowsing.apiKey,
        rateLimit: config.safeBrowsing.rateLimit,
        requestTimeoutMs: config.safeBrowsing.requestTimeoutMs,
        retryBaseDelayMs: config.retryBaseDelayMs,
      },
      logger,
      dependencies,
    )
    this.sb = config.safeBrowsing
  }

  protected async lookup(candidate: UrlCandidate, deadline: number): Promise<ProviderFinding> {
    const query = new URLSearchParams({ key: this.sb.apiKey })
    const response = await this.requestJson(
      {
        url: `${this.sb.baseUrl}/threatMatches:find?${query.toString()}`,
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          client: {
            clientId: this.sb.clientId,
            clientVersion: this.sb.clientVersion,
          },
          threatInfo: {
            threatTypes: this.sb.threatTypes,
            platformTypes: ["ANY_PLATFORM"],
            threatEntryTypes: ["URL"],
            threatEntries: [{ url: candidate.url.href }],
          },
        }),
      },
      deadline,
    )

    const matches = this.parsePayload(ThreatMatchesResponseSchema, response.body).matches ?? []

    if (matches.length > 0) {
      return {
        status: "MATCHED_UNSAFE",
        detail: {
          threat_types: [...new Set(matches.map((match) => match.threatType))],
          platform_types: [...new Set(matches.flatMap((match) => match.platformType ?? []))],
          match_count: matches.length,
        },
      }
    }

    return {
      status: "CONFIRMED_SAFE",
      detail: { threat_types: [], match_count: 0 },
    }
  }
}
