import type pino from "pino"
import { z } from "zod"
import type { AppConfig, VirusTotalSettings } from "../config"
import type { ProviderDetail, UrlCandidate } from "../types"
import {
  ProviderRequestError,
  ReputationClient,
  type ProviderFinding,
  type ReputationClientDependencies,
} from "./reputation-client"

const AnalysisStatsSchema = z.object({
  malicious: z.number().int().nonnegative(),
  suspicious: z.number().int().nonnegative(),
  harmless: z.number().int().nonnegative().default(0),
  undetected: z.number().int().nonnegative().default(0),
  timeout: z.number().int().nonnegative().default(0),
})

const UrlReportSchema = z.object({
  data: z.object({
    id: z.string().optional(),
    attributes: z.object({
      last_analysis_stats: AnalysisStatsSchema,
      last_analysis_date: z.number().optional(),
      reputation: z.number().optional(),
      categories: z.record(z.string()).optional(),
    }),
  }),
})

const SubmissionSchema = z.object({
  data: z.object({
    id: z.string().min(1),
  }),
})

const AnalysisSchema = z.object({
  data: z.object({
    attributes: z.object({
      status: z.string(),
      stats: AnalysisStatsSchema.optional(),
    }),
  }),
})

export type AnalysisStats = z.infer<typeof AnalysisStatsSchema>

/** VirusTotal v3 URL identifier: unpadded base64url of the URL. */
export function virusTotalUrlId(url: string): string {
  return Buffer.from(url, "utf8").toString("base64url").replace(/=+$/, "")
}

export class VirusTotalClient extends ReputationClient {
  readonly source = "VIRUSTOTAL" as const

  private readonly vt: VirusTotalSettings

  constructor(config: AppConfig, logger: pino.Logger, dependencies: ReputationClientDependencies = {}) {
    super(
      {
        apiKey: config.virustotal.apiKey,
        rateLimit: config.virustotal.rateLimit,
        requestTimeoutMs: config.virustotal.requestTimeoutMs,
        retryBaseDelayMs: config.retryBaseDelayMs,
      },
      logger,
      dependencies,
    )
    this.vt = config.virustotal
  }

  protected async lookup(candidate: UrlCandidate, deadline: number): Promise<ProviderFinding> {
    const url = candidate.url.href

    try {
      const report = await this.requestJson(
        {
          url: `${this.vt.baseUrl}/urls/${virusTotalUrlId(url)}`,
          method: "GET",
          headers: this.authHeaders(),
        },
        deadline,
      )
      const attributes = this.parsePayload(UrlReportSchema, report.body).data.attributes

      return this.classify(attributes.last_analysis_stats, {
        reputation: attributes.reputation,
        categories: attributes.categories,
        last_analysis_date: attributes.last_analysis_date,
      })
    } catch (error) {
      if (!(error instanceof ProviderRequestError) || error.status !== 404) {
        throw error
      }
    }

    if (!this.vt.submitUnknown) {
      return {
        status: "INCONCLUSIVE",
        detail: { message: "URL is unknown to VirusTotal" },
      }
    }

    return this.submitAndPoll(url, deadline)
  }

  private async submitAndPoll(url: string, deadline: number): Promise<ProviderFinding> {
    const submission = await this.requestJson(
      {
        url: `${this.vt.baseUrl}/urls`,
        method: "POST",
        headers: this.authHeaders(),
        body: new URLSearchParams({ url }),
      },
      deadline,
    )
    const analysisId = this.parsePayload(SubmissionSchema, submission.body).data.id

    if (this.now() + this.vt.pollDelayMs >= deadline) {
      return {
        status: "INCONCLUSIVE",
        detail: {
          message: "URL submitted to VirusTotal, analysis pending",
          analysis_id: analysisId,
          analysis_status: "submitted",
        },
      }
    }

    if (this.vt.pollDelayMs > 0) {
      await this.sleep(this.vt.pollDelayMs)
    }

    const analysis = await this.requestJson(
      {
        url: `${this.vt.baseUrl}/analyses/${encodeURIComponent(analysisId)}`,
        method: "GET",
        headers: this.authHeaders(),
      },
      deadline,
    )
    const attributes = this.parsePayload(AnalysisSchema, analysis.body).data.attributes

    if (attributes.status !== "completed" || !attributes.stats) {
      return {
        status: "INCONCLUSIVE",
        detail: {
          message: "VirusTotal analysis has not completed",
          analysis_id: analysisId,
          analysis_status: attributes.status,
        },
      }
    }

    return this.classify(attributes.stats, { analysis_id: analysisId })
  }

  private classify(stats: AnalysisStats, extra: ProviderDetail): ProviderFinding {
    const detections = stats.malicious + (this.vt.countSuspicious ? stats.suspicious : 0)
    const enginesReporting = stats.malicious + stats.suspicious + stats.harmless + stats.undetected
    const detail: ProviderDetail = {
      ...extra,
      stats,
      detections,
      min_detections: this.vt.minDetections,
    }

    if (detections >= this.vt.minDetections) {
      return { status: "MATCHED_UNSAFE", detail }
    }

    if (stats.malicious === 0 && stats.suspicious === 0 && enginesReporting > 0) {
      return { status: "CONFIRMED_SAFE", detail }
    }

    return { status: "INCONCLUSIVE", detail }
  }

  private authHeaders(): Record<string, string> {
    return { "x-apikey": this.vt.apiKey }
  }
}
