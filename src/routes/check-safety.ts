import { z } from "zod"
import { errorResponse, jsonResponse, readJsonBody } from "../lib/http"
import { classifyCandidate } from "../lib/url"
import type { ServerContext } from "../server-context"
import type { Assessment, ProviderResult, ProviderSource, SafetyStatus } from "../types"

const CheckSafetyRequestSchema = z.object({
  url: z.string().min(1).max(4096),
  timeout_ms: z.number().int().min(100).max(60_000).optional(),
})

const SOURCE_KEYS: Record<ProviderSource, string> = {
  BLACKLIST: "blacklist",
  VIRUSTOTAL: "virustotal",
  SAFE_BROWSING: "safe_browsing",
}

const VERDICT_MESSAGES: Record<SafetyStatus, string> = {
  SAFE: "Every consulted source cleared this URL.",
  UNSAFE: "This URL was flagged as dangerous. Do not open it.",
  UNKNOWN: "The safety of this URL could not be confirmed. Proceed with caution.",
}

export async function handleCheckSafety(request: Request, ctx: ServerContext): Promise<Response> {
  const payload = await readJsonBody(request)
  const parsed = CheckSafetyRequestSchema.safeParse(payload)

  if (!parsed.success) {
    return errorResponse(400, "Invalid check-safety payload", parsed.error.flatten())
  }

  const assessment = await assessPayload(parsed.data.url, ctx, parsed.data.timeout_ms)
  return jsonResponse(assessmentBody(assessment))
}

export async function assessPayload(raw: string, ctx: ServerContext, timeoutMs?: number): Promise<Assessment> {
  const candidate = classifyCandidate(raw)
  const assessment: Assessment =
    candidate.kind === "OPAQUE_TEXT"
      ? { kind: "opaque", candidate }
      : { kind: "verdict", verdict: await ctx.aggregator.evaluate(candidate, timeoutMs) }

  ctx.scanStats.record(assessment)
  return assessment
}

export function assessmentBody(assessment: Assessment): Record<string, unknown> {
  if (assessment.kind === "opaque") {
    return {
      candidate_type: "opaque_text",
      content: assessment.candidate.raw,
    }
  }

  const { verdict } = assessment
  const details: Record<string, unknown> = {}
  for (const result of verdict.contributingResults) {
    details[SOURCE_KEYS[result.source]] = resultBody(result)
  }

  return {
    candidate_type: "url",
    url: verdict.candidate.raw,
    normalized_url: verdict.candidate.normalized,
    is_safe: toTriState(verdict.isSafe),
    verdict: verdict.isSafe,
    message: VERDICT_MESSAGES[verdict.isSafe],
    short_circuited: verdict.shortCircuited,
    details,
    skipped: verdict.skippedSources.map((skipped) => ({
      source: SOURCE_KEYS[skipped.source],
      reason: skipped.reason,
    })),
    decided_at: verdict.decidedAt,
  }
}

function resultBody(result: ProviderResult): Record<string, unknown> {
  return {
    status: result.status,
    latency_ms: result.latencyMs,
    fetched_at: result.fetchedAt,
    ...result.detail,
  }
}

function toTriState(status: SafetyStatus): boolean | null {
  if (status === "SAFE") {
    return true
  }

  if (status === "UNSAFE") {
    return false
  }

  return null
}
