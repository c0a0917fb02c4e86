import { setTimeout as delay } from "node:timers/promises"
import type pino from "pino"
import type { z } from "zod"
import type { RateLimitSettings } from "../config"
import type {
  ProviderDetail,
  ProviderResult,
  ProviderStatus,
  UnavailableReason,
  UrlCandidate,
} from "../types"
import { TokenBucket } from "./rate-limiter"
import type { ExternalSource, ReputationProvider } from "./reputation-provider"

export type FetchImpl = (input: Request | URL | string, init?: RequestInit) => Promise<Response>

const MAX_ATTEMPTS = 2
const DEADLINE_MARGIN_MS = 10

export class ProviderRequestError extends Error {
  constructor(
    readonly reason: UnavailableReason,
    message: string,
    readonly retryable = false,
    readonly status?: number,
  ) {
    super(message)
    this.name = "ProviderRequestError"
  }
}

export interface ProviderFinding {
  status: Exclude<ProviderStatus, "UNAVAILABLE">
  detail: ProviderDetail
}

export interface ProviderHttpRequest {
  url: string
  method: "GET" | "POST"
  headers?: Record<string, string>
  body?: string | URLSearchParams
}

export interface ProviderHttpResponse {
  status: number
  body: unknown
}

export interface ReputationClientSettings {
  apiKey: string
  rateLimit: RateLimitSettings
  requestTimeoutMs: number
  retryBaseDelayMs: number
}

export interface ReputationClientDependencies {
  fetchImpl?: FetchImpl
  bucket?: TokenBucket
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Shared plumbing for external reputation lookups: every outbound call spends
 * a token from the provider's own bucket, is timed out ahead of the caller's
 * deadline and is retried once when the failure looks transient. Adapters
 * implement `lookup` and map the provider payload to a finding.
 */
export abstract class ReputationClient implements ReputationProvider {
  abstract readonly source: ExternalSource

  protected readonly fetchImpl: FetchImpl
  protected readonly now: () => number
  protected readonly sleep: (ms: number) => Promise<void>
  readonly bucket: TokenBucket

  constructor(
    protected readonly settings: ReputationClientSettings,
    protected readonly logger: pino.Logger,
    dependencies: ReputationClientDependencies = {},
  ) {
    this.fetchImpl = dependencies.fetchImpl ?? fetch
    this.now = dependencies.now ?? Date.now
    this.sleep = dependencies.sleep ?? ((ms) => delay(ms))
    this.bucket = dependencies.bucket ?? new TokenBucket({
      capacity: settings.rateLimit.capacity,
      refillPerSecond: settings.rateLimit.refillPerSecond,
      now: this.now,
      sleep: this.sleep,
    })
  }

  get configured(): boolean {
    return this.settings.apiKey.length > 0
  }

  async check(candidate: UrlCandidate, deadline: number): Promise<ProviderResult> {
    const started = this.now()

    if (!this.configured) {
      return this.unavailable(started, "CONFIGURATION_MISSING", `${this.source} API key is not configured`)
    }

    try {
      const finding = await this.lookup(candidate, deadline)
      return {
        source: this.source,
        status: finding.status,
        detail: finding.detail,
        latencyMs: this.now() - started,
        fetchedAt: new Date(started).toISOString(),
      }
    } catch (error) {
      const failure = toProviderRequestError(error)
      this.logger.warn(
        {
          source: this.source,
          url: candidate.normalized,
          reason: failure.reason,
          httpStatus: failure.status,
          error: failure.message,
        },
        "reputation provider check failed",
      )

      return this.unavailable(started, failure.reason, failure.message, failure.status)
    }
  }

  protected abstract lookup(candidate: UrlCandidate, deadline: number): Promise<ProviderFinding>

  protected async requestJson(request: ProviderHttpRequest, deadline: number): Promise<ProviderHttpResponse> {
    let lastError: ProviderRequestError | null = null

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      if (lastError) {
        const backoffMs = this.settings.retryBaseDelayMs * 2 ** (attempt - 2)
        if (this.now() + backoffMs >= deadline - DEADLINE_MARGIN_MS) {
          break
        }
        await this.sleep(backoffMs)
      }

      const acquired = await this.bucket.acquire(deadline - DEADLINE_MARGIN_MS)
      if (!acquired) {
        throw lastError ?? new ProviderRequestError(
          "RATE_LIMITED",
          `${this.source} request budget exhausted before the deadline`,
        )
      }

      try {
        return await this.send(request, deadline)
      } catch (error) {
        const failure = toProviderRequestError(error)
        if (!failure.retryable) {
          throw failure
        }
        lastError = failure
      }
    }

    throw lastError ?? new ProviderRequestError("TIMEOUT", `${this.source} deadline reached`)
  }

  protected parsePayload<S extends z.ZodTypeAny>(schema: S, payload: unknown): z.infer<S> {
    const parsed = schema.safeParse(payload)
    if (!parsed.success) {
      throw new ProviderRequestError(
        "MALFORMED_PROVIDER_RESPONSE",
        `${this.source} response did not match the expected shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      )
    }

    return parsed.data
  }

  private async send(request: ProviderHttpRequest, deadline: number): Promise<ProviderHttpResponse> {
    const remainingMs = deadline - this.now() - DEADLINE_MARGIN_MS
    if (remainingMs <= 0) {
      throw new ProviderRequestError("TIMEOUT", `${this.source} deadline reached before the request was sent`)
    }

    const timeoutMs = Math.min(this.settings.requestTimeoutMs, remainingMs)
    const controller = new AbortController()
    const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await this.fetchImpl(request.url, {
        method: request.method,
        headers: {
          Accept: "application/json",
          ...request.headers,
        },
        body: request.body,
        signal: controller.signal,
      })

      const bodyText = await response.text()

      if (!response.ok) {
        throw httpError(this.source, response.status, bodyText)
      }

      return {
        status: response.status,
        body: parseJson(this.source, bodyText),
      }
    } catch (error) {
      if (error instanceof ProviderRequestError) {
        throw error
      }

      if (controller.signal.aborted) {
        throw new ProviderRequestError("TIMEOUT", `${this.source} request timed out after ${timeoutMs}ms`, true)
      }

      throw new ProviderRequestError("TRANSPORT_ERROR", `${this.source} request failed: ${errorMessage(error)}`, true)
    } finally {
      clearTimeout(timeoutHandle)
    }
  }

  private unavailable(
    started: number,
    reason: UnavailableReason,
    message: string,
    httpStatus?: number,
  ): ProviderResult {
    const detail: ProviderDetail = { reason, message }
    if (httpStatus !== undefined) {
      detail.http_status = httpStatus
    }

    return {
      source: this.source,
      status: "UNAVAILABLE",
      detail,
      latencyMs: this.now() - started,
      fetchedAt: new Date(started).toISOString(),
    }
  }
}

function httpError(source: ExternalSource, status: number, bodyText: string): ProviderRequestError {
  const message = `${source} returned ${status}: ${bodyText.slice(0, 300)}`

  if (status === 429) {
    return new ProviderRequestError("RATE_LIMITED", message, false, status)
  }

  return new ProviderRequestError("HTTP_ERROR", message, status >= 500, status)
}

function parseJson(source: ExternalSource, bodyText: string): unknown {
  if (bodyText.trim().length === 0) {
    return {}
  }

  try {
    return JSON.parse(bodyText)
  } catch {
    throw new ProviderRequestError("MALFORMED_PROVIDER_RESPONSE", `${source} returned a body that is not JSON`)
  }
}

function toProviderRequestError(error: unknown): ProviderRequestError {
  if (error instanceof ProviderRequestError) {
    return error
  }

  return new ProviderRequestError("TRANSPORT_ERROR", errorMessage(error))
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
