import { z } from "zod"

export type VirusTotalRateLimitTier = "public"
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent"

export interface RateLimitSettings {
  tier: VirusTotalRateLimitTier | "custom"
  capacity: number
  refillPerSecond: number
}

export interface VirusTotalSettings {
  apiKey: string
  baseUrl: string
  rateLimit: RateLimitSettings
  requestTimeoutMs: number
  minDetections: number
  countSuspicious: boolean
  submitUnknown: boolean
  pollDelayMs: number
}

export interface SafeBrowsingSettings {
  apiKey: string
  baseUrl: string
  rateLimit: RateLimitSettings
  requestTimeoutMs: number
  threatTypes: string[]
  clientId: string
  clientVersion: string
}

export interface VerdictCacheSettings {
  maxEntries: number
  safeTtlMs: number
  unsafeTtlMs: number
  unknownTtlMs: number
}

export interface UploadSettings {
  maxBytes: number
  allowedExtensions: string[]
}

export interface AppConfig {
  port: number
  host: string
  logDir: string
  logLevel: LogLevel
  overallTimeoutMs: number
  retryBaseDelayMs: number
  blacklistFile: string
  blacklistDomains: string[]
  virustotal: VirusTotalSettings
  safeBrowsing: SafeBrowsingSettings
  cache: VerdictCacheSettings
  upload: UploadSettings
}

// Requests per minute on VirusTotal's public API tier.
const virusTotalTierRpm: Record<VirusTotalRateLimitTier, number> = {
  public: 4,
}

const DEFAULT_THREAT_TYPES = [
  "MALWARE",
  "SOCIAL_ENGINEERING",
  "UNWANTED_SOFTWARE",
  "POTENTIALLY_HARMFUL_APPLICATION",
]

const MIN_OVERALL_TIMEOUT_MS = 100
const MAX_OVERALL_TIMEOUT_MS = 60_000

const RateLimitTierSchema = z.enum(["public"])
const RateLimitSettingSchema = z.preprocess(
  (value) => {
    if (typeof value !== "string") {
      return value
    }

    const normalized = value.trim().toLowerCase()
    if (/^\d+$/.test(normalized)) {
      const perMinute = Number.parseInt(normalized, 10)
      return perMinute > 0 ? perMinute : "public"
    }

    // Unrecognized tiers fall back to the public budget.
    return RateLimitTierSchema.safeParse(normalized).success ? normalized : "public"
  },
  z.union([RateLimitTierSchema, z.number().int().positive()]),
)

const EnvSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  QRGUARD_LOG_DIR: z.string().default("./data/logs"),
  QRGUARD_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  QRGUARD_OVERALL_TIMEOUT_MS: z.string().optional(),
  QRGUARD_RETRY_BASE_DELAY_MS: z.string().optional(),
  QRGUARD_BLACKLIST_FILE: z.string().default("./data/blacklist.txt"),
  QRGUARD_BLACKLIST_DOMAINS: z.string().optional(),
  QRGUARD_VIRUSTOTAL_API_KEY: z.string().optional(),
  VIRUSTOTAL_API_KEY: z.string().optional(),
  QRGUARD_VIRUSTOTAL_API_BASE_URL: z.string().default("https://www.virustotal.com/api/v3"),
  QRGUARD_VIRUSTOTAL_RATE_LIMIT: RateLimitSettingSchema.default("public"),
  QRGUARD_VIRUSTOTAL_BURST: z.string().optional(),
  QRGUARD_VIRUSTOTAL_MIN_DETECTIONS: z.string().optional(),
  QRGUARD_VIRUSTOTAL_COUNT_SUSPICIOUS: z.string().optional(),
  QRGUARD_VIRUSTOTAL_SUBMIT_UNKNOWN: z.string().optional(),
  QRGUARD_VIRUSTOTAL_POLL_DELAY_MS: z.string().optional(),
  QRGUARD_VIRUSTOTAL_TIMEOUT_MS: z.string().optional(),
  QRGUARD_SAFE_BROWSING_API_KEY: z.string().optional(),
  GOOGLE_SAFE_BROWSING_API_KEY: z.string().optional(),
  QRGUARD_SAFE_BROWSING_API_BASE_URL: z.string().default("https://safebrowsing.googleapis.com/v4"),
  QRGUARD_SAFE_BROWSING_DAILY_QUOTA: z.string().optional(),
  QRGUARD_SAFE_BROWSING_BURST: z.string().optional(),
  QRGUARD_SAFE_BROWSING_TIMEOUT_MS: z.string().optional(),
  QRGUARD_SAFE_BROWSING_THREAT_TYPES: z.string().optional(),
  QRGUARD_SAFE_BROWSING_CLIENT_ID: z.string().default("qrguard"),
  QRGUARD_SAFE_BROWSING_CLIENT_VERSION: z.string().default("0.1.0"),
  QRGUARD_CACHE_MAX_ENTRIES: z.string().optional(),
  QRGUARD_CACHE_SAFE_TTL_MINUTES: z.string().optional(),
  QRGUARD_CACHE_UNSAFE_TTL_MINUTES: z.string().optional(),
  QRGUARD_CACHE_UNKNOWN_TTL_MINUTES: z.string().optional(),
  QRGUARD_UPLOAD_MAX_BYTES: z.string().optional(),
})

function toBoolean(input: string | undefined, defaultValue: boolean): boolean {
  if (input === undefined) {
    return defaultValue
  }

  const normalized = input.trim().toLowerCase()
  if (["1", "true", "yes", "on"].includes(normalized)) {
    return true
  }

  if (["0", "false", "no", "off"].includes(normalized)) {
    return false
  }

  return defaultValue
}

function toInteger(input: string | undefined, defaultValue: number): number {
  if (!input) {
    return defaultValue
  }

  const parsed = Number.parseInt(input, 10)
  if (Number.isNaN(parsed)) {
    return defaultValue
  }

  return parsed
}

function toMinInteger(input: string | undefined, defaultValue: number, min: number): number {
  const parsed = toInteger(input, defaultValue)
  return parsed < min ? min : parsed
}

function toBoundedInteger(input: string | undefined, defaultValue: number, min: number, max: number): number {
  return Math.min(max, toMinInteger(input, defaultValue, min))
}

function parseDomainList(input: string | undefined): string[] {
  if (!input) {
    return []
  }

  return [
    ...new Set(
      input
        .split(",")
        .map((item) => item.trim().toLowerCase())
        .map((item) => item.replace(/^\*\./, ""))
        .map((item) => item.replace(/\.+$/, ""))
        .filter((item) => item.length > 0),
    ),
  ]
}

function parseThreatTypes(input: string | undefined): string[] {
  if (!input) {
    return [...DEFAULT_THREAT_TYPES]
  }

  const parsed = [
    ...new Set(
      input
        .split(",")
        .map((item) => item.trim().toUpperCase())
        .filter((item) => /^[A-Z_]+$/.test(item)),
    ),
  ]

  return parsed.length > 0 ? parsed : [...DEFAULT_THREAT_TYPES]
}

function pickApiKey(...candidates: Array<string | undefined>): string {
  for (const candidate of candidates) {
    const trimmed = candidate?.trim()
    if (trimmed) {
      return trimmed
    }
  }

  return ""
}

function trimBaseUrl(value: string): string {
  return value.trim().replace(/\/+$/, "")
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = EnvSchema.parse(env)
  const vtRateLimit = parsed.QRGUARD_VIRUSTOTAL_RATE_LIMIT
  const vtRequestsPerMinute = typeof vtRateLimit === "number" ? vtRateLimit : virusTotalTierRpm[vtRateLimit]
  const vtBurst = toMinInteger(parsed.QRGUARD_VIRUSTOTAL_BURST, Math.max(1, vtRequestsPerMinute), 1)
  const sbDailyQuota = toMinInteger(parsed.QRGUARD_SAFE_BROWSING_DAILY_QUOTA, 10_000, 1)

  return {
    port: toInteger(parsed.PORT, 3000),
    host: parsed.HOST ?? "0.0.0.0",
    logDir: parsed.QRGUARD_LOG_DIR,
    logLevel: parsed.QRGUARD_LOG_LEVEL,
    overallTimeoutMs: toBoundedInteger(
      parsed.QRGUARD_OVERALL_TIMEOUT_MS,
      8_000,
      MIN_OVERALL_TIMEOUT_MS,
      MAX_OVERALL_TIMEOUT_MS,
    ),
    retryBaseDelayMs: toMinInteger(parsed.QRGUARD_RETRY_BASE_DELAY_MS, 200, 0),
    blacklistFile: parsed.QRGUARD_BLACKLIST_FILE,
    blacklistDomains: parseDomainList(parsed.QRGUARD_BLACKLIST_DOMAINS),
    virustotal: {
      apiKey: pickApiKey(parsed.QRGUARD_VIRUSTOTAL_API_KEY, parsed.VIRUSTOTAL_API_KEY),
      baseUrl: trimBaseUrl(parsed.QRGUARD_VIRUSTOTAL_API_BASE_URL),
      rateLimit: {
        tier: typeof vtRateLimit === "number" ? "custom" : vtRateLimit,
        capacity: vtBurst,
        refillPerSecond: vtRequestsPerMinute / 60,
      },
      requestTimeoutMs: toMinInteger(parsed.QRGUARD_VIRUSTOTAL_TIMEOUT_MS, 5_000, 50),
      minDetections: toMinInteger(parsed.QRGUARD_VIRUSTOTAL_MIN_DETECTIONS, 1, 1),
      countSuspicious: toBoolean(parsed.QRGUARD_VIRUSTOTAL_COUNT_SUSPICIOUS, true),
      submitUnknown: toBoolean(parsed.QRGUARD_VIRUSTOTAL_SUBMIT_UNKNOWN, true),
      pollDelayMs: toMinInteger(parsed.QRGUARD_VIRUSTOTAL_POLL_DELAY_MS, 1_000, 0),
    },
    safeBrowsing: {
      apiKey: pickApiKey(parsed.QRGUARD_SAFE_BROWSING_API_KEY, parsed.GOOGLE_SAFE_BROWSING_API_KEY),
      baseUrl: trimBaseUrl(parsed.QRGUARD_SAFE_BROWSING_API_BASE_URL),
      rateLimit: {
        tier: "custom",
        capacity: toMinInteger(parsed.QRGUARD_SAFE_BROWSING_BURST, 20, 1),
        refillPerSecond: sbDailyQuota / 86_400,
      },
      requestTimeoutMs: toMinInteger(parsed.QRGUARD_SAFE_BROWSING_TIMEOUT_MS, 4_000, 50),
      threatTypes: parseThreatTypes(parsed.QRGUARD_SAFE_BROWSING_THREAT_TYPES),
      clientId: parsed.QRGUARD_SAFE_BROWSING_CLIENT_ID,
      clientVersion: parsed.QRGUARD_SAFE_BROWSING_CLIENT_VERSION,
    },
    cache: {
      maxEntries: toMinInteger(parsed.QRGUARD_CACHE_MAX_ENTRIES, 1_000, 1),
      safeTtlMs: toMinInteger(parsed.QRGUARD_CACHE_SAFE_TTL_MINUTES, 60, 0) * 60 * 1000,
      unsafeTtlMs: toMinInteger(parsed.QRGUARD_CACHE_UNSAFE_TTL_MINUTES, 10, 0) * 60 * 1000,
      unknownTtlMs: toMinInteger(parsed.QRGUARD_CACHE_UNKNOWN_TTL_MINUTES, 2, 0) * 60 * 1000,
    },
    upload: {
      maxBytes: toMinInteger(parsed.QRGUARD_UPLOAD_MAX_BYTES, 5 * 1024 * 1024, 1),
      allowedExtensions: ["png", "jpg", "jpeg", "gif"],
    },
  }
}
