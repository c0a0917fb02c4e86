import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleReadyz(_request: Request, ctx: ServerContext): Response {
  const virustotalConfigured = Boolean(ctx.config.virustotal.apiKey)
  const safeBrowsingConfigured = Boolean(ctx.config.safeBrowsing.apiKey)
  const virustotalBaseUrlValid = !virustotalConfigured || isValidUrl(ctx.config.virustotal.baseUrl)
  const safeBrowsingBaseUrlValid = !safeBrowsingConfigured || isValidUrl(ctx.config.safeBrowsing.baseUrl)

  const checks = {
    virustotal_api_key_configured: virustotalConfigured,
    virustotal_base_url_valid: virustotalBaseUrlValid,
    safe_browsing_api_key_configured: safeBrowsingConfigured,
    safe_browsing_base_url_valid: safeBrowsingBaseUrlValid,
    blacklist_entries: ctx.blacklist.size,
  }

  // Without an external provider every verdict would be UNKNOWN or a blacklist hit.
  const ready =
    (virustotalConfigured || safeBrowsingConfigured) &&
    virustotalBaseUrlValid &&
    safeBrowsingBaseUrlValid

  return jsonResponse(
    {
      status: ready ? "ready" : "not_ready",
      timestamp: new Date().toISOString(),
      checks,
    },
    ready ? 200 : 503,
  )
}

function isValidUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === "http:" || parsed.protocol === "https:"
  } catch {
    return false
  }
}
