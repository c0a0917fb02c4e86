import type { Candidate } from "../types"

const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"])

export function classifyCandidate(raw: string): Candidate {
  const trimmed = raw.trim()

  let url: URL
  try {
    url = new URL(trimmed)
  } catch {
    return { kind: "OPAQUE_TEXT", raw }
  }

  if (!SUPPORTED_PROTOCOLS.has(url.protocol) || normalizeHostname(url.hostname).length === 0) {
    return { kind: "OPAQUE_TEXT", raw }
  }

  return {
    kind: "URL",
    raw,
    url,
    normalized: normalizeUrl(url),
  }
}

/**
 * Cache key for a URL: scheme, host and port, path and query. The host is
 * lower-cased without a trailing dot, trailing slashes on the path are
 * dropped (the root stays `/`) and the fragment is ignored.
 */
export function normalizeUrl(url: URL): string {
  const host = normalizeHostname(url.hostname)
  const port = url.port ? `:${url.port}` : ""
  const path = url.pathname.replace(/\/+$/, "") || "/"

  return `${url.protocol}//${host}${port}${path}${url.search}`
}

export function normalizeHostname(hostname: string): string {
  return hostname.trim().toLowerCase().replace(/\.+$/, "")
}
