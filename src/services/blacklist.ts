import { readFileSync } from "node:fs"
import type pino from "pino"
import { domainSuffixes, normalizeDomain } from "../lib/domain-match"
import { classifyCandidate } from "../lib/url"
import type { ProviderResult, UrlCandidate } from "../types"

export interface BlacklistEntries {
  domains: string[]
  urls: string[]
}

/**
 * Local set of known-bad domains and URLs. Filled once at startup and only
 * read afterwards.
 */
export class BlacklistStore {
  private readonly domains: ReadonlySet<string>
  private readonly urls: ReadonlySet<string>

  constructor(
    entries: Iterable<string>,
    private readonly now: () => number = Date.now,
  ) {
    const parsed = parseBlacklistEntries(entries)
    this.domains = new Set(parsed.domains)
    this.urls = new Set(parsed.urls)
  }

  static fromFile(
    path: string,
    extraEntries: string[],
    logger: pino.Logger,
  ): BlacklistStore {
    let fileEntries: string[] = []

    try {
      fileEntries = readFileSync(path, "utf8").split(/\r?\n/)
    } catch (error) {
      logger.warn({ error, path }, "blacklist file could not be read, continuing without it")
    }

    return new BlacklistStore([...fileEntries, ...extraEntries])
  }

  get size(): number {
    return this.domains.size + this.urls.size
  }

  lookup(candidate: UrlCandidate): ProviderResult {
    const started = this.now()
    const matchedRule = this.findMatch(candidate)

    return {
      source: "BLACKLIST",
      status: matchedRule ? "MATCHED_UNSAFE" : "INCONCLUSIVE",
      detail: matchedRule
        ? { match: matchedRule, message: "URL is in the local blacklist" }
        : { message: "URL is not in the local blacklist" },
      latencyMs: this.now() - started,
      fetchedAt: new Date(started).toISOString(),
    }
  }

  private findMatch(candidate: UrlCandidate): string | null {
    if (this.urls.has(candidate.normalized)) {
      return candidate.normalized
    }

    for (const suffix of domainSuffixes(candidate.url.hostname)) {
      if (this.domains.has(suffix)) {
        return suffix
      }
    }

    return null
  }
}

export function parseBlacklistEntries(lines: Iterable<string>): BlacklistEntries {
  const domains = new Set<string>()
  const urls = new Set<string>()

  for (const line of lines) {
    const entry = line.replace(/#.*$/, "").trim()
    if (!entry) {
      continue
    }

    if (entry.includes("://")) {
      const candidate = classifyCandidate(entry)
      if (candidate.kind === "URL") {
        urls.add(candidate.normalized)
      }
      continue
    }

    const domain = normalizeDomain(entry)
    if (domain.length > 0) {
      domains.add(domain)
    }
  }

  return {
    domains: [...domains],
    urls: [...urls],
  }
}
