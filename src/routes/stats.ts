import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleStats(_request: Request, ctx: ServerContext): Response {
  const cache = ctx.verdictCache.stats()

  return jsonResponse({
    scans: ctx.scanStats.snapshot(),
    cache: {
      size: cache.size,
      in_flight: cache.inFlight,
      hits: cache.hits,
      misses: cache.misses,
      joined: cache.joined,
      hit_rate: cache.hitRate,
    },
    providers: ctx.providers.map((provider) => ({
      source: provider.source,
      configured: provider.configured,
    })),
  })
}
