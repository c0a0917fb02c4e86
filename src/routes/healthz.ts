import { jsonResponse } from "../lib/http"
import type { ServerContext } from "../server-context"

export function handleHealthz(_request: Request, _ctx: ServerContext): Response {
  return jsonResponse({
    status: "ok",
    timestamp: new Date().toISOString(),
    checks: {
      process_running: true,
    },
  })
}
