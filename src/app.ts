import { errorResponse } from "./lib/http"
import { handleCheckSafety } from "./routes/check-safety"
import { handleHealthz } from "./routes/healthz"
import { handleReadyz } from "./routes/readyz"
import { handleScan } from "./routes/scan"
import { handleStats } from "./routes/stats"
import type { ServerContext } from "./server-context"

type RouteHandler = (request: Request, ctx: ServerContext) => Response | Promise<Response>

const routes: Record<string, { method: "GET" | "POST"; handler: RouteHandler }> = {
  "/healthz": { method: "GET", handler: handleHealthz },
  "/readyz": { method: "GET", handler: handleReadyz },
  "/v1/check-safety": { method: "POST", handler: handleCheckSafety },
  "/v1/scan": { method: "POST", handler: handleScan },
  "/v1/stats": { method: "GET", handler: handleStats },
}

export function createRequestHandler(ctx: ServerContext): (request: Request) => Promise<Response> {
  return async (request) => {
    const started = Date.now()
    const { pathname } = new URL(request.url)
    const route = Object.hasOwn(routes, pathname) ? routes[pathname] : undefined

    let response: Response

    if (!route) {
      response = errorResponse(404, "Route not found")
    } else if (request.method !== route.method) {
      response = errorResponse(405, "Method not allowed")
    } else {
      try {
        response = await route.handler(request, ctx)
      } catch (error) {
        ctx.loggers.app.error({ error, pathname }, "unhandled route error")
        response = errorResponse(500, "Internal server error")
      }
    }

    ctx.loggers.app.info(
      {
        method: request.method,
        pathname,
        status: response.status,
        durationMs: Date.now() - started,
      },
      "http request",
    )

    return response
  }
}
