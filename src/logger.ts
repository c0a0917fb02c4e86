import { mkdirSync } from "node:fs"
import { resolve } from "node:path"
import pino from "pino"
import { createStream } from "rotating-file-stream"
import type { AppConfig } from "./config"

export interface Loggers {
  app: pino.Logger
  security: pino.Logger
}

export function createLoggers(config: AppConfig): Loggers {
  const resolvedLogDir = resolve(config.logDir)
  mkdirSync(resolvedLogDir, { recursive: true })

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  })

  // Verdict trail for flagged URLs, kept longer than the request log.
  const securityStream = createStream("security.log", {
    interval: "1d",
    size: "10M",
    rotate: 90,
    path: resolvedLogDir,
    compress: "gzip",
  })

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "qrguard",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  )

  const security = pino(
    {
      level: config.logLevel,
      base: {
        service: "qrguard-security",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    securityStream,
  )

  return { app, security }
}

export function createSilentLoggers(): Loggers {
  return {
    app: pino({ level: "silent" }),
    security: pino({ level: "silent" }),
  }
}
