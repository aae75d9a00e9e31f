import type { Request, Response, NextFunction } from "express"
import { logger } from "../lib/logger.js"

/**
 * Log method, path, status and duration of every finished request.
 * Health checks are skipped to reduce log noise.
 */
export function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now()
  res.on("finish", () => {
    const duration = Date.now() - start
    if (req.path !== "/health") {
      logger.info(
        {
          method: req.method,
          path: req.path,
          statusCode: res.statusCode,
          duration,
          userAgent: req.get("user-agent"),
        },
        `${req.method} ${req.path} ${res.statusCode} ${duration}ms`
      )
    }
  })
  next()
}
