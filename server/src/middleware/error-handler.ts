/**
 * Global error handling middleware.
 * Must be registered after all routes.
 */

import type { Request, Response, NextFunction } from "express"
import { HttpError } from "../lib/errors.js"
import { createRouteLogger } from "../lib/logger.js"

// express.json() rejects unparsable bodies with a SyntaxError carrying status 400
function isBodyParseError(err: Error): boolean {
  return err instanceof SyntaxError && "status" in err && err.status === 400
}

/**
 * Express error handling middleware.
 *
 * - HttpError subclasses answer with their own status and message
 * - Malformed JSON bodies answer 400
 * - Anything else is logged and answered with a generic 500
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof HttpError) {
    res.status(err.statusCode).json({ error: { message: err.message } })
    return
  }

  if (isBodyParseError(err)) {
    res.status(400).json({ error: { message: "Malformed JSON body" } })
    return
  }

  const routeLogger = createRouteLogger(req)
  routeLogger.error({ err }, err.message)

  // Don't leak error details to client
  res.status(500).json({
    error: { message: "Internal server error" },
  })
}
