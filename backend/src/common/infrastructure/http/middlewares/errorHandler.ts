/* eslint-disable prettier/prettier */
import { NextFunction, Request, Response } from "express"

import { AppError } from "../../../domain/errors/app-error.js"
import { BadRequestError } from "../../../domain/errors/bad-request-error.js"
import { NotFoundError } from "../../../domain/errors/not-found-error.js"
import { createLogger } from "../../logger/index.js"

/**
 * @file errorHandler.ts
 * @description
 * Global Express error middleware.
 *
 * - AppError (and subclasses) -> status from class or category + structured body
 * - anything else -> 500, logged with its stack
 *
 * The HTTP status mapping lives only here; domain and application code
 * never see a status code.
 */

const log = createLogger("http")

export function resolveHttpStatus(err: AppError): number {
  if (err instanceof BadRequestError) return 400
  if (err instanceof NotFoundError) return 404

  if (err.category === "VALIDATION") return 400

  // Degraded infrastructure: 503 while a retry may succeed
  if (err.category === "DEVICE") return err.retryable ? 503 : 500
  if (err.category === "DATABASE") return err.retryable ? 503 : 500
  if (err.category === "REALTIME") return err.retryable ? 503 : 500
  if (err.category === "INFRASTRUCTURE") return err.retryable ? 503 : 500

  return 500
}

function pickDetails(err: AppError): Record<string, unknown> | undefined {
  if (!("details" in err)) return undefined
  const details: unknown = err.details
  if (details && typeof details === "object" && !Array.isArray(details)) {
    return Object.fromEntries(Object.entries(details))
  }
  return undefined
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): Response {
  if (err instanceof AppError) {
    const status = resolveHttpStatus(err)
    const details = pickDetails(err)

    if (status >= 500) log.error({ err, method: req.method, path: req.path }, "request failed")

    return res.status(status).json({
      error: {
        name: err.name,
        message: err.message,
        category: err.category,
        retryable: err.retryable,
        isOperational: err.isOperational,
        timestamp: err.timestamp.toISOString(),
        ...(details ? { details } : {}),
      },
    })
  }

  log.error({ err, method: req.method, path: req.path }, "unhandled error")

  return res.status(500).json({
    error: {
      name: "InternalServerError",
      message: "Internal Server Error",
      timestamp: new Date().toISOString(),
    },
  })
}
