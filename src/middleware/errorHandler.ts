import type { ErrorRequestHandler, RequestHandler } from 'express'
import pino from 'pino'
import { ZodError } from 'zod'
import { AppError } from '../utils/errors.js'

const logger = pino({ name: 'http', level: process.env.LOG_LEVEL || 'info' })

/**
 * Wraps an async route so rejections reach the error middleware.
 */
export function asyncHandler(handler: RequestHandler): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(handler(req, res, next)).catch(next)
  }
}

export const notFoundHandler: RequestHandler = (req, res) => {
  res.status(404).json({ success: false, error: `Route ${req.method} ${req.path} not found`, code: 'not_found' })
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: 'Invalid request parameters',
      code: 'validation_error',
      details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    })
    return
  }
  if (err instanceof AppError) {
    if (err.statusCode >= 500) {
      logger.error({ err, method: req.method, path: req.path }, 'Request failed')
    }
    res.status(err.statusCode).json({ success: false, error: err.message, code: err.errorCode })
    return
  }
  if (err instanceof SyntaxError) {
    res.status(400).json({ success: false, error: 'Malformed JSON body', code: 'validation_error' })
    return
  }
  logger.error({ err, method: req.method, path: req.path }, 'Unhandled error')
  res.status(500).json({ success: false, error: 'Internal server error', code: 'internal_error' })
}
