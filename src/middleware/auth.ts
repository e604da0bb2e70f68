import type { Request, Response, NextFunction, RequestHandler } from 'express'
import { timingSafeEqual } from 'crypto'

const PUBLIC_PREFIXES = ['/health', '/webhooks']

function matches(candidate: string, tokens: readonly string[]): boolean {
  const given = Buffer.from(candidate)
  return tokens.some((token) => {
    const expected = Buffer.from(token)
    return expected.length === given.length && timingSafeEqual(expected, given)
  })
}

/**
 * API key check for the CRM-facing API. Health checks and the platform
 * webhook (which carries its own signature) are exempt.
 */
export function apiKeyAuth(tokens: readonly string[]): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (PUBLIC_PREFIXES.some((prefix) => req.path.startsWith(prefix))) {
      return next()
    }
    if (tokens.length === 0) {
      // if no tokens configured, deny by default
      return res.status(401).json({ success: false, error: 'API not configured: missing API_TOKENS', code: 'unauthorized' })
    }
    const headerKey = req.header('x-api-key') || req.header('authorization')?.replace(/^Bearer\s+/i, '')
    if (!headerKey || !matches(headerKey, tokens)) {
      return res.status(401).json({ success: false, error: 'Invalid or missing API key', code: 'unauthorized' })
    }
    return next()
  }
}
