import { createHmac, timingSafeEqual } from 'crypto'

export const SIGNATURE_HEADER = 'X-Hub-Signature-256'
const PREFIX = 'sha256='
const HEX_DIGEST = /^[0-9a-f]{64}$/

export function sign(payload: string | Buffer, secret: string): string {
  return createHmac('sha256', secret).update(payload).digest('hex')
}

export function signatureHeader(payload: string | Buffer, secret: string): string {
  return `${PREFIX}${sign(payload, secret)}`
}

/**
 * Checks a `sha256=<hex>` header against the payload. Any malformed input
 * yields `false`. The digest is always computed and compared in constant
 * time, so a bad header costs the same as a wrong one.
 */
export function verify(payload: string | Buffer, secret: string, header: string | undefined | null): boolean {
  const expected = Buffer.from(sign(payload, secret), 'hex')

  let provided = ''
  if (typeof header === 'string' && header.startsWith(PREFIX)) {
    provided = header.slice(PREFIX.length).toLowerCase()
  }
  const wellFormed = HEX_DIGEST.test(provided)
  const candidate = wellFormed ? Buffer.from(provided, 'hex') : Buffer.alloc(expected.length)

  const equal = timingSafeEqual(expected, candidate)
  return wellFormed && equal
}
