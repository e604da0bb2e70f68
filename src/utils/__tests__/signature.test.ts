import { describe, it, expect } from '@jest/globals'
import { createHmac } from 'crypto'
import { sign, signatureHeader, verify } from '../signature.js'

describe('signature', () => {
  const payload = '{"event":"message.received","message_id":"msg_1"}'
  const secret = 'test-secret'

  it('produces the hex HMAC-SHA256 of the payload', () => {
    const expected = createHmac('sha256', secret).update(payload).digest('hex')

    expect(sign(payload, secret)).toBe(expected)
    expect(signatureHeader(payload, secret)).toBe(`sha256=${expected}`)
  })

  it('verifies its own header', () => {
    expect(verify(payload, secret, signatureHeader(payload, secret))).toBe(true)
    expect(verify(Buffer.from(payload), secret, signatureHeader(payload, secret))).toBe(true)
  })

  it('accepts an upper-case digest', () => {
    const header = `sha256=${sign(payload, secret).toUpperCase()}`

    expect(verify(payload, secret, header)).toBe(true)
  })

  it('rejects a tampered payload or the wrong secret', () => {
    const header = signatureHeader(payload, secret)

    expect(verify(payload.replace('msg_1', 'msg_2'), secret, header)).toBe(false)
    expect(verify(payload, 'other-secret', header)).toBe(false)
  })

  it.each([
    ['missing', undefined],
    ['null', null],
    ['empty', ''],
    ['without prefix', sign(payload, secret)],
    ['wrong algorithm', `sha1=${sign(payload, secret)}`],
    ['truncated', signatureHeader(payload, secret).slice(0, -2)],
    ['not hex', `sha256=${'z'.repeat(64)}`]
  ])('returns false for a %s header', (_label, header) => {
    expect(verify(payload, secret, header)).toBe(false)
  })
})
