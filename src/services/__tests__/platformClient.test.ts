import { describe, it, expect, jest } from '@jest/globals'
import { PermanentDeliveryError, TransientError } from '../../utils/errors.js'
import { GraphPlatformClient } from '../platformClient.js'
import type { FetchLike } from '../webhookSender.js'
import { makeAccount } from '../../testing/fakes.js'

function jsonResponse(status: number, body: unknown) {
  return jest.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } }))
}

function graphError(status: number, code: number, subcode?: number) {
  return jsonResponse(status, { error: { message: `graph error ${code}`, code, error_subcode: subcode } })
}

const sendRequest = { account: makeAccount(), recipientId: 'user-42', text: 'hello' }

async function failureOf(client: GraphPlatformClient): Promise<unknown> {
  try {
    await client.send(sendRequest)
  } catch (err) {
    return err
  }
  throw new Error('expected send to fail')
}

describe('GraphPlatformClient', () => {
  it('posts the message with the account token and returns the platform id', async () => {
    const fetchImpl = jsonResponse(200, { recipient_id: 'user-42', message_id: 'mid.abc' })
    const client = new GraphPlatformClient({ baseUrl: 'https://graph.example.test/v21.0/', fetchImpl })

    const result = await client.send(sendRequest)

    expect(result).toEqual({ platformMessageId: 'mid.abc' })
    const call = fetchImpl.mock.calls[0]
    expect(call?.[0]).toBe('https://graph.example.test/v21.0/me/messages?access_token=test-token')
    expect(call?.[1].method).toBe('POST')
    expect(JSON.parse(String(call?.[1].body))).toEqual({ recipient: { id: 'user-42' }, message: { text: 'hello' } })
  })

  it.each([
    ['HTTP 429', jsonResponse(429, {}), 'rate_limited'],
    ['rate limit code 4', graphError(400, 4), 'rate_limited'],
    ['rate limit code 613', graphError(400, 613), 'rate_limited'],
    ['server error', jsonResponse(502, {}), 'platform_unavailable']
  ])('treats %s as transient', async (_label, fetchImpl, code) => {
    const err = await failureOf(new GraphPlatformClient({ baseUrl: 'https://graph.example.test', fetchImpl }))

    expect(err).toBeInstanceOf(TransientError)
    expect(err).toMatchObject({ errorCode: code, retryable: true })
  })

  it.each([
    ['an invalid token', graphError(401, 190), 'invalid_token'],
    ['an unavailable user', graphError(400, 551), 'recipient_unavailable'],
    ['an unknown recipient', graphError(400, 100, 2018001), 'invalid_recipient'],
    ['any other 4xx', graphError(400, 100), 'platform_rejected'],
    ['a success without message id', jsonResponse(200, { recipient_id: 'user-42' }), 'invalid_response']
  ])('treats %s as permanent', async (_label, fetchImpl, code) => {
    const err = await failureOf(new GraphPlatformClient({ baseUrl: 'https://graph.example.test', fetchImpl }))

    expect(err).toBeInstanceOf(PermanentDeliveryError)
    expect(err).toMatchObject({ errorCode: code, retryable: false })
  })

  it('maps timeouts and network failures to transient errors', async () => {
    const timeout = Object.assign(new Error('aborted'), { name: 'TimeoutError' })
    const timedOut = new GraphPlatformClient({
      baseUrl: 'https://graph.example.test',
      fetchImpl: jest.fn<FetchLike>(async () => {
        throw timeout
      })
    })
    const offline = new GraphPlatformClient({
      baseUrl: 'https://graph.example.test',
      fetchImpl: jest.fn<FetchLike>(async () => {
        throw new Error('ECONNRESET')
      })
    })

    expect(await failureOf(timedOut)).toMatchObject({ errorCode: 'timeout', retryable: true })
    expect(await failureOf(offline)).toMatchObject({ errorCode: 'network_error', retryable: true })
  })

  it('fails permanently when the account has no access token', async () => {
    const fetchImpl = jsonResponse(200, { message_id: 'mid.abc' })
    const client = new GraphPlatformClient({ baseUrl: 'https://graph.example.test', fetchImpl })

    await expect(
      client.send({ ...sendRequest, account: makeAccount({ platformAccessToken: undefined }) })
    ).rejects.toMatchObject({ errorCode: 'missing_token' })
    expect(fetchImpl).not.toHaveBeenCalled()
  })
})
