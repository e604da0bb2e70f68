import { describe, it, expect } from '@jest/globals'
import { UNSUPPORTED_MESSAGE_TEXT, parsePlatformWebhook } from '../platformEvents.js'

const NOW = new Date('2026-01-01T00:00:00.000Z')

describe('parsePlatformWebhook', () => {
  it('extracts messages, delivery receipts and read receipts', () => {
    const body = {
      object: 'instagram',
      entry: [
        {
          id: 'page-1',
          time: 1767225600000,
          messaging: [
            {
              sender: { id: 'user-7' },
              recipient: { id: 'page-1' },
              timestamp: 1767225600000,
              message: { mid: 'mid.1', text: 'hi' }
            },
            {
              sender: { id: 'user-7' },
              recipient: { id: 'page-1' },
              timestamp: 1767225601000,
              delivery: { mids: ['mid.out.1', 'mid.out.2'], watermark: 1767225601000 }
            },
            {
              sender: { id: 'user-7' },
              recipient: { id: 'page-1' },
              timestamp: 1767225602000,
              read: { mid: 'mid.out.2', watermark: 1767225602000 }
            }
          ]
        }
      ]
    }

    const { events, skipped } = parsePlatformWebhook(body, NOW)

    expect(skipped).toBe(0)
    expect(events).toEqual([
      {
        kind: 'message',
        channelId: 'page-1',
        platformMessageId: 'mid.1',
        senderId: 'user-7',
        recipientId: 'page-1',
        text: 'hi',
        messageType: 'text',
        timestamp: '2026-01-01T00:00:00.000Z'
      },
      { kind: 'delivery', channelId: 'page-1', platformMessageIds: ['mid.out.1', 'mid.out.2'], at: '2026-01-01T00:00:01.000Z' },
      { kind: 'read', channelId: 'page-1', platformMessageIds: ['mid.out.2'], at: '2026-01-01T00:00:02.000Z' }
    ])
  })

  it('skips echoes of our own messages and entries without ids', () => {
    const body = {
      entry: [
        {
          id: 'page-1',
          messaging: [
            { sender: { id: 'page-1' }, recipient: { id: 'user-7' }, message: { mid: 'mid.echo', text: 'sent by us', is_echo: true } },
            { sender: { id: 'user-7' }, recipient: { id: 'page-1' }, message: { text: 'no mid' } },
            { sender: { id: 'user-7' }, recipient: { id: 'page-1' }, reaction: { mid: 'mid.1', action: 'react' } },
            'garbage'
          ]
        }
      ]
    }

    expect(parsePlatformWebhook(body, NOW)).toEqual({ events: [], skipped: 4 })
  })

  it('labels attachment-only messages with a placeholder text', () => {
    const body = {
      entry: [
        {
          id: 'page-1',
          messaging: [
            {
              sender: { id: 'user-7' },
              recipient: { id: 'page-1' },
              message: { mid: 'mid.2', attachments: [{ type: 'image', payload: { url: 'https://cdn.example.test/a.jpg' } }] }
            }
          ]
        }
      ]
    }

    const { events } = parsePlatformWebhook(body, NOW)

    expect(events).toEqual([
      {
        kind: 'message',
        channelId: 'page-1',
        platformMessageId: 'mid.2',
        senderId: 'user-7',
        recipientId: 'page-1',
        text: UNSUPPORTED_MESSAGE_TEXT,
        messageType: 'image',
        timestamp: '2026-01-01T00:00:00.000Z'
      }
    ])
  })

  it('returns nothing for bodies that are not platform webhooks', () => {
    expect(parsePlatformWebhook({ entry: 'nope' }, NOW)).toEqual({ events: [], skipped: 0 })
    expect(parsePlatformWebhook(null, NOW)).toEqual({ events: [], skipped: 0 })
  })
})
