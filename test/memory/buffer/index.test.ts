import { describe, it, expect, beforeEach } from 'vitest'
import { ChatMemoryBuffer } from '../../../src/memory/buffer/index.js'
import { ConfigurationError } from '../../../src/memory/errors.js'
import type { ChatMessage } from '../../../src/memory/types.js'

function msg(role: ChatMessage['role'], content: string): ChatMessage {
  return { role, content }
}

describe('ChatMemoryBuffer', () => {
  let buffer: ChatMemoryBuffer

  beforeEach(() => {
    buffer = new ChatMemoryBuffer()
  })

  describe('basic operations', () => {
    it('starts empty', async () => {
      expect(await buffer.getAll()).toEqual([])
      expect(await buffer.get()).toEqual([])
      expect(buffer.size).toBe(0)
    })

    it('appends messages in order', async () => {
      await buffer.put(msg('user', 'Hello'))
      await buffer.put(msg('assistant', 'Hi there!'))

      expect(await buffer.getAll()).toEqual([msg('user', 'Hello'), msg('assistant', 'Hi there!')])
    })

    it('ignores the input on get', async () => {
      await buffer.put(msg('user', 'Hello'))

      expect(await buffer.get('unrelated')).toEqual([msg('user', 'Hello')])
    })

    it('replaces history on set', async () => {
      await buffer.put(msg('user', 'old'))
      await buffer.set([msg('user', 'new')])

      expect(await buffer.getAll()).toEqual([msg('user', 'new')])
    })

    it('clears history on reset', async () => {
      await buffer.put(msg('user', 'Hello'))
      await buffer.reset()

      expect(await buffer.getAll()).toEqual([])
    })

    it('defaults its name', () => {
      expect(buffer.name).toBe('ChatMemoryBuffer')
      expect(new ChatMemoryBuffer({ name: 'chat' }).name).toBe('chat')
    })

    it('fromDefaults creates an empty buffer', async () => {
      const created = ChatMemoryBuffer.fromDefaults()
      expect(created).toBeInstanceOf(ChatMemoryBuffer)
      expect(await created.getAll()).toEqual([])
    })
  })

  describe('isolation', () => {
    it('returns a fresh array from get and getAll', async () => {
      await buffer.put(msg('user', 'Hello'))

      const fromGet = await buffer.get()
      fromGet.push(msg('user', 'injected'))
      const fromGetAll = await buffer.getAll()
      fromGetAll.unshift(msg('system', 'injected'))

      expect(await buffer.getAll()).toEqual([msg('user', 'Hello')])
    })

    it('does not alias the array passed to set', async () => {
      const input = [msg('user', 'a')]
      await buffer.set(input)
      input.push(msg('user', 'b'))

      expect(await buffer.getAll()).toEqual([msg('user', 'a')])
    })
  })

  describe('limit option', () => {
    beforeEach(async () => {
      await buffer.set([msg('user', '1'), msg('assistant', '2'), msg('user', '3')])
    })

    it('returns the most recent messages', async () => {
      expect(await buffer.get(undefined, { limit: 2 })).toEqual([
        msg('assistant', '2'),
        msg('user', '3'),
      ])
    })

    it('returns nothing for a zero limit', async () => {
      expect(await buffer.get(undefined, { limit: 0 })).toEqual([])
    })

    it('returns everything when the limit exceeds the size', async () => {
      expect(await buffer.get(undefined, { limit: 10 })).toHaveLength(3)
    })
  })

  describe('maxMessages', () => {
    it('evicts the oldest non-system message', async () => {
      const bounded = new ChatMemoryBuffer({ maxMessages: 3 })
      await bounded.put(msg('system', 'rules'))
      await bounded.put(msg('user', 'first'))
      await bounded.put(msg('assistant', 'second'))
      await bounded.put(msg('user', 'third'))

      expect(await bounded.getAll()).toEqual([
        msg('system', 'rules'),
        msg('assistant', 'second'),
        msg('user', 'third'),
      ])
    })

    it('evicts the oldest system message when only system messages remain', async () => {
      const bounded = new ChatMemoryBuffer({ maxMessages: 1 })
      await bounded.set([msg('system', 'a'), msg('system', 'b')])

      expect(await bounded.getAll()).toEqual([msg('system', 'b')])
    })

    it('applies to set', async () => {
      const bounded = new ChatMemoryBuffer({ maxMessages: 2 })
      await bounded.set([msg('user', '1'), msg('user', '2'), msg('user', '3')])

      expect(await bounded.getAll()).toEqual([msg('user', '2'), msg('user', '3')])
    })

    it('rejects a non-positive limit', () => {
      expect(() => new ChatMemoryBuffer({ maxMessages: 0 })).toThrow(ConfigurationError)
      expect(() => new ChatMemoryBuffer({ maxMessages: 1.5 })).toThrow(ConfigurationError)
    })
  })
})
