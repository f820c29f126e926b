import { describe, expect, it, vi } from 'vitest'
import { createMailbox } from '@sweepwatch/system'

describe('createMailbox', () => {
  describe('drain', () => {
    it('should return null when nothing is pending', () => {
      const mailbox = createMailbox<string>()

      expect(mailbox.drain()).toEqual({ item: null, discarded: 0 })
      expect(mailbox.getStats().taken).toBe(0)
    })

    it('should take the oldest item and discard the rest by default', () => {
      const mailbox = createMailbox<string>()
      mailbox.put('a')
      mailbox.put('b')
      mailbox.put('c')

      expect(mailbox.drain()).toEqual({ item: 'a', discarded: 2 })
      expect(mailbox.size()).toBe(0)
      expect(mailbox.drain()).toEqual({ item: null, discarded: 0 })
    })

    it('should take the newest item with the newest policy', () => {
      const mailbox = createMailbox<string>({ take: 'newest' })
      mailbox.put('a')
      mailbox.put('b')
      mailbox.put('c')

      expect(mailbox.drain()).toEqual({ item: 'c', discarded: 2 })
    })

    it('should notify drop subscribers with the discarded items', () => {
      const mailbox = createMailbox<string>()
      const onDrop = vi.fn()
      mailbox.onDrop(onDrop)

      mailbox.put('a')
      mailbox.put('b')
      mailbox.put('c')
      mailbox.drain()

      expect(onDrop).toHaveBeenCalledWith({ reason: 'discarded', items: ['b', 'c'] })
    })

    it('should put items arriving during a drain into the next drain only', () => {
      const mailbox = createMailbox<string>()
      mailbox.put('a')
      mailbox.put('b')

      // A producer reacting to the drop lands its item after the snapshot
      mailbox.onDrop(() => mailbox.put('late'))

      expect(mailbox.drain()).toEqual({ item: 'a', discarded: 1 })
      expect(mailbox.drain()).toEqual({ item: 'late', discarded: 0 })
      expect(mailbox.drain()).toEqual({ item: null, discarded: 0 })
    })

    it('should never return the same item from two drains', () => {
      const mailbox = createMailbox<number>({ capacity: 4 })
      const seen: Array<number> = []

      for (let i = 0; i < 20; i++) {
        mailbox.put(i)
        if (i % 3 === 0) {
          const { item } = mailbox.drain()
          if (item !== null) seen.push(item)
        }
      }

      expect(new Set(seen).size).toBe(seen.length)
    })
  })

  describe('overflow', () => {
    it('should drop the oldest pending item when full by default', () => {
      const mailbox = createMailbox<string>({ capacity: 2 })
      const onDrop = vi.fn()
      mailbox.onDrop(onDrop)

      mailbox.put('a')
      mailbox.put('b')
      mailbox.put('c')

      expect(onDrop).toHaveBeenCalledWith({ reason: 'overflowed', items: ['a'] })
      expect(mailbox.drain()).toEqual({ item: 'b', discarded: 1 })
    })

    it('should drop the incoming item with drop-newest', () => {
      const mailbox = createMailbox<string>({ capacity: 2, overflow: 'drop-newest' })

      mailbox.put('a')
      mailbox.put('b')
      mailbox.put('c')

      expect(mailbox.drain()).toEqual({ item: 'a', discarded: 1 })
      expect(mailbox.getStats().overflowed).toBe(1)
    })

    it('should reject a capacity below one', () => {
      expect(() => createMailbox({ capacity: 0 })).toThrow(
        'Mailbox capacity must be a positive integer, got 0',
      )
    })
  })

  describe('stats', () => {
    it('should account for every accepted item exactly once', () => {
      const mailbox = createMailbox<number>({ capacity: 3 })

      for (let i = 0; i < 5; i++) mailbox.put(i) // 2 overflow
      mailbox.drain() // takes 1, discards 2
      mailbox.put(5)
      mailbox.put(6)

      const stats = mailbox.getStats()
      expect(stats).toEqual({
        accepted: 7,
        taken: 1,
        discarded: 2,
        overflowed: 2,
        pending: 2,
      })
      expect(stats.taken + stats.discarded + stats.overflowed + stats.pending).toBe(
        stats.accepted,
      )
    })
  })
})
