import { describe, it, expect } from 'vitest'
import { isSafe } from '../safety'

const stored = (standalone: number, recurring = 0) => [
  ...Array.from({ length: standalone }, () => ({ parentId: null })),
  ...Array.from({ length: recurring }, () => ({ parentId: 'series-1' })),
]

const fetched = (count: number) => Array.from({ length: count }, (_, i) => ({ uid: `event-${i}` }))

describe('isSafe', () => {
  it('accepts a batch at least as large as the stored events', () => {
    expect(isSafe(stored(10), fetched(10))).toBe(true)
    expect(isSafe(stored(10), fetched(14))).toBe(true)
    expect(isSafe([], [])).toBe(true)
  })

  it('accepts a moderate shrink', () => {
    expect(isSafe(stored(10), fetched(8))).toBe(true)
    expect(isSafe(stored(10), fetched(5))).toBe(true)
  })

  it('refuses an empty batch replacing stored events', () => {
    expect(isSafe(stored(10), [])).toBe(false)
    expect(isSafe(stored(0, 4), [])).toBe(false)
  })

  it('refuses losing more than half of the standalone events', () => {
    expect(isSafe(stored(10), fetched(4))).toBe(false)
    expect(isSafe(stored(10), fetched(3))).toBe(false)
  })

  it('does not count recurring instances against the batch', () => {
    // 2 standalone events and 10 instances of one series collapsing upstream
    expect(isSafe(stored(2, 10), fetched(2))).toBe(true)
    expect(isSafe(stored(2, 10), fetched(1))).toBe(true)
    expect(isSafe(stored(5, 10), fetched(2))).toBe(false)
  })
})
