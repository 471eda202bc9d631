/**
 * Tests for the diff engine (diffSnapshots).
 */

import { describe, it, expect } from 'vitest'
import { diffSnapshots, indexEntries } from '@presence-feed/core'
import { entry, identities, snapshot } from './fixtures.js'

describe('diffSnapshots', () => {
  it('treats every entry as added on the first fetch', () => {
    const delta = diffSnapshots(null, snapshot(['A', 'B', 'C']))
    expect(identities(delta.added)).toEqual(['A', 'B', 'C'])
    expect(delta.removed).toEqual([])
    expect(delta.initial).toBe(true)
    expect(delta.changed).toBe(true)
  })

  it('reports arrivals in source order and departures', () => {
    const delta = diffSnapshots(
      snapshot(['A', 'B', 'C', 'D', 'E']),
      snapshot(['F', 'A', 'B', 'G', 'C']),
    )
    expect(identities(delta.added)).toEqual(['F', 'G'])
    expect(delta.removed).toEqual(['D', 'E'])
    expect(delta.initial).toBe(false)
    expect(delta.changed).toBe(true)
  })

  it('is unchanged for an identical snapshot', () => {
    const delta = diffSnapshots(snapshot(['A', 'B']), snapshot(['A', 'B']))
    expect(delta.added).toEqual([])
    expect(delta.removed).toEqual([])
    expect(delta.changed).toBe(false)
  })

  it('ignores reordering of the same participants', () => {
    const delta = diffSnapshots(snapshot(['A', 'B']), snapshot(['B', 'A']))
    expect(delta.changed).toBe(false)
  })

  it('flags a change in aggregate counts alone', () => {
    const delta = diffSnapshots(
      snapshot(['A'], { total: 12, online: 4 }),
      snapshot(['A'], { total: 12, online: 5 }),
    )
    expect(delta.added).toEqual([])
    expect(delta.removed).toEqual([])
    expect(delta.changed).toBe(true)
  })

  it('flags an online change of a participant in both snapshots', () => {
    const before = { ...snapshot([]), entries: [entry(1, { isOnline: true })] }
    const after = { ...snapshot([]), entries: [entry(1, { isOnline: false })] }
    expect(diffSnapshots(before, after).changed).toBe(true)
  })

  it('flags an activity change of a participant in both snapshots', () => {
    const before = {
      ...snapshot([]),
      entries: [entry(1, { activity: { kind: 'training', details: 'Training Attack (1/5)' } })],
    }
    const after = {
      ...snapshot([]),
      entries: [entry(1, { activity: { kind: 'training', details: 'Training Attack (2/5)' } })],
    }
    const delta = diffSnapshots(before, after)
    expect(delta.added).toEqual([])
    expect(delta.changed).toBe(true)
  })

  it('does not flag a level change alone', () => {
    const before = { ...snapshot([]), entries: [entry(1, { level: 3 })] }
    const after = { ...snapshot([]), entries: [entry(1, { level: 4 })] }
    expect(diffSnapshots(before, after).changed).toBe(false)
  })

  it('keeps the first occurrence of a duplicated identity', () => {
    const next = {
      ...snapshot([]),
      entries: [entry('A', { level: 2 }), entry('B'), entry('A', { level: 9 })],
    }
    const delta = diffSnapshots(null, next)
    expect(identities(delta.added)).toEqual(['A', 'B'])
    expect(delta.added[0]?.level).toBe(2)
  })

  it('distinguishes numeric and string identities', () => {
    const delta = diffSnapshots(snapshot([1]), snapshot(['1']))
    expect(identities(delta.added)).toEqual(['1'])
    expect(delta.removed).toEqual([1])
  })
})

describe('indexEntries', () => {
  it('maps identities to entries', () => {
    const index = indexEntries([entry('A'), entry('B')])
    expect([...index.keys()]).toEqual(['A', 'B'])
    expect(index.get('B')?.displayName).toBe('Player B')
  })
})
