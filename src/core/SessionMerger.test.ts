import { describe, expect, it } from 'vitest'

import type { ArchiveEntry } from '../models'
import type { LiveSession } from '../utils/tmux'
import { mergeSessions } from './SessionMerger'

const archive = (name: string, seconds: number, file = `${name}.json`): ArchiveEntry => ({
  name,
  path: `/store/${file}`,
  mtime: new Date(seconds * 1000),
  windowCount: 2,
})

const live = (name: string, windows = 1): LiveSession => ({
  id: `$${name}`,
  name,
  created: 0,
  attached: 0,
  windows,
  width: 80,
  height: 24,
})

describe('mergeSessions', () => {
  it('lists live sessions first, then archives by age', () => {
    const views = mergeSessions(
      [live('c'), live('a', 3)],
      [archive('a', 100), archive('b', 200), archive('d', 300)]
    )

    expect(views.map((v) => [v.name, v.origin])).toEqual([
      ['a', 'LIVE'],
      ['c', 'LIVE'],
      ['d', 'ARCH'],
      ['b', 'ARCH'],
    ])
  })

  it('keeps the archive behind a live session', () => {
    const [view] = mergeSessions([live('a', 3)], [archive('a', 100)])

    expect(view).toEqual({
      name: 'a',
      origin: 'LIVE',
      windowCount: 3,
      updatedAt: new Date(100000),
      archive: archive('a', 100),
    })
  })

  it('reports a live session without archive as never saved', () => {
    expect(mergeSessions([live('a')], [])[0]).toMatchObject({ updatedAt: null, archive: null })
  })

  it('keeps the newest of duplicate archives', () => {
    const views = mergeSessions([], [archive('a', 300, 'new.json'), archive('a', 100, 'old.json')])

    expect(views).toHaveLength(1)
    expect(views[0].archive?.path).toBe('/store/new.json')
  })

  it('lets the later of equally old duplicates win', () => {
    const views = mergeSessions([], [archive('a', 100, 'first.json'), archive('a', 100, 'second.json')])

    expect(views[0].archive?.path).toBe('/store/second.json')
  })

  it('breaks ties by code unit order', () => {
    expect(mergeSessions([live('b'), live('B'), live('a')], []).map((v) => v.name)).toEqual(['B', 'a', 'b'])
  })
})
