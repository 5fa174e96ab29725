import { describe, expect, it } from 'vitest'
import type { ScanBatch } from '../../types/scan.ts'
import { ResultStore, createResultStore } from '../result-store.ts'
import { FakeClock } from './fakes.ts'

function batch(tag: string): ScanBatch {
  return { results: [], failed: [{ company_number: tag, code: 'not_found', message: 'Not found' }] }
}

function sequentialIds() {
  let n = 0
  return () => `id-${++n}`
}

describe('ResultStore', () => {
  it('returns a saved batch by id', () => {
    const store = new ResultStore({ maxEntries: 5, ttlMs: 60_000, clock: new FakeClock(), generateId: sequentialIds() })

    const id = store.save(batch('A'))

    expect(id).toBe('id-1')
    expect(store.get(id)).toEqual(batch('A'))
    expect(store.get('missing')).toBeNull()
  })

  it('evicts the oldest entry past capacity', () => {
    const store = new ResultStore({ maxEntries: 2, ttlMs: 60_000, clock: new FakeClock(), generateId: sequentialIds() })

    store.save(batch('A'))
    store.save(batch('B'))
    store.save(batch('C'))

    expect(store.size).toBe(2)
    expect(store.get('id-1')).toBeNull()
    expect(store.get('id-3')).toEqual(batch('C'))
  })

  it('expires entries once the time to live has elapsed', () => {
    const clock = new FakeClock()
    const store = new ResultStore({ maxEntries: 5, ttlMs: 1000, clock, generateId: sequentialIds() })
    const id = store.save(batch('A'))

    clock.advance(999)
    expect(store.get(id)).not.toBeNull()

    clock.advance(1)
    expect(store.get(id)).toBeNull()
    expect(store.size).toBe(0)
  })

  it('converts minutes from configuration', () => {
    const clock = new FakeClock()
    const store = createResultStore({ maxEntries: 1, ttlMinutes: 2 }, clock)
    const id = store.save(batch('A'))

    clock.advance(119_999)
    expect(store.get(id)).not.toBeNull()
    clock.advance(1)
    expect(store.get(id)).toBeNull()
  })
})
