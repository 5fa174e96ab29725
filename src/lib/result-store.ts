// In-process store for finished batches, looked up later by id (report pages, exports)

import { randomUUID } from 'node:crypto'
import type { ScanBatch } from '../types/scan.ts'
import { systemClock, type Clock } from './clock.ts'

export interface ResultStoreOptions {
  maxEntries: number
  ttlMs: number
  clock?: Clock
  generateId?: () => string
}

interface Entry {
  batch: ScanBatch
  savedAt: number
}

export class ResultStore {
  private entries = new Map<string, Entry>()
  private maxEntries: number
  private ttlMs: number
  private clock: Clock
  private generateId: () => string

  constructor(options: ResultStoreOptions) {
    this.maxEntries = options.maxEntries
    this.ttlMs = options.ttlMs
    this.clock = options.clock ?? systemClock
    this.generateId = options.generateId ?? randomUUID
  }

  get size(): number {
    this.evictExpired()
    return this.entries.size
  }

  save(batch: ScanBatch): string {
    this.evictExpired()
    const id = this.generateId()
    this.entries.set(id, { batch, savedAt: this.clock.now() })

    // Map iteration order is insertion order: oldest first
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
    return id
  }

  get(id: string): ScanBatch | null {
    this.evictExpired()
    return this.entries.get(id)?.batch ?? null
  }

  private evictExpired(): void {
    const now = this.clock.now()
    for (const [id, entry] of this.entries) {
      if (now - entry.savedAt >= this.ttlMs) this.entries.delete(id)
    }
  }
}

export function createResultStore(config: { maxEntries: number; ttlMinutes: number }, clock?: Clock): ResultStore {
  return new ResultStore({
    maxEntries: config.maxEntries,
    ttlMs: config.ttlMinutes * 60_000,
    clock,
  })
}
