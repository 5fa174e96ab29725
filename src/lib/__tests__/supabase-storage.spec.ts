import { describe, expect, it, vi } from 'vitest'
import { ObjectStoreCache } from '../cache-store.ts'
import { CacheUnavailableError, InvalidInputError } from '../errors.ts'
import { SupabaseObjectStore, createSupabaseObjectStore, type StorageApi } from '../supabase-storage.ts'

const KEY = 'results/01234567/Directors/result.json'

/** Bucket stand-in keyed by object path, with switchable failures */
function fakeStorage() {
  const objects = new Map<string, Blob>()
  const calls: string[] = []
  const failures = { list: false, download: false, upload: false }

  const storage: StorageApi = {
    from(bucket) {
      return {
        async list(path, options) {
          calls.push(`list ${bucket}:${path}?search=${options.search}&limit=${options.limit}`)
          if (failures.list) return { data: null, error: { message: 'list refused' } }
          const names = [...objects.keys()]
            .filter(key => key.startsWith(`${path}/`) && key.slice(path.length + 1).includes(options.search))
            .map(key => ({ name: key.slice(path.length + 1) }))
          return { data: names.slice(0, options.limit), error: null }
        },
        async download(path) {
          calls.push(`download ${bucket}:${path}`)
          const blob = objects.get(path)
          if (failures.download || !blob) return { data: null, error: { message: 'download refused' } }
          return { data: blob, error: null }
        },
        async upload(path, body, options) {
          calls.push(`upload ${bucket}:${path} ${options.contentType} upsert=${options.upsert}`)
          if (failures.upload) return { error: { message: 'upload refused' } }
          objects.set(path, new Blob([new TextDecoder().decode(body)]))
          return { error: null }
        },
      }
    },
  }

  return { storage, objects, calls, failures }
}

describe('SupabaseObjectStore', () => {
  it('uploads with upsert and reads the bytes back', async () => {
    const { storage, calls } = fakeStorage()
    const store = new SupabaseObjectStore(storage, 'scan-results')

    await store.put(KEY, new TextEncoder().encode('{"a":1}'), 'application/json')
    const bytes = await store.get(KEY)

    expect(bytes && new TextDecoder().decode(bytes)).toBe('{"a":1}')
    expect(calls).toEqual([
      `upload scan-results:${KEY} application/json upsert=true`,
      'list scan-results:results/01234567/Directors?search=result.json&limit=100',
      `download scan-results:${KEY}`,
    ])
  })

  it('checks existence by listing the folder', async () => {
    const { storage, objects } = fakeStorage()
    objects.set('results/01234567/Directors/result.json.bak', new Blob(['x']))
    const store = new SupabaseObjectStore(storage, 'scan-results')

    expect(await store.exists(KEY)).toBe(false)
    objects.set(KEY, new Blob(['{}']))
    expect(await store.exists(KEY)).toBe(true)
  })

  it('returns null for a missing object without downloading', async () => {
    const { storage, calls } = fakeStorage()

    expect(await new SupabaseObjectStore(storage, 'scan-results').get(KEY)).toBeNull()
    expect(calls.some(c => c.startsWith('download'))).toBe(false)
  })

  it('maps storage errors to CacheUnavailableError', async () => {
    const { storage, objects, failures } = fakeStorage()
    objects.set(KEY, new Blob(['{}']))
    const store = new SupabaseObjectStore(storage, 'scan-results')

    failures.download = true
    await expect(store.get(KEY)).rejects.toThrow(`Storage download failed for ${KEY}: download refused`)

    failures.list = true
    await expect(store.exists(KEY)).rejects.toBeInstanceOf(CacheUnavailableError)

    failures.upload = true
    await expect(store.put(KEY, new Uint8Array([1]), 'application/json')).rejects.toBeInstanceOf(CacheUnavailableError)
  })

  it('lets the cache treat a failing bucket as a miss', async () => {
    const { storage, objects, failures } = fakeStorage()
    objects.set(KEY, new Blob(['{}']))
    failures.list = true
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})

    const cache = new ObjectStoreCache(new SupabaseObjectStore(storage, 'scan-results'))

    expect(await cache.get('01234567', 'Directors')).toBeNull()
    expect(warn).toHaveBeenCalled()
    warn.mockRestore()
  })
})

describe('createSupabaseObjectStore', () => {
  it('requires the project URL and service key', () => {
    expect(() => createSupabaseObjectStore({ bucket: 'scan-results' })).toThrow('SUPABASE_URL is not set')
    expect(() => createSupabaseObjectStore({ supabaseUrl: 'https://project.supabase.test', bucket: 'scan-results' }))
      .toThrow(InvalidInputError)
  })

  it('builds a store when configured', () => {
    const store = createSupabaseObjectStore({
      supabaseUrl: 'https://project.supabase.test',
      supabaseServiceKey: 'test-secret',
      bucket: 'scan-results',
    })
    expect(store).toBeInstanceOf(SupabaseObjectStore)
  })
})
