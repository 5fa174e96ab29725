// Supabase Storage adapter for the scan result cache

import { createClient } from '@supabase/supabase-js'
import type { ObjectStore } from './cache-store.ts'
import type { AppConfig } from './config.ts'
import { CacheUnavailableError, InvalidInputError } from './errors.ts'

function splitKey(key: string): { folder: string; file: string } {
  const index = key.lastIndexOf('/')
  return index === -1
    ? { folder: '', file: key }
    : { folder: key.slice(0, index), file: key.slice(index + 1) }
}

// Search is a prefix match, so siblings such as "result.json.bak" can come back too
const LIST_LIMIT = 100

type StorageResult<T> = { data: T; error: null } | { data: null; error: { message: string } }

/** The slice of `SupabaseClient['storage']` the cache uses */
export interface StorageApi {
  from(bucket: string): {
    list(path: string, options: { search: string; limit: number }): Promise<StorageResult<Array<{ name: string }>>>
    download(path: string): Promise<StorageResult<Blob>>
    upload(path: string, body: Uint8Array, options: { contentType: string; upsert: boolean }): Promise<{ error: { message: string } | null }>
  }
}

export class SupabaseObjectStore implements ObjectStore {
  private storage: StorageApi
  private bucket: string

  constructor(storage: StorageApi, bucket: string) {
    this.storage = storage
    this.bucket = bucket
  }

  async exists(key: string): Promise<boolean> {
    const { folder, file } = splitKey(key)
    const { data, error } = await this.storage.from(this.bucket).list(folder, { search: file, limit: LIST_LIMIT })
    if (error) {
      throw new CacheUnavailableError(`Storage list failed for ${key}: ${error.message}`, error)
    }
    return data.some(entry => entry.name === file)
  }

  async get(key: string): Promise<Uint8Array | null> {
    if (!(await this.exists(key))) return null

    const { data, error } = await this.storage.from(this.bucket).download(key)
    if (error) {
      throw new CacheUnavailableError(`Storage download failed for ${key}: ${error.message}`, error)
    }
    return new Uint8Array(await data.arrayBuffer())
  }

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    const { error } = await this.storage.from(this.bucket).upload(key, bytes, {
      contentType,
      upsert: true,
    })
    if (error) {
      throw new CacheUnavailableError(`Storage upload failed for ${key}: ${error.message}`, error)
    }
  }
}

export function createSupabaseObjectStore(config: AppConfig['storage']): SupabaseObjectStore {
  if (!config.supabaseUrl) {
    throw new InvalidInputError('SUPABASE_URL is not set')
  }
  if (!config.supabaseServiceKey) {
    throw new InvalidInputError('SUPABASE_SERVICE_ROLE_KEY is not set')
  }

  const client = createClient(config.supabaseUrl, config.supabaseServiceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  })
  return new SupabaseObjectStore(client.storage, config.bucket)
}
