/**
 * Scan result cache over a key/value object store.
 *
 * Layout: results/{company_number}/{folder}/result.json where the folder
 * records the option that changes the result shape (active directors only).
 */

import { z } from 'zod'
import type { CompanyScanResult } from '../types/scan.ts'
import { CacheUnavailableError } from './errors.ts'

// ── Object store ──

export interface ObjectStore {
  exists(key: string): Promise<boolean>
  /** null when the key is absent; throws CacheUnavailableError when the store cannot be read */
  get(key: string): Promise<Uint8Array | null>
  put(key: string, bytes: Uint8Array, contentType: string): Promise<void>
}

/** Process-local store, used when no remote bucket is configured and in tests */
export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, { bytes: Uint8Array; contentType: string }>()

  async exists(key: string): Promise<boolean> {
    return this.objects.has(key)
  }

  async get(key: string): Promise<Uint8Array | null> {
    return this.objects.get(key)?.bytes ?? null
  }

  async put(key: string, bytes: Uint8Array, contentType: string): Promise<void> {
    this.objects.set(key, { bytes, contentType })
  }

  keys(): string[] {
    return [...this.objects.keys()]
  }
}

// ── Cached payload schema ──

const SeveritySchema = z.enum(['high', 'medium', 'low'])
const RecordDateFieldSchema = z.enum(['incorporation_date', 'name_change_date'])

const MismatchSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('date_mismatch'),
    severity: SeveritySchema,
    document: z.string(),
    message: z.string(),
    field: RecordDateFieldSchema,
    expected_date: z.string(),
    found_date: z.string(),
    difference_days: z.number(),
  }),
  z.object({
    type: z.literal('name_mismatch'),
    severity: SeveritySchema,
    document: z.string(),
    message: z.string(),
    expected_names: z.array(z.string()),
    found_name: z.string(),
  }),
  z.object({
    type: z.literal('missing_date'),
    severity: SeveritySchema,
    document: z.string(),
    message: z.string(),
    field: RecordDateFieldSchema,
    expected_date: z.string(),
  }),
  z.object({
    type: z.literal('other'),
    severity: SeveritySchema,
    document: z.string(),
    message: z.string(),
  }),
])

const CompanyRecordSchema = z.object({
  company_number: z.string(),
  company_name: z.string(),
  company_status: z.string(),
  incorporation_date: z.string().nullable(),
  dissolution_date: z.string().nullable().optional(),
  registered_address: z.object({
    premises: z.string().optional(),
    address_line_1: z.string().optional(),
    address_line_2: z.string().optional(),
    locality: z.string().optional(),
    region: z.string().optional(),
    postal_code: z.string().optional(),
    country: z.string().optional(),
  }),
  sic_codes: z.array(z.string()),
  company_type: z.string(),
  previous_names: z.array(z.object({
    name: z.string(),
    effective_from: z.string(),
    ceased_on: z.string(),
  })),
})

const CachedResultSchema: z.ZodType<CompanyScanResult> = z.object({
  status: z.literal('ok'),
  company_number: z.string(),
  company_name: z.string(),
  company_status: z.string(),
  profile: CompanyRecordSchema,
  mismatches: z.object({
    mismatches: z.array(MismatchSchema),
    documents_checked: z.number(),
    facts_extracted: z.number(),
    warnings: z.array(z.string()),
  }),
  scanned_at: z.string(),
  configuration: z.object({
    active_directors_only: z.boolean(),
    use_ai: z.boolean(),
  }),
  from_cache: z.boolean(),
})

// ── Cache ──

export interface CacheStore {
  exists(companyNumber: string, fingerprint: string): Promise<boolean>
  get(companyNumber: string, fingerprint: string): Promise<CompanyScanResult | null>
  put(companyNumber: string, result: CompanyScanResult): Promise<boolean>
}

/** The AI flag is provenance only; it does not split the cache */
export function configurationFingerprint(options: { active_directors_only: boolean }): string {
  return options.active_directors_only ? 'Only Active Directors' : 'Directors'
}

export function cacheKey(companyNumber: string, fingerprint: string): string {
  return `results/${companyNumber}/${fingerprint}/result.json`
}

export class ObjectStoreCache implements CacheStore {
  private store: ObjectStore

  constructor(store: ObjectStore) {
    this.store = store
  }

  async exists(companyNumber: string, fingerprint: string): Promise<boolean> {
    try {
      return await this.store.exists(cacheKey(companyNumber, fingerprint))
    } catch (error) {
      console.warn(`Cache unavailable checking ${companyNumber}:`, error instanceof Error ? error.message : error)
      return false
    }
  }

  async get(companyNumber: string, fingerprint: string): Promise<CompanyScanResult | null> {
    const key = cacheKey(companyNumber, fingerprint)

    let bytes: Uint8Array | null
    try {
      bytes = await this.store.get(key)
    } catch (error) {
      console.warn(`Cache unavailable reading ${key}, treating as miss:`, error instanceof Error ? error.message : error)
      return null
    }
    if (!bytes) return null

    let body: unknown
    try {
      body = JSON.parse(new TextDecoder('utf-8').decode(bytes))
    } catch {
      console.warn(`Cached result at ${key} is not valid JSON, ignoring`)
      return null
    }

    const parsed = CachedResultSchema.safeParse(body)
    if (!parsed.success) {
      console.warn(`Cached result at ${key} has an unexpected shape, ignoring`)
      return null
    }

    return { ...parsed.data, from_cache: true }
  }

  async put(companyNumber: string, result: CompanyScanResult): Promise<boolean> {
    const key = cacheKey(companyNumber, configurationFingerprint(result.configuration))
    const payload = new TextEncoder().encode(JSON.stringify({ ...result, from_cache: false }, null, 2))

    try {
      await this.store.put(key, payload, 'application/json')
      console.log(`Cached scan result at ${key}`)
      return true
    } catch (error) {
      const reason = error instanceof CacheUnavailableError ? error.message : error
      console.error(`Failed to cache scan result at ${key}:`, reason)
      return false
    }
  }
}
