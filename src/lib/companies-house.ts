// Companies House API Client
// Documentation: https://developer-specs.company-information.service.gov.uk

import { z } from 'zod'
import type {
  CompanyRecord,
  CompanySummary,
  Director,
  DocumentType,
  DownloadedDocument,
  FilingDocument,
  OfficerAppointment,
  RateLimitStatus,
} from '../types/registry.ts'
import { systemClock, type Clock } from './clock.ts'
import { normalizeCompanyNumber, tryNormalizeCompanyNumber } from './company-number.ts'
import {
  InvalidInputError,
  NotFoundError,
  ParseError,
  ScanCancelledError,
  UpstreamUnavailableError,
  isCancellation,
  throwIfCancelled,
} from './errors.ts'
import type { AppConfig } from './config.ts'
import { RateLimiter } from './rate-limiter.ts'

// ── Response schemas ──

const AddressSchema = z.object({
  premises: z.string().optional(),
  address_line_1: z.string().optional(),
  address_line_2: z.string().optional(),
  locality: z.string().optional(),
  region: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string().optional(),
})

const ProfileSchema = z.object({
  company_number: z.string(),
  company_name: z.string(),
  company_status: z.string().default('unknown'),
  date_of_creation: z.string().optional(),
  date_of_cessation: z.string().optional(),
  registered_office_address: AddressSchema.optional(),
  sic_codes: z.array(z.string()).optional(),
  type: z.string().default('unknown'),
  previous_company_names: z.array(z.object({
    name: z.string(),
    effective_from: z.string(),
    ceased_on: z.string(),
  })).optional(),
})

const FilingHistorySchema = z.object({
  total_count: z.number().optional(),
  items: z.array(z.object({
    transaction_id: z.string(),
    category: z.string().default('miscellaneous'),
    type: z.string().default(''),
    description: z.string().default(''),
    date: z.string().optional(),
    links: z.object({ document_metadata: z.string().optional() }).optional(),
  })).default([]),
})

const OfficersSchema = z.object({
  total_results: z.number().optional(),
  items: z.array(z.object({
    name: z.string(),
    officer_role: z.string(),
    appointed_on: z.string().optional(),
    resigned_on: z.string().optional(),
    links: z.object({
      officer: z.object({ appointments: z.string() }),
    }),
  })).default([]),
})

const AppointmentsSchema = z.object({
  name: z.string().default(''),
  total_results: z.number().optional(),
  items: z.array(z.object({
    name: z.string().optional(),
    officer_role: z.string(),
    appointed_on: z.string().optional(),
    resigned_on: z.string().optional(),
    appointed_to: z.object({
      company_number: z.string(),
      company_name: z.string().default(''),
      company_status: z.string().optional(),
    }),
  })).default([]),
})

const SearchSchema = z.object({
  hits: z.number().optional(),
  items: z.array(z.object({
    company_number: z.string(),
    company_name: z.string(),
    company_status: z.string().default('unknown'),
    company_type: z.string().optional(),
    date_of_creation: z.string().optional(),
    date_of_cessation: z.string().optional(),
    registered_office_address: AddressSchema.optional(),
    sic_codes: z.array(z.string()).optional(),
  })).default([]),
})

const DocumentMetadataSchema = z.object({
  resources: z.record(z.string(), z.unknown()).default({}),
})

// ── Types ──

export interface RequestOptions {
  signal?: AbortSignal
  /** Epoch ms; rate-limit waits past this fail instead */
  deadline?: number
}

export interface CompaniesHouseConfig {
  apiKey: string
  rateLimiter: RateLimiter
  baseUrl?: string
  documentBaseUrl?: string
  maxRetries?: number
  retryBaseDelayMs?: number
  clock?: Clock
  fetch?: typeof fetch
}

/** The slice of the registry the network traversal needs */
export interface DirectorSource {
  getOfficers(companyNumber: string, options?: RequestOptions & { activeOnly?: boolean }): Promise<OfficerAppointment[]>
  getOfficerAppointments(directorId: string, options?: RequestOptions): Promise<Director>
}

export interface RegistryClient extends DirectorSource {
  getProfile(companyNumber: string, options?: RequestOptions): Promise<CompanyRecord>
  getFilingHistory(companyNumber: string, options?: RequestOptions & { limit?: number }): Promise<FilingDocument[]>
  downloadDocument(documentId: string, options?: RequestOptions): Promise<DownloadedDocument>
  search(query: string, options?: RequestOptions & { status?: string; limit?: number }): Promise<CompanySummary[]>
  getRateLimitStatus(): RateLimitStatus
}

// Representations to ask the document API for, best first
const DOCUMENT_CONTENT_TYPES = ['application/xhtml+xml', 'text/plain', 'application/json', 'application/pdf']
const TEXT_CONTENT_TYPES = new Set(['application/xhtml+xml', 'text/plain', 'application/json', 'text/html'])

const FILING_CATEGORY_TYPES: Record<string, DocumentType> = {
  'incorporation': 'incorporation',
  'change-of-name': 'name-change',
  'annual-return': 'annual-return',
  'confirmation-statement': 'annual-return',
}

const PAGE_SIZE = 100

// ── Helpers ──

/** ".../document/abc123" → "abc123" */
function lastPathSegment(path: string): string | null {
  const segment = path.replace(/\/+$/, '').split('/').pop()
  return segment || null
}

/** "/officers/AbC123/appointments" → "AbC123" */
export function directorIdFromLink(link: string): string | null {
  const match = link.match(/\/officers\/([^/]+)\/appointments/)
  return match ? match[1] : null
}

export class CompaniesHouseClient implements RegistryClient {
  private baseUrl: string
  private documentBaseUrl: string
  private authHeader: string
  private rateLimiter: RateLimiter
  private maxRetries: number
  private retryBaseDelayMs: number
  private clock: Clock
  private fetchImpl: typeof fetch

  constructor(config: CompaniesHouseConfig) {
    if (!config.apiKey) {
      throw new InvalidInputError('Companies House API key is required')
    }
    this.baseUrl = (config.baseUrl ?? 'https://api.company-information.service.gov.uk').replace(/\/+$/, '')
    this.documentBaseUrl = (config.documentBaseUrl ?? 'https://document-api.company-information.service.gov.uk').replace(/\/+$/, '')
    // Basic auth: key as user name, empty password
    this.authHeader = `Basic ${Buffer.from(`${config.apiKey}:`).toString('base64')}`
    this.rateLimiter = config.rateLimiter
    this.maxRetries = config.maxRetries ?? 3
    this.retryBaseDelayMs = config.retryBaseDelayMs ?? 1000
    this.clock = config.clock ?? systemClock
    this.fetchImpl = config.fetch ?? fetch
  }

  getRateLimitStatus(): RateLimitStatus {
    return this.rateLimiter.getStatus()
  }

  /**
   * One rate-limited request with retry on 429/5xx/network failure.
   * 404 → NotFound, 401/403 → InvalidInput; neither is retried.
   */
  private async send(url: string, resource: string, accept: string, options: RequestOptions = {}): Promise<Response> {
    const attempts = this.maxRetries + 1
    let lastStatus: number | undefined
    let lastError: string | undefined

    for (let attempt = 0; attempt < attempts; attempt++) {
      throwIfCancelled(options.signal)
      await this.rateLimiter.acquire({ signal: options.signal, deadline: options.deadline })

      let response: Response
      try {
        response = await this.fetchImpl(url, {
          headers: { Authorization: this.authHeader, Accept: accept },
          signal: options.signal,
        })
      } catch (error) {
        if (isCancellation(error) || options.signal?.aborted) {
          throw new ScanCancelledError()
        }
        lastError = error instanceof Error ? error.message : String(error)
        lastStatus = undefined
        if (attempt < attempts - 1) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt)
          console.log(`Companies House network error on ${resource}, retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxRetries})`)
          await this.clock.sleep(delay, options.signal)
        }
        continue
      }

      if (response.status === 404) {
        throw new NotFoundError(resource)
      }

      if (response.status === 401 || response.status === 403) {
        throw new InvalidInputError(`Companies House rejected the API key (HTTP ${response.status})`)
      }

      if (response.status === 429 || response.status >= 500) {
        lastStatus = response.status
        lastError = `HTTP ${response.status}`
        if (attempt < attempts - 1) {
          const delay = this.retryBaseDelayMs * Math.pow(2, attempt)
          console.log(`Companies House API ${response.status} on ${resource}, retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxRetries})`)
          await this.clock.sleep(delay, options.signal)
        }
        continue
      }

      if (!response.ok) {
        throw new UpstreamUnavailableError(`Companies House API ${response.status} on ${resource}`, attempt + 1, response.status)
      }

      return response
    }

    throw new UpstreamUnavailableError(
      `Companies House unavailable for ${resource} after ${attempts} attempts: ${lastError ?? 'unknown error'}`,
      attempts,
      lastStatus
    )
  }

  private async getJson<S extends z.ZodTypeAny>(url: string, resource: string, schema: S, options?: RequestOptions): Promise<z.output<S>> {
    const response = await this.send(url, resource, 'application/json', options)
    const text = await response.text()

    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (error) {
      throw new ParseError(`Malformed JSON from Companies House for ${resource}`, error instanceof Error ? error.message : error)
    }

    const parsed = schema.safeParse(body)
    if (!parsed.success) {
      throw new ParseError(`Unexpected response shape from Companies House for ${resource}`, parsed.error.issues)
    }
    return parsed.data
  }

  async getProfile(companyNumber: string, options?: RequestOptions): Promise<CompanyRecord> {
    const number = normalizeCompanyNumber(companyNumber)
    const data = await this.getJson(`${this.baseUrl}/company/${number}`, `company ${number}`, ProfileSchema, options)

    return {
      company_number: normalizeCompanyNumber(data.company_number),
      company_name: data.company_name,
      company_status: data.company_status,
      incorporation_date: data.date_of_creation ?? null,
      dissolution_date: data.date_of_cessation ?? null,
      registered_address: data.registered_office_address ?? {},
      sic_codes: data.sic_codes ?? [],
      company_type: data.type,
      previous_names: data.previous_company_names ?? [],
    }
  }

  async getFilingHistory(companyNumber: string, options: RequestOptions & { limit?: number } = {}): Promise<FilingDocument[]> {
    const number = normalizeCompanyNumber(companyNumber)
    const limit = options.limit ?? 100
    const filings: FilingDocument[] = []
    let startIndex = 0

    while (filings.length < limit) {
      const url = `${this.baseUrl}/company/${number}/filing-history?items_per_page=${PAGE_SIZE}&start_index=${startIndex}`
      const page = await this.getJson(url, `filing history ${number}`, FilingHistorySchema, options)
      const retrievedAt = new Date(this.clock.now()).toISOString()

      for (const item of page.items) {
        const metadataLink = item.links?.document_metadata
        filings.push({
          document_id: (metadataLink && lastPathSegment(metadataLink)) || '',
          company_number: number,
          document_type: FILING_CATEGORY_TYPES[item.category] ?? 'other',
          transaction_id: item.transaction_id,
          category: item.category,
          filing_type: item.type,
          description: item.description,
          date: item.date ?? null,
          retrieved_at: retrievedAt,
        })
      }

      startIndex += page.items.length
      if (page.items.length === 0 || (page.total_count !== undefined && startIndex >= page.total_count)) break
    }

    return filings.slice(0, limit)
  }

  async getOfficers(companyNumber: string, options: RequestOptions & { activeOnly?: boolean } = {}): Promise<OfficerAppointment[]> {
    const number = normalizeCompanyNumber(companyNumber)
    const officers: OfficerAppointment[] = []
    let startIndex = 0

    for (;;) {
      const url = `${this.baseUrl}/company/${number}/officers?items_per_page=${PAGE_SIZE}&start_index=${startIndex}`
      const page = await this.getJson(url, `officers ${number}`, OfficersSchema, options)

      for (const item of page.items) {
        const directorId = directorIdFromLink(item.links.officer.appointments)
        if (!directorId) continue
        officers.push({
          director_id: directorId,
          name: item.name,
          role: item.officer_role,
          appointed_on: item.appointed_on ?? null,
          resigned_on: item.resigned_on ?? null,
        })
      }

      startIndex += page.items.length
      if (page.items.length === 0 || page.total_results === undefined || startIndex >= page.total_results) break
    }

    return options.activeOnly ? officers.filter(o => !o.resigned_on) : officers
  }

  async getOfficerAppointments(directorId: string, options?: RequestOptions): Promise<Director> {
    const appointments: Director['appointments'] = []
    let name = ''
    let startIndex = 0

    for (;;) {
      const url = `${this.baseUrl}/officers/${encodeURIComponent(directorId)}/appointments?items_per_page=${PAGE_SIZE}&start_index=${startIndex}`
      const page = await this.getJson(url, `appointments ${directorId}`, AppointmentsSchema, options)
      name = name || page.name

      for (const item of page.items) {
        const companyNumber = tryNormalizeCompanyNumber(item.appointed_to.company_number)
        if (!companyNumber) {
          console.warn(`Skipping appointment of ${directorId} with unreadable company number "${item.appointed_to.company_number}"`)
          continue
        }
        appointments.push({
          company_number: companyNumber,
          company_name: item.appointed_to.company_name,
          company_status: item.appointed_to.company_status,
          role: item.officer_role,
          appointed_on: item.appointed_on ?? null,
          resigned_on: item.resigned_on ?? null,
        })
      }

      startIndex += page.items.length
      if (page.items.length === 0 || page.total_results === undefined || startIndex >= page.total_results) break
    }

    return { director_id: directorId, name, appointments }
  }

  /** Advanced search, paged until `limit` results or the registry runs out */
  async search(query: string, options: RequestOptions & { status?: string; limit?: number } = {}): Promise<CompanySummary[]> {
    const limit = options.limit ?? 100
    const results: CompanySummary[] = []
    let startIndex = 0

    while (results.length < limit) {
      const params = new URLSearchParams()
      if (query.trim()) params.set('company_name_includes', query.trim())
      if (options.status) params.set('company_status', options.status)
      params.set('size', String(Math.min(PAGE_SIZE, limit - results.length)))
      params.set('start_index', String(startIndex))

      let page: z.infer<typeof SearchSchema>
      try {
        page = await this.getJson(`${this.baseUrl}/advanced-search/companies?${params}`, `search "${query}"`, SearchSchema, options)
      } catch (error) {
        // The advanced search answers 404 when there are no (more) hits
        if (error instanceof NotFoundError) break
        throw error
      }

      for (const item of page.items) {
        const companyNumber = tryNormalizeCompanyNumber(item.company_number)
        if (!companyNumber) {
          console.warn(`Skipping search hit with unreadable company number "${item.company_number}"`)
          continue
        }
        results.push({
          company_number: companyNumber,
          company_name: item.company_name,
          company_status: item.company_status,
          company_type: item.company_type,
          date_of_creation: item.date_of_creation ?? null,
          date_of_cessation: item.date_of_cessation ?? null,
          address: item.registered_office_address,
          sic_codes: item.sic_codes ?? [],
        })
      }

      startIndex += page.items.length
      if (page.items.length === 0 || (page.hits !== undefined && startIndex >= page.hits)) break
    }

    return results.slice(0, limit)
  }

  /** Metadata first, then the best representation the document API offers */
  async downloadDocument(documentId: string, options?: RequestOptions): Promise<DownloadedDocument> {
    const metadata = await this.getJson(
      `${this.documentBaseUrl}/document/${encodeURIComponent(documentId)}`,
      `document ${documentId}`,
      DocumentMetadataSchema,
      options
    )

    const available = Object.keys(metadata.resources)
    const contentType = DOCUMENT_CONTENT_TYPES.find(type => available.includes(type)) ?? 'application/pdf'

    const response = await this.send(
      `${this.documentBaseUrl}/document/${encodeURIComponent(documentId)}/content`,
      `document ${documentId}`,
      contentType,
      options
    )

    const bytes = new Uint8Array(await response.arrayBuffer())
    const returnedType = (response.headers.get('content-type') ?? contentType).split(';')[0].trim()

    return {
      document_id: documentId,
      content_type: returnedType,
      bytes,
      text: TEXT_CONTENT_TYPES.has(returnedType) ? new TextDecoder('utf-8').decode(bytes) : undefined,
    }
  }
}

/** Client with its own process-wide rate limiter, built from environment config */
export function createCompaniesHouseClient(
  config: AppConfig['companiesHouse'],
  overrides: { clock?: Clock; fetch?: typeof fetch } = {}
): CompaniesHouseClient {
  if (!config.apiKey) {
    throw new InvalidInputError('COMPANIES_HOUSE_API_KEY is not set')
  }
  const clock = overrides.clock ?? systemClock
  return new CompaniesHouseClient({
    apiKey: config.apiKey,
    baseUrl: config.baseUrl,
    documentBaseUrl: config.documentBaseUrl,
    maxRetries: config.maxRetries,
    retryBaseDelayMs: config.retryBaseDelayMs,
    rateLimiter: new RateLimiter({
      maxRequests: config.maxRequests,
      windowMs: config.windowSeconds * 1000,
      clock,
    }),
    clock,
    fetch: overrides.fetch,
  })
}
