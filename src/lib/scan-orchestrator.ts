/**
 * Scan orchestration: which companies to scan, cache lookups, per-company
 * fetch → extract → detect, and the optional director network afterwards.
 *
 * Item failures never raise: each becomes an error slot in its input position.
 */

import type { CompanyRecord, CompanySummary, FilingDocument } from '../types/registry.ts'
import type {
  CompanyScanResult,
  ExtractedFact,
  FailedScanResult,
  NetworkGraph,
  ScanBatch,
  ScanConfiguration,
  ScanRequest,
  ScanResult,
  ScanSummary,
} from '../types/scan.ts'
import { ObjectStoreCache, MemoryObjectStore, configurationFingerprint, type CacheStore } from './cache-store.ts'
import { systemClock, type Clock } from './clock.ts'
import { createCompaniesHouseClient, type RegistryClient, type RequestOptions } from './companies-house.ts'
import { applyCompanyFilters, parseCompanyFilters, searchLetters } from './company-filters.ts'
import { tryNormalizeCompanyNumber } from './company-number.ts'
import { mapWithConcurrency } from './concurrency.ts'
import type { AppConfig } from './config.ts'
import { DefaultDocumentTextReader, type DocumentTextReader } from './document-text.ts'
import { InvalidInputError, ScanCancelledError, isCancellation, toErrorInfo } from './errors.ts'
import { PatternFactExtractor, contextForDocumentType, type FactExtractor } from './fact-extractor.ts'
import { LlmFactExtractor } from './llm-fact-extractor.ts'
import { createLLMClient } from './llm.ts'
import { MismatchDetector } from './mismatch-detector.ts'
import { NetworkTraversal } from './network-traversal.ts'
import { createSupabaseObjectStore } from './supabase-storage.ts'

// ── Types ──

export interface ScanOrchestratorDeps {
  registry: RegistryClient
  cache?: CacheStore
  patternExtractor?: FactExtractor
  /** Required for use_ai scans */
  llmExtractor?: FactExtractor
  textReader?: DocumentTextReader
  detector?: MismatchDetector
  traversal?: NetworkTraversal
  /** Companies scanned at once */
  concurrency?: number
  /** Documents downloaded at once per company */
  documentConcurrency?: number
  maxFilings?: number
  searchLimit?: number
  clock?: Clock
}

export type CompanySelection =
  | { mode: 'specific'; company_numbers: string[] }
  | { mode: 'filtered'; filters: unknown }

const DEFAULT_NETWORK_DEPTH = 1

// ── Orchestrator ──

export class ScanOrchestrator {
  private registry: RegistryClient
  private cache?: CacheStore
  private patternExtractor: FactExtractor
  private llmExtractor?: FactExtractor
  private textReader: DocumentTextReader
  private detector: MismatchDetector
  private traversal: NetworkTraversal
  private concurrency: number
  private documentConcurrency: number
  private maxFilings: number
  private searchLimit: number
  private clock: Clock

  constructor(deps: ScanOrchestratorDeps) {
    this.registry = deps.registry
    this.cache = deps.cache
    this.patternExtractor = deps.patternExtractor ?? new PatternFactExtractor()
    this.llmExtractor = deps.llmExtractor
    this.textReader = deps.textReader ?? new DefaultDocumentTextReader()
    this.detector = deps.detector ?? new MismatchDetector()
    this.concurrency = deps.concurrency ?? 4
    this.documentConcurrency = deps.documentConcurrency ?? 4
    this.traversal = deps.traversal ?? new NetworkTraversal(deps.registry, { concurrency: this.concurrency })
    this.maxFilings = deps.maxFilings ?? 100
    this.searchLimit = deps.searchLimit ?? 100
    this.clock = deps.clock ?? systemClock
  }

  /** Company numbers to scan: the explicit list, or a registry search narrowed by filters */
  async resolveCompanies(selection: CompanySelection, options: RequestOptions = {}): Promise<string[]> {
    if (selection.mode === 'specific') {
      return selection.company_numbers
    }

    const filters = parseCompanyFilters(selection.filters)
    const limit = filters.limit ?? this.searchLimit
    const letters = searchLetters(filters)

    let found: CompanySummary[] = letters.length === 0
      ? await this.registry.search('', { ...options, status: filters.status, limit })
      : []

    for (const letter of letters) {
      found = found.concat(await this.registry.search(letter, { ...options, status: filters.status, limit }))
      if (found.length >= limit) break
    }

    const numbers: string[] = []
    for (const company of applyCompanyFilters(found, filters)) {
      if (!numbers.includes(company.company_number)) numbers.push(company.company_number)
    }
    console.log(`Filtered search: ${found.length} found, ${numbers.length} after filters, limit ${limit}`)
    return numbers.slice(0, limit)
  }

  async processCompanies(request: ScanRequest): Promise<ScanBatch> {
    const useAi = request.use_ai ?? false
    if (useAi && !this.llmExtractor) {
      throw new InvalidInputError('An LLM API key is required when AI extraction is enabled')
    }
    if (request.company_numbers.length === 0) {
      throw new InvalidInputError('No company numbers provided')
    }
    const depth = request.network_depth ?? DEFAULT_NETWORK_DEPTH
    if (!Number.isInteger(depth) || depth < 0) {
      throw new InvalidInputError(`network_depth must be a non-negative integer, got ${depth}`)
    }

    const configuration: ScanConfiguration = {
      active_directors_only: request.active_only ?? true,
      use_ai: useAi,
    }
    // The cache serves single-company interactive requests only
    const useCache = !!this.cache && request.use_cache !== false && request.company_numbers.length === 1
    const { signal, deadline } = request

    console.log(`Scanning ${request.company_numbers.length} companies (ai=${useAi}, active_only=${configuration.active_directors_only}, cache=${useCache})`)

    const outcomes = await mapWithConcurrency(
      request.company_numbers,
      this.concurrency,
      async raw => {
        const number = tryNormalizeCompanyNumber(raw)
        if (!number) {
          throw new InvalidInputError(`Invalid company number "${raw}"`)
        }
        return this.scanCompany(number, configuration, { signal, deadline, useCache })
      },
      signal
    )

    const results: ScanResult[] = outcomes.map((outcome, i) => {
      const raw = request.company_numbers[i]
      const companyNumber = tryNormalizeCompanyNumber(raw) ?? raw
      if (outcome.status === 'fulfilled') return outcome.value

      const error = outcome.status === 'skipped' ? toErrorInfo(new ScanCancelledError()) : toErrorInfo(outcome.reason)
      if (outcome.status === 'rejected' && error.code !== 'cancelled') {
        console.error(`Scan failed for ${companyNumber}:`, outcome.reason)
      }
      const failed: FailedScanResult = {
        status: 'error',
        company_number: companyNumber,
        error,
        scanned_at: this.timestamp(),
      }
      return failed
    })

    const failed: ScanBatch['failed'] = []
    for (const result of results) {
      if (result.status === 'error') failed.push({ company_number: result.company_number, ...result.error })
    }

    let network: NetworkGraph | undefined
    if (request.scan_network) {
      const seeds = results.filter((r): r is CompanyScanResult => r.status === 'ok').map(r => r.company_number)
      network = await this.traversal.traverse(seeds, {
        maxDepth: depth,
        activeOnly: configuration.active_directors_only,
        signal,
        deadline,
      })
    }

    console.log(`Scan complete: ${results.length - failed.length} ok, ${failed.length} failed`)
    return network ? { results, network, failed } : { results, failed }
  }

  private async scanCompany(
    companyNumber: string,
    configuration: ScanConfiguration,
    options: RequestOptions & { useCache: boolean }
  ): Promise<CompanyScanResult> {
    const { signal, deadline } = options

    if (options.useCache && this.cache) {
      const cached = await this.cache.get(companyNumber, configurationFingerprint(configuration))
      if (cached) {
        console.log(`Cache hit for ${companyNumber}`)
        return cached
      }
    }

    const profile = await this.registry.getProfile(companyNumber, { signal, deadline })
    const filings = await this.registry.getFilingHistory(companyNumber, { signal, deadline, limit: this.maxFilings })
    const relevant = filings.filter(f => f.document_type !== 'other' && f.document_id)

    const warnings: string[] = []
    const facts = await this.extractFromFilings(relevant, configuration.use_ai, warnings, { signal, deadline })
    const mismatches = this.detector.detect(profile, facts)

    console.log(`${companyNumber}: ${relevant.length} documents, ${facts.length} facts, ${mismatches.length} mismatches`)

    const result = this.buildResult(profile, configuration, {
      mismatches,
      documents_checked: relevant.length,
      facts_extracted: facts.length,
      warnings,
    })

    if (options.useCache && this.cache) {
      await this.cache.put(companyNumber, result)
    }
    return result
  }

  private async extractFromFilings(
    filings: FilingDocument[],
    useAi: boolean,
    warnings: string[],
    request: RequestOptions
  ): Promise<ExtractedFact[]> {
    const { signal } = request
    const extractor = useAi && this.llmExtractor ? this.llmExtractor : this.patternExtractor

    const outcomes = await mapWithConcurrency(
      filings,
      this.documentConcurrency,
      async (filing): Promise<ExtractedFact[]> => {
        const document = await this.registry.downloadDocument(filing.document_id, request)
        const text = await this.textReader.read(document)
        if (text === null) {
          warnings.push(`Document ${filing.document_id} (${document.content_type}) has no readable text`)
          return []
        }
        return extractor.extract({
          document_id: filing.document_id,
          text,
          context: contextForDocumentType(filing.document_type),
          signal,
        })
      },
      signal
    )

    const facts: ExtractedFact[] = []
    outcomes.forEach((outcome, i) => {
      if (outcome.status === 'skipped') throw new ScanCancelledError()
      if (outcome.status === 'rejected') {
        if (isCancellation(outcome.reason)) throw new ScanCancelledError()
        const { message } = toErrorInfo(outcome.reason)
        console.warn(`Skipping document ${filings[i].document_id}: ${message}`)
        warnings.push(`Document ${filings[i].document_id} unavailable: ${message}`)
        return
      }
      facts.push(...outcome.value)
    })
    return facts
  }

  private buildResult(
    profile: CompanyRecord,
    configuration: ScanConfiguration,
    report: CompanyScanResult['mismatches']
  ): CompanyScanResult {
    return {
      status: 'ok',
      company_number: profile.company_number,
      company_name: profile.company_name,
      company_status: profile.company_status,
      profile,
      mismatches: report,
      scanned_at: this.timestamp(),
      configuration,
      from_cache: false,
    }
  }

  private timestamp(): string {
    return new Date(this.clock.now()).toISOString()
  }
}

export function summarize(batch: ScanBatch): ScanSummary {
  const ok = batch.results.filter((r): r is CompanyScanResult => r.status === 'ok')
  return {
    total_companies: batch.results.length,
    successful: ok.length,
    failed: batch.results.length - ok.length,
    total_mismatches: ok.reduce((sum, r) => sum + r.mismatches.mismatches.length, 0),
    companies_with_mismatches: ok.filter(r => r.mismatches.mismatches.length > 0).length,
    from_cache: ok.some(r => r.from_cache),
  }
}

/** Wire every collaborator from environment config */
export function createScanOrchestrator(
  config: AppConfig,
  overrides: { clock?: Clock; fetch?: typeof fetch } = {}
): ScanOrchestrator {
  const registry = createCompaniesHouseClient(config.companiesHouse, overrides)

  const llmExtractor = config.llm.apiKey
    ? new LlmFactExtractor(createLLMClient({
        provider: config.llm.provider,
        apiKey: config.llm.apiKey,
        model: config.llm.model,
        fetch: overrides.fetch,
      }))
    : undefined

  let cache: CacheStore
  if (config.storage.supabaseUrl && config.storage.supabaseServiceKey) {
    cache = new ObjectStoreCache(createSupabaseObjectStore(config.storage))
  } else {
    console.log('Supabase storage not configured, caching scan results in memory')
    cache = new ObjectStoreCache(new MemoryObjectStore())
  }

  return new ScanOrchestrator({
    registry,
    cache,
    llmExtractor,
    concurrency: config.scan.concurrency,
    maxFilings: config.scan.maxFilings,
    searchLimit: config.scan.searchLimit,
    clock: overrides.clock,
  })
}
