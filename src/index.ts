export * from './types/registry.ts'
export * from './types/scan.ts'

export * from './lib/errors.ts'
export { loadConfig, type AppConfig, type LLMProviderName } from './lib/config.ts'
export { systemClock, type Clock } from './lib/clock.ts'
export { normalizeCompanyNumber, tryNormalizeCompanyNumber } from './lib/company-number.ts'
export { RateLimiter, type RateLimiterOptions } from './lib/rate-limiter.ts'
export {
  CompaniesHouseClient,
  createCompaniesHouseClient,
  type CompaniesHouseConfig,
  type DirectorSource,
  type RegistryClient,
  type RequestOptions,
} from './lib/companies-house.ts'

export { DateFactExtractor, parseDate, formatDate, type DateRange, type DateDiscrepancy } from './lib/date-extractor.ts'
export { NameFactExtractor, normalizeEntityName } from './lib/name-extractor.ts'
export { PatternFactExtractor, contextForDocumentType, type DocumentText, type FactExtractor } from './lib/fact-extractor.ts'
export { LlmFactExtractor } from './lib/llm-fact-extractor.ts'
export { createLLMClient, type LLMClient, type LLMProvider } from './lib/llm.ts'
export { DefaultDocumentTextReader, markupToText, type DocumentTextReader } from './lib/document-text.ts'
export { MismatchDetector } from './lib/mismatch-detector.ts'

export {
  MemoryObjectStore,
  ObjectStoreCache,
  cacheKey,
  configurationFingerprint,
  type CacheStore,
  type ObjectStore,
} from './lib/cache-store.ts'
export { SupabaseObjectStore, createSupabaseObjectStore } from './lib/supabase-storage.ts'
export { ResultStore, createResultStore } from './lib/result-store.ts'

export { NetworkTraversal, type TraversalOptions } from './lib/network-traversal.ts'
export { CompanyFiltersSchema, parseCompanyFilters, applyCompanyFilters, type CompanyFilters } from './lib/company-filters.ts'
export {
  ScanOrchestrator,
  createScanOrchestrator,
  summarize,
  type CompanySelection,
  type ScanOrchestratorDeps,
} from './lib/scan-orchestrator.ts'
