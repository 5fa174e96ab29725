// Scan types: facts, mismatch findings, per-company results and the director network

import type { CompanyRecord } from './registry.ts'

export type DateContext = 'incorporation' | 'name_change' | 'registration' | 'filing'
export type FactContext = DateContext | 'unscoped'

// =====================================================
// FACTS
// =====================================================

export interface DateFact {
  kind: 'date'
  context: FactContext
  value: Date | null   // null = the document names the date but the span did not parse
  raw: string
  source_document_id: string
  confidence: number   // heuristic, not calibrated
}

export interface NameFact {
  kind: 'name'
  context: FactContext
  value: string
  source_document_id: string
  confidence: number
}

export type ExtractedFact = DateFact | NameFact

// =====================================================
// MISMATCHES
// =====================================================

export type MismatchSeverity = 'high' | 'medium' | 'low'
export type RecordDateField = 'incorporation_date' | 'name_change_date'

interface MismatchBase {
  severity: MismatchSeverity
  document: string
  message: string
}

export interface DateMismatch extends MismatchBase {
  type: 'date_mismatch'
  field: RecordDateField
  expected_date: string
  found_date: string
  difference_days: number
}

export interface NameMismatch extends MismatchBase {
  type: 'name_mismatch'
  expected_names: string[]
  found_name: string
}

export interface MissingDate extends MismatchBase {
  type: 'missing_date'
  field: RecordDateField
  expected_date: string
}

export interface OtherMismatch extends MismatchBase {
  type: 'other'
}

export type Mismatch = DateMismatch | NameMismatch | MissingDate | OtherMismatch
export type MismatchKind = Mismatch['type']

// =====================================================
// RESULTS
// =====================================================

export interface ScanConfiguration {
  active_directors_only: boolean
  use_ai: boolean
}

export interface MismatchReport {
  mismatches: Mismatch[]
  documents_checked: number
  facts_extracted: number
  warnings: string[]
}

export type ErrorCode =
  | 'invalid_input'
  | 'not_found'
  | 'rate_limited'
  | 'upstream_unavailable'
  | 'parse_error'
  | 'cache_unavailable'
  | 'cancelled'
  | 'internal'

export interface ErrorInfo {
  code: ErrorCode
  message: string
}

export interface CompanyScanResult {
  status: 'ok'
  company_number: string
  company_name: string
  company_status: string
  profile: CompanyRecord
  mismatches: MismatchReport
  scanned_at: string
  configuration: ScanConfiguration
  from_cache: boolean
}

export interface FailedScanResult {
  status: 'error'
  company_number: string
  error: ErrorInfo
  scanned_at: string
}

export type ScanResult = CompanyScanResult | FailedScanResult

// =====================================================
// NETWORK
// =====================================================

export interface CompanyNode {
  company_number: string
  company_name: string | null
  company_status: string | null
  depth: number
}

export interface DirectorNode {
  director_id: string
  name: string
  company_count: number
}

export interface Connection {
  company_number: string
  director_id: string
  role: string
}

export interface NetworkStatistics {
  total_companies: number
  total_directors: number
  total_connections: number
  depth_reached: number
  max_depth: number
  warnings: string[]
  cancelled: boolean
}

export interface NetworkGraph {
  companies: CompanyNode[]
  directors: DirectorNode[]
  connections: Connection[]
  statistics: NetworkStatistics
}

// =====================================================
// BATCH
// =====================================================

export interface ScanRequest {
  company_numbers: string[]
  scan_network?: boolean
  network_depth?: number
  active_only?: boolean
  use_ai?: boolean
  use_cache?: boolean
  signal?: AbortSignal
  /** Epoch ms; a rate-limit wait that would run past it fails with `rate_limited` */
  deadline?: number
}

export interface ScanBatch {
  results: ScanResult[]
  network?: NetworkGraph
  failed: Array<{ company_number: string } & ErrorInfo>
}

export interface ScanSummary {
  total_companies: number
  successful: number
  failed: number
  total_mismatches: number
  companies_with_mismatches: number
  from_cache: boolean
}
