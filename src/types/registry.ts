// =====================================================
// COMPANY REGISTRY TYPES
// =====================================================

export type CompanyStatus =
  | 'active'
  | 'dissolved'
  | 'liquidation'
  | 'receivership'
  | 'administration'
  | 'voluntary-arrangement'
  | 'converted-closed'
  | 'insolvency-proceedings'
  | 'open'
  | 'closed'
  | 'registered'
  | 'removed'

export interface RegisteredAddress {
  premises?: string
  address_line_1?: string
  address_line_2?: string
  locality?: string
  region?: string
  postal_code?: string
  country?: string
}

export interface PreviousCompanyName {
  name: string
  effective_from: string
  ceased_on: string
}

/** Authoritative snapshot of one company as returned by the registry at scan time */
export interface CompanyRecord {
  company_number: string         // always normalized (8 chars)
  company_name: string
  company_status: CompanyStatus | string
  incorporation_date: string | null   // yyyy-MM-dd
  dissolution_date?: string | null
  registered_address: RegisteredAddress
  sic_codes: string[]
  company_type: string
  previous_names: PreviousCompanyName[]
}

/** Light record carried by search results and graph nodes */
export interface CompanySummary {
  company_number: string
  company_name: string
  company_status: CompanyStatus | string
  company_type?: string
  date_of_creation?: string | null
  date_of_cessation?: string | null
  address?: RegisteredAddress
  sic_codes?: string[]
}

// =====================================================
// OFFICERS
// =====================================================

/** One officer as listed on one company */
export interface OfficerAppointment {
  director_id: string
  name: string
  role: string
  appointed_on: string | null
  resigned_on?: string | null
}

export interface DirectorCompanyLink {
  company_number: string
  company_name: string
  company_status?: string
  role: string
  appointed_on: string | null
  resigned_on?: string | null
}

/** Registry-assigned identity; names collide and are never used to merge */
export interface Director {
  director_id: string
  name: string
  appointments: DirectorCompanyLink[]
}

// =====================================================
// FILINGS
// =====================================================

export type DocumentType = 'incorporation' | 'name-change' | 'annual-return' | 'other'

export interface FilingDocument {
  document_id: string
  company_number: string
  document_type: DocumentType
  transaction_id: string
  category: string
  filing_type: string
  description: string
  date: string | null
  retrieved_at: string
}

export interface DownloadedDocument {
  document_id: string
  content_type: string
  bytes: Uint8Array
  text?: string
}

export interface RateLimitStatus {
  max_requests: number
  remaining_requests: number
  window_seconds: number
  reset_at: string
}
