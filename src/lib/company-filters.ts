// Filtered company selection: registry search terms plus client-side filters

import { z } from 'zod'
import type { CompanySummary } from '../types/registry.ts'
import { InvalidInputError } from './errors.ts'

const IsoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd')
const Letter = z.string().regex(/^[A-Za-z]$/, 'expected a single letter')

export const CompanyFiltersSchema = z.object({
  alpha_start: Letter.optional(),
  alpha_end: Letter.optional(),
  status: z.string().min(1).optional(),
  year_from: z.number().int().optional(),
  year_to: z.number().int().optional(),
  location: z.string().optional(),
  sic_codes: z.array(z.string().min(1)).optional(),
  company_types: z.array(z.string().min(1)).optional(),
  dissolved_from: IsoDate.optional(),
  dissolved_to: IsoDate.optional(),
  limit: z.number().int().positive().optional(),
})

export type CompanyFilters = z.infer<typeof CompanyFiltersSchema>

/** At most five letters are searched per request */
export const MAX_SEARCH_LETTERS = 5

export function parseCompanyFilters(input: unknown): CompanyFilters {
  const parsed = CompanyFiltersSchema.safeParse(input ?? {})
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new InvalidInputError(`Invalid company filters: ${issues}`, parsed.error.issues)
  }
  return parsed.data
}

/**
 * Search terms for the alphabetical range, e.g. A..C → [A, B, C].
 * An empty list means "search by status only".
 */
export function searchLetters(filters: CompanyFilters): string[] {
  if (!filters.alpha_start || !filters.alpha_end) return []

  const start = filters.alpha_start.toUpperCase().charCodeAt(0)
  const end = Math.min(filters.alpha_end.toUpperCase().charCodeAt(0), start + MAX_SEARCH_LETTERS - 1)
  const letters: string[] = []
  for (let code = start; code <= end; code++) {
    letters.push(String.fromCharCode(code))
  }
  return letters
}

function yearOf(date: string | null | undefined): number | null {
  if (!date) return null
  const year = Number(date.split('-')[0])
  return Number.isInteger(year) ? year : null
}

function addressText(company: CompanySummary): string {
  const address = company.address ?? {}
  return [address.locality, address.region, address.postal_code, address.address_line_1, address.country]
    .filter(Boolean)
    .join(' ')
    .toUpperCase()
}

/** Filters the registry search cannot express. A company missing a filtered field is excluded. */
export function applyCompanyFilters(companies: CompanySummary[], filters: CompanyFilters): CompanySummary[] {
  let selected = companies

  if (filters.year_from !== undefined || filters.year_to !== undefined) {
    const from = filters.year_from ?? 0
    const to = filters.year_to ?? 9999
    selected = selected.filter(c => {
      const year = yearOf(c.date_of_creation)
      return year !== null && year >= from && year <= to
    })
  }

  const location = filters.location?.trim().toUpperCase()
  if (location) {
    selected = selected.filter(c => addressText(c).includes(location))
  }

  if (filters.sic_codes && filters.sic_codes.length > 0) {
    const wanted = new Set(filters.sic_codes.map(s => s.trim()))
    selected = selected.filter(c => (c.sic_codes ?? []).some(code => wanted.has(code)))
  }

  if (filters.company_types && filters.company_types.length > 0) {
    const types = new Set(filters.company_types)
    selected = selected.filter(c => c.company_type !== undefined && types.has(c.company_type))
  }

  if (filters.dissolved_from || filters.dissolved_to) {
    const from = filters.dissolved_from ?? '1850-01-01'
    const to = filters.dissolved_to ?? '2999-12-31'
    selected = selected.filter(c => !!c.date_of_cessation && c.date_of_cessation >= from && c.date_of_cessation <= to)
  }

  return selected
}
