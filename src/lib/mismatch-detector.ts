/**
 * Mismatch detection: authoritative company record vs facts pulled from its filings.
 *
 * Date facts are only compared when their context maps to a record field:
 *   incorporation, registration → incorporation_date
 *   name_change                 → previous_names[].ceased_on
 * Filing and unscoped dates are never compared.
 */

import { isValid, parseISO } from 'date-fns'
import type { CompanyRecord } from '../types/registry.ts'
import type {
  DateFact,
  ExtractedFact,
  Mismatch,
  MismatchSeverity,
  NameFact,
  RecordDateField,
} from '../types/scan.ts'
import { DateFactExtractor, formatDate } from './date-extractor.ts'
import { normalizeEntityName } from './name-extractor.ts'

interface RecordDates {
  incorporation: Date | null
  nameChanges: Date[]
}

function toDate(value: string | null | undefined): Date | null {
  if (!value) return null
  const parsed = parseISO(value)
  return isValid(parsed) ? parsed : null
}

function iso(date: Date): string {
  return formatDate(date, 'iso')
}

function mismatchKey(m: Mismatch): string {
  switch (m.type) {
    case 'date_mismatch':
      return `${m.type}|${m.document}|${m.field}|${m.expected_date}|${m.found_date}`
    case 'missing_date':
      return `${m.type}|${m.document}|${m.field}`
    case 'name_mismatch':
      return `${m.type}|${m.document}|${normalizeEntityName(m.found_name)}`
    case 'other':
      return `${m.type}|${m.document}|${m.message}`
  }
}

export class MismatchDetector {
  private dates: DateFactExtractor

  constructor(dates: DateFactExtractor = new DateFactExtractor()) {
    this.dates = dates
  }

  detect(record: CompanyRecord, facts: ExtractedFact[]): Mismatch[] {
    const recordDates: RecordDates = {
      incorporation: toDate(record.incorporation_date),
      nameChanges: record.previous_names
        .map(p => toDate(p.ceased_on))
        .filter((d): d is Date => d !== null)
        .sort((a, b) => a.getTime() - b.getTime()),
    }

    const dateFacts = facts.filter((f): f is DateFact => f.kind === 'date')
    const nameFacts = facts.filter((f): f is NameFact => f.kind === 'name')

    const found: Mismatch[] = [
      ...this.compareDateFacts(recordDates, dateFacts),
      ...this.findMissingDates(recordDates, dateFacts),
      ...this.compareNames(record, nameFacts),
    ]

    // Same finding from the same document is reported once
    const seen = new Set<string>()
    return found.filter(m => {
      const key = mismatchKey(m)
      if (seen.has(key)) return false
      seen.add(key)
      return true
    })
  }

  private compareDateFacts(record: RecordDates, facts: DateFact[]): Mismatch[] {
    const mismatches: Mismatch[] = []

    for (const fact of facts) {
      const value = fact.value
      if (!value) continue

      if ((fact.context === 'incorporation' || fact.context === 'registration') && record.incorporation) {
        const [discrepancy] = this.dates.findMismatches(record.incorporation, [value], 0)
        if (discrepancy) {
          mismatches.push({
            type: 'date_mismatch',
            severity: 'high',
            document: fact.source_document_id,
            field: 'incorporation_date',
            expected_date: iso(discrepancy.expected),
            found_date: iso(discrepancy.found),
            difference_days: discrepancy.difference_days,
            message: `${fact.context === 'registration' ? 'Registration' : 'Incorporation'} date in document (${discrepancy.found_str}) differs from registry incorporation date (${discrepancy.expected_str}) by ${discrepancy.difference_days} days`,
          })
        }
      }

      if (fact.context === 'name_change') {
        if (record.incorporation && !this.dates.validateSequence([record.incorporation, value])) {
          mismatches.push({
            type: 'other',
            severity: 'medium',
            document: fact.source_document_id,
            message: `Name change dated ${formatDate(value)} precedes incorporation on ${formatDate(record.incorporation)}`,
          })
        }

        if (record.nameChanges.length > 0 && !record.nameChanges.some(d => this.dates.compareDates(d, value, 0))) {
          const nearest = record.nameChanges.reduce((best, d) =>
            Math.abs(d.getTime() - value.getTime()) < Math.abs(best.getTime() - value.getTime()) ? d : best
          )
          const [discrepancy] = this.dates.findMismatches(nearest, [value], 0)
          mismatches.push({
            type: 'date_mismatch',
            severity: 'medium',
            document: fact.source_document_id,
            field: 'name_change_date',
            expected_date: iso(discrepancy.expected),
            found_date: iso(discrepancy.found),
            difference_days: discrepancy.difference_days,
            message: `Name change date in document (${discrepancy.found_str}) matches no recorded name change; nearest is ${discrepancy.expected_str}`,
          })
        }
      }
    }

    return mismatches
  }

  /**
   * A document that names a date ("Date of incorporation: ...") without a parseable
   * value is reported; a document that never mentions it is not.
   */
  private findMissingDates(record: RecordDates, facts: DateFact[]): Mismatch[] {
    const mismatches: Mismatch[] = []
    const byDocument = new Map<string, DateFact[]>()
    for (const fact of facts) {
      const list = byDocument.get(fact.source_document_id) ?? []
      list.push(fact)
      byDocument.set(fact.source_document_id, list)
    }

    const latestNameChange = record.nameChanges.length > 0 ? record.nameChanges[record.nameChanges.length - 1] : null
    const fields: Array<{ contexts: DateFact['context'][]; field: RecordDateField; expected: Date | null; label: string }> = [
      { contexts: ['incorporation', 'registration'], field: 'incorporation_date', expected: record.incorporation, label: 'incorporation' },
      { contexts: ['name_change'], field: 'name_change_date', expected: latestNameChange, label: 'name change' },
    ]

    for (const [documentId, documentFacts] of byDocument) {
      for (const { contexts, field, expected, label } of fields) {
        if (!expected) continue
        const scoped = documentFacts.filter(f => contexts.includes(f.context))
        const claims = scoped.filter(f => f.value === null)
        if (claims.length === 0 || scoped.some(f => f.value !== null)) continue

        mismatches.push({
          type: 'missing_date',
          severity: 'low',
          document: documentId,
          field,
          expected_date: iso(expected),
          message: `Document mentions the ${label} date ("${claims[0].raw}") but it could not be read; registry has ${formatDate(expected)}`,
        })
      }
    }

    return mismatches
  }

  private compareNames(record: CompanyRecord, facts: NameFact[]): Mismatch[] {
    if (facts.length === 0) return []

    const expectedNames = [record.company_name, ...record.previous_names.map(p => p.name)]
    const variants = new Set(expectedNames.map(normalizeEntityName))

    const byDocument = new Map<string, NameFact[]>()
    for (const fact of facts) {
      const list = byDocument.get(fact.source_document_id) ?? []
      list.push(fact)
      byDocument.set(fact.source_document_id, list)
    }

    const mismatches: Mismatch[] = []
    for (const [documentId, documentFacts] of byDocument) {
      const anyVariantFound = documentFacts.some(f => variants.has(normalizeEntityName(f.value)))
      const severity: MismatchSeverity = anyVariantFound ? 'medium' : 'high'

      for (const fact of documentFacts) {
        if (variants.has(normalizeEntityName(fact.value))) continue
        mismatches.push({
          type: 'name_mismatch',
          severity,
          document: documentId,
          expected_names: expectedNames,
          found_name: fact.value,
          message: `Name "${fact.value}" in document does not match the registered name or any previous name`,
        })
      }
    }

    return mismatches
  }
}
