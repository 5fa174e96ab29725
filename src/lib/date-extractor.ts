/**
 * Date extraction from filing document text.
 *
 * Two tiers: context phrases first ("date of incorporation: ..."), then generic
 * date shapes anywhere in the text. Results are unioned and deduplicated by exact
 * timestamp; near-duplicates stay distinct so a one-day discrepancy is never hidden.
 */

import { differenceInCalendarDays, format, isSameDay, isValid, parse } from 'date-fns'
import type { DateContext, DateFact } from '../types/scan.ts'

// ── Patterns ──

const MONTHS = 'January|February|March|April|May|June|July|August|September|October|November|December'

const DATE_PATTERNS: RegExp[] = [
  // D/M/YYYY, D-M-YYYY
  /\b(\d{1,2})[/-](\d{1,2})[/-](\d{4})\b/gi,
  // D Month YYYY
  new RegExp(`\\b(\\d{1,2})\\s+(${MONTHS})\\s+(\\d{4})\\b`, 'gi'),
  // Month D, YYYY
  new RegExp(`\\b(${MONTHS})\\s+(\\d{1,2}),?\\s+(\\d{4})\\b`, 'gi'),
  // D/M/YY, D-M-YY
  /\b(\d{1,2})[/-](\d{1,2})[/-](\d{2})\b/gi,
]

const CONTEXT_PATTERNS: Record<DateContext, RegExp[]> = {
  incorporation: [
    /date of incorporation[:\s]+([^\n]{5,30})/gi,
    /incorporated on[:\s]+([^\n]{5,30})/gi,
    /incorporation date[:\s]+([^\n]{5,30})/gi,
  ],
  name_change: [
    /date of change[:\s]+([^\n]{5,30})/gi,
    /changed (?:its name )?on[:\s]+([^\n]{5,30})/gi,
    /effective (?:date|from)[:\s]+([^\n]{5,30})/gi,
  ],
  registration: [
    /date of registration[:\s]+([^\n]{5,30})/gi,
    /registered on[:\s]+([^\n]{5,30})/gi,
  ],
  filing: [
    /filed on[:\s]+([^\n]{5,30})/gi,
    /filing date[:\s]+([^\n]{5,30})/gi,
  ],
}

const RANGE_PATTERN = /from\s+(\S+(?:\s+\w+\s+\d{4})?)\s+to\s+(\S+(?:\s+\w+\s+\d{4})?)/gi

// Day-first (UK) ordering. Tried in order; the first in-range result wins.
const PARSE_FORMATS = [
  'dd/MM/yyyy',
  'dd-MM-yyyy',
  'dd.MM.yyyy',
  'dd/MM/yy',
  'dd-MM-yy',
  'dd.MM.yy',
  'dd MMMM yyyy',
  'dd MMM yyyy',
  'MMMM dd yyyy',
  'MMM dd yyyy',
  'MMMM yyyy',
  'MMM yyyy',
  'yyyy-MM-dd',
]

// Two-digit years resolve to 1950–2049; a missing day-of-month resolves to the 1st
const REFERENCE_DATE = new Date(2000, 0, 1)

const MIN_YEAR = 1800
const MAX_YEAR = 2100

const DATE_FORMATS: Record<string, string> = {
  uk: 'dd/MM/yyyy',
  us: 'MM/dd/yyyy',
  iso: 'yyyy-MM-dd',
  long: 'd MMMM yyyy',
}

// ── Types ──

export interface DateRange {
  start_date: Date
  end_date: Date
  text: string
}

export interface DateDiscrepancy {
  expected: Date
  found: Date
  difference_days: number
  expected_str: string
  found_str: string
}

// ── Parsing ──

function cleanPhrase(phrase: string): string {
  return phrase
    .replace(/(\d{1,2})(?:st|nd|rd|th)\b/gi, '$1')
    .replace(/\bof\b/gi, ' ')
    .replace(/,/g, ' ')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[.;:)\]]+$/, '')
}

function inRange(date: Date): boolean {
  const year = date.getFullYear()
  return year >= MIN_YEAR && year <= MAX_YEAR
}

function parseWithFormats(phrase: string): Date | null {
  for (const pattern of PARSE_FORMATS) {
    const parsed = parse(phrase, pattern, REFERENCE_DATE)
    if (isValid(parsed) && inRange(parsed)) return parsed
  }
  return null
}

/** Leftmost generic date shape in the phrase; on a tie the earlier pattern wins */
function firstGenericDate(phrase: string): string | null {
  let first: { index: number; text: string } | null = null
  for (const pattern of DATE_PATTERNS) {
    for (const match of phrase.matchAll(pattern)) {
      const index = match.index ?? 0
      if (!first || index < first.index) first = { index, text: match[0] }
      break
    }
  }
  return first?.text ?? null
}

/**
 * Parse a free-form date phrase, day-first.
 * Falls back to the first generic date inside the phrase, and only that one:
 * a later date in the same span belongs to something else.
 * Returns null for anything unparseable or outside 1800–2100.
 */
export function parseDate(phrase: string): Date | null {
  const cleaned = cleanPhrase(phrase)
  if (!cleaned) return null

  const direct = parseWithFormats(cleaned)
  if (direct) return direct

  const generic = firstGenericDate(cleaned)
  return generic ? parseWithFormats(cleanPhrase(generic)) : null
}

export function formatDate(date: Date, formatType: string = 'uk'): string {
  return format(date, DATE_FORMATS[formatType] ?? formatType)
}

// ── Extraction ──

function uniqueSorted(dates: Date[]): Date[] {
  const seen = new Map<number, Date>()
  for (const d of dates) {
    if (!seen.has(d.getTime())) seen.set(d.getTime(), d)
  }
  return Array.from(seen.values()).sort((a, b) => a.getTime() - b.getTime())
}

interface ContextHit {
  raw: string
  value: Date | null
}

function contextHits(text: string, context: DateContext): ContextHit[] {
  const hits: ContextHit[] = []
  for (const pattern of CONTEXT_PATTERNS[context]) {
    for (const match of text.matchAll(pattern)) {
      const raw = match[1].trim()
      hits.push({ raw, value: parseDate(raw) })
    }
  }
  return hits
}

function genericHits(text: string): Array<{ raw: string; value: Date }> {
  const hits: Array<{ raw: string; value: Date }> = []
  for (const pattern of DATE_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const value = parseDate(match[0])
      if (value) hits.push({ raw: match[0], value })
    }
  }
  return hits
}

export class DateFactExtractor {
  /**
   * All distinct dates in the text, ascending. With a context, the context phrases
   * are matched as well as the generic shapes.
   */
  extract(text: string, context?: DateContext): Date[] {
    const dates: Date[] = []

    if (context) {
      for (const hit of contextHits(text, context)) {
        if (hit.value) dates.push(hit.value)
      }
    }

    for (const hit of genericHits(text)) {
      dates.push(hit.value)
    }

    return uniqueSorted(dates)
  }

  /**
   * Same two tiers as `extract`, kept as labelled facts.
   * A context phrase whose span does not parse is kept as a claim with a null value.
   */
  extractFacts(text: string, context: DateContext | undefined, documentId: string): DateFact[] {
    const facts: DateFact[] = []
    const seenTimes = new Set<number>()
    const seenClaims = new Set<string>()

    if (context) {
      for (const hit of contextHits(text, context)) {
        if (hit.value) {
          if (seenTimes.has(hit.value.getTime())) continue
          seenTimes.add(hit.value.getTime())
          facts.push({ kind: 'date', context, value: hit.value, raw: hit.raw, source_document_id: documentId, confidence: 0.9 })
        } else {
          if (seenClaims.has(hit.raw)) continue
          seenClaims.add(hit.raw)
          facts.push({ kind: 'date', context, value: null, raw: hit.raw, source_document_id: documentId, confidence: 0.3 })
        }
      }
    }

    const unscoped = genericHits(text).sort((a, b) => a.value.getTime() - b.value.getTime())
    for (const hit of unscoped) {
      if (seenTimes.has(hit.value.getTime())) continue
      seenTimes.add(hit.value.getTime())
      facts.push({ kind: 'date', context: 'unscoped', value: hit.value, raw: hit.raw, source_document_id: documentId, confidence: 0.5 })
    }

    return facts
  }

  /** "from X to Y" phrasing; both ends must parse */
  extractDateRanges(text: string): DateRange[] {
    const ranges: DateRange[] = []
    for (const match of text.matchAll(RANGE_PATTERN)) {
      const start = parseDate(match[1])
      const end = parseDate(match[2])
      if (start && end) {
        ranges.push({ start_date: start, end_date: end, text: match[0] })
      }
    }
    return ranges
  }

  extractIncorporationDate(text: string): Date | null {
    return this.firstContextDate(text, 'incorporation')
  }

  extractNameChangeDate(text: string): Date | null {
    return this.firstContextDate(text, 'name_change')
  }

  compareDates(a: Date, b: Date, toleranceDays = 0): boolean {
    if (toleranceDays === 0) return isSameDay(a, b)
    return Math.abs(differenceInCalendarDays(a, b)) <= toleranceDays
  }

  /** Every found date outside tolerance, with the signed difference found − expected */
  findMismatches(expected: Date, found: Date[], toleranceDays = 0): DateDiscrepancy[] {
    return found
      .filter(d => !this.compareDates(expected, d, toleranceDays))
      .map(d => ({
        expected,
        found: d,
        difference_days: differenceInCalendarDays(d, expected),
        expected_str: formatDate(expected),
        found_str: formatDate(d),
      }))
  }

  /** True iff the dates are already non-decreasing */
  validateSequence(dates: Date[]): boolean {
    for (let i = 1; i < dates.length; i++) {
      if (dates[i].getTime() < dates[i - 1].getTime()) return false
    }
    return true
  }

  private firstContextDate(text: string, context: DateContext): Date | null {
    const hit = contextHits(text, context).find(h => h.value !== null)
    return hit?.value ?? null
  }
}
