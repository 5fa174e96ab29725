/**
 * LLM-backed fact extraction.
 * Same contract as the pattern extractor. A failed call or an unusable answer falls
 * back to the pattern extractor for that document; cancellation does not.
 */

import { z } from 'zod'
import type { DateFact, ExtractedFact, NameFact } from '../types/scan.ts'
import { parseDate } from './date-extractor.ts'
import { ScanCancelledError, isCancellation } from './errors.ts'
import { PatternFactExtractor, type DocumentText, type FactExtractor } from './fact-extractor.ts'
import { extractJSON, type LLMClient } from './llm.ts'

const FactContextSchema = z.enum(['incorporation', 'name_change', 'registration', 'filing', 'unscoped'])

const DatesResponseSchema = z.object({
  dates: z.array(z.object({
    context: FactContextSchema.catch('unscoped'),
    date: z.string(),
    text: z.string().optional(),
  })),
})

const NamesResponseSchema = z.object({
  names: z.array(z.object({
    name: z.string().min(1),
    context: FactContextSchema.catch('unscoped'),
  })),
})

const DATES_SYSTEM = `You extract dates from UK company filing documents. Respond ONLY with a JSON object. No markdown, no backticks.`

const NAMES_SYSTEM = `You extract company names from UK company filing documents. Respond ONLY with a JSON object. No markdown, no backticks.`

function datesPrompt(text: string): string {
  return `Find every date stated in the document below. For each, classify what it refers to:
- "incorporation": the date the company was incorporated
- "name_change": the date a change of company name took effect
- "registration": the date the company was registered
- "filing": the date the document was filed or made up to
- "unscoped": any other date

Write dates exactly as ISO yyyy-MM-dd. UK documents use day-first ordering.

Respond with: {"dates":[{"context":"incorporation","date":"1999-05-10","text":"incorporated on 10 May 1999"}]}

DOCUMENT:
${text}`
}

function namesPrompt(text: string): string {
  return `List every company name stated in the document below (the company's current, new or former name). Do not list people.
Classify each as "incorporation" (name on a certificate of incorporation), "name_change" (a new or former name in a change of name) or "unscoped".

Respond with: {"names":[{"name":"ACME WIDGETS LIMITED","context":"incorporation"}]}

DOCUMENT:
${text}`
}

export interface LlmFactExtractorOptions {
  maxChars?: number
  fallback?: FactExtractor
}

export class LlmFactExtractor implements FactExtractor {
  readonly name = 'llm'
  private llm: LLMClient
  private fallback: FactExtractor
  private maxChars: number

  constructor(llm: LLMClient, options: LlmFactExtractorOptions = {}) {
    this.llm = llm
    this.fallback = options.fallback ?? new PatternFactExtractor()
    this.maxChars = options.maxChars ?? 12_000
  }

  async extract(document: DocumentText): Promise<ExtractedFact[]> {
    const text = document.text.slice(0, this.maxChars)

    try {
      const [dates, names] = await Promise.all([
        this.extractDates(text, document.document_id, document.signal),
        this.extractNames(text, document.document_id, document.signal),
      ])
      return [...dates, ...names]
    } catch (error) {
      if (isCancellation(error) || document.signal?.aborted) throw new ScanCancelledError()
      console.warn(`LLM extraction failed for ${document.document_id}, using ${this.fallback.name} extractor:`, error instanceof Error ? error.message : error)
      return this.fallback.extract(document)
    }
  }

  private async callForJSON(system: string, prompt: string, signal?: AbortSignal): Promise<unknown> {
    const result = await this.llm.createMessage({
      system,
      messages: [{ role: 'user', content: prompt }],
      maxTokens: 1500,
      temperature: 0,
      jsonMode: this.llm.provider !== 'anthropic',
      signal,
    })

    if (!result.success) {
      throw new Error(result.error || 'LLM call failed')
    }

    return JSON.parse(extractJSON(result.text))
  }

  private async extractDates(text: string, documentId: string, signal?: AbortSignal): Promise<DateFact[]> {
    const parsed = DatesResponseSchema.parse(await this.callForJSON(DATES_SYSTEM, datesPrompt(text), signal))

    const facts: DateFact[] = []
    const seen = new Set<string>()
    for (const item of parsed.dates) {
      const value = parseDate(item.date)
      if (!value) continue

      const key = `${item.context}:${value.getTime()}`
      if (seen.has(key)) continue
      seen.add(key)

      facts.push({
        kind: 'date',
        context: item.context,
        value,
        raw: item.text ?? item.date,
        source_document_id: documentId,
        confidence: item.context === 'unscoped' ? 0.5 : 0.7,
      })
    }
    return facts
  }

  private async extractNames(text: string, documentId: string, signal?: AbortSignal): Promise<NameFact[]> {
    const parsed = NamesResponseSchema.parse(await this.callForJSON(NAMES_SYSTEM, namesPrompt(text), signal))

    return parsed.names.map(item => ({
      kind: 'name' as const,
      context: item.context,
      value: item.name.trim(),
      source_document_id: documentId,
      confidence: 0.6,
    }))
  }
}
