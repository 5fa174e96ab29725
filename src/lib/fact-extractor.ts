// Fact extraction: one contract, pattern-based and LLM-based implementations

import type { DocumentType } from '../types/registry.ts'
import type { DateContext, ExtractedFact } from '../types/scan.ts'
import { DateFactExtractor } from './date-extractor.ts'
import { NameFactExtractor } from './name-extractor.ts'

export interface DocumentText {
  document_id: string
  text: string
  context?: DateContext
  signal?: AbortSignal
}

export interface FactExtractor {
  readonly name: string
  extract(document: DocumentText): Promise<ExtractedFact[]>
}

const CONTEXT_BY_DOCUMENT_TYPE: Record<DocumentType, DateContext | undefined> = {
  'incorporation': 'incorporation',
  'name-change': 'name_change',
  'annual-return': 'filing',
  'other': undefined,
}

export function contextForDocumentType(type: DocumentType): DateContext | undefined {
  return CONTEXT_BY_DOCUMENT_TYPE[type]
}

/** Regex/context heuristics. Pure: no I/O, no shared state. */
export class PatternFactExtractor implements FactExtractor {
  readonly name = 'pattern'
  private dates = new DateFactExtractor()
  private names = new NameFactExtractor()

  async extract(document: DocumentText): Promise<ExtractedFact[]> {
    return this.extractSync(document)
  }

  extractSync(document: DocumentText): ExtractedFact[] {
    return [
      ...this.dates.extractFacts(document.text, document.context, document.document_id),
      ...this.names.extract(document.text, document.document_id),
    ]
  }
}
