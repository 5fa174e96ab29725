// Entity-name extraction from fixed filing layouts (certificates, change-of-name forms, returns)

import type { FactContext, NameFact } from '../types/scan.ts'

const NAME_PATTERNS: Array<{ context: FactContext; pattern: RegExp; confidence: number }> = [
  // Certificate of incorporation: "... hereby certifies that ACME LIMITED is this day incorporated ..."
  {
    context: 'incorporation',
    pattern: /hereby certif(?:y|ies) that\s+([^\n]{2,160}?)\s+(?:is|was) this day incorporated/gi,
    confidence: 0.9,
  },
  {
    context: 'name_change',
    pattern: /(?:^|\n)[ \t]*new (?:company )?name[ \t]*[:\-][ \t]*([^\n]{2,160})/gi,
    confidence: 0.8,
  },
  {
    context: 'name_change',
    pattern: /(?:^|\n)[ \t]*(?:previous|former|old) (?:company )?name[ \t]*[:\-][ \t]*([^\n]{2,160})/gi,
    confidence: 0.8,
  },
  {
    context: 'unscoped',
    pattern: /(?:^|\n)[ \t]*(?:company name|name of (?:the )?company)[ \t]*[:\-][ \t]*([^\n]{2,160})/gi,
    confidence: 0.7,
  },
]

export function normalizeEntityName(name: string): string {
  return name.toLowerCase().replace(/\s+/g, ' ').trim()
}

function cleanName(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^["'“”]+|["'“”]+$/g, '')
    .replace(/[.,;:]+$/, '')
    .trim()
}

export class NameFactExtractor {
  extract(text: string, documentId: string): NameFact[] {
    const facts: NameFact[] = []
    const seen = new Set<string>()

    for (const { context, pattern, confidence } of NAME_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const value = cleanName(match[1])
        if (!/[a-z]/i.test(value)) continue

        const key = `${context}:${normalizeEntityName(value)}`
        if (seen.has(key)) continue
        seen.add(key)

        facts.push({ kind: 'name', context, value, source_document_id: documentId, confidence })
      }
    }

    return facts
  }
}
