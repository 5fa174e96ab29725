// Turns a downloaded filing document into plain text for fact extraction

import type { DownloadedDocument } from '../types/registry.ts'

export interface DocumentTextReader {
  /** null when the representation cannot be read as text (e.g. a scanned PDF) */
  read(document: DownloadedDocument): Promise<string | null>
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
}

export function markupToText(markup: string): string {
  return markup
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|tr|li|h[1-6])>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(Number(code)))
    .replace(/&([a-z]+);/gi, (match, name: string) => ENTITIES[name.toLowerCase()] ?? match)
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{2,}/g, '\n')
    .trim()
}

/** Reads textual representations; binary PDFs need an OCR collaborator and are skipped */
export class DefaultDocumentTextReader implements DocumentTextReader {
  async read(document: DownloadedDocument): Promise<string | null> {
    if (document.text === undefined) return null

    if (document.content_type === 'application/xhtml+xml' || document.content_type === 'text/html') {
      return markupToText(document.text)
    }
    return document.text
  }
}
