import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ScanCancelledError } from '../errors.ts'
import { LlmFactExtractor } from '../llm-fact-extractor.ts'
import { createLLMClient, extractJSON, type LLMClient, type LLMMessageParams, type LLMResponse } from '../llm.ts'
import { jsonResponse } from './fakes.ts'

/** Answers the dates prompt and the names prompt with canned text */
function scriptedClient(answers: { dates: LLMResponse; names: LLMResponse }, provider: LLMClient['provider'] = 'xai') {
  const calls: LLMMessageParams[] = []
  const client: LLMClient = {
    provider,
    model: 'test-model',
    async createMessage(params) {
      calls.push(params)
      return params.system?.includes('extract dates') ? answers.dates : answers.names
    },
  }
  return { client, calls }
}

const ok = (text: string): LLMResponse => ({ success: true, text })

describe('LlmFactExtractor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('turns model answers into facts, re-parsing dates', async () => {
    const { client, calls } = scriptedClient({
      dates: ok('```json\n{"dates":[{"context":"incorporation","date":"1999-05-10","text":"incorporated on 10 May 1999"},{"context":"incorporation","date":"1999-05-10"},{"context":"weird","date":"2001-02-03"},{"context":"filing","date":"9999-01-01"}]}\n```'),
      names: ok('{"names":[{"name":" ACME WIDGETS LIMITED ","context":"incorporation"}]}'),
    })
    const extractor = new LlmFactExtractor(client)

    const facts = await extractor.extract({ document_id: 'inc-1', text: 'certificate text' })

    expect(facts).toEqual([
      { kind: 'date', context: 'incorporation', value: new Date(1999, 4, 10), raw: 'incorporated on 10 May 1999', source_document_id: 'inc-1', confidence: 0.7 },
      { kind: 'date', context: 'unscoped', value: new Date(2001, 1, 3), raw: '2001-02-03', source_document_id: 'inc-1', confidence: 0.5 },
      { kind: 'name', context: 'incorporation', value: 'ACME WIDGETS LIMITED', source_document_id: 'inc-1', confidence: 0.6 },
    ])
    expect(calls).toHaveLength(2)
    expect(calls.every(c => c.jsonMode === true && c.temperature === 0)).toBe(true)
  })

  it('does not ask Anthropic for JSON mode', async () => {
    const { client, calls } = scriptedClient({ dates: ok('{"dates":[]}'), names: ok('{"names":[]}') }, 'anthropic')
    await new LlmFactExtractor(client).extract({ document_id: 'd', text: 'x' })
    expect(calls.map(c => c.jsonMode)).toEqual([false, false])
  })

  it('truncates long documents', async () => {
    const { client, calls } = scriptedClient({ dates: ok('{"dates":[]}'), names: ok('{"names":[]}') })
    await new LlmFactExtractor(client, { maxChars: 10 }).extract({ document_id: 'd', text: 'abcdefghijKLMNOP' })
    expect(calls[0].messages[0].content).toContain('abcdefghij')
    expect(calls[0].messages[0].content).not.toContain('KLMNOP')
  })

  it('falls back to pattern extraction when the call fails', async () => {
    const { client } = scriptedClient({
      dates: { success: false, text: '', error: 'quota exceeded' },
      names: ok('{"names":[]}'),
    })

    const facts = await new LlmFactExtractor(client).extract({
      document_id: 'inc-1',
      text: 'Date of incorporation: 04/03/1998',
      context: 'incorporation',
    })

    expect(facts).toEqual([
      { kind: 'date', context: 'incorporation', value: new Date(1998, 2, 4), raw: '04/03/1998', source_document_id: 'inc-1', confidence: 0.9 },
    ])
  })

  it('falls back when the answer is not valid JSON', async () => {
    const { client } = scriptedClient({ dates: ok('no idea'), names: ok('{"names":[]}') })

    const facts = await new LlmFactExtractor(client).extract({ document_id: 'd', text: 'Signed 01/02/2001' })

    expect(facts).toEqual([
      { kind: 'date', context: 'unscoped', value: new Date(2001, 1, 1), raw: '01/02/2001', source_document_id: 'd', confidence: 0.5 },
    ])
  })

  it('does not fall back once the scan is cancelled', async () => {
    const controller = new AbortController()
    const client: LLMClient = {
      provider: 'xai',
      model: 'test-model',
      async createMessage(params) {
        controller.abort()
        expect(params.signal).toBe(controller.signal)
        return { success: false, text: '', error: 'aborted' }
      },
    }

    await expect(new LlmFactExtractor(client).extract({ document_id: 'd', text: 'Signed 01/02/2001', signal: controller.signal }))
      .rejects.toBeInstanceOf(ScanCancelledError)
  })
})

describe('extractJSON', () => {
  it('strips fences and thinking blocks', () => {
    expect(extractJSON('<think>hmm</think>\n```json\n{"a":1}\n```')).toBe('{"a":1}')
    expect(extractJSON('Here you go: [1,2]')).toBe('[1,2]')
  })
})

describe('createLLMClient', () => {
  it('routes xAI through the OpenAI-compatible endpoint', async () => {
    const urls: string[] = []
    const fetchStub = vi.fn(async (input: RequestInfo | URL) => {
      urls.push(String(input))
      return jsonResponse({
        id: 'r1',
        choices: [{ index: 0, message: { role: 'assistant', content: '{"ok":true}' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 10, completion_tokens: 3, total_tokens: 13 },
      })
    })

    const client = createLLMClient({ provider: 'xai', apiKey: 'test-secret', fetch: fetchStub })
    const response = await client.createMessage({ messages: [{ role: 'user', content: 'hi' }], jsonMode: true })

    expect(client.model).toBe('grok-3-mini')
    expect(urls).toEqual(['https://api.x.ai/v1/chat/completions'])
    expect(response).toEqual({ success: true, text: '{"ok":true}', usage: { inputTokens: 10, outputTokens: 3 } })
  })

  it('reports HTTP failures without throwing', async () => {
    const fetchStub = vi.fn(async () => new Response('overloaded', { status: 529 }))

    const client = createLLMClient({ provider: 'anthropic', apiKey: 'test-secret', fetch: fetchStub })
    const response = await client.createMessage({ messages: [{ role: 'user', content: 'hi' }] })

    expect(response.success).toBe(false)
    expect(response.text).toBe('')
  })

  it('reports an unexpected response shape as a failure', async () => {
    const fetchStub = vi.fn(async () => jsonResponse({ choices: 'none' }))

    const client = createLLMClient({ provider: 'openai', apiKey: 'test-secret', model: 'test-model', fetch: fetchStub })
    const response = await client.createMessage({ messages: [{ role: 'user', content: 'hi' }] })

    expect(response).toEqual({ success: false, text: '', error: 'openai returned an unexpected response shape' })
  })

  it('rethrows when the caller cancels the request', async () => {
    const controller = new AbortController()
    const fetchStub = vi.fn(async () => {
      controller.abort()
      throw new DOMException('The operation was aborted.', 'AbortError')
    })

    const client = createLLMClient({ provider: 'xai', apiKey: 'test-secret', fetch: fetchStub })

    await expect(client.createMessage({ messages: [{ role: 'user', content: 'hi' }], signal: controller.signal }))
      .rejects.toThrow('The operation was aborted.')
  })
})
