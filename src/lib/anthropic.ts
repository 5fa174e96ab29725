// Anthropic Messages API
// Documentation: https://docs.anthropic.com/en/api/messages

import { z } from 'zod'
import type { LLMClient, LLMMessageParams, LLMResponse } from './llm.ts'

const ANTHROPIC_BASE_URL = 'https://api.anthropic.com'

export interface AnthropicConfig {
  apiKey: string
  model: string
  timeoutMs?: number
  fetch?: typeof fetch
}

const MessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
  stop_reason: z.string().nullable().optional(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }).optional(),
})

/** No JSON mode here: `jsonMode` is ignored and the prompt has to ask for JSON */
export class AnthropicClient implements LLMClient {
  readonly provider = 'anthropic' as const
  readonly model: string
  private apiKey: string
  private timeoutMs: number
  private fetchImpl: typeof fetch

  constructor(config: AnthropicConfig) {
    this.apiKey = config.apiKey
    this.model = config.model
    this.timeoutMs = config.timeoutMs ?? 60_000
    this.fetchImpl = config.fetch ?? fetch
  }

  async createMessage(params: LLMMessageParams): Promise<LLMResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      max_tokens: params.maxTokens ?? 1024,
      messages: params.messages,
    }
    if (params.system) body.system = params.system
    if (params.temperature !== undefined) body.temperature = params.temperature

    console.log(`Anthropic createMessage: model=${this.model}, max_tokens=${body.max_tokens}`)

    const timeout = AbortSignal.timeout(this.timeoutMs)
    let response: Response
    try {
      response = await this.fetchImpl(`${ANTHROPIC_BASE_URL}/v1/messages`, {
        method: 'POST',
        headers: {
          'x-api-key': this.apiKey,
          'anthropic-version': '2023-06-01',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: params.signal ? AbortSignal.any([params.signal, timeout]) : timeout,
      })
    } catch (error) {
      if (params.signal?.aborted) throw error
      console.error('Anthropic request error:', error)
      return { success: false, text: '', error: error instanceof Error ? error.message : 'Unknown error' }
    }

    const responseText = await response.text()
    if (!response.ok) {
      console.error(`Anthropic error ${response.status}:`, responseText)
      return { success: false, text: '', error: `Anthropic API ${response.status}: ${responseText}` }
    }

    let json: unknown
    try {
      json = JSON.parse(responseText)
    } catch {
      return { success: false, text: '', error: 'Anthropic returned a non-JSON body' }
    }

    const parsed = MessageSchema.safeParse(json)
    if (!parsed.success) {
      return { success: false, text: '', error: 'Anthropic returned an unexpected response shape' }
    }

    const { content, usage, stop_reason } = parsed.data
    console.log(`Anthropic response: ${usage?.input_tokens ?? 0} input, ${usage?.output_tokens ?? 0} output tokens, stop_reason=${stop_reason}`)
    return {
      success: true,
      text: content.filter(block => block.type === 'text').map(block => block.text ?? '').join('\n'),
      usage: { inputTokens: usage?.input_tokens ?? 0, outputTokens: usage?.output_tokens ?? 0 },
    }
  }
}
