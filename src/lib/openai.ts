// OpenAI-compatible chat completions (OpenAI, xAI)
// Documentation: https://platform.openai.com/docs/api-reference/chat

import { z } from 'zod'
import type { LLMClient, LLMMessageParams, LLMProvider, LLMResponse } from './llm.ts'

export interface OpenAICompatibleConfig {
  provider: Exclude<LLMProvider, 'anthropic'>
  apiKey: string
  baseUrl: string
  model: string
  timeoutMs?: number
  fetch?: typeof fetch
}

const ChatCompletionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable() }),
    finish_reason: z.string().nullable().optional(),
  })),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
  }).optional(),
})

export class OpenAICompatibleClient implements LLMClient {
  readonly provider: Exclude<LLMProvider, 'anthropic'>
  readonly model: string
  private baseUrl: string
  private apiKey: string
  private timeoutMs: number
  private fetchImpl: typeof fetch

  constructor(config: OpenAICompatibleConfig) {
    this.provider = config.provider
    this.apiKey = config.apiKey
    this.baseUrl = config.baseUrl
    this.model = config.model
    this.timeoutMs = config.timeoutMs ?? 60_000
    this.fetchImpl = config.fetch ?? fetch
  }

  async createMessage(params: LLMMessageParams): Promise<LLMResponse> {
    const messages = [
      ...(params.system ? [{ role: 'system' as const, content: params.system }] : []),
      ...params.messages,
    ]

    const body: Record<string, unknown> = {
      model: this.model,
      messages,
      max_tokens: params.maxTokens ?? 1024,
    }
    if (params.temperature !== undefined) body.temperature = params.temperature
    if (params.jsonMode) body.response_format = { type: 'json_object' }

    console.log(`${this.provider} createMessage: model=${this.model}, jsonMode=${!!params.jsonMode}`)

    const timeout = AbortSignal.timeout(this.timeoutMs)
    let response: Response
    try {
      response = await this.fetchImpl(`${this.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: params.signal ? AbortSignal.any([params.signal, timeout]) : timeout,
      })
    } catch (error) {
      // Caller cancellation propagates; a timeout or network error is a failed call
      if (params.signal?.aborted) throw error
      console.error(`${this.provider} request error:`, error)
      return { success: false, text: '', error: error instanceof Error ? error.message : 'Unknown error' }
    }

    const responseText = await response.text()
    if (!response.ok) {
      console.error(`${this.provider} error ${response.status}:`, responseText)
      return { success: false, text: '', error: `${this.provider} API ${response.status}: ${responseText}` }
    }

    let json: unknown
    try {
      json = JSON.parse(responseText)
    } catch {
      return { success: false, text: '', error: `${this.provider} returned a non-JSON body` }
    }

    const parsed = ChatCompletionSchema.safeParse(json)
    if (!parsed.success) {
      return { success: false, text: '', error: `${this.provider} returned an unexpected response shape` }
    }

    const { choices, usage } = parsed.data
    console.log(`${this.provider} response: ${usage?.prompt_tokens ?? 0} prompt, ${usage?.completion_tokens ?? 0} completion tokens`)
    return {
      success: true,
      text: choices[0]?.message.content ?? '',
      usage: { inputTokens: usage?.prompt_tokens ?? 0, outputTokens: usage?.completion_tokens ?? 0 },
    }
  }
}
