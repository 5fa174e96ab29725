// Unified LLM Client - abstracts xAI, OpenAI and Anthropic behind a common interface
// Usage: const llm = createLLMClient({ provider: 'xai', apiKey })

import { AnthropicClient } from './anthropic.ts'
import { OpenAICompatibleClient } from './openai.ts'

export type LLMProvider = 'xai' | 'openai' | 'anthropic'

export interface LLMResponse {
  success: boolean
  text: string
  error?: string
  usage?: { inputTokens: number; outputTokens: number }
}

export interface LLMMessageParams {
  system?: string
  messages: Array<{ role: 'user' | 'assistant'; content: string }>
  maxTokens?: number
  temperature?: number
  /** Ask for a JSON object response where the provider supports it */
  jsonMode?: boolean
  signal?: AbortSignal
}

export interface LLMClient {
  provider: LLMProvider
  model: string
  createMessage(params: LLMMessageParams): Promise<LLMResponse>
}

export const DEFAULT_MODELS: Record<LLMProvider, string> = {
  xai: 'grok-3-mini',
  openai: 'gpt-4o-mini',
  anthropic: 'claude-sonnet-4-5-20250929',
}

const BASE_URLS: Record<Exclude<LLMProvider, 'anthropic'>, string> = {
  xai: 'https://api.x.ai',
  openai: 'https://api.openai.com',
}

export interface LLMClientOptions {
  provider?: LLMProvider
  apiKey: string
  model?: string
  timeoutMs?: number
  fetch?: typeof fetch
}

/**
 * Create a unified LLM client.
 * xAI speaks the OpenAI chat completions protocol, so it shares that client.
 */
export function createLLMClient(options: LLMClientOptions): LLMClient {
  const provider = options.provider ?? 'xai'
  const model = options.model || DEFAULT_MODELS[provider]

  if (provider === 'anthropic') {
    return new AnthropicClient({ apiKey: options.apiKey, model, timeoutMs: options.timeoutMs, fetch: options.fetch })
  }

  return new OpenAICompatibleClient({
    provider,
    apiKey: options.apiKey,
    baseUrl: BASE_URLS[provider],
    model,
    timeoutMs: options.timeoutMs,
    fetch: options.fetch,
  })
}

/** Strip markdown code fences and thinking blocks, then isolate the JSON payload */
export function extractJSON(raw: string): string {
  let cleaned = raw.replace(/<think>[\s\S]*?<\/think>/gi, '').trim()
  cleaned = cleaned.replace(/```(?:json)?\s*\n?/g, '').replace(/```\s*$/g, '').trim()
  const objMatch = cleaned.match(/\{[\s\S]*\}/)
  if (objMatch) return objMatch[0]
  const arrayMatch = cleaned.match(/\[[\s\S]*\]/)
  if (arrayMatch) return arrayMatch[0]
  return cleaned
}
