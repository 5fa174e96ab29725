// Environment configuration, validated once at startup

import { z } from 'zod'
import { InvalidInputError } from './errors.ts'

const EnvSchema = z.object({
  COMPANIES_HOUSE_API_KEY: z.string().min(1).optional(),
  CH_API_BASE_URL: z.string().url().default('https://api.company-information.service.gov.uk'),
  CH_DOCUMENT_API_BASE_URL: z.string().url().default('https://document-api.company-information.service.gov.uk'),
  CH_RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(600),
  CH_RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(300),
  CH_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  CH_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),

  SCAN_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  SCAN_MAX_FILINGS: z.coerce.number().int().positive().default(100),
  SEARCH_LIMIT: z.coerce.number().int().positive().default(100),

  LLM_PROVIDER: z.enum(['xai', 'openai', 'anthropic']).default('xai'),
  LLM_API_KEY: z.string().min(1).optional(),
  LLM_MODEL: z.string().min(1).optional(),

  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
  SCAN_CACHE_BUCKET: z.string().min(1).default('scan-results'),

  RESULT_STORE_MAX_ENTRIES: z.coerce.number().int().positive().default(50),
  RESULT_STORE_TTL_MINUTES: z.coerce.number().positive().default(60),
})

export type LLMProviderName = z.infer<typeof EnvSchema>['LLM_PROVIDER']

export interface AppConfig {
  companiesHouse: {
    apiKey?: string
    baseUrl: string
    documentBaseUrl: string
    maxRequests: number
    windowSeconds: number
    maxRetries: number
    retryBaseDelayMs: number
  }
  scan: {
    concurrency: number
    maxFilings: number
    searchLimit: number
  }
  llm: {
    provider: LLMProviderName
    apiKey?: string
    model?: string
  }
  storage: {
    supabaseUrl?: string
    supabaseServiceKey?: string
    bucket: string
  }
  resultStore: {
    maxEntries: number
    ttlMinutes: number
  }
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Unset and empty variables are treated alike
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )

  const parsed = EnvSchema.safeParse(present)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new InvalidInputError(`Invalid configuration: ${issues}`, parsed.error.issues)
  }

  const e = parsed.data
  return {
    companiesHouse: {
      apiKey: e.COMPANIES_HOUSE_API_KEY,
      baseUrl: e.CH_API_BASE_URL,
      documentBaseUrl: e.CH_DOCUMENT_API_BASE_URL,
      maxRequests: e.CH_RATE_LIMIT_MAX_REQUESTS,
      windowSeconds: e.CH_RATE_LIMIT_WINDOW_SECONDS,
      maxRetries: e.CH_MAX_RETRIES,
      retryBaseDelayMs: e.CH_RETRY_BASE_DELAY_MS,
    },
    scan: {
      concurrency: e.SCAN_CONCURRENCY,
      maxFilings: e.SCAN_MAX_FILINGS,
      searchLimit: e.SEARCH_LIMIT,
    },
    llm: {
      provider: e.LLM_PROVIDER,
      apiKey: e.LLM_API_KEY,
      model: e.LLM_MODEL,
    },
    storage: {
      supabaseUrl: e.SUPABASE_URL,
      supabaseServiceKey: e.SUPABASE_SERVICE_ROLE_KEY,
      bucket: e.SCAN_CACHE_BUCKET,
    },
    resultStore: {
      maxEntries: e.RESULT_STORE_MAX_ENTRIES,
      ttlMinutes: e.RESULT_STORE_TTL_MINUTES,
    },
  }
}
