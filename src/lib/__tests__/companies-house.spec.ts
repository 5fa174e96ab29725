import { describe, expect, it, vi } from 'vitest'
import { CompaniesHouseClient, createCompaniesHouseClient, directorIdFromLink } from '../companies-house.ts'
import {
  InvalidInputError,
  NotFoundError,
  ParseError,
  UpstreamUnavailableError,
} from '../errors.ts'
import { RateLimiter } from '../rate-limiter.ts'
import { FakeClock, jsonResponse } from './fakes.ts'

type Handler = (url: URL, init?: RequestInit) => Response | Promise<Response>

function setup(handler: Handler, options: { maxRequests?: number } = {}) {
  const clock = new FakeClock()
  const requests: Array<{ url: URL; headers: Headers }> = []
  const fetchStub = vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => {
    const url = new URL(String(input))
    requests.push({ url, headers: new Headers(init?.headers) })
    return handler(url, init)
  })
  const client = new CompaniesHouseClient({
    apiKey: 'test-key',
    baseUrl: 'https://registry.test',
    documentBaseUrl: 'https://documents.test',
    rateLimiter: new RateLimiter({ maxRequests: options.maxRequests ?? 100, windowMs: 1000, clock }),
    maxRetries: 2,
    retryBaseDelayMs: 100,
    clock,
    fetch: fetchStub,
  })
  return { client, clock, requests, fetchStub }
}

const PROFILE = {
  company_number: '01234567',
  company_name: 'ACME WIDGETS LIMITED',
  company_status: 'active',
  date_of_creation: '1999-05-10',
  registered_office_address: { locality: 'Leeds', postal_code: 'LS1 1AA' },
  sic_codes: ['62020'],
  type: 'ltd',
  previous_company_names: [{ name: 'ACME TRADING LIMITED', effective_from: '1999-05-10', ceased_on: '2005-03-03' }],
}

describe('CompaniesHouseClient requests', () => {
  it('maps the company profile and authenticates with the key as user name', async () => {
    const { client, requests } = setup(() => jsonResponse(PROFILE))

    const record = await client.getProfile('1234567')

    expect(record).toEqual({
      company_number: '01234567',
      company_name: 'ACME WIDGETS LIMITED',
      company_status: 'active',
      incorporation_date: '1999-05-10',
      dissolution_date: null,
      registered_address: { locality: 'Leeds', postal_code: 'LS1 1AA' },
      sic_codes: ['62020'],
      company_type: 'ltd',
      previous_names: [{ name: 'ACME TRADING LIMITED', effective_from: '1999-05-10', ceased_on: '2005-03-03' }],
    })
    expect(requests[0].url.pathname).toBe('/company/01234567')
    expect(requests[0].headers.get('authorization')).toBe(`Basic ${Buffer.from('test-key:').toString('base64')}`)
  })

  it('maps 404 to NotFound without retrying', async () => {
    const { client, clock, fetchStub } = setup(() => new Response('', { status: 404 }))

    await expect(client.getProfile('01234567')).rejects.toBeInstanceOf(NotFoundError)
    expect(fetchStub).toHaveBeenCalledTimes(1)
    expect(clock.sleeps).toEqual([])
  })

  it('retries 503 with backoff, then gives up as UpstreamUnavailable', async () => {
    const { client, clock, fetchStub } = setup(() => new Response('', { status: 503 }))

    const error = await client.getProfile('01234567').catch((e: unknown) => e)

    expect(error).toBeInstanceOf(UpstreamUnavailableError)
    expect(error instanceof UpstreamUnavailableError && [error.attempts, error.statusCode]).toEqual([3, 503])
    expect(fetchStub).toHaveBeenCalledTimes(3)
    expect(clock.sleeps).toEqual([100, 200])
  })

  it('recovers when a retry succeeds', async () => {
    let calls = 0
    const { client, clock } = setup(() => (++calls === 1 ? new Response('', { status: 429 }) : jsonResponse(PROFILE)))

    const record = await client.getProfile('01234567')

    expect(record.company_name).toBe('ACME WIDGETS LIMITED')
    expect(clock.sleeps).toEqual([100])
  })

  it('retries network failures', async () => {
    let calls = 0
    const { client } = setup(() => {
      if (++calls === 1) throw new TypeError('fetch failed')
      return jsonResponse(PROFILE)
    })

    await expect(client.getProfile('01234567')).resolves.toMatchObject({ company_number: '01234567' })
    expect(calls).toBe(2)
  })

  it('raises ParseError on malformed JSON without retrying', async () => {
    const { client, fetchStub } = setup(() => new Response('{not json', { status: 200 }))

    await expect(client.getProfile('01234567')).rejects.toBeInstanceOf(ParseError)
    expect(fetchStub).toHaveBeenCalledTimes(1)
  })

  it('raises ParseError on an unexpected shape', async () => {
    const { client } = setup(() => jsonResponse({ company_status: 'active' }))
    await expect(client.getProfile('01234567')).rejects.toBeInstanceOf(ParseError)
  })

  it('treats a rejected key as invalid input', async () => {
    const { client, fetchStub } = setup(() => new Response('', { status: 401 }))

    await expect(client.getProfile('01234567')).rejects.toBeInstanceOf(InvalidInputError)
    expect(fetchStub).toHaveBeenCalledTimes(1)
  })

  it('waits for the rate limit window between requests', async () => {
    const { client, clock } = setup(() => jsonResponse(PROFILE), { maxRequests: 1 })

    await client.getProfile('01234567')
    await client.getProfile('01234567')

    expect(clock.sleeps).toEqual([1000])
    expect(client.getRateLimitStatus().remaining_requests).toBe(0)
  })

  it('rejects invalid company numbers before any request', async () => {
    const { client, fetchStub } = setup(() => jsonResponse(PROFILE))
    await expect(client.getProfile('not-a-number')).rejects.toBeInstanceOf(InvalidInputError)
    expect(fetchStub).not.toHaveBeenCalled()
  })
})

describe('CompaniesHouseClient resources', () => {
  it('maps filing history to documents', async () => {
    const { client } = setup(() => jsonResponse({
      total_count: 2,
      items: [
        {
          transaction_id: 'tx1',
          category: 'incorporation',
          type: 'NEWINC',
          description: 'incorporation-company',
          date: '1999-05-10',
          links: { document_metadata: 'https://documents.test/document/abc123' },
        },
        { transaction_id: 'tx2', category: 'accounts', type: 'AA', description: 'accounts', date: '2001-01-31' },
      ],
    }))

    const filings = await client.getFilingHistory('1234567')

    expect(filings.map(f => [f.document_id, f.document_type, f.transaction_id])).toEqual([
      ['abc123', 'incorporation', 'tx1'],
      ['', 'other', 'tx2'],
    ])
    expect(filings[0]).toMatchObject({ company_number: '01234567', retrieved_at: '2024-01-01T00:00:00.000Z' })
  })

  it('pages officers and filters resigned ones when asked', async () => {
    const officer = (name: string, id: string, resigned_on?: string) => ({
      name,
      officer_role: 'director',
      appointed_on: '2010-01-01',
      resigned_on,
      links: { officer: { appointments: `/officers/${id}/appointments` } },
    })
    const { client, requests } = setup(url => url.searchParams.get('start_index') === '0'
      ? jsonResponse({ total_results: 3, items: [officer('SMITH, Jane', 'D1'), officer('JONES, Sam', 'D2', '2015-06-30')] })
      : jsonResponse({ total_results: 3, items: [officer('BROWN, Alex', 'D3')] }))

    const all = await client.getOfficers('01234567')
    const active = await client.getOfficers('01234567', { activeOnly: true })

    expect(all.map(o => o.director_id)).toEqual(['D1', 'D2', 'D3'])
    expect(all[1]).toEqual({ director_id: 'D2', name: 'JONES, Sam', role: 'director', appointed_on: '2010-01-01', resigned_on: '2015-06-30' })
    expect(active.map(o => o.director_id)).toEqual(['D1', 'D3'])
    expect(requests.map(r => r.url.searchParams.get('start_index'))).toEqual(['0', '2', '0', '2'])
  })

  it('normalizes company numbers in appointments', async () => {
    const { client } = setup(() => jsonResponse({
      name: 'Jane SMITH',
      total_results: 1,
      items: [{
        officer_role: 'director',
        appointed_on: '2010-01-01',
        appointed_to: { company_number: 'sc123', company_name: 'NORTHERN LIMITED', company_status: 'active' },
      }],
    }))

    const director = await client.getOfficerAppointments('D1')

    expect(director).toEqual({
      director_id: 'D1',
      name: 'Jane SMITH',
      appointments: [{
        company_number: 'SC000123',
        company_name: 'NORTHERN LIMITED',
        company_status: 'active',
        role: 'director',
        appointed_on: '2010-01-01',
        resigned_on: null,
      }],
    })
  })

  it('searches with advanced search and treats 404 as no hits', async () => {
    const { client, requests } = setup(url => url.searchParams.get('company_name_includes') === 'A'
      ? jsonResponse({ hits: 1, items: [{ company_number: '1234567', company_name: 'ACME WIDGETS LIMITED', company_status: 'active', date_of_creation: '1999-05-10' }] })
      : new Response('', { status: 404 }))

    const hits = await client.search('A', { status: 'active', limit: 10 })
    const none = await client.search('Z')

    expect(hits).toEqual([{
      company_number: '01234567',
      company_name: 'ACME WIDGETS LIMITED',
      company_status: 'active',
      company_type: undefined,
      date_of_creation: '1999-05-10',
      date_of_cessation: null,
      address: undefined,
      sic_codes: [],
    }])
    expect(none).toEqual([])
    expect(requests[0].url.pathname).toBe('/advanced-search/companies')
    expect(requests[0].url.searchParams.get('company_status')).toBe('active')
    expect(requests[0].url.searchParams.get('size')).toBe('10')
  })

  it('keeps letter-suffixed numbers and skips unreadable ones in search hits', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const { client } = setup(() => jsonResponse({
      hits: 3,
      items: [
        { company_number: '01234567', company_name: 'ACME WIDGETS LIMITED', company_status: 'active' },
        { company_number: 'IP28746R', company_name: 'NORTHERN CO-OPERATIVE SOCIETY', company_status: 'active' },
        { company_number: '??', company_name: 'BROKEN ROW', company_status: 'active' },
      ],
    }))

    const hits = await client.search('A')

    expect(hits.map(h => h.company_number)).toEqual(['01234567', 'IP28746R'])
    expect(warn).toHaveBeenCalledWith('Skipping search hit with unreadable company number "??"')
    warn.mockRestore()
  })

  it('keeps every readable appointment when one company number is unreadable', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const appointment = (company_number: string) => ({
      officer_role: 'director',
      appointed_to: { company_number, company_name: `COMPANY ${company_number}`, company_status: 'active' },
    })
    const { client } = setup(() => jsonResponse({
      name: 'Jane SMITH',
      total_results: 3,
      items: [appointment('01234567'), appointment('IP28746R'), appointment('??')],
    }))

    const director = await client.getOfficerAppointments('D1')

    expect(director.appointments.map(a => a.company_number)).toEqual(['01234567', 'IP28746R'])
    expect(warn).toHaveBeenCalledWith('Skipping appointment of D1 with unreadable company number "??"')
    warn.mockRestore()
  })

  it('downloads the best textual representation of a document', async () => {
    const { client, requests } = setup(url => url.pathname.endsWith('/content')
      ? new Response('<p>Date of incorporation: 10/05/1999</p>', { headers: { 'content-type': 'application/xhtml+xml; charset=utf-8' } })
      : jsonResponse({ resources: { 'application/pdf': {}, 'application/xhtml+xml': {} } }))

    const document = await client.downloadDocument('abc123')

    expect(document.content_type).toBe('application/xhtml+xml')
    expect(document.text).toBe('<p>Date of incorporation: 10/05/1999</p>')
    expect(requests.map(r => [r.url.href, r.headers.get('accept')])).toEqual([
      ['https://documents.test/document/abc123', 'application/json'],
      ['https://documents.test/document/abc123/content', 'application/xhtml+xml'],
    ])
  })

  it('returns PDFs as bytes only', async () => {
    const { client } = setup(url => url.pathname.endsWith('/content')
      ? new Response(new Uint8Array([37, 80, 68, 70]), { headers: { 'content-type': 'application/pdf' } })
      : jsonResponse({ resources: { 'application/pdf': {} } }))

    const document = await client.downloadDocument('abc123')

    expect(document.content_type).toBe('application/pdf')
    expect(document.text).toBeUndefined()
    expect([...document.bytes]).toEqual([37, 80, 68, 70])
  })
})

describe('Companies House helpers', () => {
  it('reads director ids from appointment links', () => {
    expect(directorIdFromLink('/officers/AbC-123_x/appointments')).toBe('AbC-123_x')
    expect(directorIdFromLink('/company/01234567')).toBeNull()
  })

  it('requires an API key', () => {
    const clock = new FakeClock()
    expect(() => new CompaniesHouseClient({ apiKey: '', rateLimiter: new RateLimiter({ maxRequests: 1, windowMs: 1000, clock }) }))
      .toThrow(InvalidInputError)
    expect(() => createCompaniesHouseClient({
      baseUrl: 'https://registry.test',
      documentBaseUrl: 'https://documents.test',
      maxRequests: 600,
      windowSeconds: 300,
      maxRetries: 3,
      retryBaseDelayMs: 1000,
    })).toThrow('COMPANIES_HOUSE_API_KEY is not set')
  })
})
