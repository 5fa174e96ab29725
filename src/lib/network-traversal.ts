/**
 * Director network traversal.
 *
 * Breadth-first from the seed companies, one depth level at a time. Within a level
 * the officer lists are fetched concurrently but merged in frontier order, so a run
 * against an unchanged registry always yields the same graph.
 */

import type { Connection, CompanyNode, DirectorNode, NetworkGraph } from '../types/scan.ts'
import type { DirectorSource, RequestOptions } from './companies-house.ts'
import { tryNormalizeCompanyNumber } from './company-number.ts'
import { mapWithConcurrency } from './concurrency.ts'
import { isCancellation } from './errors.ts'

export interface TraversalOptions extends RequestOptions {
  /** 0 = seeds and their directors only */
  maxDepth: number
  activeOnly?: boolean
}

export interface NetworkTraversalOptions {
  concurrency?: number
}

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export class NetworkTraversal {
  private source: DirectorSource
  private concurrency: number

  constructor(source: DirectorSource, options: NetworkTraversalOptions = {}) {
    this.source = source
    this.concurrency = options.concurrency ?? 4
  }

  async traverse(seeds: string[], options: TraversalOptions): Promise<NetworkGraph> {
    const maxDepth = Math.max(0, Math.floor(options.maxDepth))
    const activeOnly = options.activeOnly ?? false
    const request: RequestOptions = { signal: options.signal, deadline: options.deadline }

    const companies = new Map<string, CompanyNode>()
    const directors = new Map<string, DirectorNode>()
    const connections = new Map<string, Connection>()
    const warnings: string[] = []
    let cancelled = false
    let depthReached = 0

    let frontier: string[] = []
    for (const seed of seeds) {
      const number = tryNormalizeCompanyNumber(seed)
      if (!number) {
        warnings.push(`Skipped invalid seed company number "${seed}"`)
        continue
      }
      if (companies.has(number)) continue
      companies.set(number, { company_number: number, company_name: null, company_status: null, depth: 0 })
      frontier.push(number)
    }

    for (let depth = 0; frontier.length > 0 && depth <= maxDepth; depth++) {
      if (options.signal?.aborted) {
        cancelled = true
        break
      }
      depthReached = depth
      console.log(`Network traversal: depth ${depth}, ${frontier.length} companies`)

      const officerOutcomes = await mapWithConcurrency(
        frontier,
        this.concurrency,
        number => this.source.getOfficers(number, { ...request, activeOnly }),
        options.signal
      )

      const newDirectors: string[] = []
      officerOutcomes.forEach((outcome, i) => {
        const companyNumber = frontier[i]
        if (outcome.status === 'skipped') {
          cancelled = true
          return
        }
        if (outcome.status === 'rejected') {
          if (isCancellation(outcome.reason)) {
            cancelled = true
            return
          }
          const warning = `Officers unavailable for ${companyNumber}: ${reason(outcome.reason)}`
          console.warn(`Network traversal: ${warning}`)
          warnings.push(warning)
          return
        }

        for (const officer of outcome.value) {
          if (!directors.has(officer.director_id)) {
            directors.set(officer.director_id, { director_id: officer.director_id, name: officer.name, company_count: 0 })
            newDirectors.push(officer.director_id)
          }
          const key = `${companyNumber}|${officer.director_id}|${officer.role}`
          if (!connections.has(key)) {
            connections.set(key, { company_number: companyNumber, director_id: officer.director_id, role: officer.role })
          }
        }
      })

      if (cancelled || depth + 1 > maxDepth) break

      const appointmentOutcomes = await mapWithConcurrency(
        newDirectors,
        this.concurrency,
        id => this.source.getOfficerAppointments(id, request),
        options.signal
      )

      const next: string[] = []
      appointmentOutcomes.forEach((outcome, i) => {
        const directorId = newDirectors[i]
        if (outcome.status === 'skipped') {
          cancelled = true
          return
        }
        if (outcome.status === 'rejected') {
          if (isCancellation(outcome.reason)) {
            cancelled = true
            return
          }
          const warning = `Appointments unavailable for director ${directorId}: ${reason(outcome.reason)}`
          console.warn(`Network traversal: ${warning}`)
          warnings.push(warning)
          return
        }

        for (const appointment of outcome.value.appointments) {
          if (activeOnly && appointment.resigned_on) continue
          if (companies.has(appointment.company_number)) continue
          companies.set(appointment.company_number, {
            company_number: appointment.company_number,
            company_name: appointment.company_name || null,
            company_status: appointment.company_status ?? null,
            depth: depth + 1,
          })
          next.push(appointment.company_number)
        }
      })

      if (cancelled) break
      frontier = next
    }

    // company_count = distinct companies the director is linked to in this graph
    const companiesPerDirector = new Map<string, Set<string>>()
    for (const connection of connections.values()) {
      const set = companiesPerDirector.get(connection.director_id) ?? new Set<string>()
      set.add(connection.company_number)
      companiesPerDirector.set(connection.director_id, set)
    }
    const directorNodes = [...directors.values()].map(d => ({
      ...d,
      company_count: companiesPerDirector.get(d.director_id)?.size ?? 0,
    }))

    if (cancelled) {
      console.warn(`Network traversal cancelled at depth ${depthReached}; returning partial graph`)
    }

    return {
      companies: [...companies.values()],
      directors: directorNodes,
      connections: [...connections.values()],
      statistics: {
        total_companies: companies.size,
        total_directors: directors.size,
        total_connections: connections.size,
        depth_reached: depthReached,
        max_depth: maxDepth,
        warnings,
        cancelled,
      },
    }
  }
}
