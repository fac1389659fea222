/**
 * Test-result source
 *
 * Reads `<baseUrl>/<network>/listing.jsonl`, one suite run per line.
 */

import { z } from 'zod'
import { AppError } from '../shared/error.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createLogger } from '../shared/logger.js'
import { filterLatestResults } from './groupResults.js'
import type { TestResult } from './types.js'

const logger = createLogger('test-results')

export interface TestResultSource {
  fetch(network: string, signal?: AbortSignal): Promise<TestResult[]>
}

const UNKNOWN = 'unknown'

const listingLineSchema = z.object({
  name: z.string(),
  client: z.string().optional(),
  version: z.string().optional(),
  ntests: z.number().int().nonnegative(),
  passes: z.number().int().nonnegative(),
  fails: z.number().int().nonnegative(),
  fileName: z.string().optional(),
  timestamp: z.string().optional(),
  testSuiteId: z.string().optional(),
  clients: z.array(z.string()).optional(),
  versions: z.record(z.string()).optional(),
})

type ListingLine = z.infer<typeof listingLineSchema>

// file names start with unix seconds: 1741786498-23e4ac78....json
function timestampFromFileName(fileName: string | undefined): string | null {
  const seconds = Number.parseInt(fileName?.split('-')[0] ?? '', 10)
  return Number.isFinite(seconds) ? new Date(seconds * 1000).toISOString() : null
}

function normalizeLine(line: ListingLine, network: string): TestResult {
  let client = line.client ?? ''
  let version = line.version ?? ''

  // `clients` entries look like `geth_default`
  const primary = line.clients?.[0]
  if (primary) {
    const underscore = primary.indexOf('_')
    client = underscore > 0 ? primary.slice(0, underscore) : primary
    version = line.versions?.[primary] ?? version
  }

  const timestamp =
    line.timestamp && !Number.isNaN(Date.parse(line.timestamp))
      ? line.timestamp
      : timestampFromFileName(line.fileName) ?? new Date(0).toISOString()

  return {
    name: line.name,
    client: client || UNKNOWN,
    version: version || UNKNOWN,
    ntests: line.ntests,
    passes: line.passes,
    fails: line.fails,
    timestamp,
    fileName: line.fileName,
    testSuiteId: line.testSuiteId || network,
  }
}

/** Parse a listing document; invalid lines are skipped */
export function parseListing(body: string, network: string): TestResult[] {
  const results: TestResult[] = []
  let skipped = 0

  for (const raw of body.split('\n')) {
    const text = raw.trim()
    if (!text) continue

    let json: unknown
    try {
      json = JSON.parse(text)
    } catch {
      skipped++
      continue
    }

    const parsed = listingLineSchema.safeParse(json)
    if (!parsed.success) {
      skipped++
      continue
    }
    results.push(normalizeLine(parsed.data, network))
  }

  if (skipped > 0) logger.debug(`Skipped ${skipped} invalid listing line(s) for ${network}`)
  return filterLatestResults(results)
}

export function createHttpTestResultSource(baseUrl: string): TestResultSource {
  const root = baseUrl.replace(/\/+$/, '')

  return {
    async fetch(network: string, signal?: AbortSignal): Promise<TestResult[]> {
      if (!network) throw AppError.validation('network cannot be empty')

      const url = `${root}/${encodeURIComponent(network)}/listing.jsonl`
      logger.debug(`Fetching test results from ${url}`)

      let response: Response
      try {
        response = await fetch(url, { signal })
      } catch (e) {
        throw AppError.testResults(getErrorMessage(e), e)
      }

      if (!response.ok) {
        throw AppError.testResults(`status code ${response.status}`)
      }

      return parseListing(await response.text(), network)
    },
  }
}
