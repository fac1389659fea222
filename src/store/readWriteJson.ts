/**
 * JSON file helpers
 *
 * Every JSON file goes through here. Writes are atomic.
 */

import { existsSync, readFileSync, writeFileSync, renameSync, mkdirSync, rmSync } from 'fs'
import { dirname } from 'path'
import type { z } from 'zod'
import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import type { JsonWriteOptions } from './types.js'

const logger = createLogger('json-io')

/**
 * Read and validate a JSON file.
 *
 * @returns the parsed value, or null when the file is missing, unreadable or invalid
 */
export function readJson<T>(filepath: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | null {
  if (!existsSync(filepath)) return null

  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(filepath, 'utf-8'))
  } catch (e) {
    logger.debug(`Failed to read JSON: ${filepath} (${getErrorMessage(e)})`)
    return null
  }

  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    logger.warn(`JSON validation failed: ${filepath}`)
    return null
  }
  return parsed.data
}

/**
 * Write a JSON file, by default through a temp file and rename so a crash
 * mid-write never leaves a truncated file behind.
 */
export function writeJson(filepath: string, data: unknown, options?: JsonWriteOptions): void {
  const indent = options?.indent ?? 2
  const atomic = options?.atomic ?? true
  const content = JSON.stringify(data, null, indent)

  ensureDir(dirname(filepath))

  if (atomic) {
    const tempPath = `${filepath}.tmp`
    writeFileSync(tempPath, content, 'utf-8')
    renameSync(tempPath, filepath)
  } else {
    writeFileSync(filepath, content, 'utf-8')
  }
}

/** @returns whether a file was removed */
export function removeFile(filepath: string): boolean {
  if (!existsSync(filepath)) return false
  rmSync(filepath, { force: true })
  return true
}

export function ensureDir(dirpath: string): void {
  if (!existsSync(dirpath)) {
    mkdirSync(dirpath, { recursive: true })
  }
}
