/**
 * Append-only survey store with dedupe-on-append.
 *
 * appendIfNew scans every stored record before writing. The scan and the
 * append are not atomic: two concurrent requests carrying the same
 * submission can both miss each other and both be stored.
 */
import { appendLine, readLines } from './storage'
import { StorageRecordSchema, type StorageRecord } from './schemas'
import type { Logger } from './logger'

export interface SurveyStore {
  /** Records in file order, oldest first. Each call rereads from the start. */
  iterate(): AsyncIterable<StorageRecord>
  /** Resolves true when appended, false when an identical record already exists. */
  appendIfNew(record: StorageRecord): Promise<boolean>
}

export const DEDUPE_FIELDS = [
  'submission_id',
  'email',
  'age',
  'name',
  'consent',
  'rating',
  'comments',
  'source',
] as const satisfies readonly (keyof StorageRecord)[]

export function isSameSubmission(a: StorageRecord, b: StorageRecord): boolean {
  return DEDUPE_FIELDS.every((field) => a[field] === b[field])
}

export function parseRecordLine(line: string): StorageRecord | null {
  if (!line.trim()) return null
  let raw: unknown
  try {
    raw = JSON.parse(line)
  } catch {
    return null
  }
  const parsed = StorageRecordSchema.safeParse(raw)
  return parsed.success ? parsed.data : null
}

export function createNdjsonStore(filePath: string, logger?: Logger): SurveyStore {
  async function* iterate(): AsyncGenerator<StorageRecord> {
    let lineNumber = 0
    for await (const line of readLines(filePath)) {
      lineNumber++
      const record = parseRecordLine(line)
      if (record) {
        yield record
      } else if (line.trim()) {
        logger?.warn('skipping malformed store line', { file: filePath, line: lineNumber })
      }
    }
  }

  return {
    iterate,
    async appendIfNew(record) {
      for await (const existing of iterate()) {
        if (isSameSubmission(existing, record)) return false
      }
      await appendLine(filePath, JSON.stringify(record))
      return true
    },
  }
}
