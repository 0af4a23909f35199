/**
 * Line-oriented file substrate for the NDJSON store.
 * Every function takes the file path as first param (no module-level singleton).
 */
import { appendFile, mkdir, open, type FileHandle } from 'fs/promises'
import * as path from 'path'
import { createInterface } from 'readline'
import { StorageError, isNotFound } from './errors'

/** Yields lines in file order. A missing file yields nothing. */
export async function* readLines(filePath: string): AsyncGenerator<string> {
  let handle: FileHandle
  try {
    handle = await open(filePath, 'r')
  } catch (err) {
    if (isNotFound(err)) return
    throw new StorageError(`Failed to open ${filePath}`, { cause: err })
  }

  const input = handle.createReadStream({ encoding: 'utf-8' })
  const lines = createInterface({ input, crlfDelay: Infinity })
  try {
    for await (const line of lines) {
      yield line
    }
  } catch (err) {
    throw new StorageError(`Failed to read ${filePath}`, { cause: err })
  } finally {
    lines.close()
    // autoClose releases the file handle
    input.destroy()
  }
}

/** Appends one line, creating parent directories as needed. */
export async function appendLine(filePath: string, line: string): Promise<void> {
  try {
    await mkdir(path.dirname(filePath), { recursive: true })
    await appendFile(filePath, line + '\n', 'utf-8')
  } catch (err) {
    throw new StorageError(`Failed to append to ${filePath}`, { cause: err })
  }
}
