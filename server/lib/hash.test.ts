import { describe, it, expect } from 'vitest'
import { createHash } from 'crypto'
import { deriveSubmissionId, hourBucket, sha256hex } from './hash'

function nodeSha256(input: string): string {
  return createHash('sha256').update(input).digest('hex')
}

describe('sha256hex', () => {
  it('matches known SHA-256 digests', async () => {
    expect(await sha256hex('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
    )
    expect(await sha256hex('')).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855'
    )
  })

  it('returns 64 lowercase hex characters', async () => {
    expect(await sha256hex('ava@example.com')).toMatch(/^[0-9a-f]{64}$/)
  })

  it('encodes input as UTF-8', async () => {
    expect(await sha256hex('Zoë')).toBe(nodeSha256('Zoë'))
  })
})

describe('hourBucket', () => {
  it('formats year, month, day and hour in UTC', () => {
    expect(hourBucket(new Date('2026-03-07T09:41:12.345Z'))).toBe('2026030709')
  })

  it('uses the UTC hour regardless of the offset the time was written in', () => {
    expect(hourBucket(new Date('2026-12-31T23:30:00-05:00'))).toBe('2027010104')
  })
})

describe('deriveSubmissionId', () => {
  it('hashes the email concatenated with the hour bucket', async () => {
    const id = await deriveSubmissionId('ava@example.com', new Date('2026-03-07T09:41:12Z'))
    expect(id).toBe(nodeSha256('ava@example.com2026030709'))
  })

  it('is identical within the same UTC hour', async () => {
    const first = await deriveSubmissionId('ava@example.com', new Date('2026-03-07T09:00:00Z'))
    const second = await deriveSubmissionId('ava@example.com', new Date('2026-03-07T09:59:59Z'))
    expect(first).toBe(second)
  })

  it('changes when the hour changes', async () => {
    const first = await deriveSubmissionId('ava@example.com', new Date('2026-03-07T09:59:59Z'))
    const second = await deriveSubmissionId('ava@example.com', new Date('2026-03-07T10:00:00Z'))
    expect(first).not.toBe(second)
  })
})
