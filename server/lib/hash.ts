/**
 * SHA-256 digests used for redaction and submission id derivation.
 */
const encoder = new TextEncoder()

export async function sha256hex(input: string): Promise<string> {
  const hash = await crypto.subtle.digest('SHA-256', encoder.encode(input))
  return Array.from(new Uint8Array(hash))
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('')
}

function pad2(n: number): string {
  return String(n).padStart(2, '0')
}

/** UTC hour bucket, e.g. 2026-03-07T09:41:12Z -> "2026030709". */
export function hourBucket(timestamp: Date): string {
  return (
    String(timestamp.getUTCFullYear()) +
    pad2(timestamp.getUTCMonth() + 1) +
    pad2(timestamp.getUTCDate()) +
    pad2(timestamp.getUTCHours())
  )
}

/**
 * Stable id for submissions that did not bring their own: the same
 * normalized email within the same UTC hour always yields the same id.
 */
export async function deriveSubmissionId(normalizedEmail: string, timestamp: Date): Promise<string> {
  return sha256hex(normalizedEmail + hourBucket(timestamp))
}
