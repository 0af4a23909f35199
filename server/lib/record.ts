/**
 * Builds the persisted record from a validated submission.
 * Email and age are replaced by their SHA-256 digests.
 */
import { deriveSubmissionId, sha256hex } from './hash'
import type { StorageRecord, SurveySubmission } from './schemas'

export async function buildStorageRecord(
  submission: SurveySubmission,
  receivedAt: Date,
  ip?: string
): Promise<StorageRecord> {
  const email = submission.email.toLowerCase()
  const submissionId = submission.submission_id || (await deriveSubmissionId(email, receivedAt))

  const record: StorageRecord = {
    submission_id: submissionId,
    name: submission.name,
    consent: submission.consent,
    rating: submission.rating,
    comments: submission.comments,
    source: submission.source || 'other',
    email: await sha256hex(email),
    age: await sha256hex(String(submission.age)),
    received_at: receivedAt.toISOString(),
  }

  if (submission.user_agent) record.user_agent = submission.user_agent
  if (ip) record.ip = ip

  return record
}
