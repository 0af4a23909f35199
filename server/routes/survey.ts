/**
 * POST /v1/survey — validate, redact, dedupe, append.
 */
import { Hono, type Context } from 'hono'
import type { AppEnv } from '../env'
import { resolveClientIp } from '../lib/ip'
import type { Logger } from '../lib/logger'
import { buildStorageRecord } from '../lib/record'
import type { SurveyStore } from '../lib/store'
import { parseJsonObject, validateSubmission } from '../lib/validation'

export interface SurveyRouteDeps {
  store: SurveyStore
  logger: Logger
  now: () => Date
  peerAddress: (c: Context<AppEnv>) => string | undefined
}

export function surveyRoutes({ store, logger, now, peerAddress }: SurveyRouteDeps) {
  return new Hono<AppEnv>()
    .options('/', (c) => c.body(null, 204))
    .post('/', async (c) => {
      const payload = parseJsonObject(await c.req.text())
      if (!payload) {
        return c.json(
          { error: 'invalid_json', message: 'Request body must be a JSON object' },
          400
        )
      }

      const result = validateSubmission(payload)
      if (!result.success) {
        return c.json({ error: 'validation_error', details: result.details }, 422)
      }

      const submission = result.data
      if (!submission.user_agent) {
        const headerUserAgent = c.req.header('User-Agent')?.trim()
        if (headerUserAgent) submission.user_agent = headerUserAgent
      }

      const receivedAt = now()
      const ip = resolveClientIp(c.req.header('X-Forwarded-For'), peerAddress(c))
      const record = await buildStorageRecord(submission, receivedAt, ip)
      const stored = await store.appendIfNew(record)

      logger.info(stored ? 'submission stored' : 'duplicate submission ignored', {
        request_id: c.get('requestContext').requestId,
        submission_id: record.submission_id,
      })

      return c.json({ status: 'ok', submission_id: record.submission_id }, 201)
    })
}
