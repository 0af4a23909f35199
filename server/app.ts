/**
 * Survey intake app factory. Collaborators are injected so the boundary
 * runs in-process under test.
 */
import { Hono, type Context } from 'hono'
import type { AppEnv } from './env'
import { StorageError } from './lib/errors'
import { createLogger, type Logger } from './lib/logger'
import type { SurveyStore } from './lib/store'
import { corsHeaders } from './middleware/cors'
import { requestLog } from './middleware/request-log'
import { statusRoutes } from './routes/status'
import { surveyRoutes } from './routes/survey'

export interface AppOptions {
  store: SurveyStore
  logger?: Logger
  now?: () => Date
  peerAddress?: (c: Context<AppEnv>) => string | undefined
}

export function createApp({
  store,
  logger = createLogger(),
  now = () => new Date(),
  peerAddress = () => undefined,
}: AppOptions) {
  const app = new Hono<AppEnv>()

  app.use('*', corsHeaders)
  app.use('*', requestLog(logger))

  app.route('/', statusRoutes(now))
  app.route('/v1/survey', surveyRoutes({ store, logger, now, peerAddress }))

  app.notFound((c) =>
    c.json({ error: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` }, 404)
  )

  app.onError((err, c) => {
    const requestId = c.get('requestContext')?.requestId
    if (err instanceof StorageError) {
      logger.error('storage failure', { request_id: requestId, error: err, cause: err.cause })
      return c.json({ error: err.kind, message: 'Failed to persist submission' }, 500)
    }
    logger.error('unhandled error', { request_id: requestId, error: err })
    return c.json({ error: 'internal_error', message: 'Internal server error' }, 500)
  })

  return app
}
