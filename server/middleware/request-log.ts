/**
 * Request logging: builds an explicit RequestContext, exposes it to handlers,
 * and hands it to the logger once the response exists.
 */
import { createMiddleware } from 'hono/factory'
import type { AppEnv, RequestContext } from '../env'
import type { Logger } from '../lib/logger'

export function logRequestCompletion(
  logger: Logger,
  ctx: RequestContext,
  status: number,
  finishedAt: number
): void {
  const fields = {
    request_id: ctx.requestId,
    method: ctx.method,
    path: ctx.path,
    status,
    duration_ms: Math.round((finishedAt - ctx.startedAt) * 100) / 100,
  }
  if (status >= 500) logger.error('request failed', fields)
  else logger.info('request completed', fields)
}

export function requestLog(logger: Logger, clock: () => number = () => performance.now()) {
  return createMiddleware<AppEnv>(async (c, next) => {
    const ctx: RequestContext = {
      requestId: crypto.randomUUID(),
      method: c.req.method,
      path: c.req.path,
      startedAt: clock(),
    }
    c.set('requestContext', ctx)
    await next()
    c.res.headers.set('X-Request-Id', ctx.requestId)
    logRequestCompletion(logger, ctx, c.res.status, clock())
  })
}
