/**
 * Static CORS headers on every response, errors and 404s included.
 */
import { createMiddleware } from 'hono/factory'

export const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Allow-Methods': 'POST, OPTIONS',
} as const

export const corsHeaders = createMiddleware(async (c, next) => {
  await next()
  for (const [name, value] of Object.entries(CORS_HEADERS)) {
    if (!c.res.headers.has(name)) c.res.headers.set(name, value)
  }
})
