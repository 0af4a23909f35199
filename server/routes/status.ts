import { Hono } from 'hono'
import type { AppEnv } from '../env'

export function statusRoutes(now: () => Date) {
  return new Hono<AppEnv>().get('/ping', (c) =>
    c.json({ status: 'ok', message: 'API is alive', utc_time: now().toISOString() })
  )
}
