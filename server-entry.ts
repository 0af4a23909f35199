/**
 * Node.js entry point: config -> logger -> NDJSON store -> Hono app.
 * Usage: npx tsx server-entry.ts
 */
import { serve } from '@hono/node-server'
import { getConnInfo } from '@hono/node-server/conninfo'
import { createApp } from './server/app'
import { loadConfig } from './server/lib/config'
import { createLogger } from './server/lib/logger'
import { createNdjsonStore } from './server/lib/store'

const config = loadConfig()
const logger = createLogger(config.logLevel)
const store = createNdjsonStore(config.dataFile, logger)

const app = createApp({
  store,
  logger,
  peerAddress: (c) => getConnInfo(c).remote.address,
})

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('survey intake listening', { port: info.port, data_file: config.dataFile })
})

function shutdown(signal: NodeJS.Signals): void {
  logger.info('shutting down', { signal })
  server.close((err) => {
    if (err) {
      logger.error('server close failed', { error: err })
      process.exitCode = 1
    }
  })
}

process.on('SIGINT', shutdown)
process.on('SIGTERM', shutdown)
