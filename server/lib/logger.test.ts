import { describe, it, expect, vi } from 'vitest'
import { createLogger, type LogSink } from './logger'

const clock = () => new Date('2026-03-07T09:41:12.000Z')

describe('createLogger', () => {
  it('writes one JSON line per entry', () => {
    const sink = vi.fn<LogSink>()
    const logger = createLogger('info', sink, clock)

    logger.info('submission stored', { submission_id: 'sub-1' })

    expect(sink).toHaveBeenCalledWith(
      'info',
      '{"level":"info","time":"2026-03-07T09:41:12.000Z","msg":"submission stored","submission_id":"sub-1"}'
    )
  })

  it('drops entries below the threshold', () => {
    const sink = vi.fn<LogSink>()
    const logger = createLogger('warn', sink, clock)

    logger.debug('noise')
    logger.info('noise')
    logger.warn('disk low', { free_mb: 12 })
    logger.error('disk full')

    expect(sink.mock.calls.map(([level]) => level)).toEqual(['warn', 'error'])
  })

  it('writes nothing when silent', () => {
    const sink = vi.fn<LogSink>()
    const logger = createLogger('silent', sink, clock)
    logger.error('ignored')
    expect(sink).not.toHaveBeenCalled()
  })

  it('serializes errors by name and message', () => {
    const sink = vi.fn<LogSink>()
    createLogger('info', sink, clock).error('boom', { error: new TypeError('bad input') })

    expect(sink).toHaveBeenCalledWith(
      'error',
      '{"level":"error","time":"2026-03-07T09:41:12.000Z","msg":"boom","error":{"name":"TypeError","message":"bad input"}}'
    )
  })
})
