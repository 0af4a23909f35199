import { describe, it, expect } from 'vitest'
import { resolveClientIp } from './ip'

describe('resolveClientIp', () => {
  it('takes the first forwarded entry, trimmed', () => {
    expect(resolveClientIp(' 203.0.113.9 , 10.0.0.1', '198.51.100.4')).toBe('203.0.113.9')
  })

  it('falls back to the peer address', () => {
    expect(resolveClientIp(undefined, '198.51.100.4')).toBe('198.51.100.4')
    expect(resolveClientIp(' , 10.0.0.1', '::1')).toBe('::1')
  })

  it('returns undefined when nothing resolves', () => {
    expect(resolveClientIp(undefined, undefined)).toBeUndefined()
    expect(resolveClientIp('', '  ')).toBeUndefined()
  })
})
