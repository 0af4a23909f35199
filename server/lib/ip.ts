/**
 * Client address resolution: first X-Forwarded-For entry, else the socket peer.
 */
export function resolveClientIp(
  forwardedFor: string | undefined,
  peerAddress: string | undefined
): string | undefined {
  const forwarded = forwardedFor?.split(',')[0]?.trim()
  if (forwarded) return forwarded
  const peer = peerAddress?.trim()
  return peer ? peer : undefined
}
