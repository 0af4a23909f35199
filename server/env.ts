/** Per-request state, created by the request-log middleware. */
export interface RequestContext {
  requestId: string
  method: string
  path: string
  startedAt: number
}

export type AppEnv = {
  Variables: { requestContext: RequestContext }
}
