// apps/backend/src/middleware/session.ts
import { randomBytes } from 'crypto'
import type { Request } from 'express'

// Cookie transport lives outside this service; clients echo the id they were given.
export const SESSION_HEADER = 'x-session-id'

export function sessionIdOf(req: Request): string | null {
  const id = (req.header(SESSION_HEADER) || '').trim()
  return id || null
}

export function newSessionId(): string {
  return randomBytes(8).toString('hex')
}
