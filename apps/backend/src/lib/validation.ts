import type { z } from 'zod'
import { HttpError } from './errors.js'

/** Parses a request body, answering 400 with every issue message on failure */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body ?? {})
  if (parsed.success) return parsed.data
  const messages = parsed.error.issues.map((issue) => issue.message)
  throw new HttpError(400, messages[0] ?? 'Invalid request', messages)
}
