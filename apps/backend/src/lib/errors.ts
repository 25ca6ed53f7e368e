// Errors carry the HTTP status the error handler should answer with.

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    public readonly details?: string[]
  ) {
    super(message)
    this.name = 'HttpError'
  }
}

/** The text-generation call failed or returned nothing usable */
export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GenerationError'
  }
}

export class RefineInputEmptyError extends HttpError {
  constructor() {
    super(400, 'Refine instructions cannot be empty.')
    this.name = 'RefineInputEmptyError'
  }
}

export class SessionNotFoundError extends HttpError {
  constructor() {
    super(404, 'No active proposal found. Please generate one.')
    this.name = 'SessionNotFoundError'
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
