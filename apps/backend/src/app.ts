// apps/backend/src/app.ts
import express, { type Request, type Response, type NextFunction } from 'express'
import cors from 'cors'
import morgan from 'morgan'
import compression from 'compression'

import { createProvidersRouter } from './routes/providers.js'
import { createProposalsRouter, type ProposalsRouterDeps } from './routes/proposals.js'
import type { AppConfig } from './lib/config.js'
import { HttpError, errorMessage } from './lib/errors.js'

export type AppDeps = ProposalsRouterDeps & {
  config: ProposalsRouterDeps['config'] & Pick<AppConfig, 'corsOrigins'>
  /** Request logging; off in tests */
  logRequests?: boolean
}

export function createApp(deps: AppDeps) {
  const app = express()

  if (deps.logRequests !== false) app.use(morgan('dev'))
  app.use(cors({ origin: deps.config.corsOrigins, credentials: true }))
  app.use(compression())
  app.use(express.json({ limit: '1mb' }))

  // Health (public)
  app.get('/api/health', (_req: Request, res: Response) =>
    res.json({ ok: true, ts: new Date().toISOString() })
  )

  const api = express.Router()
  api.use(createProvidersRouter(deps.providers))
  api.use(createProposalsRouter(deps))
  app.use('/api', api)

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof HttpError ? err.status : 500
    if (status >= 500) console.error('[ERROR]', err)
    const body: { error: string; details?: string[] } = {
      error: status >= 500 && !(err instanceof HttpError) ? 'INTERNAL_SERVER_ERROR' : errorMessage(err),
    }
    if (err instanceof HttpError && err.details && err.details.length > 1) body.details = err.details
    res.status(status).json(body)
  })

  return app
}
