// apps/backend/src/routes/providers.ts
import { Router } from 'express'
import { ProviderProfileSchema } from '@proposal-desk/prompts'
import { HttpError } from '../lib/errors.js'
import type { ProviderRepository } from '../lib/provider-store.js'
import { parseBody } from '../lib/validation.js'

export function createProvidersRouter(providers: ProviderRepository) {
  const router = Router()

  router.get('/providers', async (_req, res, next) => {
    try {
      res.json({ providers: await providers.list() })
    } catch (err) {
      next(err)
    }
  })

  router.post('/providers', async (req, res, next) => {
    try {
      const profile = parseBody(ProviderProfileSchema, req.body)
      const provider = await providers.create(profile)
      console.info(`[providers] created '${provider.name}' (#${provider.id})`)
      res.status(201).json({ provider, message: `Company profile '${provider.name}' created.` })
    } catch (err) {
      next(err)
    }
  })

  router.get('/providers/:id', async (req, res, next) => {
    try {
      const provider = await providers.get(Number(req.params.id))
      if (!provider) throw new HttpError(404, 'Selected company not found.')
      res.json({ provider })
    } catch (err) {
      next(err)
    }
  })

  return router
}
