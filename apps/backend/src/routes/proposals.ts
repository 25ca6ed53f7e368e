// apps/backend/src/routes/proposals.ts
import { Router, type Request } from 'express'
import { ProposalRequestSchema, RefineRequestSchema } from '@proposal-desk/prompts'
import { DOCX_FILE_NAME, exportDocx } from '../docx/exportDocx.js'
import { renderHtml } from '../export/render-html.js'
import type { AppConfig } from '../lib/config.js'
import type { DraftStore, ProposalDraft } from '../lib/draft-store.js'
import { GenerationError, HttpError, SessionNotFoundError } from '../lib/errors.js'
import type { GenerateText } from '../lib/generate.js'
import type { ProviderRecord, ProviderRepository } from '../lib/provider-store.js'
import { parseBody } from '../lib/validation.js'
import { newSessionId, sessionIdOf } from '../middleware/session.js'
import { serializeDocument } from '../narrative/plain-text.js'
import { createProposal, refineProposal, type ProposalDeps } from '../orchestrator/proposal.js'
import { buildExportOutput, buildViewOutput } from '../orchestrator/summary-output.js'

export type ProposalsRouterDeps = {
  providers: ProviderRepository
  drafts: DraftStore
  generate: GenerateText
  config: Pick<AppConfig, 'generation' | 'hideVspFromDocx' | 'vspVisibleInUi'>
}

export function createProposalsRouter(deps: ProposalsRouterDeps) {
  const router = Router()
  const proposalDeps: ProposalDeps = { generate: deps.generate, generation: deps.config.generation }

  function loadSession(req: Request): { sessionId: string; draft: ProposalDraft } {
    const sessionId = sessionIdOf(req)
    const draft = sessionId ? deps.drafts.get(sessionId) : undefined
    if (!sessionId || !draft) throw new SessionNotFoundError()
    return { sessionId, draft }
  }

  function view(draft: ProposalDraft, provider: ProviderRecord | null) {
    return {
      summary: draft.summary,
      summaryText: serializeDocument(draft.summary),
      html: renderHtml(buildViewOutput(draft, provider)),
      vsp: deps.config.vspVisibleInUi ? draft.vsp : undefined,
      context: draft.clientContext,
      warnings: draft.warnings.map((warning) => warning.message),
      provider: provider ? { id: provider.id, name: provider.name } : null,
      updatedAt: draft.updatedAt,
    }
  }

  router.post('/proposals', async (req, res, next) => {
    try {
      const { providerId, ...client } = parseBody(ProposalRequestSchema, req.body)
      const provider = await deps.providers.get(providerId)
      if (!provider) throw new HttpError(404, 'Selected company not found.')

      const draft = await createProposal(provider, client, proposalDeps)
      const sessionId = newSessionId()
      deps.drafts.put(sessionId, draft)

      res.status(201).json({ sessionId, ...view(draft, provider) })
    } catch (err) {
      next(err)
    }
  })

  router.get('/proposals/current', async (req, res, next) => {
    try {
      const { draft } = loadSession(req)
      res.json(view(draft, await deps.providers.get(draft.providerId)))
    } catch (err) {
      next(err)
    }
  })

  router.post('/proposals/current/refine', async (req, res, next) => {
    try {
      const { sessionId, draft } = loadSession(req)
      const { instructions } = parseBody(RefineRequestSchema, req.body)
      const provider = await deps.providers.get(draft.providerId)

      let refined: ProposalDraft
      try {
        refined = await refineProposal(draft, provider, instructions, proposalDeps)
      } catch (err) {
        if (err instanceof GenerationError) {
          res.status(502).json({ error: `Refine failed: ${err.message}`, ...view(draft, provider) })
          return
        }
        throw err
      }

      deps.drafts.put(sessionId, refined)
      res.json(view(refined, provider))
    } catch (err) {
      next(err)
    }
  })

  router.get('/proposals/current/export', async (req, res, next) => {
    try {
      const { draft } = loadSession(req)
      const provider = await deps.providers.get(draft.providerId)
      const output = buildExportOutput(draft, provider, { includeVsp: !deps.config.hideVspFromDocx })
      const buffer = await exportDocx(output)

      res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.wordprocessingml.document')
      res.setHeader('Content-Disposition', `attachment; filename="${DOCX_FILE_NAME}"`)
      res.send(buffer)
    } catch (err) {
      next(err)
    }
  })

  router.delete('/proposals/current', (req, res) => {
    const sessionId = sessionIdOf(req)
    if (sessionId) deps.drafts.clear(sessionId)
    res.json({ ok: true, message: 'Session cleared.' })
  })

  return router
}
