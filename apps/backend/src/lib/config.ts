// apps/backend/src/lib/config.ts
import { z } from 'zod'

function parseFlag(value: string | undefined, fallback: boolean): boolean {
  if (value == null || value.trim() === '') return fallback
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase())
}

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v) => parseFlag(v, fallback))

/** Boolean env switch read at call time */
export function readFlag(name: string, fallback = false): boolean {
  return parseFlag(process.env[name], fallback)
}

const ConfigSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  CORS_ORIGIN: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  TEMPERATURE_VSP: z.coerce.number().min(0).max(2).default(0.9),
  MAX_TOKENS_VSP: z.coerce.number().int().positive().default(1700),
  TEMPERATURE_EXEC: z.coerce.number().min(0).max(2).default(0.9),
  MAX_TOKENS_EXEC: z.coerce.number().int().positive().default(1700),
  HIDE_VSP_FROM_DOCX: flag(false),
  VSP_VISIBLE_IN_UI: flag(true),
  PROPOSAL_FAKE_RUNS: flag(false),
})

export type AppConfig = {
  port: number
  corsOrigins: string[]
  openai: { apiKey?: string }
  generation: {
    vsp: { temperature: number; maxTokens: number }
    summary: { temperature: number; maxTokens: number }
  }
  hideVspFromDocx: boolean
  vspVisibleInUi: boolean
  fakeRuns: boolean
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env)
  return {
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGIN ? parsed.CORS_ORIGIN.split(',').map((s) => s.trim()) : ['http://localhost:5173'],
    openai: { apiKey: parsed.OPENAI_API_KEY },
    generation: {
      vsp: { temperature: parsed.TEMPERATURE_VSP, maxTokens: parsed.MAX_TOKENS_VSP },
      summary: { temperature: parsed.TEMPERATURE_EXEC, maxTokens: parsed.MAX_TOKENS_EXEC },
    },
    hideVspFromDocx: parsed.HIDE_VSP_FROM_DOCX,
    vspVisibleInUi: parsed.VSP_VISIBLE_IN_UI,
    fakeRuns: parsed.PROPOSAL_FAKE_RUNS,
  }
}
