// apps/backend/src/lib/models.ts
// Centralised model resolution so every generation call shares defaults.

const FALLBACK_MODEL = (process.env.MODEL_DEFAULT && process.env.MODEL_DEFAULT.trim()) || 'gpt-4o'

export function resolveModel(...candidates: Array<string | undefined | null>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) {
      return candidate.trim()
    }
  }
  return FALLBACK_MODEL
}
