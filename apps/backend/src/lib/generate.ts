// apps/backend/src/lib/generate.ts
import { chat } from './openai.js'
import { resolveModel } from './models.js'
import { GenerationError, errorMessage } from './errors.js'

export type GenerateParams = {
  temperature: number
  maxTokens: number
  system?: string
  model?: string
  /** Logged with the request, e.g. which proposal step asked */
  step?: string
}

/** External text-generation boundary; fails with GenerationError */
export type GenerateText = (prompt: string, params: GenerateParams) => Promise<string>

export const generateText: GenerateText = (prompt, params) =>
  chat({
    model: resolveModel(params.model),
    system: params.system,
    messages: [{ role: 'user', content: prompt }],
    temperature: params.temperature,
    max_output_tokens: params.maxTokens,
    meta: { step: params.step ?? null },
  })

/**
 * Runs a generation and never rejects: on failure the caller gets a
 * descriptive placeholder it can classify and render like any other text.
 */
export async function generateOrPlaceholder(
  generate: GenerateText,
  label: string,
  prompt: string,
  params: GenerateParams
): Promise<{ text: string; failed: boolean }> {
  try {
    return { text: await generate(prompt, params), failed: false }
  } catch (err) {
    if (!(err instanceof GenerationError)) console.error('[generate] unexpected failure', err)
    return { text: `${label} generation failed: ${errorMessage(err)}`, failed: true }
  }
}
