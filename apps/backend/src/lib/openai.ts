// apps/backend/src/lib/openai.ts
import OpenAI from 'openai'
import { readFlag } from './config.js'
import { GenerationError, errorMessage } from './errors.js'

type ChatArgs = {
  model: string
  system?: string
  messages: OpenAI.Chat.ChatCompletionMessageParam[]
  temperature?: number
  top_p?: number
  max_output_tokens?: number
  meta?: Record<string, string | number | boolean | null>
}

let client: OpenAI | null = null

function openai(): OpenAI {
  if (!client) {
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
      organization: process.env.OPENAI_ORG_ID || null,
    })
  }
  return client
}

const isReasoningModel = (model: string) => /gpt-5|^o\d/i.test(model)

const FAKE_TEXT = [
  'Introduction',
  'This is a stub because PROPOSAL_FAKE_RUNS=true.',
  'Solution Overview',
  '- Stubbed bullet',
].join('\n')

export async function chat(args: ChatArgs): Promise<string> {
  const {
    model,
    system,
    messages,
    temperature = 0.3,
    top_p = 1,
    max_output_tokens = 1200,
    meta = {},
  } = args

  const reasoning = isReasoningModel(model)
  const safeTemperature = reasoning ? 1 : temperature
  const safeTopP = reasoning ? 1 : top_p

  const FAKE = readFlag('PROPOSAL_FAKE_RUNS')
  const TRACE = readFlag('PROPOSAL_TRACE')

  if (TRACE) {
    console.log('[chat] model=%s temp=%s max=%s FAKE=%s', model, safeTemperature, max_output_tokens, FAKE)
  }

  const start = Date.now()
  console.info(JSON.stringify({
    type: 'llm.request',
    model,
    temperature: safeTemperature,
    top_p: safeTopP,
    max_output_tokens,
    meta,
  }))

  if (FAKE) {
    if (TRACE) console.log('[chat] fake run enabled, returning stub text')
    return FAKE_TEXT
  }

  const payload: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model,
    temperature: safeTemperature,
    top_p: safeTopP,
    messages: [...(system ? [{ role: 'system' as const, content: system }] : []), ...messages],
  }
  if (reasoning) payload.max_completion_tokens = max_output_tokens
  else payload.max_tokens = max_output_tokens

  let out: string
  try {
    const r = await openai().chat.completions.create(payload)
    out = (r.choices[0]?.message?.content ?? '').trim()
    console.info(JSON.stringify({
      type: 'llm.response',
      model,
      duration_ms: Date.now() - start,
      meta,
      usage: r.usage ?? null,
      choices: r.choices.length,
    }))
  } catch (err) {
    console.error(JSON.stringify({
      type: 'llm.error',
      model,
      duration_ms: Date.now() - start,
      meta,
      error: errorMessage(err),
    }))
    throw new GenerationError(errorMessage(err), { cause: err })
  }

  if (TRACE) console.log('[chat] received %d chars', out.length)
  if (!out) throw new GenerationError(`${model} returned empty output`)
  return out
}
