// apps/backend/src/index.ts
import 'dotenv/config'
import { createApp } from './app.js'
import { loadConfig } from './lib/config.js'
import { InMemoryDraftStore } from './lib/draft-store.js'
import { generateText } from './lib/generate.js'
import { InMemoryProviderRepository } from './lib/provider-store.js'

const config = loadConfig()

if (!config.openai.apiKey && !config.fakeRuns) {
  console.warn('[boot] OPENAI_API_KEY is not set; generation will fail and placeholders will be shown')
}

const app = createApp({
  providers: new InMemoryProviderRepository(),
  drafts: new InMemoryDraftStore(),
  generate: generateText,
  config,
})

app.listen(config.port, () => {
  console.log(`Backend running on http://localhost:${config.port}/api/health`)
})

export default app
