import OpenAI from 'openai'

let cachedClient: OpenAI | null = null
let cachedKey: string | null = null

export function getOpenAiClient(apiKey: string): OpenAI {
  if (!cachedClient || cachedKey !== apiKey) {
    cachedClient = new OpenAI({ apiKey })
    cachedKey = apiKey
  }
  return cachedClient
}
