type DiagnosticPayload = Record<string, unknown> | undefined

type EnvSnapshot = {
  hasOpenAI: boolean
  openAIKeyPreview: string | null
  transcribeModel: string | null
  adviceModel: string | null
  nodeEnv: string | null
}

function describeKey(value: string | undefined): string | null {
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed.length ? `${trimmed.length} chars` : null
}

export function describeEnvSnapshot(): EnvSnapshot {
  const key = process.env.OPENAI_API_KEY
  return {
    hasOpenAI: typeof key === 'string' && key.trim().length > 0,
    openAIKeyPreview: describeKey(key),
    transcribeModel: process.env.OPENAI_TRANSCRIBE_MODEL ?? null,
    adviceModel: process.env.OPENAI_ADVICE_MODEL ?? null,
    nodeEnv: process.env.NODE_ENV ?? null,
  }
}

export function serializeError(error: unknown) {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  if (error && typeof error === 'object') {
    try {
      return JSON.parse(JSON.stringify(error))
    } catch {
      return { ...error }
    }
  }
  if (typeof error === 'string') {
    return { message: error }
  }
  return { message: 'Unknown error', value: error }
}

export function describeError(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim().length) return error.message
  if (typeof error === 'string' && error.trim().length) return error
  return fallback
}

export function logDiagnostic(level: 'log' | 'error', event: string, payload?: DiagnosticPayload) {
  const timestamp = new Date().toISOString()
  const basePayload =
    payload && typeof payload === 'object'
      ? 'env' in payload
        ? payload
        : { ...payload, env: describeEnvSnapshot() }
      : { env: describeEnvSnapshot() }

  if (level === 'error') {
    console.error('[diagnostic]', timestamp, event, basePayload)
  } else {
    console.log('[diagnostic]', timestamp, event, basePayload)
  }
}
