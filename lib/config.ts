import { z } from 'zod'
import { logDiagnostic } from '@/utils/diagnostics'

export const DEFAULT_TRANSCRIBE_MODEL = 'whisper-1'
export const DEFAULT_ADVICE_MODEL = 'gpt-4'
export const DEFAULT_ADVICE_TEMPERATURE = 0.7

function blankToUndefined(value: unknown): unknown {
  if (typeof value !== 'string') return value
  const trimmed = value.trim()
  return trimmed.length ? trimmed : undefined
}

const envSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankToUndefined, z.string().optional()),
  OPENAI_TRANSCRIBE_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_TRANSCRIBE_MODEL)),
  OPENAI_ADVICE_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_ADVICE_MODEL)),
  OPENAI_ADVICE_TEMPERATURE: z.preprocess(
    blankToUndefined,
    z.coerce.number().min(0).max(2).default(DEFAULT_ADVICE_TEMPERATURE),
  ),
})

export type AppConfig = {
  apiKey: string | null
  transcribeModel: string
  adviceModel: string
  adviceTemperature: number
}

type EnvSource = Record<string, string | undefined>

export function readAppConfig(env: EnvSource = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (parsed.success) {
    return {
      apiKey: parsed.data.OPENAI_API_KEY ?? null,
      transcribeModel: parsed.data.OPENAI_TRANSCRIBE_MODEL,
      adviceModel: parsed.data.OPENAI_ADVICE_MODEL,
      adviceTemperature: parsed.data.OPENAI_ADVICE_TEMPERATURE,
    }
  }

  logDiagnostic('error', 'config:invalid', {
    note: 'Falling back to defaults for invalid settings',
    issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
  })

  // only the invalid keys are dropped; the credential is kept as given
  const invalidKeys = new Set(parsed.error.issues.map((issue) => String(issue.path[0])))
  const sanitized: EnvSource = {}
  for (const key of Object.keys(envSchema.shape)) {
    if (!invalidKeys.has(key)) sanitized[key] = env[key]
  }
  return readAppConfig(sanitized)
}

export function hasOpenAiCredential(config: AppConfig = readAppConfig()): config is AppConfig & { apiKey: string } {
  return typeof config.apiKey === 'string' && config.apiKey.length > 0
}
