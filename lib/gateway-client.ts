import { z } from 'zod'
import type { RecordingBuffer } from '@/lib/session-state'
import { recordingFileName } from '@/lib/recording-file'
import { resolveErrorMessage, type ErrorPayload } from '@/types/error-types'

export type TranscriptionReply = {
  text: string
  error: string | null
}

export interface SessionGateways {
  checkConfiguration(): Promise<boolean>
  transcribe(recording: RecordingBuffer): Promise<TranscriptionReply>
  advise(transcript: string): Promise<string>
}

const healthSchema = z.object({
  ok: z.boolean(),
  env: z.object({ hasOpenAI: z.boolean() }),
})

const transcribeSchema = z.object({
  ok: z.literal(true),
  text: z.string(),
  error: z.string().nullable().optional(),
})

const adviceSchema = z.object({
  ok: z.literal(true),
  advice: z.string(),
})

const errorSchema = z
  .object({ message: z.string().optional(), reason: z.string().optional(), error: z.string().nullable().optional() })
  .passthrough()

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json()
  } catch {
    return null
  }
}

function failureFrom(response: Response, body: unknown, fallback: string): Error {
  const parsed = errorSchema.safeParse(body)
  const payload: ErrorPayload = parsed.success ? parsed.data : null
  return new Error(resolveErrorMessage(payload, `${fallback} (status ${response.status})`))
}

export async function fetchConfigurationStatus(fetchImpl: typeof fetch = fetch): Promise<boolean> {
  const response = await fetchImpl('/api/health', { cache: 'no-store' })
  const body = await readJson(response)
  const parsed = healthSchema.safeParse(body)
  if (!response.ok || !parsed.success) {
    throw failureFrom(response, body, 'health_check_failed')
  }
  return parsed.data.env.hasOpenAI
}

export async function requestTranscription(
  recording: RecordingBuffer,
  fetchImpl: typeof fetch = fetch,
): Promise<TranscriptionReply> {
  const form = new FormData()
  const blob = new Blob([recording.bytes.slice()], { type: recording.mimeType })
  form.append('audio', blob, recordingFileName(recording.mimeType))

  const response = await fetchImpl('/api/transcribe', { method: 'POST', body: form })
  const body = await readJson(response)
  const parsed = transcribeSchema.safeParse(body)
  if (!response.ok || !parsed.success) {
    throw failureFrom(response, body, 'transcription_request_failed')
  }
  return { text: parsed.data.text, error: parsed.data.error ?? null }
}

export async function requestAdvice(transcript: string, fetchImpl: typeof fetch = fetch): Promise<string> {
  const response = await fetchImpl('/api/advice', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ transcript }),
  })
  const body = await readJson(response)
  const parsed = adviceSchema.safeParse(body)
  if (!response.ok || !parsed.success) {
    throw failureFrom(response, body, 'advice_request_failed')
  }
  return parsed.data.advice
}

export const httpGateways: SessionGateways = {
  checkConfiguration: () => fetchConfigurationStatus(),
  transcribe: (recording) => requestTranscription(recording),
  advise: (transcript) => requestAdvice(transcript),
}
