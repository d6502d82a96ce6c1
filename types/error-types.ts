export type SessionNoticeKind =
  | 'configuration_missing'
  | 'transcription_failure'
  | 'advice_failure'
  | 'empty_transcript'

export type SessionNotice = {
  kind: SessionNoticeKind
  level: 'error' | 'warning'
  message: string
}

export interface ApiErrorReport {
  ok?: boolean
  message?: string
  reason?: string
  error?: string | null
  status?: number
  [key: string]: unknown
}

export type ErrorPayload = ApiErrorReport | null | undefined

export function resolveErrorMessage(payload: ErrorPayload, fallback: string): string {
  const messageCandidates: unknown[] = []

  if (payload && typeof payload === 'object') {
    messageCandidates.push(payload.message, payload.reason, payload.error)
  }

  const resolved = messageCandidates.find(
    (value): value is string => typeof value === 'string' && value.trim().length > 0,
  )

  return resolved ? resolved.trim() : fallback
}
