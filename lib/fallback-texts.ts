export const FALLBACK_TEXTS = {
  missingCredential: 'Missing OPENAI_API_KEY.',
  missingCredentialNotice: 'Missing OPENAI_API_KEY. Please configure it in your .env file.',
  adviceError: 'Error generating medical advice. Please try again.',
  emptyTranscript: 'No transcript available.',
  transcriptionErrorPrefix: 'Transcription error',
  healthCheckFailed: 'Unable to reach the server to check configuration.',
} as const

export type FallbackTexts = typeof FALLBACK_TEXTS

export function formatTranscriptionError(detail: string): string {
  return `${FALLBACK_TEXTS.transcriptionErrorPrefix}: ${detail}`
}
