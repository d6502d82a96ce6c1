import { toFile } from 'openai'
import { hasOpenAiCredential, readAppConfig, type AppConfig } from '@/lib/config'
import { FALLBACK_TEXTS, formatTranscriptionError } from '@/lib/fallback-texts'
import { getOpenAiClient } from '@/lib/openai-client'
import { recordingFileName } from '@/lib/recording-file'
import { describeError, logDiagnostic, serializeError } from '@/utils/diagnostics'

export type TranscriptionErrorReporter = (message: string) => void

export interface TranscribeOptions {
  mimeType?: string
  reportError?: TranscriptionErrorReporter
  config?: AppConfig
}

const logReporter: TranscriptionErrorReporter = (message) => {
  logDiagnostic('error', 'transcription:reported', { message })
}

/**
 * Sends one recording to the speech-to-text endpoint and returns the trimmed text.
 * Never throws: failures go to `reportError` and yield an empty string.
 */
export async function transcribeAudio(audio: Uint8Array, options: TranscribeOptions = {}): Promise<string> {
  const config = options.config ?? readAppConfig()
  const reportError = options.reportError ?? logReporter

  if (!hasOpenAiCredential(config)) {
    return FALLBACK_TEXTS.missingCredential
  }

  const fileName = recordingFileName(options.mimeType)
  try {
    const client = getOpenAiClient(config.apiKey)
    const file = await toFile(audio, fileName, options.mimeType ? { type: options.mimeType } : undefined)
    const result = await client.audio.transcriptions.create({ file, model: config.transcribeModel })
    const text = typeof result.text === 'string' ? result.text.trim() : ''
    logDiagnostic('log', 'transcription:completed', {
      model: config.transcribeModel,
      bytes: audio.byteLength,
      fileName,
      textLength: text.length,
    })
    return text
  } catch (error) {
    logDiagnostic('error', 'transcription:failed', {
      model: config.transcribeModel,
      bytes: audio.byteLength,
      error: serializeError(error),
    })
    reportError(formatTranscriptionError(describeError(error, 'unknown error')))
    return ''
  }
}
