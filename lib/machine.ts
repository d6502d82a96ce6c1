'use client'
import { create } from 'zustand'
import { FALLBACK_TEXTS, formatTranscriptionError } from '@/lib/fallback-texts'
import { httpGateways, type SessionGateways } from '@/lib/gateway-client'
import {
  applySessionEvent,
  createSessionState,
  needsTranscription,
  sessionShape,
  type RecordingBuffer,
  type SessionEvent,
  type SessionShape,
  type SessionState,
} from '@/lib/session-state'
import type { SessionNotice, SessionNoticeKind } from '@/types/error-types'
import { describeError } from '@/utils/diagnostics'

type Busy = 'checking' | 'transcribing' | 'advising' | null

type Store = {
  session: SessionState
  shape: SessionShape
  configured: boolean | null
  busy: Busy
  advice: string | null
  adviceRequest: number
  notices: SessionNotice[]
  debugLog: string[]
  initialize: () => Promise<void>
  recordAudio: (recording: RecordingBuffer) => Promise<void>
  requestAdvice: () => Promise<void>
  clear: () => void
}

const DEBUG_LOG_LIMIT = 50

function withNotice(notices: SessionNotice[], notice: SessionNotice): SessionNotice[] {
  return [...notices.filter((existing) => existing.kind !== notice.kind), notice]
}

function withoutNotices(notices: SessionNotice[], kinds: SessionNoticeKind[]): SessionNotice[] {
  return notices.filter((notice) => !kinds.includes(notice.kind))
}

export function createSessionMachine(gateways: SessionGateways) {
  return create<Store>((set, get) => {
    const push = (message: string) =>
      set((current) => ({ debugLog: [...current.debugLog, message].slice(-DEBUG_LOG_LIMIT) }))

    const dispatch = (event: SessionEvent) => {
      const session = applySessionEvent(get().session, event)
      if (session !== get().session) {
        set({ session, shape: sessionShape(session) })
      }
      return session
    }

    const notify = (notice: SessionNotice) => set((current) => ({ notices: withNotice(current.notices, notice) }))

    const reportMissingConfiguration = () =>
      notify({
        kind: 'configuration_missing',
        level: 'error',
        message: FALLBACK_TEXTS.missingCredentialNotice,
      })

    const transcribeCurrent = async () => {
      const { session, configured } = get()
      const recording = session.recording
      if (configured !== true || !recording || !needsTranscription(session)) return

      const generation = session.generation
      dispatch({ type: 'transcriptionStarted', generation })
      set({ busy: 'transcribing' })
      push(`Transcribing recording #${generation}`)

      let event: SessionEvent
      let failure: string | null = null
      try {
        const reply = await gateways.transcribe(recording)
        event = { type: 'transcribed', generation, text: reply.text }
        failure = reply.error
      } catch (error) {
        event = { type: 'transcriptionFailed', generation }
        failure = formatTranscriptionError(describeError(error, 'request failed'))
      }

      if (get().session.generation !== generation) {
        push(`Discarded transcription for superseded recording #${generation}`)
        return
      }

      const next = dispatch(event)
      set({ busy: null })
      if (failure) {
        notify({ kind: 'transcription_failure', level: 'error', message: failure })
        push(`Transcription failed → ${sessionShape(next)}`)
      } else {
        push(`Transcription settled → ${sessionShape(next)}`)
      }
    }

    return {
      session: createSessionState(),
      shape: 'idle',
      configured: null,
      busy: null,
      advice: null,
      adviceRequest: 0,
      notices: [],
      debugLog: ['Ready'],
      initialize: async () => {
        if (get().configured !== null || get().busy === 'checking') return
        set({ busy: 'checking' })
        let configured = false
        let checkFailed = false
        try {
          configured = await gateways.checkConfiguration()
        } catch (error) {
          checkFailed = true
          push(`Configuration check failed: ${describeError(error, FALLBACK_TEXTS.healthCheckFailed)}`)
        }
        set({ configured, busy: get().busy === 'checking' ? null : get().busy })
        if (!configured) {
          if (checkFailed) {
            notify({ kind: 'configuration_missing', level: 'error', message: FALLBACK_TEXTS.healthCheckFailed })
          } else {
            reportMissingConfiguration()
          }
          push('Configuration missing → gateways disabled')
          return
        }
        push('Configuration ok')
        await transcribeCurrent()
      },
      recordAudio: async (recording) => {
        const before = get().session
        const session = dispatch({ type: 'recorded', recording })
        if (session === before) return
        set((current) => ({
          advice: null,
          busy: current.busy === 'transcribing' ? null : current.busy,
          notices: withoutNotices(current.notices, ['transcription_failure', 'advice_failure', 'empty_transcript']),
        }))
        push(`New recording #${session.generation} (${recording.bytes.byteLength} bytes) → recorded`)
        await transcribeCurrent()
      },
      requestAdvice: async () => {
        const { session, configured, busy } = get()
        if (busy === 'advising') return
        if (!session.transcript) {
          notify({ kind: 'empty_transcript', level: 'warning', message: FALLBACK_TEXTS.emptyTranscript })
          push('Advice requested without transcript')
          return
        }
        if (configured === null) return
        if (!configured) {
          reportMissingConfiguration()
          return
        }

        const generation = session.generation
        const request = get().adviceRequest + 1
        set((current) => ({
          adviceRequest: request,
          busy: 'advising',
          notices: withoutNotices(current.notices, ['advice_failure', 'empty_transcript']),
        }))
        push('Generating advice')

        let advice: string
        try {
          advice = await gateways.advise(session.transcript)
        } catch (error) {
          advice = FALLBACK_TEXTS.adviceError
          notify({ kind: 'advice_failure', level: 'error', message: describeError(error, FALLBACK_TEXTS.adviceError) })
        }

        // a newer request owns the busy flag now
        if (get().adviceRequest !== request) {
          push('Discarded advice for superseded request')
          return
        }
        if (get().session.generation !== generation) {
          push('Discarded advice for superseded transcript')
          if (get().busy === 'advising') set({ busy: null })
          return
        }
        set({ advice, busy: null })
        push('Advice ready')
      },
      clear: () => {
        dispatch({ type: 'cleared' })
        set((current) => ({
          advice: null,
          busy: current.busy === 'checking' ? current.busy : null,
          notices: current.notices.filter((notice) => notice.kind === 'configuration_missing'),
        }))
        push('Cleared → idle')
      },
    }
  })
}

export const useSessionMachine = createSessionMachine(httpGateways)
