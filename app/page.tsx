"use client"
import { useCallback, useEffect, useRef, useState } from 'react'
import { createAudioRecorder, type AudioRecorder } from '@/lib/audio-recorder'
import { useSessionMachine } from '@/lib/machine'

const BUSY_LABELS = {
  checking: 'Checking configuration...',
  transcribing: 'Transcribing...',
  advising: 'Generating advice...',
} as const

export default function Home() {
  const transcript = useSessionMachine((state) => state.session.transcript)
  const shape = useSessionMachine((state) => state.shape)
  const configured = useSessionMachine((state) => state.configured)
  const busy = useSessionMachine((state) => state.busy)
  const advice = useSessionMachine((state) => state.advice)
  const notices = useSessionMachine((state) => state.notices)
  const debugLog = useSessionMachine((state) => state.debugLog)
  const initialize = useSessionMachine((state) => state.initialize)
  const recordAudio = useSessionMachine((state) => state.recordAudio)
  const requestAdvice = useSessionMachine((state) => state.requestAdvice)
  const clear = useSessionMachine((state) => state.clear)

  const recorderRef = useRef<AudioRecorder | null>(null)
  const [recording, setRecording] = useState(false)
  const [micError, setMicError] = useState<string | null>(null)

  useEffect(() => {
    void initialize()
  }, [initialize])

  useEffect(() => {
    return () => {
      recorderRef.current?.cancel()
      recorderRef.current = null
    }
  }, [])

  const toggleRecording = useCallback(async () => {
    setMicError(null)
    try {
      if (!recording) {
        const recorder = recorderRef.current ?? createAudioRecorder()
        recorderRef.current = recorder
        await recorder.start()
        setRecording(true)
        return
      }
      const recorder = recorderRef.current
      setRecording(false)
      if (!recorder) return
      const captured = await recorder.stop()
      if (captured) {
        await recordAudio(captured)
      }
    } catch (err) {
      setRecording(false)
      recorderRef.current?.cancel()
      setMicError(err instanceof Error ? err.message : 'Microphone unavailable')
    }
  }, [recording, recordAudio])

  const handleClear = useCallback(() => {
    if (recording) {
      recorderRef.current?.cancel()
      setRecording(false)
    }
    clear()
  }, [clear, recording])

  const adviceDisabled = configured !== true || busy === 'advising' || busy === 'transcribing'
  const lastLog = debugLog[debugLog.length - 1] ?? ''

  return (
    <main className="consult">
      <h2 className="consult-title">Speech to Text</h2>
      <p className="consult-caption">Click the microphone button to record audio.</p>

      {notices.map((notice) => (
        <div key={notice.kind} className={`notice notice-${notice.level}`} role="alert">
          {notice.message}
        </div>
      ))}
      {micError ? (
        <div className="notice notice-error" role="alert">
          {micError}
        </div>
      ) : null}

      <button
        type="button"
        className={recording ? 'mic-button recording' : 'mic-button'}
        onClick={() => void toggleRecording()}
        disabled={busy === 'transcribing'}
        aria-pressed={recording}
      >
        {recording ? '■ Stop recording' : '🎙 Start recording'}
      </button>

      {busy ? <p className="busy-indicator">{BUSY_LABELS[busy]}</p> : null}

      <label className="transcript-label" htmlFor="transcript">
        Transcript
      </label>
      <textarea id="transcript" className="transcript" value={transcript} readOnly rows={8} />

      <div className="actions">
        <button type="button" className="primary" onClick={() => void requestAdvice()} disabled={adviceDisabled}>
          Get Medical Advice
        </button>
        <button type="button" className="secondary" onClick={handleClear}>
          Clear
        </button>
      </div>

      {advice !== null ? (
        <section className="advice">
          <h3>Medical Advice</h3>
          <div className="advice-body">{advice}</div>
        </section>
      ) : null}

      <footer className="status-line" data-shape={shape}>
        {lastLog}
      </footer>
    </main>
  )
}
