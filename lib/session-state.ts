export type RecordingBuffer = {
  bytes: Uint8Array
  mimeType: string
}

export type TranscriptionStatus = 'none' | 'pending' | 'settled'

export type SessionState = {
  recording: RecordingBuffer | null
  transcript: string
  generation: number
  transcription: TranscriptionStatus
}

export type SessionShape = 'idle' | 'recorded' | 'transcribed'

export type SessionEvent =
  | { type: 'recorded'; recording: RecordingBuffer }
  | { type: 'transcriptionStarted'; generation: number }
  | { type: 'transcribed'; generation: number; text: string }
  | { type: 'transcriptionFailed'; generation: number }
  | { type: 'cleared' }

export function createSessionState(): SessionState {
  return { recording: null, transcript: '', generation: 0, transcription: 'none' }
}

export function sessionShape(state: SessionState): SessionShape {
  if (!state.recording) return 'idle'
  return state.transcript ? 'transcribed' : 'recorded'
}

export function sameAudio(a: Uint8Array | null | undefined, b: Uint8Array | null | undefined): boolean {
  if (!a || !b) return a === b
  if (a.byteLength !== b.byteLength) return false
  for (let i = 0; i < a.byteLength; i += 1) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/** True when the current recording still needs its one automatic transcription attempt. */
export function needsTranscription(state: SessionState): boolean {
  return state.recording !== null && !state.transcript && state.transcription === 'none'
}

export function applySessionEvent(state: SessionState, event: SessionEvent): SessionState {
  switch (event.type) {
    case 'recorded': {
      if (!event.recording.bytes.byteLength) return state
      if (state.recording && sameAudio(state.recording.bytes, event.recording.bytes)) return state
      return {
        recording: { bytes: event.recording.bytes, mimeType: event.recording.mimeType },
        transcript: '',
        generation: state.generation + 1,
        transcription: 'none',
      }
    }
    case 'transcriptionStarted': {
      if (event.generation !== state.generation || !needsTranscription(state)) return state
      return { ...state, transcription: 'pending' }
    }
    case 'transcribed': {
      if (event.generation !== state.generation || !state.recording) return state
      return { ...state, transcript: event.text, transcription: 'settled' }
    }
    case 'transcriptionFailed': {
      if (event.generation !== state.generation || !state.recording) return state
      return { ...state, transcript: '', transcription: 'settled' }
    }
    case 'cleared': {
      if (!state.recording && !state.transcript && state.transcription === 'none') return state
      return { recording: null, transcript: '', generation: state.generation + 1, transcription: 'none' }
    }
    default:
      return state
  }
}
