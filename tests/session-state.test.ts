import { describe, expect, it } from 'vitest'
import {
  applySessionEvent,
  createSessionState,
  needsTranscription,
  sameAudio,
  sessionShape,
  type RecordingBuffer,
  type SessionState,
} from '@/lib/session-state'

function recording(...bytes: number[]): RecordingBuffer {
  return { bytes: Uint8Array.from(bytes), mimeType: 'audio/wav' }
}

function transcribed(state: SessionState, text: string): SessionState {
  const started = applySessionEvent(state, { type: 'transcriptionStarted', generation: state.generation })
  return applySessionEvent(started, { type: 'transcribed', generation: state.generation, text })
}

describe('sameAudio', () => {
  it('compares byte content rather than identity', () => {
    expect(sameAudio(Uint8Array.from([1, 2, 3]), Uint8Array.from([1, 2, 3]))).toBe(true)
    expect(sameAudio(Uint8Array.from([1, 2, 3]), Uint8Array.from([1, 2, 4]))).toBe(false)
    expect(sameAudio(Uint8Array.from([1, 2]), Uint8Array.from([1, 2, 3]))).toBe(false)
    expect(sameAudio(null, null)).toBe(true)
    expect(sameAudio(null, Uint8Array.from([1]))).toBe(false)
  })
})

describe('applySessionEvent', () => {
  it('starts idle', () => {
    const state = createSessionState()
    expect(sessionShape(state)).toBe('idle')
    expect(needsTranscription(state)).toBe(false)
  })

  it('moves idle → recorded on a new recording', () => {
    const state = applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(1, 2) })
    expect(sessionShape(state)).toBe('recorded')
    expect(state.generation).toBe(1)
    expect(state.transcript).toBe('')
    expect(needsTranscription(state)).toBe(true)
  })

  it('ignores an empty payload', () => {
    const initial = createSessionState()
    expect(applySessionEvent(initial, { type: 'recorded', recording: recording() })).toBe(initial)
  })

  it('ignores a recording identical to the stored one', () => {
    const first = transcribed(
      applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(7, 8, 9) }),
      'patient reports headache',
    )
    const again = applySessionEvent(first, { type: 'recorded', recording: recording(7, 8, 9) })
    expect(again).toBe(first)
    expect(again.transcript).toBe('patient reports headache')
  })

  it('resets the transcript when a different recording replaces a transcribed one', () => {
    const done = transcribed(
      applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(1) }),
      'patient reports headache',
    )
    expect(sessionShape(done)).toBe('transcribed')

    const next = applySessionEvent(done, { type: 'recorded', recording: recording(2) })
    expect(sessionShape(next)).toBe('recorded')
    expect(next.transcript).toBe('')
    expect(next.generation).toBe(done.generation + 1)
    expect(Array.from(next.recording?.bytes ?? [])).toEqual([2])
  })

  it('keeps the transcript empty immediately after every distinct recording', () => {
    let state = createSessionState()
    for (let i = 1; i <= 5; i += 1) {
      state = applySessionEvent(state, { type: 'recorded', recording: recording(i, i) })
      expect(state.transcript).toBe('')
      state = transcribed(state, `take ${i}`)
      expect(state.transcript).toBe(`take ${i}`)
    }
  })

  it('discards a transcription result from a superseded generation', () => {
    const a = applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(0xa) })
    const pendingA = applySessionEvent(a, { type: 'transcriptionStarted', generation: a.generation })
    const b = applySessionEvent(pendingA, { type: 'recorded', recording: recording(0xb) })

    const afterStale = applySessionEvent(b, { type: 'transcribed', generation: a.generation, text: 'from A' })
    expect(afterStale).toBe(b)
    expect(afterStale.transcript).toBe('')
    expect(needsTranscription(afterStale)).toBe(true)
  })

  it('settles an empty or failed transcription without asking for another attempt', () => {
    const recorded = applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(3) })
    const empty = applySessionEvent(recorded, { type: 'transcribed', generation: recorded.generation, text: '' })
    expect(sessionShape(empty)).toBe('recorded')
    expect(needsTranscription(empty)).toBe(false)

    const failed = applySessionEvent(recorded, { type: 'transcriptionFailed', generation: recorded.generation })
    expect(failed.transcript).toBe('')
    expect(failed.transcription).toBe('settled')
    expect(needsTranscription(failed)).toBe(false)
  })

  it('only marks a transcription pending once per generation', () => {
    const recorded = applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(4) })
    const pending = applySessionEvent(recorded, { type: 'transcriptionStarted', generation: recorded.generation })
    expect(pending.transcription).toBe('pending')
    expect(applySessionEvent(pending, { type: 'transcriptionStarted', generation: recorded.generation })).toBe(pending)
  })

  it('clears any state back to idle', () => {
    const done = transcribed(
      applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(5) }),
      'patient reports headache',
    )
    const cleared = applySessionEvent(done, { type: 'cleared' })
    expect(sessionShape(cleared)).toBe('idle')
    expect(cleared.recording).toBeNull()
    expect(cleared.transcript).toBe('')
    expect(cleared.generation).toBe(done.generation + 1)
  })

  it('leaves idle state unchanged when cleared again', () => {
    const idle = createSessionState()
    const once = applySessionEvent(idle, { type: 'cleared' })
    expect(once).toBe(idle)
    const twice = applySessionEvent(once, { type: 'cleared' })
    expect(twice).toEqual({ recording: null, transcript: '', generation: 0, transcription: 'none' })
  })

  it('drops a transcription that resolves after clear', () => {
    const recorded = applySessionEvent(createSessionState(), { type: 'recorded', recording: recording(6) })
    const pending = applySessionEvent(recorded, { type: 'transcriptionStarted', generation: recorded.generation })
    const cleared = applySessionEvent(pending, { type: 'cleared' })
    const late = applySessionEvent(cleared, { type: 'transcribed', generation: recorded.generation, text: 'late' })
    expect(late).toBe(cleared)
    expect(late.transcript).toBe('')
  })
})
