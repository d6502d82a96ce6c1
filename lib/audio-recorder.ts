import type { RecordingBuffer } from '@/lib/session-state'

const SUPPORTED_MIME_TYPES = [
  'audio/webm;codecs=opus',
  'audio/webm',
  'audio/ogg;codecs=opus',
  'audio/ogg',
  'audio/mp4',
]

export class AudioRecorder {
  private micStream: MediaStream | null = null
  private recorder: MediaRecorder | null = null
  private chunks: Blob[] = []
  private mimeType: string = 'audio/webm'

  get isRecording(): boolean {
    return this.recorder?.state === 'recording'
  }

  async start(): Promise<void> {
    if (typeof window === 'undefined') throw new Error('AudioRecorder unavailable')
    if (this.isRecording) return

    const stream = await navigator.mediaDevices.getUserMedia({ audio: true })
    const supportedMime = SUPPORTED_MIME_TYPES.find((candidate) => {
      try {
        return MediaRecorder.isTypeSupported(candidate)
      } catch {
        return false
      }
    })

    const recorder = supportedMime ? new MediaRecorder(stream, { mimeType: supportedMime }) : new MediaRecorder(stream)

    this.micStream = stream
    this.recorder = recorder
    this.mimeType = supportedMime || recorder.mimeType || 'audio/webm'
    this.chunks = []

    recorder.ondataavailable = (event) => {
      if (event.data && event.data.size) {
        this.chunks.push(event.data)
      }
    }

    recorder.start()
  }

  /** Resolves with the captured audio, or null when nothing was recorded. */
  async stop(): Promise<RecordingBuffer | null> {
    const recorder = this.recorder
    if (!recorder) throw new Error('Recorder not started')

    if (recorder.state === 'inactive') {
      this.cleanup()
      return null
    }

    const blob = await new Promise<Blob>((resolve, reject) => {
      recorder.onstop = () => resolve(new Blob(this.chunks, { type: this.mimeType }))
      try {
        recorder.stop()
      } catch (err) {
        reject(err instanceof Error ? err : new Error('stop_failed'))
      }
    }).finally(() => this.cleanup())

    if (!blob.size) return null
    return { bytes: new Uint8Array(await blob.arrayBuffer()), mimeType: blob.type || this.mimeType }
  }

  cancel() {
    if (this.recorder && this.recorder.state !== 'inactive') {
      try {
        this.recorder.stop()
      } catch (err) {
        console.error('[audio-recorder] stop during cancel failed', err)
      }
    }
    this.cleanup()
  }

  private cleanup() {
    if (this.micStream) {
      this.micStream.getTracks().forEach((track) => track.stop())
    }
    this.micStream = null
    this.recorder = null
    this.chunks = []
  }
}

export function createAudioRecorder() {
  return new AudioRecorder()
}
