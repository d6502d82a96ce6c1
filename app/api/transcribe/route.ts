import { NextResponse } from 'next/server'
import { jsonErrorResponse } from '@/lib/api-error'
import { transcribeAudio } from '@/lib/transcription'
import { logDiagnostic, serializeError } from '@/utils/diagnostics'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function POST(request: Request) {
  let form: FormData
  try {
    form = await request.formData()
  } catch (error) {
    logDiagnostic('log', 'transcribe:rejected', { reason: 'invalid_form', error: serializeError(error) })
    return NextResponse.json({ ok: false, message: 'Expected a multipart form with an audio file' }, { status: 400 })
  }

  const audio = form.get('audio')
  if (!(audio instanceof Blob) || audio.size === 0) {
    logDiagnostic('log', 'transcribe:rejected', { reason: 'missing_audio' })
    return NextResponse.json({ ok: false, message: 'Missing audio recording' }, { status: 400 })
  }

  try {
    const bytes = new Uint8Array(await audio.arrayBuffer())
    const reported: string[] = []
    const text = await transcribeAudio(bytes, {
      mimeType: audio.type || undefined,
      reportError: (message) => {
        reported.push(message)
      },
    })
    return NextResponse.json({ ok: true, text, error: reported[0] ?? null })
  } catch (error) {
    return jsonErrorResponse(error, 'transcription_failed', 500)
  }
}
