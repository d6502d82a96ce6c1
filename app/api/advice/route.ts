import { NextResponse } from 'next/server'
import { z } from 'zod'
import { generateAdvice, inspectAdviceSections } from '@/lib/advice'
import { jsonErrorResponse } from '@/lib/api-error'
import { logDiagnostic, serializeError } from '@/utils/diagnostics'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

const schema = z.object({
  transcript: z.string().refine((value) => value.trim().length > 0, 'Transcript must not be empty'),
})

export async function POST(request: Request) {
  let body: unknown
  try {
    body = await request.json()
  } catch (error) {
    logDiagnostic('log', 'advice:rejected', { reason: 'invalid_json', error: serializeError(error) })
    return NextResponse.json({ ok: false, message: 'Expected a JSON body' }, { status: 400 })
  }

  const parsed = schema.safeParse(body)
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Invalid advice request'
    return NextResponse.json({ ok: false, message }, { status: 400 })
  }

  try {
    const advice = await generateAdvice(parsed.data.transcript)
    const sections = inspectAdviceSections(advice)
    if (sections.missing.length) {
      logDiagnostic('log', 'advice:sections-missing', { missing: sections.missing })
    }
    return NextResponse.json({ ok: true, advice, sections })
  } catch (error) {
    return jsonErrorResponse(error, 'advice_failed', 500)
  }
}
