import { NextResponse } from 'next/server'
import { hasOpenAiCredential, readAppConfig } from '@/lib/config'

export const runtime = 'nodejs'
export const dynamic = 'force-dynamic'

export async function GET() {
  const config = readAppConfig()
  const env = {
    hasOpenAI: hasOpenAiCredential(config),
    transcribeModel: config.transcribeModel,
    adviceModel: config.adviceModel,
  }
  return NextResponse.json({ ok: true, env })
}
