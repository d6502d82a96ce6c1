import { NextResponse } from 'next/server'

import { logDiagnostic } from '@/utils/diagnostics'

type MaybeError = {
  status?: unknown
  statusCode?: unknown
  message?: unknown
  stack?: unknown
  code?: unknown
  response?: unknown
  [key: string]: unknown
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}

function extractStatus(error: MaybeError, fallback?: number): number {
  const response = isRecord(error.response) ? error.response : undefined
  const candidates = [fallback, error.status, error.statusCode, response?.status, response?.statusCode]
  for (const candidate of candidates) {
    if (typeof candidate === 'number' && Number.isFinite(candidate) && candidate >= 400) {
      return candidate
    }
  }
  return 500
}

function extractMessage(error: MaybeError, fallback: string): string {
  if (typeof error.message === 'string' && error.message.trim().length) {
    return error.message
  }
  return fallback
}

export function jsonErrorResponse(error: unknown, fallbackMessage: string, fallbackStatus?: number) {
  const err: MaybeError = isRecord(error) ? error : {}
  const status = extractStatus(err, fallbackStatus)
  const message = extractMessage(err, fallbackMessage)
  const payload: Record<string, unknown> = {
    ok: false,
    message,
  }
  if (typeof err.code === 'string' && err.code.length) {
    payload.code = err.code
  }

  logDiagnostic('error', 'json-error-response', {
    note: 'Responding with structured error payload',
    status,
    message,
    error:
      error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : Object.keys(err).length
        ? err
        : { message: fallbackMessage },
  })

  return NextResponse.json(payload, { status })
}
