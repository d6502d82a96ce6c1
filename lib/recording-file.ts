const EXTENSION_BY_MIME: Record<string, string> = {
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/wave': 'wav',
  'audio/webm': 'webm',
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
}

export function recordingFileName(mimeType?: string | null): string {
  const base = (mimeType ?? '').split(';')[0]?.trim().toLowerCase() ?? ''
  return `recording.${EXTENSION_BY_MIME[base] ?? 'wav'}`
}
