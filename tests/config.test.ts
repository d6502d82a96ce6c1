import { afterEach, describe, expect, it, vi } from 'vitest'
import { hasOpenAiCredential, readAppConfig } from '@/lib/config'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('readAppConfig', () => {
  it('applies defaults when nothing is set', () => {
    expect(readAppConfig({})).toEqual({
      apiKey: null,
      transcribeModel: 'whisper-1',
      adviceModel: 'gpt-4',
      adviceTemperature: 0.7,
    })
  })

  it('treats a blank key as missing', () => {
    const config = readAppConfig({ OPENAI_API_KEY: '   ' })
    expect(config.apiKey).toBeNull()
    expect(hasOpenAiCredential(config)).toBe(false)
  })

  it('reads trimmed overrides', () => {
    const config = readAppConfig({
      OPENAI_API_KEY: ' test-secret ',
      OPENAI_TRANSCRIBE_MODEL: ' whisper-1 ',
      OPENAI_ADVICE_MODEL: 'gpt-4o',
      OPENAI_ADVICE_TEMPERATURE: '0.25',
    })
    expect(config).toEqual({
      apiKey: 'test-secret',
      transcribeModel: 'whisper-1',
      adviceModel: 'gpt-4o',
      adviceTemperature: 0.25,
    })
    expect(hasOpenAiCredential(config)).toBe(true)
  })

  it('falls back to the default temperature when the value is invalid and keeps the key', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})

    expect(readAppConfig({ OPENAI_API_KEY: 'test-secret', OPENAI_ADVICE_TEMPERATURE: 'warm' })).toEqual({
      apiKey: 'test-secret',
      transcribeModel: 'whisper-1',
      adviceModel: 'gpt-4',
      adviceTemperature: 0.7,
    })
    expect(readAppConfig({ OPENAI_ADVICE_TEMPERATURE: '5' }).adviceTemperature).toBe(0.7)

    const invalidLog = errorSpy.mock.calls.find((call) => call[2] === 'config:invalid')
    expect(invalidLog?.[0]).toBe('[diagnostic]')
  })
})
