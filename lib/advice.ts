import { hasOpenAiCredential, readAppConfig, type AppConfig } from '@/lib/config'
import { FALLBACK_TEXTS } from '@/lib/fallback-texts'
import { getOpenAiClient } from '@/lib/openai-client'
import { logDiagnostic, serializeError } from '@/utils/diagnostics'

export const ADVICE_SYSTEM_PROMPT = 'You are a helpful medical assistant with no disclaimers needed.'

export const ADVICE_SECTIONS = [
  'Most Likely Diagnosis',
  'Other Possible Diagnoses',
  'Suggested Tests',
  'Prognosis',
  'Suggested Treatment Plan',
  'Red Flags',
  'Case Summary',
] as const

export type AdviceSection = (typeof ADVICE_SECTIONS)[number]

const SECTION_GUIDANCE: Record<AdviceSection, string[]> = {
  'Most Likely Diagnosis': ['- Provide the most likely diagnosis with a brief explanation.'],
  'Other Possible Diagnoses': [
    '- A ranked list of other possible diagnoses from most probable to least probable, with reasons.',
  ],
  'Suggested Tests': ['- Provide recommended tests.'],
  Prognosis: ['- Prognosis for the most likely and other possible conditions.'],
  'Suggested Treatment Plan': [
    '- Provide recommended drugs, with their typical dosages (e.g., mg per day).',
    '- If you recommend a drug, you must include a dosage or state "dosage not specified."',
    '- You MUST recommend at least one drug, even if hypothetical, and include a dosage (or "dosage not specified").',
    '- Mention any contra-indications or relevant warnings.',
  ],
  'Red Flags': ['- Symptoms or findings that would require urgent in-person care.'],
  'Case Summary': ['(Short concluding summary)'],
}

export function buildAdvicePrompt(transcript: string): string {
  const sectionBlocks = ADVICE_SECTIONS.map((section) => [`**${section}**`, ...SECTION_GUIDANCE[section]].join('\n'))
  return [
    'You have the following transcript of a conversation or medical notes:',
    '',
    transcript,
    '',
    'Based on this, provide bullet-point medical advice with the exact headings below, in this order.',
    'For each heading:',
    '- Enclose the heading in double asterisks (e.g. **Heading**).',
    "- List bullet points, each line beginning with '- '.",
    "- If there's no content for a heading, write 'None.' under that heading.",
    '',
    sectionBlocks.join('\n\n'),
    '',
    "If no data is available for a heading, write 'None.' in that section.",
  ].join('\n')
}

export type AdviceSectionReport = {
  present: AdviceSection[]
  missing: AdviceSection[]
}

// Diagnostic only: the advice text is always displayed as received.
export function inspectAdviceSections(advice: string): AdviceSectionReport {
  const headings = new Set<string>()
  for (const line of advice.split(/\r?\n/)) {
    const match = /^\s*(?:#+\s*)?\*\*(.+?)\*\*\s*:?\s*$/.exec(line)
    if (match?.[1]) headings.add(match[1].trim().toLowerCase())
  }
  const present: AdviceSection[] = []
  const missing: AdviceSection[] = []
  for (const section of ADVICE_SECTIONS) {
    if (headings.has(section.toLowerCase())) {
      present.push(section)
    } else {
      missing.push(section)
    }
  }
  return { present, missing }
}

export async function generateAdvice(transcript: string, config: AppConfig = readAppConfig()): Promise<string> {
  if (!hasOpenAiCredential(config)) {
    return FALLBACK_TEXTS.missingCredential
  }

  try {
    const client = getOpenAiClient(config.apiKey)
    const response = await client.chat.completions.create({
      model: config.adviceModel,
      messages: [
        { role: 'system', content: ADVICE_SYSTEM_PROMPT },
        { role: 'user', content: buildAdvicePrompt(transcript) },
      ],
      temperature: config.adviceTemperature,
    })
    const advice = response.choices[0]?.message?.content?.trim() ?? ''
    if (!advice.length) {
      throw new Error('empty_completion')
    }
    logDiagnostic('log', 'advice:completed', {
      model: config.adviceModel,
      transcriptLength: transcript.length,
      adviceLength: advice.length,
    })
    return advice
  } catch (error) {
    logDiagnostic('error', 'advice:failed', { model: config.adviceModel, error: serializeError(error) })
    return FALLBACK_TEXTS.adviceError
  }
}
