// =============================================================================
// SongSketch - Prompt Generator
// =============================================================================

import { SONG_DSL_REFERENCE } from './format'
import { PRESET_PROMPTS, isPresetName } from './presets'

/**
 * Optional musical direction for a song prompt. Empty values are left out.
 */
export interface SongPromptParameters {
  /** Genre, e.g. 'jazz' */
  style?: string
  mood?: string
  /** BPM or BPM range, e.g. '120' or '70-85' */
  tempoHint?: string
  keyHint?: string
  timeSignature?: string
  /** Approximate length in bars */
  lengthBars?: string
  chordProgression?: string
  instruments?: string[]
  structureHint?: string
  durationHint?: string
}

export interface SongPromptRequest extends SongPromptParameters {
  description: string
}

export interface SectionPromptRequest {
  /** Section name, e.g. 'Chorus' */
  sectionType: string
  bars: number
  key: string
  tempo: number
  instruments: string[]
  mood?: string
  /** Surrounding material the section should fit */
  reference?: string
}

function parameterLines(params: SongPromptParameters): string[] {
  const lines: string[] = []
  if (params.style) lines.push(`- Style/Genre: ${params.style}`)
  if (params.mood) lines.push(`- Mood: ${params.mood}`)
  if (params.tempoHint) lines.push(`- Tempo: ${params.tempoHint} BPM`)
  if (params.keyHint) lines.push(`- Key: ${params.keyHint}`)
  if (params.timeSignature) lines.push(`- Time Signature: ${params.timeSignature}`)
  if (params.lengthBars) lines.push(`- Approximate Length: ${params.lengthBars} bars`)
  if (params.chordProgression) lines.push(`- Chord Progression: ${params.chordProgression}`)
  if (params.instruments && params.instruments.length > 0) lines.push(`- Instruments: ${params.instruments.join(', ')}`)
  if (params.structureHint) lines.push(`- Structure: ${params.structureHint}`)
  if (params.durationHint) lines.push(`- Duration: ${params.durationHint}`)
  return lines
}

/**
 * Build a prompt asking a language model for a complete song in the DSL.
 *
 * @example
 * ```typescript
 * const prompt = generateSongPrompt({ description: 'A rainy night drive', style: 'synthwave' })
 * ```
 */
export function generateSongPrompt(request: SongPromptRequest): string {
  const parts = [
    '# SONG GENERATION REQUEST',
    '',
    'Generate a complete song in the DSL format specified below.',
    'Output ONLY the DSL code - no explanations before or after.',
    '',
    '## SONG DESCRIPTION:',
    request.description,
    ''
  ]

  const params = parameterLines(request)
  if (params.length > 0) {
    parts.push('## PARAMETERS:', ...params, '')
  }

  parts.push(
    SONG_DSL_REFERENCE,
    '',
    '## YOUR OUTPUT:',
    'Generate the complete song now. Start with `SONG:` and include all sections.',
    'Remember: Output ONLY the DSL code, no explanations.'
  )

  return parts.join('\n')
}

/**
 * Build a prompt for regenerating a single section.
 */
export function generateSectionPrompt(request: SectionPromptRequest): string {
  const { sectionType, bars, key, tempo, instruments, mood, reference } = request

  let prompt = `# GENERATE SONG SECTION

Generate a ${sectionType} section with these parameters:
- Bars: ${bars}
- Key: ${key}
- Tempo: ${tempo}
- Instruments: ${instruments.join(', ')}
`
  if (mood) prompt += `- Mood: ${mood}\n`
  if (reference) prompt += `\nReference/Context: ${reference}\n`

  prompt += `
Output ONLY the section in this format:
\`\`\`
SECTION: ${sectionType} [${bars} bars]
  [instrument patterns...]
  DRUMS: [drum pattern]
\`\`\`

Use the DSL format with chords like \`Am(w)\`, \`F(h)\`, etc.
Durations: w=whole, h=half, q=quarter, e=eighth
Dynamics: pp, p, mp, mf, f, ff
`
  return prompt
}

/**
 * Song prompt with a preset's parameters. Unknown presets give a plain prompt.
 */
export function getPresetPrompt(presetName: string, description: string): string {
  if (!isPresetName(presetName)) {
    return generateSongPrompt({ description })
  }
  return generateSongPrompt({ ...PRESET_PROMPTS[presetName], description })
}
