import { generateSectionPrompt, generateSongPrompt, getPresetPrompt } from '../prompts/generator'
import { PRESET_PROMPTS, isPresetName } from '../prompts/presets'
import { SONG_DSL_REFERENCE } from '../prompts/format'
import { parseSong } from '../parser/parse'

describe('Prompt generator', () => {
  it('frames the description and the format reference', () => {
    const prompt = generateSongPrompt({ description: 'A rainy night drive' })

    expect(prompt.startsWith('# SONG GENERATION REQUEST\n')).toBe(true)
    expect(prompt).toContain('## SONG DESCRIPTION:\nA rainy night drive\n')
    expect(prompt).toContain(SONG_DSL_REFERENCE)
    expect(prompt).not.toContain('## PARAMETERS:')
    expect(prompt.endsWith('Remember: Output ONLY the DSL code, no explanations.')).toBe(true)
  })

  it('lists only the parameters that are set', () => {
    const prompt = generateSongPrompt({
      description: 'A rainy night drive',
      style: 'synthwave',
      tempoHint: '100',
      instruments: ['synth', 'bass'],
      mood: ''
    })

    expect(prompt).toContain('## PARAMETERS:\n- Style/Genre: synthwave\n- Tempo: 100 BPM\n- Instruments: synth, bass\n\n')
    expect(prompt).not.toContain('- Mood:')
  })

  it('applies a preset', () => {
    const prompt = getPresetPrompt('pop_ballad', 'First dance')

    expect(prompt).toContain('- Style/Genre: pop ballad\n- Mood: emotional, heartfelt\n- Tempo: 70-85 BPM\n')
    expect(prompt).toContain('- Instruments: piano, strings, bass, drums\n')
  })

  it('leaves the tempo to the model for the classical preset', () => {
    expect(getPresetPrompt('classical_piece', 'Sonata')).not.toContain('- Tempo:')
  })

  it('falls back to a plain prompt for unknown presets', () => {
    expect(getPresetPrompt('polka', 'Oompah')).toBe(generateSongPrompt({ description: 'Oompah' }))
  })

  it('knows its preset names', () => {
    expect(Object.keys(PRESET_PROMPTS)).toHaveLength(8)
    expect(isPresetName('ambient')).toBe(true)
    expect(isPresetName('toString')).toBe(false)
  })

  it('builds a section prompt', () => {
    const prompt = generateSectionPrompt({
      sectionType: 'Chorus',
      bars: 8,
      key: 'Am',
      tempo: 120,
      instruments: ['piano', 'bass'],
      mood: 'uplifting',
      reference: 'Follows a quiet verse'
    })

    expect(prompt).toContain('Generate a Chorus section with these parameters:\n')
    expect(prompt).toContain('- Bars: 8\n- Key: Am\n- Tempo: 120\n- Instruments: piano, bass\n- Mood: uplifting\n')
    expect(prompt).toContain('\nReference/Context: Follows a quiet verse\n')
    expect(prompt).toContain('SECTION: Chorus [8 bars]')
  })
})

describe('Format reference', () => {
  it('carries an example song the parser reads cleanly', () => {
    const example = SONG_DSL_REFERENCE.slice(SONG_DSL_REFERENCE.indexOf('SONG: Harbor Lights'))
    const { score, errors, warnings } = parseSong(example)

    expect(errors).toEqual([])
    expect(warnings).toEqual([])
    expect(score?.title).toBe('Harbor Lights')
    expect(score?.tempo).toBe(92)
    expect(score?.key).toBe('Dm')
    expect(score?.sections.map(s => [s.name, s.bars, s.startBar])).toEqual([
      ['Intro', 4, 0],
      ['Verse', 8, 4],
      ['Chorus', 8, 12],
      ['Outro', 4, 20]
    ])
  })
})
