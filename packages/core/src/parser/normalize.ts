// =============================================================================
// SongSketch - Text Normalizer
// =============================================================================

/** Structural keywords that must start a line */
export const STRUCTURAL_KEYWORDS = ['SONG:', 'TEMPO:', 'KEY:', 'SECTION:'] as const

/** Instrument markers that start an indented track line */
export const INSTRUMENT_MARKERS = [
  'GUITAR', 'PIANO', 'BASS', 'DRUMS', 'STRINGS', 'PAD', 'LEAD',
  'SYNTH', 'ORGAN', 'BRASS', 'CHOIR', 'FLUTE', 'VIOLIN', 'CELLO'
] as const

export const SECTION_MARKER = 'SECTION:'

/** Below this many line breaks the text is treated as collapsed onto one line */
const ONE_LINE_THRESHOLD = 5

const KEYWORD_PATTERN = new RegExp(`(\\s+)(${STRUCTURAL_KEYWORDS.join('|')})`, 'gi')
const INSTRUMENT_PATTERN = new RegExp(`(\\s+)(${INSTRUMENT_MARKERS.join('|')}):`, 'gi')

const COMMENT_PREFIXES = ['#', '//', '*'] as const

function countNewlines(text: string): number {
  let count = 0
  for (const ch of text) {
    if (ch === '\n') count++
  }
  return count
}

/**
 * Recover line structure from text whose header and section keywords were
 * squashed onto one line.
 *
 * Line breaks are only ever inserted. A whitespace run that already holds a
 * line break is left untouched, so `normalize(normalize(x)) === normalize(x)`.
 */
export function normalize(raw: string): string {
  if (countNewlines(raw) >= ONE_LINE_THRESHOLD || !raw.toUpperCase().includes(SECTION_MARKER)) {
    return raw
  }

  return raw
    .replace(KEYWORD_PATTERN, (match: string, space: string, keyword: string) =>
      space.includes('\n') ? match : `${space}\n${keyword}`)
    .replace(INSTRUMENT_PATTERN, (match: string, space: string, marker: string) =>
      space.includes('\n') ? match : `${space}\n  ${marker}:`)
}

/**
 * Drop blank lines, code fences and comment lines; cut inline `//` comments.
 *
 * A comment line that still mentions SECTION is kept so a commented-out section
 * header keeps its structure.
 */
export function clean(text: string): string {
  const lines: string[] = []

  for (const line of text.split('\n')) {
    let s = line.trim()
    if (!s || s.startsWith('```')) continue

    if (COMMENT_PREFIXES.some(prefix => s.startsWith(prefix)) && !s.toUpperCase().includes('SECTION')) {
      continue
    }

    if (s.includes('//')) {
      s = s.split('//')[0].trim()
    }
    if (s) lines.push(s)
  }

  return lines.join('\n')
}
