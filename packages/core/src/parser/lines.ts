// =============================================================================
// SongSketch - Section Body Line Classification
// =============================================================================

/**
 * The kinds of line that can appear inside a section block.
 */
export type SectionLine =
  | { kind: 'drums'; pattern: string }
  | { kind: 'instrument'; word: string; pattern: string }
  | { kind: 'header'; field: HeaderField }
  | { kind: 'unrecognized'; text: string }

export type HeaderField = 'SONG' | 'TEMPO' | 'KEY'

const LABELLED_LINE = /^(\w+)\s*:\s*(.+)/

const HEADER_FIELDS: readonly HeaderField[] = ['SONG', 'TEMPO', 'KEY']

function isHeaderField(word: string): word is HeaderField {
  return HEADER_FIELDS.some(field => field === word)
}

/**
 * Classify one trimmed section body line by its `<word>:` label.
 */
export function classifyLine(line: string): SectionLine {
  const match = LABELLED_LINE.exec(line)
  if (!match) {
    return { kind: 'unrecognized', text: line }
  }

  const word = match[1]
  const label = word.toUpperCase()
  const pattern = match[2]

  if (label === 'DRUMS') {
    return { kind: 'drums', pattern }
  }
  if (isHeaderField(label)) {
    return { kind: 'header', field: label }
  }
  return { kind: 'instrument', word, pattern }
}
