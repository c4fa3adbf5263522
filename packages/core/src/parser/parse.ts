// =============================================================================
// SongSketch - DSL Parser
// =============================================================================

import type { DrumTrack, InstrumentTrack, ParseResult, Score, Section } from '../score/types'
import {
  DEFAULT_KEY,
  DEFAULT_SECTION_BARS,
  DEFAULT_TEMPO,
  DEFAULT_TITLE,
  assignStartBars,
  createDrumTrack,
  createInstrumentTrack,
  createScore,
  createSection
} from '../score/score'
import { DEFAULT_TABLES, PERCUSSION, lookupProgram, type MusicTables } from '../tables'
import { clean, normalize } from './normalize'
import { classifyLine } from './lines'
import { parseDrumPattern, parsePitchedPattern } from './patterns'

export interface DslParserOptions {
  /** Lookup tables; defaults to the built-in General MIDI set */
  tables?: MusicTables
  /** Print progress lines to the console */
  debug?: boolean
}

const TITLE_FIELD = /SONG:\s*(.+?)(?:\n|$)/i
const TEMPO_FIELD = /TEMPO:\s*(\d+)/i
const KEY_FIELD = /KEY:\s*([A-Ga-g][#b]?m?)/i

const SECTION_SPLIT = /(?=SECTION:)/i
const SECTION_NAME = /SECTION:\s*(.+?)(?:\s*[\[\(]|$)/i
const SECTION_BARS = /(\d+)\s*bars?/i

const DEFAULT_SECTION_NAME = 'Section'

export const NO_CONTENT_ERROR = 'No DSL content found'
export const NO_SECTIONS_ERROR = 'No SECTION blocks found'

/**
 * Title-case a word: first letter of every letter run uppercased, the rest lowercased.
 * 'PIANO' -> 'Piano', 'FRENCH_HORN' -> 'French_Horn'
 */
export function titleCase(word: string): string {
  let out = ''
  let previousIsLetter = false
  for (const ch of word.toLowerCase()) {
    const isLetter = ch.toUpperCase() !== ch.toLowerCase()
    out += isLetter && !previousIsLetter ? ch.toUpperCase() : ch
    previousIsLetter = isLetter
  }
  return out
}

/**
 * Mutable diagnostics for one parse call. Created per call and returned, never kept.
 */
interface ParseContext {
  errors: string[]
  warnings: string[]
}

/**
 * Parses song DSL text into a Score.
 *
 * The parser holds only configuration, so one instance can serve any number of
 * concurrent calls.
 *
 * @example
 * ```typescript
 * const parser = new DslParser({ debug: true })
 * const { score, errors, warnings } = parser.parse(text)
 * ```
 */
export class DslParser {
  private readonly tables: MusicTables
  private readonly debug: boolean

  constructor(options: DslParserOptions = {}) {
    this.tables = options.tables ?? DEFAULT_TABLES
    this.debug = options.debug ?? false
  }

  /**
   * Parse DSL text. Malformed content never throws; it lands in `errors` or `warnings`.
   */
  parse(text: string): ParseResult {
    const ctx: ParseContext = { errors: [], warnings: [] }

    const repaired = normalize(text)
    this.log(`Newlines after repair: ${repaired.split('\n').length - 1}`)

    const cleaned = clean(repaired)
    this.log(`Cleaned:\n${cleaned.slice(0, 500)}...`)

    if (!cleaned.trim()) {
      ctx.errors.push(NO_CONTENT_ERROR)
      return { errors: ctx.errors, warnings: ctx.warnings }
    }

    const score = this.parseHeader(cleaned, ctx)

    for (const block of cleaned.split(SECTION_SPLIT)) {
      if (!block.toUpperCase().includes('SECTION:')) continue

      const section = this.parseSection(block, score, ctx)
      score.sections.push(section)
      this.log(`Section: ${section.name}, ${section.tracks.length} tracks`)
    }

    if (score.sections.length === 0) {
      ctx.errors.push(NO_SECTIONS_ERROR)
      return { errors: ctx.errors, warnings: ctx.warnings }
    }

    assignStartBars(score.sections)
    return { score, errors: ctx.errors, warnings: ctx.warnings }
  }

  // ===========================================================================
  // Header
  // ===========================================================================

  private parseHeader(cleaned: string, ctx: ParseContext): Score {
    const title = TITLE_FIELD.exec(cleaned)?.[1].trim() || DEFAULT_TITLE
    const key = KEY_FIELD.exec(cleaned)?.[1] ?? DEFAULT_KEY

    let tempo = DEFAULT_TEMPO
    const tempoMatch = TEMPO_FIELD.exec(cleaned)
    if (tempoMatch) {
      const declared = parseInt(tempoMatch[1], 10)
      if (declared > 0) {
        tempo = declared
      } else {
        ctx.warnings.push(`Tempo ${tempoMatch[1]} is not playable, using ${DEFAULT_TEMPO}`)
      }
    }

    return createScore({ title, tempo, key })
  }

  // ===========================================================================
  // Sections
  // ===========================================================================

  private parseSection(block: string, score: Score, ctx: ParseContext): Section {
    const [header, ...body] = block.trim().split('\n')

    const name = SECTION_NAME.exec(header)?.[1].trim() || DEFAULT_SECTION_NAME

    let bars = DEFAULT_SECTION_BARS
    const barsMatch = SECTION_BARS.exec(header)
    if (barsMatch) {
      const declared = parseInt(barsMatch[1], 10)
      if (declared > 0) {
        bars = declared
      } else {
        ctx.warnings.push(`Section "${name}" declares ${declared} bars, using ${DEFAULT_SECTION_BARS}`)
      }
    }

    const section = createSection(name, bars, { key: score.key, tempo: score.tempo })

    for (const raw of body) {
      const text = raw.trim()
      if (!text) continue

      const line = classifyLine(text)
      switch (line.kind) {
        case 'drums':
          section.drums = this.parseDrums(line.pattern, section, ctx)
          break
        case 'instrument': {
          const track = this.parseTrack(line.word, line.pattern, section, ctx)
          if (track) section.tracks.push(track)
          break
        }
        case 'header':
          // Already read from the whole text
          break
        case 'unrecognized':
          break
      }
    }

    if (section.tracks.length === 0 && section.drums === undefined) {
      ctx.warnings.push(`Section "${name}" has no tracks`)
    }

    return section
  }

  private parseTrack(word: string, pattern: string, section: Section, ctx: ParseContext): InstrumentTrack | null {
    const instrument = word.toLowerCase()
    const name = titleCase(word)

    if (lookupProgram(instrument, this.tables) === PERCUSSION) {
      ctx.warnings.push(`Section "${section.name}": ${name} is a percussion instrument, use a DRUMS line`)
      return null
    }

    const { notes, chords, barsUsed } = parsePitchedPattern(pattern, this.tables)
    if (barsUsed > section.bars) {
      ctx.warnings.push(`Section "${section.name}": ${name} pattern spans ${barsUsed} bars, section has ${section.bars}`)
    }

    return createInstrumentTrack(name, instrument, { notes, chords })
  }

  /**
   * Several DRUMS lines in one section feed the same drum track.
   */
  private parseDrums(pattern: string, section: Section, ctx: ParseContext): DrumTrack {
    const drums = section.drums ?? createDrumTrack()
    const { hits, barsUsed } = parseDrumPattern(pattern)

    if (barsUsed > section.bars) {
      ctx.warnings.push(`Section "${section.name}": drum pattern spans ${barsUsed} bars, section has ${section.bars}`)
    }

    drums.hits.push(...hits)
    return drums
  }

  private log(message: string): void {
    if (this.debug) {
      console.log(`[parser] ${message}`)
    }
  }
}

/**
 * Parse DSL text with a one-off parser.
 */
export function parseSong(text: string, options: DslParserOptions = {}): ParseResult {
  return new DslParser(options).parse(text)
}
