// =============================================================================
// SongSketch - Pattern Parsing
// =============================================================================

import type { Chord, DrumHit, Note } from '../score/types'
import { BEATS_PER_BAR, DEFAULT_NOTE_VELOCITY } from '../score/score'
import type { MusicTables } from '../tables'
import { parseNoteToken } from '../theory/pitch'
import { parseChordSymbol } from '../theory/chord'

/** `<token>(<params>)` where the token starts with a pitch letter */
const PITCHED_ENTRY = /([A-Ga-g][#b]?\w*)\s*\(([^)]+)\)/g

/** `<drum>(<beats>)` */
const DRUM_ENTRY = /(\w+)\s*\(([^)]+)\)/g

const BEAT_NUMBER = /^\d+(?:\.\d+)?$/

const DEFAULT_DURATION = 1.0

const REST = '_'

export interface PitchedPattern {
  notes: Note[]
  chords: Chord[]
  /** Number of bars the pattern reaches, up to its last non-rest slot */
  barsUsed: number
}

export interface DrumPattern {
  hits: DrumHit[]
  barsUsed: number
}

function isRest(slot: string): boolean {
  return slot === '' || slot === REST
}

/**
 * Read duration and dynamics codes from an entry's parameter list.
 * Unknown codes are ignored.
 */
export function parseParams(params: string, tables: MusicTables): { duration: number; velocity: number } {
  let duration = DEFAULT_DURATION
  let velocity = DEFAULT_NOTE_VELOCITY

  for (const raw of params.split(',')) {
    const code = raw.trim().toLowerCase()
    const beats = tables.durations.get(code)
    if (beats !== undefined) {
      duration = beats
      continue
    }
    const dynamic = tables.dynamics.get(code)
    if (dynamic !== undefined) {
      velocity = dynamic
    }
  }

  return { duration, velocity }
}

/**
 * Parse an instrument pattern: `|`-separated bar slots of notes and chords.
 *
 * The cursor advances one 4/4 bar per slot whatever the slot holds. Entries
 * within a slot are laid out back to back from the slot's first beat.
 */
export function parsePitchedPattern(pattern: string, tables: MusicTables): PitchedPattern {
  const notes: Note[] = []
  const chords: Chord[] = []
  let barsUsed = 0
  let beat = 0

  pattern.split('|').forEach((rawSlot, index) => {
    const slot = rawSlot.trim()
    const barStart = beat
    beat += BEATS_PER_BAR
    if (isRest(slot)) return

    let offset = 0
    for (const [, token, params] of slot.matchAll(PITCHED_ENTRY)) {
      const { duration, velocity } = parseParams(params, tables)
      const start = barStart + offset

      const note = parseNoteToken(token, tables)
      if (note) {
        notes.push({ pitch: note.pitch, start, duration, velocity })
      } else {
        const { root, quality, octave } = parseChordSymbol(token, tables)
        chords.push({ root, quality, octave, start, duration, velocity })
      }

      offset += duration
      barsUsed = index + 1
    }
  })

  return { notes, chords, barsUsed }
}

/**
 * Expand a drum slot's beat argument into offsets and a velocity.
 * Returns null for arguments that are neither a keyword nor a clean list of beat numbers.
 */
function expandBeats(argument: string): { offsets: number[]; velocity: number } | null {
  const arg = argument.trim().toLowerCase()

  if (arg === '8ths' || arg === 'eighths') {
    return { offsets: Array.from({ length: 8 }, (_, i) => i * 0.5), velocity: 0.7 }
  }
  if (arg === '16ths' || arg === 'sixteenths') {
    return { offsets: Array.from({ length: 16 }, (_, i) => i * 0.25), velocity: 0.6 }
  }

  const entries = arg.split(',').map(entry => entry.trim()).filter(entry => entry !== '')
  const beats: number[] = []
  for (const entry of entries) {
    if (!BEAT_NUMBER.test(entry)) return null
    const value = parseFloat(entry)
    if (value < 1) return null
    beats.push(value - 1)
  }
  return { offsets: beats, velocity: 0.8 }
}

/**
 * Parse a drum pattern. A slot's index fixes its bar, so rests need not be spelled out.
 */
export function parseDrumPattern(pattern: string): DrumPattern {
  const hits: DrumHit[] = []
  let barsUsed = 0

  pattern.split('|').forEach((rawSlot, index) => {
    const slot = rawSlot.trim()
    if (isRest(slot)) return

    const barStart = index * BEATS_PER_BAR
    for (const [, name, argument] of slot.matchAll(DRUM_ENTRY)) {
      const expanded = expandBeats(argument)
      if (!expanded) continue

      const drum = name.toLowerCase()
      for (const offset of expanded.offsets) {
        hits.push({ drum, start: barStart + offset, velocity: expanded.velocity })
      }
      if (expanded.offsets.length > 0) barsUsed = index + 1
    }
  })

  return { hits, barsUsed }
}
