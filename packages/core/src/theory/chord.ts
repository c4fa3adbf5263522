import type { Chord } from '../score/types'
import { DEFAULT_TABLES, type MusicTables } from '../tables'
import { clampPitch, normalizeNoteName, pitchOf } from './pitch'

const DEFAULT_CHORD_OCTAVE = 4

const CHORD_SYMBOL = /^([A-Ga-g])([#b]?)(\w*)$/

const MAJOR_TRIAD: readonly number[] = [0, 4, 7]

/** A 6 or 9 right after the letters of a quality is an added tone, never an octave */
const EXTENSION_SUFFIX = /(?:^|[a-z])[69]$/i

/**
 * Chord symbol split into its parts.
 */
export interface ChordSymbol {
  root: string
  quality: string
  octave: number
}

/**
 * Split a chord symbol such as `Am`, `F#maj7` or `Dm3` into root, quality and octave.
 *
 * A trailing digit counts as the octave only when the suffix including it is not a
 * known quality but the suffix without it is: `Am7` stays a minor seventh in octave 4,
 * `Am3` becomes A minor in octave 3. Sixths and ninths (`Am6`, `Em9`, `C6`) keep
 * their digit in the quality and stay in octave 4.
 */
export function parseChordSymbol(symbol: string, tables: MusicTables = DEFAULT_TABLES): ChordSymbol {
  const match = CHORD_SYMBOL.exec(symbol)
  if (!match) {
    return { root: 'C', quality: '', octave: DEFAULT_CHORD_OCTAVE }
  }

  const root = normalizeNoteName(match[1], match[2])
  const suffix = match[3]

  const lastChar = suffix.slice(-1)
  if (/^\d$/.test(lastChar) && !EXTENSION_SUFFIX.test(suffix)) {
    const withoutDigit = suffix.slice(0, -1)
    if (!isKnownQuality(suffix, tables) && isKnownQuality(withoutDigit, tables)) {
      return { root, quality: withoutDigit, octave: parseInt(lastChar, 10) }
    }
  }

  return { root, quality: suffix, octave: DEFAULT_CHORD_OCTAVE }
}

function isKnownQuality(quality: string, tables: MusicTables): boolean {
  return tables.chordIntervals.has(quality.toLowerCase())
}

/**
 * Interval set for a chord quality.
 *
 * Exact (case-insensitive) table hit first, then common alternative spellings,
 * then the major triad.
 */
export function resolveChordIntervals(quality: string, tables: MusicTables = DEFAULT_TABLES): readonly number[] {
  const q = quality.toLowerCase()

  const exact = tables.chordIntervals.get(q)
  if (exact) return exact

  if (q.includes('maj7')) return [0, 4, 7, 11]
  if (q.includes('maj')) return [0, 4, 7]
  if (q.includes('m7') || q.includes('min7')) return [0, 3, 7, 10]
  if (q.startsWith('m') || q.includes('min')) return [0, 3, 7]
  if (q.includes('sus4')) return [0, 5, 7]
  if (q.includes('sus2')) return [0, 2, 7]
  if (q.includes('dim7')) return [0, 3, 6, 9]
  if (q.includes('dim')) return [0, 3, 6]
  if (q.includes('aug')) return [0, 4, 8]
  if (q.includes('7')) return [0, 4, 7, 10]

  return MAJOR_TRIAD
}

/**
 * MIDI pitches of a chord, root first, clamped to 0-127.
 * Tones that land on the same pitch after clamping are sounded once.
 */
export function chordPitches(chord: Pick<Chord, 'root' | 'quality' | 'octave'>, tables: MusicTables = DEFAULT_TABLES): number[] {
  const rootPitch = pitchOf(chord.root, chord.octave, tables)
  const pitches = resolveChordIntervals(chord.quality, tables).map(interval => clampPitch(rootPitch + interval))
  return [...new Set(pitches)]
}
