import { DEFAULT_TABLES, type MusicTables } from '../tables'

/** Matches an octave-qualified note such as C4, F#3 or Bb5 (single octave digit) */
const NOTE_TOKEN = /^([A-Ga-g])([#b]?)(\d)$/

/**
 * Canonical spelling of a pitch class: uppercase letter, accidental as written.
 * 'bb' -> 'Bb', 'f#' -> 'F#'
 */
export function normalizeNoteName(letter: string, accidental: string = ''): string {
  return letter.toUpperCase() + accidental
}

/**
 * Semitone of a pitch class above C. Unknown names resolve to 0.
 */
export function noteSemitone(name: string, tables: MusicTables = DEFAULT_TABLES): number {
  const spelled = name.length > 0 ? normalizeNoteName(name[0], name.slice(1)) : name
  return tables.noteSemitones.get(spelled) ?? 0
}

/**
 * MIDI pitch of a pitch class in an octave. Octave 4's C is 60; octave -1 is the lowest.
 */
export function pitchOf(name: string, octave: number, tables: MusicTables = DEFAULT_TABLES): number {
  return noteSemitone(name, tables) + (octave + 1) * 12
}

/**
 * Parse an octave-qualified note token. Returns null for anything else
 * (chord symbols, multi-digit octaves, trailing text).
 */
export function parseNoteToken(
  token: string,
  tables: MusicTables = DEFAULT_TABLES
): { name: string; octave: number; pitch: number } | null {
  const match = NOTE_TOKEN.exec(token)
  if (!match) return null

  const name = normalizeNoteName(match[1], match[2])
  const octave = parseInt(match[3], 10)
  return { name, octave, pitch: pitchOf(name, octave, tables) }
}

export function clampPitch(pitch: number): number {
  return Math.max(0, Math.min(127, pitch))
}

/**
 * Convert a normalized velocity (0-1) to the MIDI range, truncating like an integer cast.
 */
export function toMidiVelocity(velocity: number): number {
  return Math.max(0, Math.min(127, Math.trunc(velocity * 127)))
}
