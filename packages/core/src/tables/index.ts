// =============================================================================
// SongSketch - Lookup Tables
// =============================================================================

import generalMidi from './general-midi.json'

/**
 * Marks an instrument name that refers to the drum kit rather than a melodic program.
 */
export const PERCUSSION = 'percussion' as const

export type InstrumentProgram = number | typeof PERCUSSION

/**
 * Every fixed vocabulary the parser, compiler and exporter consult.
 * Passed explicitly so callers (and tests) can substitute their own.
 */
export interface MusicTables {
  /** Duration code -> beats */
  readonly durations: ReadonlyMap<string, number>
  /** Dynamics code -> normalized velocity */
  readonly dynamics: ReadonlyMap<string, number>
  /** Note name (C, C#, Db, ...) -> semitone above C */
  readonly noteSemitones: ReadonlyMap<string, number>
  /** Chord quality suffix -> semitone intervals from the root */
  readonly chordIntervals: ReadonlyMap<string, readonly number[]>
  /** Lowercase instrument name -> General MIDI program */
  readonly instruments: ReadonlyMap<string, InstrumentProgram>
  /** Program for instrument names missing from the table */
  readonly defaultProgram: number
  /** Lowercase drum name -> General MIDI percussion key */
  readonly drums: ReadonlyMap<string, number>
  /** Percussion key for drum names missing from the table */
  readonly defaultDrumPitch: number
}

/**
 * Plain-object form accepted by {@link createTables}.
 */
export interface MusicTableOverrides {
  durations?: Record<string, number>
  dynamics?: Record<string, number>
  noteSemitones?: Record<string, number>
  chordIntervals?: Record<string, readonly number[]>
  instruments?: Record<string, InstrumentProgram>
  defaultProgram?: number
  drums?: Record<string, number>
  defaultDrumPitch?: number
}

// =============================================================================
// Built-in Vocabularies
// =============================================================================

// w=whole, h=half, q=quarter, e=eighth, s=sixteenth, d=dotted, t=triplet eighth
const DURATIONS: Record<string, number> = {
  w: 4.0,
  h: 2.0,
  dh: 3.0,
  q: 1.0,
  dq: 1.5,
  e: 0.5,
  de: 0.75,
  s: 0.25,
  t: 0.333
}

const DYNAMICS: Record<string, number> = {
  ppp: 0.15,
  pp: 0.25,
  p: 0.4,
  mp: 0.55,
  mf: 0.7,
  f: 0.85,
  ff: 0.95,
  fff: 1.0
}

const NOTE_SEMITONES: Record<string, number> = {
  'C': 0, 'C#': 1, 'Db': 1, 'D': 2, 'D#': 3, 'Eb': 3,
  'E': 4, 'F': 5, 'F#': 6, 'Gb': 6, 'G': 7, 'G#': 8,
  'Ab': 8, 'A': 9, 'A#': 10, 'Bb': 10, 'B': 11
}

const CHORD_INTERVALS: Record<string, readonly number[]> = {
  '': [0, 4, 7],          // Major
  'm': [0, 3, 7],         // Minor
  '7': [0, 4, 7, 10],     // Dominant 7
  'maj7': [0, 4, 7, 11],  // Major 7
  'm7': [0, 3, 7, 10],    // Minor 7
  'dim': [0, 3, 6],
  'dim7': [0, 3, 6, 9],
  'aug': [0, 4, 8],
  'sus2': [0, 2, 7],
  'sus4': [0, 5, 7],
  'add9': [0, 4, 7, 14],
  '9': [0, 4, 7, 10, 14]  // Dominant 9
}

function loadInstrumentPrograms(): Record<string, InstrumentProgram> {
  const programs: Record<string, InstrumentProgram> = {}
  for (const [name, value] of Object.entries(generalMidi.instruments)) {
    if (typeof value === 'number') {
      programs[name] = value
    } else if (value === 'drums') {
      programs[name] = PERCUSSION
    }
  }
  return programs
}

// =============================================================================
// Construction
// =============================================================================

function toMap<T>(record: Record<string, T>): ReadonlyMap<string, T> {
  return new Map(Object.entries(record))
}

/**
 * Build a table set. Each override replaces the whole built-in table it names.
 */
export function createTables(overrides: MusicTableOverrides = {}): MusicTables {
  return Object.freeze({
    durations: toMap(overrides.durations ?? DURATIONS),
    dynamics: toMap(overrides.dynamics ?? DYNAMICS),
    noteSemitones: toMap(overrides.noteSemitones ?? NOTE_SEMITONES),
    chordIntervals: toMap(overrides.chordIntervals ?? CHORD_INTERVALS),
    instruments: toMap(overrides.instruments ?? loadInstrumentPrograms()),
    defaultProgram: overrides.defaultProgram ?? generalMidi.defaultProgram,
    drums: toMap(overrides.drums ?? generalMidi.drums),
    defaultDrumPitch: overrides.defaultDrumPitch ?? generalMidi.defaultDrumPitch
  })
}

/**
 * The General MIDI table set used when no tables are supplied.
 */
export const DEFAULT_TABLES: MusicTables = createTables()

// =============================================================================
// Lookups
// =============================================================================

/**
 * Resolve an instrument name to its program, or PERCUSSION for drum-kit aliases.
 */
export function lookupProgram(instrument: string, tables: MusicTables = DEFAULT_TABLES): InstrumentProgram {
  return tables.instruments.get(instrument.toLowerCase()) ?? tables.defaultProgram
}

/**
 * Resolve an instrument name to a melodic program; drum-kit aliases fall back to the default.
 */
export function melodicProgram(instrument: string, tables: MusicTables = DEFAULT_TABLES): number {
  const program = lookupProgram(instrument, tables)
  return program === PERCUSSION ? tables.defaultProgram : program
}

export function lookupDrumPitch(drum: string, tables: MusicTables = DEFAULT_TABLES): number {
  return tables.drums.get(drum.toLowerCase()) ?? tables.defaultDrumPitch
}
