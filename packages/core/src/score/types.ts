// =============================================================================
// SongSketch - Score Model
// =============================================================================

/**
 * A single pitched note. Times are in beats relative to the section start.
 */
export interface Note {
  /** MIDI pitch (0-127) */
  pitch: number
  start: number
  /** Duration in beats (> 0) */
  duration: number
  /** Normalized velocity (0-1) */
  velocity: number
}

/**
 * A chord kept in symbolic form. Interval expansion happens at compile/export time.
 */
export interface Chord {
  /** Root letter with optional accidental: C, F#, Bb */
  root: string
  /** Quality suffix as written ('' = major, 'm', 'maj7', ...) */
  quality: string
  octave: number
  start: number
  duration: number
  velocity: number
}

export interface DrumHit {
  /** Lowercase drum name (kick, snare, hat, ...) */
  drum: string
  start: number
  velocity: number
}

export interface InstrumentTrack {
  /** Display name, e.g. "Piano" */
  name: string
  /** Lowercase key into the instrument table */
  instrument: string
  notes: Note[]
  chords: Chord[]
  /** 0-1 */
  volume: number
  /** 0 = left, 0.5 = center, 1 = right */
  pan: number
}

export interface DrumTrack {
  name: string
  hits: DrumHit[]
  volume: number
}

export interface Section {
  name: string
  bars: number
  /** Assigned from the running total of preceding sections, never declared */
  startBar: number
  /** Informational; timing always uses the song tempo */
  key?: string
  tempo?: number
  tracks: InstrumentTrack[]
  drums?: DrumTrack
}

export interface Score {
  title: string
  /** Beats per minute (integer > 0) */
  tempo: number
  key: string
  /** Informational; the format always assumes 4 beats per bar */
  timeSignature: string
  sections: Section[]
}

/**
 * Result of a parse call. Diagnostics live here, never on the score.
 */
export interface ParseResult {
  /** Undefined when the input was unusable */
  score?: Score
  errors: string[]
  warnings: string[]
}
