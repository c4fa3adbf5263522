import type { SchemaVersion } from '../schema/version'

/**
 * Serializable score format: plain JSON with snake_case field names.
 * Optional section fields are left out when the section has none.
 */
export interface ScoreDocument {
  readonly _version: SchemaVersion
  title: string
  tempo: number
  key: string
  time_signature: string
  sections: SectionDocument[]
}

export interface SectionDocument {
  name: string
  bars: number
  start_bar: number
  key?: string
  tempo?: number
  tracks: TrackDocument[]
  drums?: DrumTrackDocument
}

export interface TrackDocument {
  name: string
  instrument: string
  notes: NoteDocument[]
  chords: ChordDocument[]
  volume: number
  pan: number
}

export interface NoteDocument {
  pitch: number
  start: number
  duration: number
  velocity: number
}

export interface ChordDocument {
  root: string
  quality: string
  octave: number
  start: number
  duration: number
  velocity: number
}

export interface DrumTrackDocument {
  name: string
  hits: DrumHitDocument[]
  volume: number
}

export interface DrumHitDocument {
  drum: string
  start: number
  velocity: number
}
