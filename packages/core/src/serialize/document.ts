// =============================================================================
// SongSketch - Score Serialization
// =============================================================================

import type { Chord, DrumHit, DrumTrack, InstrumentTrack, Note, Score, Section } from '../score/types'
import {
  DEFAULT_DRUM_TRACK_NAME,
  DEFAULT_HIT_VELOCITY,
  DEFAULT_KEY,
  DEFAULT_NOTE_VELOCITY,
  DEFAULT_TEMPO,
  DEFAULT_TIME_SIGNATURE,
  DEFAULT_TITLE,
  DEFAULT_TRACK_PAN,
  DEFAULT_TRACK_VOLUME,
  createSection
} from '../score/score'
import { SCHEMA_VERSION } from '../schema/version'
import { validateSchema, type ValidateSchemaOptions } from '../schema/validate'
import type { VersionedDocument } from '../schema/migrations'
import { ScoreFormatError } from './errors'
import type { DrumTrackDocument, ScoreDocument, SectionDocument, TrackDocument } from './types'

// =============================================================================
// Serialize
// =============================================================================

function serializeTrack(track: InstrumentTrack): TrackDocument {
  return {
    name: track.name,
    instrument: track.instrument,
    notes: track.notes.map(n => ({ pitch: n.pitch, start: n.start, duration: n.duration, velocity: n.velocity })),
    chords: track.chords.map(c => ({
      root: c.root,
      quality: c.quality,
      octave: c.octave,
      start: c.start,
      duration: c.duration,
      velocity: c.velocity
    })),
    volume: track.volume,
    pan: track.pan
  }
}

function serializeDrums(drums: DrumTrack): DrumTrackDocument {
  return {
    name: drums.name,
    hits: drums.hits.map(h => ({ drum: h.drum, start: h.start, velocity: h.velocity })),
    volume: drums.volume
  }
}

function serializeSection(section: Section): SectionDocument {
  const doc: SectionDocument = {
    name: section.name,
    bars: section.bars,
    start_bar: section.startBar,
    tracks: section.tracks.map(serializeTrack)
  }
  if (section.key !== undefined) doc.key = section.key
  if (section.tempo !== undefined) doc.tempo = section.tempo
  if (section.drums !== undefined) doc.drums = serializeDrums(section.drums)
  return doc
}

/**
 * Serialize a score for storage or transmission.
 * The result shares nothing with the score and can be JSON.stringify'd as is.
 */
export function serializeScore(score: Score): ScoreDocument {
  return {
    _version: SCHEMA_VERSION,
    title: score.title,
    tempo: score.tempo,
    key: score.key,
    time_signature: score.timeSignature,
    sections: score.sections.map(serializeSection)
  }
}

// =============================================================================
// Deserialize
// =============================================================================

type Fields = Record<string, unknown>

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function at(path: string, field: string): string {
  return path ? `${path}.${field}` : field
}

function record(value: unknown, path: string): Fields {
  if (!isRecord(value)) throw new ScoreFormatError(path || '$', 'an object')
  return value
}

function list(fields: Fields, field: string, path: string): unknown[] {
  const value = fields[field]
  if (value === undefined || value === null) return []
  if (!Array.isArray(value)) throw new ScoreFormatError(at(path, field), 'an array')
  return value
}

function num(fields: Fields, field: string, path: string, fallback?: number): number {
  const value = fields[field]
  if ((value === undefined || value === null) && fallback !== undefined) return fallback
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ScoreFormatError(at(path, field), 'a number')
  }
  return value
}

function positive(fields: Fields, field: string, path: string, fallback?: number): number {
  const value = num(fields, field, path, fallback)
  if (value <= 0) throw new ScoreFormatError(at(path, field), 'a positive number')
  return value
}

function str(fields: Fields, field: string, path: string, fallback?: string): string {
  const value = fields[field]
  if ((value === undefined || value === null) && fallback !== undefined) return fallback
  if (typeof value !== 'string') throw new ScoreFormatError(at(path, field), 'a string')
  return value
}

function readNote(value: unknown, path: string): Note {
  const f = record(value, path)
  return {
    pitch: num(f, 'pitch', path),
    start: num(f, 'start', path),
    duration: positive(f, 'duration', path),
    velocity: num(f, 'velocity', path, DEFAULT_NOTE_VELOCITY)
  }
}

function readChord(value: unknown, path: string): Chord {
  const f = record(value, path)
  return {
    root: str(f, 'root', path),
    quality: str(f, 'quality', path),
    octave: num(f, 'octave', path),
    start: num(f, 'start', path),
    duration: positive(f, 'duration', path),
    velocity: num(f, 'velocity', path, DEFAULT_NOTE_VELOCITY)
  }
}

function readTrack(value: unknown, path: string): InstrumentTrack {
  const f = record(value, path)
  return {
    name: str(f, 'name', path),
    instrument: str(f, 'instrument', path),
    notes: list(f, 'notes', path).map((n, i) => readNote(n, `${at(path, 'notes')}[${i}]`)),
    chords: list(f, 'chords', path).map((c, i) => readChord(c, `${at(path, 'chords')}[${i}]`)),
    volume: num(f, 'volume', path, DEFAULT_TRACK_VOLUME),
    pan: num(f, 'pan', path, DEFAULT_TRACK_PAN)
  }
}

function readHit(value: unknown, path: string): DrumHit {
  const f = record(value, path)
  return {
    drum: str(f, 'drum', path),
    start: num(f, 'start', path),
    velocity: num(f, 'velocity', path, DEFAULT_HIT_VELOCITY)
  }
}

function readDrums(value: unknown, path: string): DrumTrack {
  const f = record(value, path)
  return {
    name: str(f, 'name', path, DEFAULT_DRUM_TRACK_NAME),
    hits: list(f, 'hits', path).map((h, i) => readHit(h, `${at(path, 'hits')}[${i}]`)),
    volume: num(f, 'volume', path, DEFAULT_TRACK_VOLUME)
  }
}

function readSection(value: unknown, path: string): Section {
  const f = record(value, path)
  const isPresent = (field: string): boolean => f[field] !== undefined && f[field] !== null

  return createSection(str(f, 'name', path), positive(f, 'bars', path), {
    startBar: num(f, 'start_bar', path, 0),
    key: isPresent('key') ? str(f, 'key', path) : undefined,
    tempo: isPresent('tempo') ? positive(f, 'tempo', path) : undefined,
    tracks: list(f, 'tracks', path).map((t, i) => readTrack(t, `${at(path, 'tracks')}[${i}]`)),
    drums: isPresent('drums') ? readDrums(f.drums, at(path, 'drums')) : undefined
  })
}

function toVersioned(fields: Fields): VersionedDocument {
  const version = fields._version
  if (typeof version === 'string') return { ...fields, _version: version }
  if (version === undefined || version === null) return { ...fields, _version: undefined }
  throw new ScoreFormatError('_version', 'a version string')
}

/**
 * Rebuild a score from a serialized document.
 *
 * The document's version is checked first and older documents are migrated
 * unless `migrate: false` is passed. Missing optional fields take their
 * defaults; anything else malformed throws {@link ScoreFormatError}.
 */
export function deserializeScore(document: unknown, options: ValidateSchemaOptions = {}): Score {
  const versioned = validateSchema(toVersioned(record(document, '')), {
    strict: options.strict,
    migrate: options.migrate ?? true
  })

  return {
    title: str(versioned, 'title', '', DEFAULT_TITLE),
    tempo: positive(versioned, 'tempo', '', DEFAULT_TEMPO),
    key: str(versioned, 'key', '', DEFAULT_KEY),
    timeSignature: str(versioned, 'time_signature', '', DEFAULT_TIME_SIGNATURE),
    sections: list(versioned, 'sections', '').map((s, i) => readSection(s, `sections[${i}]`))
  }
}

// =============================================================================
// JSON
// =============================================================================

export function scoreToJSON(score: Score, indent: number = 2): string {
  return JSON.stringify(serializeScore(score), null, indent)
}

/**
 * Parse JSON text and deserialize the score it holds.
 */
export function scoreFromJSON(json: string, options: ValidateSchemaOptions = {}): Score {
  const parsed: unknown = JSON.parse(json)
  return deserializeScore(parsed, options)
}
