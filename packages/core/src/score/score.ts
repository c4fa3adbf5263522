import type { DrumTrack, InstrumentTrack, Score, Section } from './types'

// =============================================================================
// Defaults
// =============================================================================

export const BEATS_PER_BAR = 4

export const DEFAULT_TITLE = 'Untitled'
export const DEFAULT_TEMPO = 120
export const DEFAULT_KEY = 'C'
export const DEFAULT_TIME_SIGNATURE = '4/4'
export const DEFAULT_SECTION_BARS = 8
export const DEFAULT_NOTE_VELOCITY = 0.7
export const DEFAULT_HIT_VELOCITY = 0.8
export const DEFAULT_TRACK_VOLUME = 0.8
export const DEFAULT_TRACK_PAN = 0.5
export const DEFAULT_DRUM_TRACK_NAME = 'Drums'

// =============================================================================
// Factories
// =============================================================================

export function createScore(fields: Partial<Score> = {}): Score {
  return {
    title: fields.title ?? DEFAULT_TITLE,
    tempo: fields.tempo ?? DEFAULT_TEMPO,
    key: fields.key ?? DEFAULT_KEY,
    timeSignature: fields.timeSignature ?? DEFAULT_TIME_SIGNATURE,
    sections: fields.sections ?? []
  }
}

export function createSection(
  name: string,
  bars: number = DEFAULT_SECTION_BARS,
  fields: Partial<Omit<Section, 'name' | 'bars'>> = {}
): Section {
  const section: Section = {
    name,
    bars,
    startBar: fields.startBar ?? 0,
    tracks: fields.tracks ?? []
  }
  if (fields.key !== undefined) section.key = fields.key
  if (fields.tempo !== undefined) section.tempo = fields.tempo
  if (fields.drums !== undefined) section.drums = fields.drums
  return section
}

export function createInstrumentTrack(
  name: string,
  instrument: string,
  fields: Partial<Omit<InstrumentTrack, 'name' | 'instrument'>> = {}
): InstrumentTrack {
  return {
    name,
    instrument,
    notes: fields.notes ?? [],
    chords: fields.chords ?? [],
    volume: fields.volume ?? DEFAULT_TRACK_VOLUME,
    pan: fields.pan ?? DEFAULT_TRACK_PAN
  }
}

export function createDrumTrack(fields: Partial<DrumTrack> = {}): DrumTrack {
  return {
    name: fields.name ?? DEFAULT_DRUM_TRACK_NAME,
    hits: fields.hits ?? [],
    volume: fields.volume ?? DEFAULT_TRACK_VOLUME
  }
}

// =============================================================================
// Derived Quantities
// =============================================================================

export function totalBars(score: Score): number {
  return score.sections.reduce((sum, section) => sum + section.bars, 0)
}

export function totalBeats(score: Score): number {
  return totalBars(score) * BEATS_PER_BAR
}

/**
 * Song length in seconds at the song tempo.
 */
export function durationSeconds(score: Score): number {
  return (totalBeats(score) / score.tempo) * 60
}

export function sectionDurationBeats(section: Section): number {
  return section.bars * BEATS_PER_BAR
}

/**
 * Reassign every section's start bar as the running total of the bars before it.
 */
export function assignStartBars(sections: Section[]): void {
  let bar = 0
  for (const section of sections) {
    section.startBar = bar
    bar += section.bars
  }
}

/**
 * True when any section carries at least one drum hit.
 */
export function hasDrumHits(score: Score): boolean {
  return score.sections.some(section => section.drums !== undefined && section.drums.hits.length > 0)
}
