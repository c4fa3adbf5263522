// =============================================================================
// SongSketch - Export Types
// =============================================================================

/**
 * Options for MIDI file export.
 */
export interface MidiExportOptions {
  /**
   * Pulses (ticks) per quarter note.
   * @default 480
   */
  ppq?: number

  /**
   * Include track name meta events.
   * @default true
   */
  includeTrackNames?: boolean

  /**
   * Write each track's volume (CC7) and pan (CC10) at tick 0.
   * @default true
   */
  includeMixer?: boolean
}

/**
 * One exported track, in file order after the tempo track.
 */
export interface MidiExportTrackInfo {
  name: string
  channel: number
  /** Program change sent at tick 0; null for the drum track */
  program: number | null
  noteCount: number
}

/**
 * Result of MIDI export operation.
 */
export interface MidiExportResult {
  /** Raw MIDI file data */
  buffer: ArrayBuffer
  /** Number of tracks in the file, tempo track included */
  trackCount: number
  /** Song length in ticks */
  durationTicks: number
  ppq: number
  tracks: MidiExportTrackInfo[]
}

// =============================================================================
// Internal MIDI Types (for building MIDI files)
// =============================================================================

/**
 * Setup messages sort before note-offs, note-offs before note-ons on the same tick.
 */
export type MidiEventOrder = 0 | 1 | 2

export interface MidiTrackEvent {
  /** Absolute tick position */
  tick: number
  order: MidiEventOrder
  /** Event bytes without the delta time */
  data: Uint8Array
}

export interface MidiTrackData {
  name?: string
  events: MidiTrackEvent[]
}
