// =============================================================================
// SongSketch - Compiled Score Types
// =============================================================================

export type TimedEventKind = 'note_on' | 'note_off'

/**
 * A note-on or note-off at an absolute time in seconds.
 */
export interface TimedEvent {
  readonly kind: TimedEventKind
  /** Seconds from the start of the song */
  readonly seconds: number
  /** MIDI channel (0-15); 9 is percussion */
  readonly channel: number
  /** MIDI pitch (0-127) */
  readonly pitch: number
  /** MIDI velocity (0-127); 0 for note-offs */
  readonly velocity: number
  /** Name of the track the event belongs to */
  readonly track: string
}

/**
 * Channel and sound a track plays on during live playback.
 */
export interface ChannelAssignment {
  readonly track: string
  /** Instrument key of the first track seen with this name */
  readonly instrument: string
  readonly channel: number
  /** General MIDI program (0 for the drum kit) */
  readonly program: number
  readonly percussion: boolean
  readonly volume: number
  readonly pan: number
}

export interface CompiledScore {
  /** Sorted by `seconds`; ties keep enumeration order */
  readonly events: readonly TimedEvent[]
  /** In channel assignment order, the drum channel last */
  readonly channels: readonly ChannelAssignment[]
  readonly tempo: number
  readonly durationSeconds: number
}
